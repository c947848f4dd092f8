import {
  WebSocketGateway,
  WebSocketServer,
  SubscribeMessage,
} from '@nestjs/websockets';
import { Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Server, Socket } from 'socket.io';
import {
  AuctionService,
  type AuctionStateChangeEvent,
} from './auction.service';
import { extractBearerToken, verifyCallerToken } from '../auth/clerk-token';

interface AuctionPayload {
  auctionId?: string;
}

interface PlaceBidPayload extends AuctionPayload {
  amount?: number;
  idempotencyKey?: string;
}

interface SocketSession {
  callerId: string;
}

@WebSocketGateway({ cors: { origin: '*' } })
export class AuctionGateway implements OnModuleInit {
  @WebSocketServer()
  server!: Server;

  private readonly logger = new Logger(AuctionGateway.name);
  private readonly sessionBySocketId = new Map<string, SocketSession>();

  constructor(
    private readonly auctionService: AuctionService,
    private readonly config: ConfigService,
  ) {}

  async handleConnection(client: Socket): Promise<void> {
    const token = this.extractToken(client);
    const secretKey = this.config.get<string>('clerk.secretKey');
    if (!token || !secretKey) {
      client.emit('auth_error', { message: 'Authentication required' });
      client.disconnect(true);
      return;
    }

    try {
      const callerId = await verifyCallerToken(token, secretKey);
      this.sessionBySocketId.set(client.id, { callerId });
      this.logger.debug(`Socket authenticated id=${client.id} caller=${callerId}`);
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      this.logger.warn(`Socket auth failed: ${msg}`);
      client.emit('auth_error', { message: 'Authentication failed' });
      client.disconnect(true);
    }
  }

  handleDisconnect(client: Socket): void {
    this.sessionBySocketId.delete(client.id);
  }

  private extractToken(client: Socket): string | null {
    const authToken: unknown = client.handshake.auth?.token;
    if (typeof authToken === 'string' && authToken.trim()) {
      return authToken.trim();
    }
    return extractBearerToken(client.handshake.headers?.authorization);
  }

  private requireSession(client: Socket): SocketSession | null {
    const session = this.sessionBySocketId.get(client.id) ?? null;
    if (!session) {
      client.emit('auth_error', { message: 'Authentication required' });
      client.disconnect(true);
      return null;
    }
    return session;
  }

  onModuleInit(): void {
    this.auctionService
      .getEventEmitter()
      .on('stateChange', (data: AuctionStateChangeEvent) => {
        const room = this.auctionService.getRoomName(data.auctionId);
        if (data.event === 'auction_event') {
          this.server.to(room).emit('auction_event', {
            auctionId: data.auctionId,
            ...data.notification,
          });
        } else {
          this.server.to(room).emit('auction_state', data.state);
        }
      });
  }

  @SubscribeMessage('join_auction')
  async handleJoinAuction(
    client: Socket,
    payload: AuctionPayload,
  ): Promise<void> {
    if (!this.requireSession(client)) return;

    const { auctionId } = payload ?? {};
    if (!auctionId) {
      client.emit('error', { message: 'auctionId required' });
      return;
    }
    await client.join(this.auctionService.getRoomName(auctionId));
    const state = await this.auctionService.getState(auctionId);
    client.emit('auction_state', state ?? { error: 'Auction not found' });
  }

  @SubscribeMessage('leave_auction')
  async handleLeaveAuction(
    client: Socket,
    payload: AuctionPayload,
  ): Promise<void> {
    if (!this.requireSession(client)) return;

    const { auctionId } = payload ?? {};
    if (auctionId) {
      await client.leave(this.auctionService.getRoomName(auctionId));
    }
  }

  @SubscribeMessage('place_bid')
  async handlePlaceBid(
    client: Socket,
    payload: PlaceBidPayload,
  ): Promise<void> {
    const session = this.requireSession(client);
    if (!session) return;

    const { auctionId, amount, idempotencyKey } = payload ?? {};
    if (!auctionId || typeof amount !== 'number') {
      client.emit('bid_result', {
        accepted: false,
        reason: 'auctionId, amount required',
      });
      return;
    }
    const result = await this.auctionService.placeBid(
      auctionId,
      session.callerId,
      amount,
      idempotencyKey,
    );
    client.emit('bid_result', result);
  }

  @SubscribeMessage('withdraw')
  async handleWithdraw(
    client: Socket,
    payload: AuctionPayload,
  ): Promise<void> {
    const session = this.requireSession(client);
    if (!session) return;

    const { auctionId } = payload ?? {};
    if (!auctionId) {
      client.emit('withdraw_result', {
        withdrawn: false,
        reason: 'auctionId required',
      });
      return;
    }
    const result = await this.auctionService.withdraw(
      auctionId,
      session.callerId,
    );
    client.emit('withdraw_result', result);
  }
}
