import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter } from 'node:events';
import { randomUUID } from 'node:crypto';
import { AuctionEngine } from './engine';
import type {
  AssetRegistry,
  AuctionErrorCode,
  AuctionEvent,
  AuctionState,
  CreateAuctionInput,
  PaymentLedger,
} from './engine';
import { RedisService } from '../redis/redis.service';
import { AuctionPersistenceService } from './auction-persistence.service';
import type { AuctionSummary } from './auction-persistence.service';
import { ASSET_REGISTRY, PAYMENT_LEDGER } from '../ledger/ledger.tokens';

const AUCTION_ROOM_PREFIX = 'auction:';

export type AuctionStateChangeEvent =
  | { event: 'auction_state'; auctionId: string; state: AuctionState }
  | { event: 'auction_event'; auctionId: string; notification: AuctionEvent };

export type ServiceErrorCode =
  | AuctionErrorCode
  | 'AUCTION_NOT_FOUND'
  | 'DUPLICATE_IN_PROGRESS';

export interface ServiceRejection {
  code: ServiceErrorCode;
  reason: string;
}

export type StartOutcome =
  | { started: true; endAt: number }
  | ({ started: false } & ServiceRejection);
export type BidOutcome =
  | { accepted: true }
  | ({ accepted: false } & ServiceRejection);
export type WithdrawOutcome =
  | { withdrawn: true; amount: number }
  | ({ withdrawn: false } & ServiceRejection);
export type EndOutcome =
  | { ended: true; winner: string | null; finalPrice: number }
  | ({ ended: false } & ServiceRejection);

export interface CreateAuctionRequest {
  assetId: string;
  startingPrice: number;
}

interface AuctionEntry {
  engine: AuctionEngine;
  settleTimer: ReturnType<typeof setTimeout> | null;
}

const NOT_FOUND: ServiceRejection = {
  code: 'AUCTION_NOT_FOUND',
  reason: 'Auction not found',
};

function isServiceErrorCode(code: string): code is ServiceErrorCode {
  return [
    'UNAUTHORIZED',
    'ALREADY_STARTED',
    'NOT_STARTED',
    'AUCTION_EXPIRED',
    'ALREADY_ENDED',
    'TOO_EARLY',
    'OPERATION_IN_PROGRESS',
    'BID_TOO_LOW',
    'INVALID_AMOUNT',
    'EXTERNAL_CALL_FAILED',
    'AUCTION_NOT_FOUND',
    'DUPLICATE_IN_PROGRESS',
  ].includes(code);
}

@Injectable()
export class AuctionService implements OnModuleInit, OnModuleDestroy {
  private readonly auctions = new Map<string, AuctionEntry>();
  private readonly eventEmitter = new EventEmitter();
  private readonly logger = new Logger(AuctionService.name);
  private readonly auctionLocks = new Map<string, Promise<void>>();
  private readonly autoSettle: boolean;
  private readonly registryName: string;

  constructor(
    private readonly redis: RedisService,
    private readonly persistence: AuctionPersistenceService,
    @Inject(ASSET_REGISTRY) private readonly assets: AssetRegistry,
    @Inject(PAYMENT_LEDGER) private readonly payments: PaymentLedger,
    config: ConfigService,
  ) {
    this.autoSettle = config.get<boolean>('auction.autoSettle') ?? true;
    this.registryName = config.get<string>('ledger.registry') ?? 'default';
  }

  /* ------------------------------------------------------------------ */
  /*  RECOVERY: re-hydrate from Redis on startup                         */
  /* ------------------------------------------------------------------ */

  async onModuleInit(): Promise<void> {
    const open = await this.persistence.loadOpenAuctions();
    for (const state of open) {
      this.auctions.set(state.id, {
        engine: this.hydrate(state),
        settleTimer: null,
      });
      this.scheduleSettlement(state.id);
    }
    this.logger.log(`Recovered ${open.length} auction(s) from storage`);
  }

  onModuleDestroy(): void {
    for (const entry of this.auctions.values()) {
      if (entry.settleTimer) clearTimeout(entry.settleTimer);
      entry.settleTimer = null;
    }
  }

  /* ------------------------------------------------------------------ */
  /*  PUBLIC API                                                         */
  /* ------------------------------------------------------------------ */

  getEventEmitter(): EventEmitter {
    return this.eventEmitter;
  }

  getRoomName(auctionId: string): string {
    return `${AUCTION_ROOM_PREFIX}${auctionId}`;
  }

  /** Create auction in CREATED; the caller becomes the seller */
  async createAuction(
    seller: string,
    request: CreateAuctionRequest,
  ): Promise<AuctionState | { error: string }> {
    const assetId = request.assetId.trim();
    if (!assetId) return { error: 'assetId required' };
    if (
      !Number.isSafeInteger(request.startingPrice) ||
      request.startingPrice < 0
    ) {
      return { error: 'startingPrice must be a non-negative integer' };
    }

    const id = randomUUID();
    const engine = this.createEngine(id, {
      seller,
      assetId,
      startingPrice: request.startingPrice,
      assetRegistry: this.registryName,
    });
    const state = engine.getState();

    await this.persistence.persistAuction(state);
    this.auctions.set(id, { engine, settleTimer: null });
    this.logger.log(`Auction ${id} created by ${seller} for asset ${assetId}`);
    return state;
  }

  async listAuctions(): Promise<AuctionSummary[]> {
    return this.persistence.listAuctions();
  }

  /** Get state: in-memory first, fallback to storage for settled auctions */
  async getState(auctionId: string): Promise<AuctionState | null> {
    const entry = this.auctions.get(auctionId);
    if (entry) return entry.engine.getState();
    return this.persistence.loadAuction(auctionId);
  }

  async getRefundable(
    auctionId: string,
    address: string,
  ): Promise<number | null> {
    const state = await this.getState(auctionId);
    if (!state) return null;
    return state.refundable[address] ?? 0;
  }

  /** Start: seller escrows the asset and the 7-day window opens */
  async startAuction(
    auctionId: string,
    caller: string,
  ): Promise<StartOutcome> {
    return this.withAuctionLock(auctionId, async () => {
      const entry = await this.resolveEntry(auctionId);
      if (!entry) return { started: false, ...NOT_FOUND };

      const result = await entry.engine.start(caller);
      if (!result.started) return result;

      await this.persist(entry);
      this.scheduleSettlement(auctionId);
      this.publish(auctionId, result.event);
      return { started: true, endAt: result.endAt };
    });
  }

  /**
   * Place bid. With an idempotency key, retries return the first outcome
   * instead of bidding again.
   */
  async placeBid(
    auctionId: string,
    bidder: string,
    amount: number,
    idempotencyKey?: string,
  ): Promise<BidOutcome> {
    const normalizedIdempotencyKey =
      idempotencyKey?.trim().slice(0, 128) || null;
    if (!normalizedIdempotencyKey) {
      return this.withAuctionLock(auctionId, () =>
        this.bidLocked(auctionId, bidder, amount),
      );
    }

    const existing = await this.readIdempotentBid(
      auctionId,
      bidder,
      normalizedIdempotencyKey,
    );
    if (existing) return existing;

    const claimed = await this.redis.claimBidIdempotency(
      auctionId,
      bidder,
      normalizedIdempotencyKey,
    );
    if (!claimed) {
      const settled = await this.waitForBidIdempotencyResult(
        auctionId,
        bidder,
        normalizedIdempotencyKey,
      );
      return (
        settled ?? {
          accepted: false,
          code: 'DUPLICATE_IN_PROGRESS',
          reason: 'Duplicate bid in progress',
        }
      );
    }

    const result = await this.withAuctionLock(auctionId, () =>
      this.bidLocked(auctionId, bidder, amount),
    );
    await this.redis.storeBidIdempotencyResult(
      auctionId,
      bidder,
      normalizedIdempotencyKey,
      result,
    );
    return result;
  }

  /** Withdraw outbid funds; valid before and after the auction ends */
  async withdraw(auctionId: string, caller: string): Promise<WithdrawOutcome> {
    return this.withAuctionLock(auctionId, async () => {
      const entry = await this.resolveEntry(auctionId);
      if (!entry) return { withdrawn: false, ...NOT_FOUND };

      const result = await entry.engine.withdraw(caller);
      if (!result.withdrawn) return result;
      if (result.event) {
        const persisted = await this.persist(entry);
        this.publish(auctionId, result.event);
        if (persisted) this.releaseIfSettled(auctionId, entry);
      }
      return { withdrawn: true, amount: result.amount };
    });
  }

  /** Settle after the deadline; anyone may call */
  async endAuction(auctionId: string): Promise<EndOutcome> {
    return this.withAuctionLock(auctionId, async () => {
      const entry = await this.resolveEntry(auctionId);
      if (!entry) return { ended: false, ...NOT_FOUND };

      const result = await entry.engine.end();
      if (!result.ended) return result;

      if (entry.settleTimer) {
        clearTimeout(entry.settleTimer);
        entry.settleTimer = null;
      }
      const persisted = await this.persist(entry);
      this.publish(auctionId, result.event);
      if (persisted) this.releaseIfSettled(auctionId, entry);
      this.logger.log(
        `Auction ${auctionId} ended: winner=${result.winner ?? '(none)'} price=${result.finalPrice}`,
      );
      return {
        ended: true,
        winner: result.winner,
        finalPrice: result.finalPrice,
      };
    });
  }

  /* ------------------------------------------------------------------ */
  /*  TIMER LOGIC                                                        */
  /* ------------------------------------------------------------------ */

  private scheduleSettlement(auctionId: string): void {
    const entry = this.auctions.get(auctionId);
    if (!entry) return;
    if (entry.settleTimer) {
      clearTimeout(entry.settleTimer);
      entry.settleTimer = null;
    }
    if (!this.autoSettle) return;
    const state = entry.engine.getState();
    if (state.status !== 'ACTIVE' || state.endAt === null) return;

    const delayMs = Math.max(0, state.endAt - Date.now());
    entry.settleTimer = setTimeout(() => {
      entry.settleTimer = null;
      this.onSettlementDue(auctionId).catch((err: unknown) =>
        this.logger.error(
          `Automatic settlement of ${auctionId} crashed`,
          err instanceof Error ? err.stack : String(err),
        ),
      );
    }, delayMs);
  }

  private async onSettlementDue(auctionId: string): Promise<void> {
    const result = await this.endAuction(auctionId);
    if (!result.ended) {
      this.logger.warn(
        `Automatic settlement of ${auctionId} rejected (${result.code}): ${result.reason}`,
      );
    }
  }

  /* ------------------------------------------------------------------ */
  /*  INTERNAL                                                           */
  /* ------------------------------------------------------------------ */

  private async bidLocked(
    auctionId: string,
    bidder: string,
    amount: number,
  ): Promise<BidOutcome> {
    const entry = await this.resolveEntry(auctionId);
    if (!entry) return { accepted: false, ...NOT_FOUND };

    const result = await entry.engine.bid(bidder, amount);
    if (!result.accepted) return result;

    await this.persist(entry);
    this.publish(auctionId, result.event);
    return { accepted: true };
  }

  private createEngine(
    auctionId: string,
    input: CreateAuctionInput,
  ): AuctionEngine {
    return new AuctionEngine(auctionId, input, {
      assets: this.assets,
      payments: this.payments,
    });
  }

  private hydrate(state: AuctionState): AuctionEngine {
    const engine = this.createEngine(state.id, {
      seller: state.seller,
      assetId: state.assetId,
      startingPrice: state.startingPrice,
      assetRegistry: state.assetRegistry,
    });
    engine.setState(state);
    return engine;
  }

  /** In-memory entry, re-hydrated from storage if it was released */
  private async resolveEntry(auctionId: string): Promise<AuctionEntry | null> {
    const cached = this.auctions.get(auctionId);
    if (cached) return cached;
    const state = await this.persistence.loadAuction(auctionId);
    if (!state) return null;
    const entry: AuctionEntry = { engine: this.hydrate(state), settleTimer: null };
    this.auctions.set(auctionId, entry);
    return entry;
  }

  /**
   * Drop ended auctions with no refunds left. Only called after a successful
   * write: the stored snapshot must already reflect the released state.
   */
  private releaseIfSettled(auctionId: string, entry: AuctionEntry): void {
    const state = entry.engine.getState();
    if (state.ended && Object.keys(state.refundable).length === 0) {
      this.auctions.delete(auctionId);
    }
  }

  /** Write the snapshot; failures are logged and reported as `false` */
  private async persist(entry: AuctionEntry): Promise<boolean> {
    const state = entry.engine.getState();
    try {
      await this.persistence.persistAuction(state);
      return true;
    } catch (err) {
      this.logger.error(
        `Failed to persist auction ${state.id}: ${err instanceof Error ? err.message : String(err)}`,
        err instanceof Error ? err.stack : undefined,
      );
      return false;
    }
  }

  private publish(auctionId: string, notification: AuctionEvent): void {
    const entry = this.auctions.get(auctionId);
    this.eventEmitter.emit('stateChange', {
      event: 'auction_event',
      auctionId,
      notification,
    } satisfies AuctionStateChangeEvent);
    if (!entry) return;
    this.eventEmitter.emit('stateChange', {
      event: 'auction_state',
      auctionId,
      state: entry.engine.getState(),
    } satisfies AuctionStateChangeEvent);
  }

  private async readIdempotentBid(
    auctionId: string,
    bidder: string,
    idempotencyKey: string,
  ): Promise<BidOutcome | null> {
    const stored = await this.redis.getBidIdempotencyResult(
      auctionId,
      bidder,
      idempotencyKey,
    );
    if (!stored) return null;
    if (stored.accepted) return { accepted: true };
    if (!isServiceErrorCode(stored.code)) return null;
    return { accepted: false, code: stored.code, reason: stored.reason };
  }

  private async waitForBidIdempotencyResult(
    auctionId: string,
    bidder: string,
    idempotencyKey: string,
  ): Promise<BidOutcome | null> {
    const maxAttempts = 40;
    for (let i = 0; i < maxAttempts; i += 1) {
      const result = await this.readIdempotentBid(
        auctionId,
        bidder,
        idempotencyKey,
      );
      if (result) return result;
      await new Promise((resolve) => setTimeout(resolve, 25));
    }
    return null;
  }

  private async withAuctionLock<T>(
    auctionId: string,
    fn: () => Promise<T>,
  ): Promise<T> {
    const prev = this.auctionLocks.get(auctionId) ?? Promise.resolve();
    let release!: () => void;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = prev.then(() => current);
    this.auctionLocks.set(auctionId, tail);

    await prev;
    try {
      return await fn();
    } finally {
      release();
      if (this.auctionLocks.get(auctionId) === tail) {
        this.auctionLocks.delete(auctionId);
      }
    }
  }
}
