import { Injectable, OnModuleDestroy, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';

export type StoredBidOutcome =
  | { accepted: true }
  | { accepted: false; code: string; reason: string };

function isStoredBidOutcome(value: unknown): value is StoredBidOutcome {
  if (typeof value !== 'object' || value === null) return false;
  if (!('accepted' in value)) return false;
  if (value.accepted === true) return true;
  return (
    value.accepted === false &&
    'code' in value &&
    typeof value.code === 'string' &&
    'reason' in value &&
    typeof value.reason === 'string'
  );
}

@Injectable()
export class RedisService implements OnModuleDestroy {
  private readonly client: Redis;
  private readonly logger = new Logger(RedisService.name);

  constructor(config: ConfigService) {
    const url = config.get<string>('redis.url') ?? 'redis://localhost:6379';
    this.client = new Redis(url);
    this.client.on('error', (err) =>
      this.logger.error('Redis connection error', err),
    );
    this.client.on('connect', () => this.logger.log('Connected to Redis'));
  }

  getClient(): Redis {
    return this.client;
  }

  private bidIdempotencyPendingKey(
    auctionId: string,
    bidder: string,
    idempotencyKey: string,
  ): string {
    return `auction:${auctionId}:bidder:${bidder}:idem:${idempotencyKey}:pending`;
  }

  private bidIdempotencyResultKey(
    auctionId: string,
    bidder: string,
    idempotencyKey: string,
  ): string {
    return `auction:${auctionId}:bidder:${bidder}:idem:${idempotencyKey}:result`;
  }

  async claimBidIdempotency(
    auctionId: string,
    bidder: string,
    idempotencyKey: string,
    ttlSec = 30,
  ): Promise<boolean> {
    const result = await this.client.set(
      this.bidIdempotencyPendingKey(auctionId, bidder, idempotencyKey),
      '1',
      'EX',
      ttlSec,
      'NX',
    );
    return result === 'OK';
  }

  async getBidIdempotencyResult(
    auctionId: string,
    bidder: string,
    idempotencyKey: string,
  ): Promise<StoredBidOutcome | null> {
    const raw = await this.client.get(
      this.bidIdempotencyResultKey(auctionId, bidder, idempotencyKey),
    );
    if (!raw) return null;
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      this.logger.warn(
        `Discarding unreadable idempotency result for auction ${auctionId}: ${String(err)}`,
      );
      return null;
    }
    return isStoredBidOutcome(parsed) ? parsed : null;
  }

  async storeBidIdempotencyResult(
    auctionId: string,
    bidder: string,
    idempotencyKey: string,
    result: StoredBidOutcome,
    ttlSec = 600,
  ): Promise<void> {
    const pipeline = this.client.pipeline();
    pipeline.set(
      this.bidIdempotencyResultKey(auctionId, bidder, idempotencyKey),
      JSON.stringify(result),
      'EX',
      ttlSec,
    );
    pipeline.del(
      this.bidIdempotencyPendingKey(auctionId, bidder, idempotencyKey),
    );
    await pipeline.exec();
  }

  async onModuleDestroy() {
    await this.client.quit();
  }
}
