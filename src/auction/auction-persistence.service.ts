import { Injectable, Logger } from '@nestjs/common';
import { RedisService } from '../redis/redis.service';
import type { AuctionState, AuctionStatus } from './engine';

const STATE_KEY_PREFIX = 'auction-state:';
const INDEX_KEY = 'auction-state:index';
const OPEN_KEY = 'auction-state:open';

/** Lightweight summary for listing auctions */
export interface AuctionSummary {
  id: string;
  seller: string;
  assetId: string;
  status: AuctionStatus;
  highestBid: number;
  highestBidder: string | null;
  endAt: number | null;
}

const STATUSES: readonly string[] = ['CREATED', 'ACTIVE', 'ENDED'];

function isNumberRecord(value: unknown): value is Record<string, number> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.values(value).every((v) => typeof v === 'number')
  );
}

function isAuctionState(value: unknown): value is AuctionState {
  if (typeof value !== 'object' || value === null) return false;
  const v: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  return (
    typeof v.id === 'string' &&
    typeof v.assetRegistry === 'string' &&
    typeof v.assetId === 'string' &&
    typeof v.seller === 'string' &&
    typeof v.escrowAddress === 'string' &&
    typeof v.startingPrice === 'number' &&
    typeof v.status === 'string' &&
    STATUSES.includes(v.status) &&
    typeof v.started === 'boolean' &&
    typeof v.ended === 'boolean' &&
    (v.endAt === null || typeof v.endAt === 'number') &&
    (v.highestBidder === null || typeof v.highestBidder === 'string') &&
    typeof v.highestBid === 'number' &&
    typeof v.escrowed === 'number' &&
    isNumberRecord(v.refundable)
  );
}

/**
 * Stores each auction as a JSON snapshot in Redis. Auctions that still have
 * work left (not ended, or ended with unclaimed refunds) are tracked in an
 * "open" set so they can be re-hydrated on startup.
 */
@Injectable()
export class AuctionPersistenceService {
  private readonly logger = new Logger(AuctionPersistenceService.name);

  constructor(private readonly redis: RedisService) {}

  stateKey(auctionId: string): string {
    return `${STATE_KEY_PREFIX}${auctionId}`;
  }

  /* ------------------------------------------------------------------ */
  /*  WRITES                                                             */
  /* ------------------------------------------------------------------ */

  /** Write the full snapshot and keep the index/open sets in step */
  async persistAuction(state: AuctionState): Promise<void> {
    const hasOpenRefunds = Object.keys(state.refundable).length > 0;
    const pipeline = this.redis.getClient().multi();
    pipeline.set(this.stateKey(state.id), JSON.stringify(state));
    pipeline.sadd(INDEX_KEY, state.id);
    if (state.status !== 'ENDED' || hasOpenRefunds) {
      pipeline.sadd(OPEN_KEY, state.id);
    } else {
      pipeline.srem(OPEN_KEY, state.id);
    }
    await pipeline.exec();
  }

  /* ------------------------------------------------------------------ */
  /*  READS                                                              */
  /* ------------------------------------------------------------------ */

  async loadAuction(auctionId: string): Promise<AuctionState | null> {
    const raw = await this.redis.getClient().get(this.stateKey(auctionId));
    return raw ? this.parse(auctionId, raw) : null;
  }

  /** Load every auction that is not fully settled (for recovery) */
  async loadOpenAuctions(): Promise<AuctionState[]> {
    const ids = await this.redis.getClient().smembers(OPEN_KEY);
    return this.loadMany(ids);
  }

  async listAuctions(): Promise<AuctionSummary[]> {
    const ids = await this.redis.getClient().smembers(INDEX_KEY);
    const states = await this.loadMany(ids);
    return states.map((s) => ({
      id: s.id,
      seller: s.seller,
      assetId: s.assetId,
      status: s.status,
      highestBid: s.highestBid,
      highestBidder: s.highestBidder,
      endAt: s.endAt,
    }));
  }

  private async loadMany(ids: string[]): Promise<AuctionState[]> {
    if (ids.length === 0) return [];
    const raws = await this.redis
      .getClient()
      .mget(...ids.map((id) => this.stateKey(id)));
    const states: AuctionState[] = [];
    raws.forEach((raw, idx) => {
      const id = ids[idx];
      if (!raw || id === undefined) return;
      const state = this.parse(id, raw);
      if (state) states.push(state);
    });
    return states;
  }

  private parse(auctionId: string, raw: string): AuctionState | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      this.logger.error(
        `Unreadable snapshot for auction ${auctionId}`,
        err instanceof Error ? err.stack : String(err),
      );
      return null;
    }
    if (!isAuctionState(parsed)) {
      this.logger.error(`Malformed snapshot for auction ${auctionId}`);
      return null;
    }
    return parsed;
  }
}
