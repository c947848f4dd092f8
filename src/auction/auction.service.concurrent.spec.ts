import { Logger } from '@nestjs/common';
import { AuctionService } from './auction.service';
import type { AuctionStateChangeEvent } from './auction.service';
import { AUCTION_DURATION_MS } from './engine';
import type { AuctionEvent, AuctionState } from './engine';
import type { StoredBidOutcome } from '../redis/redis.service';
import {
  AssetRegistryDouble,
  PaymentLedgerDouble,
} from '../test-utils/ledger-doubles';

class RedisTestDouble {
  private readonly idemPending = new Set<string>();
  private readonly idemResult = new Map<string, StoredBidOutcome>();

  private idemScope(
    auctionId: string,
    bidder: string,
    idempotencyKey: string,
  ): string {
    return `${auctionId}:${bidder}:${idempotencyKey}`;
  }

  async claimBidIdempotency(
    auctionId: string,
    bidder: string,
    idempotencyKey: string,
  ): Promise<boolean> {
    const scope = this.idemScope(auctionId, bidder, idempotencyKey);
    if (this.idemPending.has(scope) || this.idemResult.has(scope)) return false;
    this.idemPending.add(scope);
    return true;
  }

  async getBidIdempotencyResult(
    auctionId: string,
    bidder: string,
    idempotencyKey: string,
  ): Promise<StoredBidOutcome | null> {
    return this.idemResult.get(this.idemScope(auctionId, bidder, idempotencyKey)) ?? null;
  }

  async storeBidIdempotencyResult(
    auctionId: string,
    bidder: string,
    idempotencyKey: string,
    result: StoredBidOutcome,
  ): Promise<void> {
    const scope = this.idemScope(auctionId, bidder, idempotencyKey);
    this.idemPending.delete(scope);
    this.idemResult.set(scope, result);
  }
}

const SELLER = 'seller-1';
const ASSET = 'asset-7';

function configWith(values: Record<string, unknown>) {
  return { get: (key: string) => values[key] };
}

describe('AuctionService', () => {
  let service: AuctionService;
  let redis: RedisTestDouble;
  let assets: AssetRegistryDouble;
  let payments: PaymentLedgerDouble;
  let notifications: AuctionEvent[];
  const persistence = {
    persistAuction: jest.fn(async (_state: AuctionState) => {}),
    loadAuction: jest.fn(async (_id: string): Promise<AuctionState | null> => null),
    loadOpenAuctions: jest.fn(async (): Promise<AuctionState[]> => []),
    listAuctions: jest.fn(async () => []),
  };

  function build(autoSettle = false): AuctionService {
    const built = new AuctionService(
      redis as never,
      persistence as never,
      assets,
      payments,
      configWith({
        'auction.autoSettle': autoSettle,
        'ledger.registry': 'main',
      }) as never,
    );
    built
      .getEventEmitter()
      .on('stateChange', (data: AuctionStateChangeEvent) => {
        if (data.event === 'auction_event') notifications.push(data.notification);
      });
    return built;
  }

  beforeEach(() => {
    jest.clearAllMocks();
    redis = new RedisTestDouble();
    assets = new AssetRegistryDouble();
    payments = new PaymentLedgerDouble();
    assets.mint(ASSET, SELLER);
    notifications = [];
    service = build();
  });

  afterEach(() => {
    service.onModuleDestroy();
    jest.useRealTimers();
  });

  async function createAndStartAuction(): Promise<string> {
    const created = await service.createAuction(SELLER, {
      assetId: ASSET,
      startingPrice: 10,
    });
    if ('error' in created) throw new Error(created.error);
    const started = await service.startAuction(created.id, SELLER);
    expect(started.started).toBe(true);
    return created.id;
  }

  function lastPersisted(): AuctionState {
    const call = persistence.persistAuction.mock.calls.at(-1);
    if (!call) throw new Error('nothing persisted');
    return call[0];
  }

  describe('createAuction', () => {
    it('creates in CREATED with the caller as seller and persists it', async () => {
      const created = await service.createAuction(SELLER, {
        assetId: ` ${ASSET} `,
        startingPrice: 10,
      });
      if ('error' in created) throw new Error(created.error);
      expect(created.status).toBe('CREATED');
      expect(created.seller).toBe(SELLER);
      expect(created.assetId).toBe(ASSET);
      expect(created.assetRegistry).toBe('main');
      expect(created.escrowAddress).toBe(`auction:${created.id}`);
      expect(persistence.persistAuction).toHaveBeenCalledWith(created);
    });

    it('rejects a blank asset id and a negative starting price', async () => {
      expect(
        await service.createAuction(SELLER, { assetId: '  ', startingPrice: 1 }),
      ).toEqual({ error: 'assetId required' });
      expect(
        await service.createAuction(SELLER, { assetId: ASSET, startingPrice: -1 }),
      ).toEqual({ error: 'startingPrice must be a non-negative integer' });
      expect(persistence.persistAuction).not.toHaveBeenCalled();
    });
  });

  describe('startAuction', () => {
    it('reports an unknown auction', async () => {
      expect(await service.startAuction('missing', SELLER)).toEqual({
        started: false,
        code: 'AUCTION_NOT_FOUND',
        reason: 'Auction not found',
      });
    });

    it('rejects a non-seller and leaves the asset with the seller', async () => {
      const created = await service.createAuction(SELLER, {
        assetId: ASSET,
        startingPrice: 10,
      });
      if ('error' in created) throw new Error(created.error);
      const result = await service.startAuction(created.id, 'mallory');
      expect(result).toMatchObject({ started: false, code: 'UNAUTHORIZED' });
      expect(assets.ownerOf(ASSET)).toBe(SELLER);
      expect((await service.getState(created.id))?.started).toBe(false);
    });
  });

  describe('bidding', () => {
    it('serialises 25 simultaneous bids; the record high wins', async () => {
      const auctionId = await createAndStartAuction();
      const bids = Array.from({ length: 25 }, (_, i) => ({
        bidder: `user-${i + 1}`,
        amount: 11 + ((i * 7) % 25),
      }));
      bids.forEach((b) => payments.fund(b.bidder, 100));

      const results = await Promise.all(
        bids.map((b) => service.placeBid(auctionId, b.bidder, b.amount)),
      );

      const accepted = bids.filter((_, idx) => results[idx]?.accepted);
      const state = await service.getState(auctionId);
      expect(state?.highestBid).toBe(35);
      expect(state?.highestBidder).toBe(bids.find((b) => b.amount === 35)?.bidder);
      expect(state?.escrowed).toBe(accepted.reduce((sum, b) => sum + b.amount, 0));
      // create + start + one snapshot per accepted bid
      expect(persistence.persistAuction).toHaveBeenCalledTimes(2 + accepted.length);
    });

    it('preserves ordering: a lower bid after a higher one is rejected', async () => {
      const auctionId = await createAndStartAuction();
      ['alice', 'bob', 'charlie'].forEach((who) => payments.fund(who, 100));

      const r1 = await service.placeBid(auctionId, 'alice', 15);
      const r2 = await service.placeBid(auctionId, 'bob', 14);
      const r3 = await service.placeBid(auctionId, 'charlie', 16);

      expect(r1).toEqual({ accepted: true });
      expect(r2).toEqual({
        accepted: false,
        code: 'BID_TOO_LOW',
        reason: 'Bid must be higher than current highest (15)',
      });
      expect(r3).toEqual({ accepted: true });
      const state = await service.getState(auctionId);
      expect(state?.highestBidder).toBe('charlie');
      expect(state?.refundable).toEqual({ alice: 15 });
    });

    it('accepts exactly one of many same-amount concurrent bids', async () => {
      const auctionId = await createAndStartAuction();
      const bidders = Array.from({ length: 30 }, (_, i) => `same-${i}`);
      bidders.forEach((b) => payments.fund(b, 100));

      const results = await Promise.all(
        bidders.map((b) => service.placeBid(auctionId, b, 13)),
      );

      expect(results.filter((r) => r.accepted)).toHaveLength(1);
      expect(results[0]).toEqual({ accepted: true });
      expect((await service.getState(auctionId))?.highestBidder).toBe('same-0');
    });

    it('deduplicates retries via idempotency key', async () => {
      const auctionId = await createAndStartAuction();
      payments.fund('retry-user', 100);

      const results = await Promise.all(
        Array.from({ length: 20 }, () =>
          service.placeBid(auctionId, 'retry-user', 17, 'idem-key-1'),
        ),
      );

      for (const result of results) {
        expect(result).toEqual({ accepted: true });
      }
      expect(payments.balanceOf('retry-user')).toBe(83);
      expect(notifications.filter((n) => n.type === 'Bid')).toHaveLength(1);
    });

    it('replays a stored rejection for the same idempotency key', async () => {
      const auctionId = await createAndStartAuction();
      payments.fund('alice', 100);

      const first = await service.placeBid(auctionId, 'alice', 5, 'k-low');
      const retry = await service.placeBid(auctionId, 'alice', 50, 'k-low');

      expect(first).toEqual({
        accepted: false,
        code: 'BID_TOO_LOW',
        reason: 'Bid must be higher than current highest (10)',
      });
      expect(retry).toEqual(first);
      expect((await service.getState(auctionId))?.highestBidder).toBeNull();
    });

    it('keeps an accepted bid when the snapshot write fails', async () => {
      const logError = jest
        .spyOn(Logger.prototype, 'error')
        .mockImplementation(() => undefined);
      const auctionId = await createAndStartAuction();
      payments.fund('alice', 100);
      persistence.persistAuction.mockRejectedValueOnce(new Error('redis down'));

      expect(await service.placeBid(auctionId, 'alice', 15)).toEqual({
        accepted: true,
      });
      expect(logError).toHaveBeenCalledWith(
        `Failed to persist auction ${auctionId}: redis down`,
        expect.any(String),
      );
      logError.mockRestore();
    });
  });

  describe('withdraw and settlement', () => {
    it('runs the outbid → withdraw → settle scenario and publishes each notification', async () => {
      jest.useFakeTimers();
      jest.setSystemTime(new Date('2026-01-01T00:00:00.000Z'));
      payments.fund('alice', 100);
      payments.fund('bob', 100);
      const auctionId = await createAndStartAuction();

      await service.placeBid(auctionId, 'alice', 15);
      expect((await service.placeBid(auctionId, 'bob', 12)).accepted).toBe(false);
      await service.placeBid(auctionId, 'bob', 20);
      expect(await service.withdraw(auctionId, 'alice')).toEqual({
        withdrawn: true,
        amount: 15,
      });
      expect(await service.withdraw(auctionId, 'alice')).toEqual({
        withdrawn: true,
        amount: 0,
      });

      expect(await service.endAuction(auctionId)).toMatchObject({
        ended: false,
        code: 'TOO_EARLY',
      });

      jest.setSystemTime(Date.now() + AUCTION_DURATION_MS);
      expect(await service.endAuction(auctionId)).toEqual({
        ended: true,
        winner: 'bob',
        finalPrice: 20,
      });
      expect(await service.endAuction(auctionId)).toMatchObject({
        ended: false,
        code: 'ALREADY_ENDED',
      });

      expect(assets.ownerOf(ASSET)).toBe('bob');
      expect(payments.balanceOf(SELLER)).toBe(20);
      expect(payments.balanceOf('alice')).toBe(100);
      expect(notifications).toEqual([
        { type: 'Start', endAt: Date.parse('2026-01-08T00:00:00.000Z') },
        { type: 'Bid', bidder: 'alice', amount: 15 },
        { type: 'Bid', bidder: 'bob', amount: 20 },
        { type: 'Withdrawal', address: 'alice', amount: 15 },
        { type: 'End', winner: 'bob', amount: 20 },
      ]);
    });

    it('returns the asset when nobody bid and releases the auction from memory', async () => {
      jest.useFakeTimers();
      jest.setSystemTime(new Date('2026-01-01T00:00:00.000Z'));
      const auctionId = await createAndStartAuction();
      jest.setSystemTime(Date.now() + AUCTION_DURATION_MS);

      expect(await service.endAuction(auctionId)).toEqual({
        ended: true,
        winner: null,
        finalPrice: 10,
      });
      expect(assets.ownerOf(ASSET)).toBe(SELLER);
      expect(payments.balanceOf(SELLER)).toBe(0);

      const settled = lastPersisted();
      persistence.loadAuction.mockResolvedValueOnce(settled);
      expect(await service.getState(auctionId)).toEqual(settled);
      expect(persistence.loadAuction).toHaveBeenCalledWith(auctionId);
    });

    it('keeps a settled auction in memory when the post-withdraw write fails', async () => {
      const logError = jest
        .spyOn(Logger.prototype, 'error')
        .mockImplementation(() => undefined);
      jest.useFakeTimers();
      jest.setSystemTime(new Date('2026-01-01T00:00:00.000Z'));
      payments.fund('alice', 100);
      payments.fund('bob', 100);
      const auctionId = await createAndStartAuction();
      await service.placeBid(auctionId, 'alice', 15);
      await service.placeBid(auctionId, 'bob', 20);
      jest.setSystemTime(Date.now() + AUCTION_DURATION_MS);
      expect((await service.endAuction(auctionId)).ended).toBe(true);

      persistence.persistAuction.mockRejectedValueOnce(new Error('redis down'));
      expect(await service.withdraw(auctionId, 'alice')).toEqual({
        withdrawn: true,
        amount: 15,
      });
      expect(await service.withdraw(auctionId, 'alice')).toEqual({
        withdrawn: true,
        amount: 0,
      });

      expect(persistence.loadAuction).not.toHaveBeenCalled();
      expect(payments.balanceOf('alice')).toBe(100);
      expect(logError).toHaveBeenCalledWith(
        `Failed to persist auction ${auctionId}: redis down`,
        expect.any(String),
      );
      logError.mockRestore();
    });

    it('does not settle twice when the settlement write fails', async () => {
      const logError = jest
        .spyOn(Logger.prototype, 'error')
        .mockImplementation(() => undefined);
      jest.useFakeTimers();
      jest.setSystemTime(new Date('2026-01-01T00:00:00.000Z'));
      const auctionId = await createAndStartAuction();
      jest.setSystemTime(Date.now() + AUCTION_DURATION_MS);

      persistence.persistAuction.mockRejectedValueOnce(new Error('redis down'));
      expect((await service.endAuction(auctionId)).ended).toBe(true);
      expect(await service.endAuction(auctionId)).toMatchObject({
        ended: false,
        code: 'ALREADY_ENDED',
      });
      expect(persistence.loadAuction).not.toHaveBeenCalled();
      logError.mockRestore();
    });

    it('settles automatically at the deadline when enabled', async () => {
      jest.useFakeTimers();
      jest.setSystemTime(new Date('2026-01-01T00:00:00.000Z'));
      service = build(true);
      payments.fund('alice', 100);
      const auctionId = await createAndStartAuction();
      await service.placeBid(auctionId, 'alice', 15);

      const settled = new Promise<void>((resolve) => {
        service.getEventEmitter().on('stateChange', (data: AuctionStateChangeEvent) => {
          if (data.event === 'auction_event' && data.notification.type === 'End') {
            resolve();
          }
        });
      });
      jest.advanceTimersByTime(AUCTION_DURATION_MS);
      await settled;

      expect(assets.ownerOf(ASSET)).toBe('alice');
      expect(payments.balanceOf(SELLER)).toBe(15);
      expect(lastPersisted().status).toBe('ENDED');
    });
  });

  describe('recovery', () => {
    it('re-hydrates open auctions so refunds can still be claimed', async () => {
      payments.fund('alice', 100);
      payments.fund('bob', 100);
      const auctionId = await createAndStartAuction();
      await service.placeBid(auctionId, 'alice', 15);
      await service.placeBid(auctionId, 'bob', 20);
      const snapshot = lastPersisted();

      persistence.loadOpenAuctions.mockResolvedValueOnce([snapshot]);
      const restarted = build();
      await restarted.onModuleInit();

      expect(await restarted.getState(auctionId)).toEqual(snapshot);
      expect(await restarted.getRefundable(auctionId, 'alice')).toBe(15);
      expect(await restarted.withdraw(auctionId, 'alice')).toEqual({
        withdrawn: true,
        amount: 15,
      });
      restarted.onModuleDestroy();
    });
  });
});
