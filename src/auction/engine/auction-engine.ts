import { CapabilityError } from './capabilities';
import type { AssetRegistry, PaymentLedger } from './capabilities';
import type {
  AuctionErrorCategory,
  AuctionErrorCode,
  AuctionRejection,
  AuctionState,
  BidResult,
  CreateAuctionInput,
  EndResult,
  StartResult,
  WithdrawResult,
} from './types';

export const AUCTION_DURATION_MS = 7 * 24 * 60 * 60 * 1000;
export const DEFAULT_ASSET_REGISTRY = 'default';

export function escrowAddressFor(auctionId: string): string {
  return `auction:${auctionId}`;
}

export function errorCategory(code: AuctionErrorCode): AuctionErrorCategory {
  switch (code) {
    case 'UNAUTHORIZED':
      return 'Unauthorized';
    case 'BID_TOO_LOW':
    case 'INVALID_AMOUNT':
      return 'BidTooLow';
    case 'EXTERNAL_CALL_FAILED':
      return 'ExternalCallFailed';
    default:
      return 'InvalidState';
  }
}

export interface AuctionEngineDeps {
  assets: AssetRegistry;
  payments: PaymentLedger;
  now?: () => number;
}

type ScalarState = Omit<AuctionState, 'refundable'>;

interface Snapshot {
  state: ScalarState;
  refundable: Map<string, number>;
}

function reject(code: AuctionErrorCode, reason: string): AuctionRejection {
  return { code, reason };
}

/**
 * Single-asset ascending auction. Owns all auction state; `start`, `bid`,
 * `withdraw` and `end` are the only mutators.
 *
 * Every mutator writes its local outcome before calling out to the asset
 * registry or payment ledger, so a capability that calls back into the engine
 * mid-call sees the updated state. While one operation awaits its external
 * call, any other mutation is rejected with `OPERATION_IN_PROGRESS`, so a
 * rejected capability call rolls back exactly that operation. Callers are
 * responsible for serialising operations on one engine (see AuctionService).
 */
export class AuctionEngine {
  private state: ScalarState;
  private refundable = new Map<string, number>();
  private pending = false;
  private readonly assets: AssetRegistry;
  private readonly payments: PaymentLedger;
  private readonly now: () => number;

  constructor(auctionId: string, input: CreateAuctionInput, deps: AuctionEngineDeps) {
    this.assets = deps.assets;
    this.payments = deps.payments;
    this.now = deps.now ?? (() => Date.now());
    this.state = {
      id: auctionId,
      assetRegistry: input.assetRegistry ?? DEFAULT_ASSET_REGISTRY,
      assetId: input.assetId,
      seller: input.seller,
      escrowAddress: escrowAddressFor(auctionId),
      startingPrice: input.startingPrice,
      status: 'CREATED',
      started: false,
      ended: false,
      endAt: null,
      highestBidder: null,
      highestBid: input.startingPrice,
      escrowed: 0,
    };
  }

  /**
   * CREATED → ACTIVE; escrows the asset from the seller.
   */
  async start(caller: string): Promise<StartResult> {
    if (caller !== this.state.seller) {
      return {
        started: false,
        ...reject('UNAUTHORIZED', 'Only the seller can start the auction'),
      };
    }
    if (this.state.started) {
      return {
        started: false,
        ...reject(
          'ALREADY_STARTED',
          `Auction cannot start from status ${this.state.status}`,
        ),
      };
    }

    const endAt = this.now() + AUCTION_DURATION_MS;
    const { seller, escrowAddress, assetId } = this.state;
    const failure = await this.transact(async () => {
      this.state.started = true;
      this.state.status = 'ACTIVE';
      this.state.endAt = endAt;
      await this.assets.transfer(seller, escrowAddress, assetId);
    });
    if (failure) return { started: false, ...failure };
    return { started: true, endAt, event: { type: 'Start', endAt } };
  }

  /**
   * Place a bid. The outgoing leader's bid becomes refundable; the new
   * bidder's payment is collected into escrow.
   */
  async bid(caller: string, amount: number): Promise<BidResult> {
    const deadline = this.activeDeadline();
    if (typeof deadline !== 'number') return { accepted: false, ...deadline };
    if (this.now() >= deadline) {
      return {
        accepted: false,
        ...reject('AUCTION_EXPIRED', 'Auction bidding window has closed'),
      };
    }
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      return {
        accepted: false,
        ...reject('INVALID_AMOUNT', 'Bid amount must be a positive integer'),
      };
    }
    if (amount <= this.state.highestBid) {
      return {
        accepted: false,
        ...reject(
          'BID_TOO_LOW',
          `Bid must be higher than current highest (${this.state.highestBid})`,
        ),
      };
    }

    const failure = await this.transact(async () => {
      const previousBidder = this.state.highestBidder;
      if (previousBidder !== null) {
        this.refundable.set(
          previousBidder,
          this.refundableOf(previousBidder) + this.state.highestBid,
        );
      }
      this.state.highestBidder = caller;
      this.state.highestBid = amount;
      this.state.escrowed += amount;
      await this.payments.debit(caller, amount);
    });
    if (failure) return { accepted: false, ...failure };
    return { accepted: true, event: { type: 'Bid', bidder: caller, amount } };
  }

  /**
   * Pay out the caller's outbid funds. Valid in any state; a zero balance is
   * a no-op.
   */
  async withdraw(caller: string): Promise<WithdrawResult> {
    const amount = this.refundableOf(caller);
    if (amount === 0) return { withdrawn: true, amount: 0 };

    const failure = await this.transact(async () => {
      this.refundable.delete(caller);
      this.state.escrowed -= amount;
      await this.payments.credit(caller, amount);
    });
    if (failure) return { withdrawn: false, ...failure };
    return {
      withdrawn: true,
      amount,
      event: { type: 'Withdrawal', address: caller, amount },
    };
  }

  /**
   * ACTIVE → ENDED once the deadline has passed. Hands the asset to the
   * winner and pays the seller, or returns the asset when nobody bid.
   */
  async end(): Promise<EndResult> {
    const deadline = this.activeDeadline();
    if (typeof deadline !== 'number') return { ended: false, ...deadline };
    if (this.now() < deadline) {
      return {
        ended: false,
        ...reject(
          'TOO_EARLY',
          `Auction cannot end before ${new Date(deadline).toISOString()}`,
        ),
      };
    }

    const { seller, escrowAddress, assetId } = this.state;
    const winner = this.state.highestBidder;
    const finalPrice = this.state.highestBid;
    const failure = await this.transact(async () => {
      this.state.ended = true;
      this.state.status = 'ENDED';
      if (winner === null) {
        await this.assets.transfer(escrowAddress, seller, assetId);
        return;
      }
      this.state.escrowed -= finalPrice;
      await this.assets.transfer(escrowAddress, winner, assetId);
      try {
        await this.payments.credit(seller, finalPrice);
      } catch (err) {
        await this.compensateTransfer(winner, escrowAddress, assetId, err);
        throw err;
      }
    });
    if (failure) return { ended: false, ...failure };
    return {
      ended: true,
      winner,
      finalPrice,
      event: { type: 'End', winner, amount: finalPrice },
    };
  }

  /** Withdrawable balance; absent addresses read as zero. */
  refundableOf(address: string): number {
    return this.refundable.get(address) ?? 0;
  }

  getState(): Readonly<AuctionState> {
    return {
      ...this.state,
      refundable: Object.fromEntries(this.refundable),
    };
  }

  /**
   * Replace state wholesale (e.g. after loading from storage).
   */
  setState(state: AuctionState): void {
    const { refundable, ...scalars } = state;
    this.state = { ...scalars };
    this.refundable = new Map(
      Object.entries(refundable).filter(([, amount]) => amount > 0),
    );
  }

  private activeDeadline(): number | AuctionRejection {
    if (this.state.status === 'ENDED') {
      return reject('ALREADY_ENDED', 'Auction has already ended');
    }
    if (this.state.status !== 'ACTIVE' || this.state.endAt === null) {
      return reject('NOT_STARTED', 'Auction has not started');
    }
    return this.state.endAt;
  }

  /**
   * Run a mutate-then-call step. On a capability rejection the state is
   * restored and the rejection returned; any other error is rethrown after
   * restoring. Steps never overlap, so the snapshot holds no other
   * operation's committed changes.
   */
  private async transact(
    step: () => Promise<void>,
  ): Promise<AuctionRejection | null> {
    if (this.pending) {
      return reject(
        'OPERATION_IN_PROGRESS',
        'Another operation is awaiting an external call',
      );
    }
    const snapshot = this.snapshot();
    this.pending = true;
    try {
      await step();
      return null;
    } catch (err) {
      this.restore(snapshot);
      if (err instanceof CapabilityError) {
        return reject(
          'EXTERNAL_CALL_FAILED',
          `${err.capability} rejected the call (${err.code}): ${err.message}`,
        );
      }
      throw err;
    } finally {
      this.pending = false;
    }
  }

  private async compensateTransfer(
    holder: string,
    escrowAddress: string,
    assetId: string,
    cause: unknown,
  ): Promise<void> {
    try {
      await this.assets.transfer(holder, escrowAddress, assetId);
    } catch (compensationError) {
      throw new Error(
        `Seller payout failed and asset ${assetId} could not be returned to escrow from ${holder}`,
        { cause: [cause, compensationError] },
      );
    }
  }

  private snapshot(): Snapshot {
    return { state: { ...this.state }, refundable: new Map(this.refundable) };
  }

  private restore(snapshot: Snapshot): void {
    this.state = snapshot.state;
    this.refundable = snapshot.refundable;
  }
}
