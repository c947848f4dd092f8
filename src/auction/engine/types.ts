/**
 * Auction state machine: CREATED → ACTIVE → ENDED
 */
export type AuctionStatus = 'CREATED' | 'ACTIVE' | 'ENDED';

/**
 * Single source of truth for one auction. All engine logic reads/writes this shape.
 */
export interface AuctionState {
  id: string;
  assetRegistry: string;
  assetId: string;
  seller: string;
  /** Custody address the auction holds the asset and bids under */
  escrowAddress: string;
  startingPrice: number;
  status: AuctionStatus;
  started: boolean;
  ended: boolean;
  /** Epoch ms; null until started */
  endAt: number | null;
  /** null = no bidder yet */
  highestBidder: string | null;
  highestBid: number;
  /** Outbid funds per address. Absent keys read as zero. */
  refundable: Record<string, number>;
  escrowed: number;
}

export interface CreateAuctionInput {
  seller: string;
  assetId: string;
  startingPrice: number;
  assetRegistry?: string;
}

export type AuctionErrorCode =
  | 'UNAUTHORIZED'
  | 'ALREADY_STARTED'
  | 'NOT_STARTED'
  | 'AUCTION_EXPIRED'
  | 'ALREADY_ENDED'
  | 'TOO_EARLY'
  | 'OPERATION_IN_PROGRESS'
  | 'BID_TOO_LOW'
  | 'INVALID_AMOUNT'
  | 'EXTERNAL_CALL_FAILED';

export type AuctionErrorCategory =
  | 'Unauthorized'
  | 'InvalidState'
  | 'BidTooLow'
  | 'ExternalCallFailed';

export interface AuctionRejection {
  code: AuctionErrorCode;
  reason: string;
}

/**
 * Observability notifications. One-way; never read back by the engine.
 */
export type AuctionEvent =
  | { type: 'Start'; endAt: number }
  | { type: 'Bid'; bidder: string; amount: number }
  | { type: 'Withdrawal'; address: string; amount: number }
  | { type: 'End'; winner: string | null; amount: number };

/**
 * Result of start() – explicit started or reason.
 */
export type StartResult =
  | { started: true; endAt: number; event: AuctionEvent }
  | ({ started: false } & AuctionRejection);

/**
 * Result of bid() – explicit accepted/rejected with reason.
 */
export type BidResult =
  | { accepted: true; event: AuctionEvent }
  | ({ accepted: false } & AuctionRejection);

/**
 * Result of withdraw(). `event` is absent for a zero-balance no-op.
 */
export type WithdrawResult =
  | { withdrawn: true; amount: number; event?: AuctionEvent }
  | ({ withdrawn: false } & AuctionRejection);

/**
 * Result of end() – winner (or null) and final price.
 */
export type EndResult =
  | {
      ended: true;
      winner: string | null;
      finalPrice: number;
      event: AuctionEvent;
    }
  | ({ ended: false } & AuctionRejection);
