export {
  AuctionEngine,
  AUCTION_DURATION_MS,
  DEFAULT_ASSET_REGISTRY,
  errorCategory,
  escrowAddressFor,
} from './auction-engine';
export type { AuctionEngineDeps } from './auction-engine';
export { CapabilityError } from './capabilities';
export type {
  AssetRegistry,
  PaymentLedger,
  CapabilityErrorCode,
} from './capabilities';
export type {
  AuctionState,
  AuctionStatus,
  AuctionEvent,
  AuctionErrorCode,
  AuctionErrorCategory,
  AuctionRejection,
  CreateAuctionInput,
  StartResult,
  BidResult,
  WithdrawResult,
  EndResult,
} from './types';
