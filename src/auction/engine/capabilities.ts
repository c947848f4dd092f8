export type CapabilityErrorCode =
  | 'UNAUTHORIZED'
  | 'NOT_OWNED'
  | 'INSUFFICIENT_FUNDS'
  | 'TRANSFER_REJECTED';

/**
 * Thrown by a capability that rejected a call. Any other error thrown by a
 * capability is treated as unexpected and propagates to the caller.
 */
export class CapabilityError extends Error {
  constructor(
    readonly capability: 'AssetRegistry' | 'PaymentLedger',
    readonly code: CapabilityErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'CapabilityError';
  }
}

/** Moves custody of a unique asset. Rejects if `from` does not hold it. */
export interface AssetRegistry {
  transfer(from: string, to: string, assetId: string): Promise<void>;
}

/** Moves funds. Each call either fully succeeds or fully fails. */
export interface PaymentLedger {
  /** Releases `amount` to `address`. */
  credit(address: string, amount: number): Promise<void>;
  /** Collects `amount` from `address` into escrow. */
  debit(address: string, amount: number): Promise<void>;
}
