export const ASSET_REGISTRY = Symbol('ASSET_REGISTRY');
export const PAYMENT_LEDGER = Symbol('PAYMENT_LEDGER');
