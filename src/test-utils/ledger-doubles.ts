import { CapabilityError } from '../auction/engine';
import type { AssetRegistry, PaymentLedger } from '../auction/engine';

type Call =
  | { op: 'transfer'; from: string; to: string; assetId: string }
  | { op: 'credit'; address: string; amount: number }
  | { op: 'debit'; address: string; amount: number };

/**
 * Shared call log so tests can assert ordering across both capabilities.
 */
export class CallLog {
  readonly calls: Call[] = [];
}

export class AssetRegistryDouble implements AssetRegistry {
  private readonly owners = new Map<string, string>();
  /** Runs inside transfer() before it completes, to simulate reentrancy */
  onTransfer: (() => Promise<void> | void) | null = null;
  failNext: CapabilityError | Error | null = null;

  constructor(private readonly log = new CallLog()) {}

  mint(assetId: string, owner: string): void {
    this.owners.set(assetId, owner);
  }

  ownerOf(assetId: string): string | null {
    return this.owners.get(assetId) ?? null;
  }

  async transfer(from: string, to: string, assetId: string): Promise<void> {
    this.log.calls.push({ op: 'transfer', from, to, assetId });
    if (this.onTransfer) await this.onTransfer();
    const failure = this.failNext;
    if (failure) {
      this.failNext = null;
      throw failure;
    }
    if (this.owners.get(assetId) !== from) {
      throw new CapabilityError(
        'AssetRegistry',
        'NOT_OWNED',
        `Asset ${assetId} is not held by ${from}`,
      );
    }
    this.owners.set(assetId, to);
  }
}

export class PaymentLedgerDouble implements PaymentLedger {
  private readonly balances = new Map<string, number>();
  /** Runs inside credit() before the balance moves, to simulate reentrancy */
  onCredit: ((address: string, amount: number) => Promise<void> | void) | null =
    null;
  failNextCredit: CapabilityError | null = null;

  constructor(private readonly log = new CallLog()) {}

  fund(address: string, amount: number): void {
    this.balances.set(address, this.balanceOf(address) + amount);
  }

  balanceOf(address: string): number {
    return this.balances.get(address) ?? 0;
  }

  async credit(address: string, amount: number): Promise<void> {
    this.log.calls.push({ op: 'credit', address, amount });
    if (this.onCredit) await this.onCredit(address, amount);
    const failure = this.failNextCredit;
    if (failure) {
      this.failNextCredit = null;
      throw failure;
    }
    this.balances.set(address, this.balanceOf(address) + amount);
  }

  async debit(address: string, amount: number): Promise<void> {
    this.log.calls.push({ op: 'debit', address, amount });
    const balance = this.balanceOf(address);
    if (balance < amount) {
      throw new CapabilityError(
        'PaymentLedger',
        'INSUFFICIENT_FUNDS',
        `${address} cannot cover ${amount}`,
      );
    }
    this.balances.set(address, balance - amount);
  }
}
