import { Injectable, Logger } from '@nestjs/common';
import { RedisService } from '../redis/redis.service';
import { CapabilityError } from '../auction/engine';
import type { PaymentLedger } from '../auction/engine';

/**
 * Lua script for atomic check-and-debit.
 * KEYS[1] = balance key
 * ARGV[1] = amount
 * Returns the new balance, or -1 if the balance is insufficient.
 */
const DEBIT_SCRIPT = `
local balance = tonumber(redis.call('GET', KEYS[1]) or '0')
local amount = tonumber(ARGV[1])
if balance < amount then
  return -1
end
return redis.call('DECRBY', KEYS[1], amount)
`;

function assertTransferable(address: string, amount: number): void {
  if (!address) {
    throw new CapabilityError(
      'PaymentLedger',
      'TRANSFER_REJECTED',
      'Missing account address',
    );
  }
  if (!Number.isSafeInteger(amount) || amount <= 0) {
    throw new CapabilityError(
      'PaymentLedger',
      'TRANSFER_REJECTED',
      `Amount must be a positive integer (got ${amount})`,
    );
  }
}

@Injectable()
export class RedisPaymentLedger implements PaymentLedger {
  private readonly logger = new Logger(RedisPaymentLedger.name);

  constructor(private readonly redis: RedisService) {}

  balanceKey(address: string): string {
    return `ledger:balance:${address}`;
  }

  async credit(address: string, amount: number): Promise<void> {
    assertTransferable(address, amount);
    await this.redis.getClient().incrby(this.balanceKey(address), amount);
    this.logger.debug(`Credited ${amount} to ${address}`);
  }

  async debit(address: string, amount: number): Promise<void> {
    assertTransferable(address, amount);
    const result = await this.redis
      .getClient()
      .eval(DEBIT_SCRIPT, 1, this.balanceKey(address), amount.toString());
    if (result === -1) {
      throw new CapabilityError(
        'PaymentLedger',
        'INSUFFICIENT_FUNDS',
        `${address} cannot cover ${amount}`,
      );
    }
    this.logger.debug(`Debited ${amount} from ${address}`);
  }

  async balanceOf(address: string): Promise<number> {
    const raw = await this.redis.getClient().get(this.balanceKey(address));
    return raw ? parseInt(raw, 10) : 0;
  }
}
