import { Module } from '@nestjs/common';
import { LedgerController } from './ledger.controller';
import { ASSET_REGISTRY, PAYMENT_LEDGER } from './ledger.tokens';
import { RedisAssetRegistry } from './redis-asset-registry';
import { RedisPaymentLedger } from './redis-payment-ledger';

@Module({
  controllers: [LedgerController],
  providers: [
    RedisAssetRegistry,
    RedisPaymentLedger,
    { provide: ASSET_REGISTRY, useExisting: RedisAssetRegistry },
    { provide: PAYMENT_LEDGER, useExisting: RedisPaymentLedger },
  ],
  exports: [ASSET_REGISTRY, PAYMENT_LEDGER, RedisAssetRegistry],
})
export class LedgerModule {}
