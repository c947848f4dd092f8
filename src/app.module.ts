import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { AuctionModule } from './auction/auction.module';
import { ConfigModule } from './config/config.module';
import { LedgerModule } from './ledger/ledger.module';
import { RedisModule } from './redis/redis.module';

@Module({
  imports: [ConfigModule, RedisModule, LedgerModule, AuctionModule],
  controllers: [AppController],
})
export class AppModule {}
