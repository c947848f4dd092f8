import { Module } from '@nestjs/common';
import { AuctionController } from './auction.controller';
import { AuctionGateway } from './auction.gateway';
import { AuctionService } from './auction.service';
import { AuctionPersistenceService } from './auction-persistence.service';
import { LedgerModule } from '../ledger/ledger.module';

@Module({
  imports: [LedgerModule],
  controllers: [AuctionController],
  providers: [AuctionService, AuctionGateway, AuctionPersistenceService],
  exports: [AuctionService],
})
export class AuctionModule {}
