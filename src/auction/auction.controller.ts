import {
  BadGatewayException,
  BadRequestException,
  Body,
  ConflictException,
  Controller,
  ForbiddenException,
  Get,
  HttpException,
  NotFoundException,
  Param,
  ParseUUIDPipe,
  Post,
  UseGuards,
} from '@nestjs/common';
import { AuctionService } from './auction.service';
import type { ServiceRejection } from './auction.service';
import { ClerkAuthGuard } from '../auth/guards/clerk-auth.guard';
import { CallerId } from '../auth/decorators/caller-id.decorator';

/** Map a rejected operation onto the HTTP status its reason code implies */
export function toHttpException(rejection: ServiceRejection): HttpException {
  const body = { code: rejection.code, message: rejection.reason };
  switch (rejection.code) {
    case 'AUCTION_NOT_FOUND':
      return new NotFoundException(body);
    case 'UNAUTHORIZED':
      return new ForbiddenException(body);
    case 'BID_TOO_LOW':
    case 'INVALID_AMOUNT':
      return new BadRequestException(body);
    case 'EXTERNAL_CALL_FAILED':
      return new BadGatewayException(body);
    default:
      return new ConflictException(body);
  }
}

@Controller('auctions')
export class AuctionController {
  constructor(private readonly auctionService: AuctionService) {}

  @Post()
  @UseGuards(ClerkAuthGuard)
  async create(
    @CallerId() caller: string,
    @Body() body: { assetId?: unknown; startingPrice?: unknown },
  ) {
    if (typeof body?.assetId !== 'string') {
      throw new BadRequestException('assetId required');
    }
    if (typeof body.startingPrice !== 'number') {
      throw new BadRequestException('startingPrice must be a number');
    }
    const result = await this.auctionService.createAuction(caller, {
      assetId: body.assetId,
      startingPrice: body.startingPrice,
    });
    if ('error' in result) {
      throw new BadRequestException(result.error);
    }
    return result;
  }

  @Get()
  async list() {
    return this.auctionService.listAuctions();
  }

  @Get(':id')
  async getState(@Param('id', ParseUUIDPipe) id: string) {
    const state = await this.auctionService.getState(id);
    if (!state) throw new NotFoundException('Auction not found');
    return state;
  }

  @Get(':id/refunds/:address')
  async refundable(
    @Param('id', ParseUUIDPipe) id: string,
    @Param('address') address: string,
  ) {
    const amount = await this.auctionService.getRefundable(id, address);
    if (amount === null) throw new NotFoundException('Auction not found');
    return { address, amount };
  }

  @Post(':id/start')
  @UseGuards(ClerkAuthGuard)
  async start(
    @Param('id', ParseUUIDPipe) id: string,
    @CallerId() caller: string,
  ) {
    const result = await this.auctionService.startAuction(id, caller);
    if (!result.started) throw toHttpException(result);
    return this.auctionService.getState(id);
  }

  @Post(':id/bids')
  @UseGuards(ClerkAuthGuard)
  async bid(
    @Param('id', ParseUUIDPipe) id: string,
    @CallerId() caller: string,
    @Body() body: { amount?: unknown; idempotencyKey?: unknown },
  ) {
    if (typeof body?.amount !== 'number') {
      throw new BadRequestException('amount must be a number');
    }
    const idempotencyKey =
      typeof body.idempotencyKey === 'string' ? body.idempotencyKey : undefined;
    const result = await this.auctionService.placeBid(
      id,
      caller,
      body.amount,
      idempotencyKey,
    );
    if (!result.accepted) throw toHttpException(result);
    return this.auctionService.getState(id);
  }

  @Post(':id/withdrawals')
  @UseGuards(ClerkAuthGuard)
  async withdraw(
    @Param('id', ParseUUIDPipe) id: string,
    @CallerId() caller: string,
  ) {
    const result = await this.auctionService.withdraw(id, caller);
    if (!result.withdrawn) throw toHttpException(result);
    return { address: caller, amount: result.amount };
  }

  @Post(':id/end')
  @UseGuards(ClerkAuthGuard)
  async end(@Param('id', ParseUUIDPipe) id: string) {
    const result = await this.auctionService.endAuction(id);
    if (!result.ended) throw toHttpException(result);
    return { winner: result.winner, finalPrice: result.finalPrice };
  }
}
