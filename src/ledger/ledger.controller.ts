import {
  BadRequestException,
  Body,
  ConflictException,
  Controller,
  ForbiddenException,
  Get,
  Logger,
  Param,
  Post,
  UseGuards,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ClerkAuthGuard } from '../auth/guards/clerk-auth.guard';
import { CallerId } from '../auth/decorators/caller-id.decorator';
import { RedisAssetRegistry } from './redis-asset-registry';
import { RedisPaymentLedger } from './redis-payment-ledger';

@Controller('ledger')
export class LedgerController {
  private readonly logger = new Logger(LedgerController.name);

  constructor(
    private readonly assets: RedisAssetRegistry,
    private readonly payments: RedisPaymentLedger,
    private readonly config: ConfigService,
  ) {}

  @Get('balances/:address')
  async balance(@Param('address') address: string) {
    return { address, balance: await this.payments.balanceOf(address) };
  }

  @Get('assets/:assetId')
  async asset(@Param('assetId') assetId: string) {
    return {
      registry: this.assets.name,
      assetId,
      owner: await this.assets.ownerOf(assetId),
    };
  }

  /** Development faucet: fund the caller. */
  @Post('deposits')
  @UseGuards(ClerkAuthGuard)
  async deposit(@CallerId() caller: string, @Body('amount') amount: unknown) {
    this.requireFaucet();
    if (typeof amount !== 'number' || !Number.isSafeInteger(amount) || amount <= 0) {
      throw new BadRequestException('amount must be a positive integer');
    }
    await this.payments.credit(caller, amount);
    this.logger.log(`Faucet deposit ${amount} -> ${caller}`);
    return { address: caller, balance: await this.payments.balanceOf(caller) };
  }

  /** Development faucet: register an asset to the caller. */
  @Post('assets')
  @UseGuards(ClerkAuthGuard)
  async registerAsset(
    @CallerId() caller: string,
    @Body('assetId') assetId: unknown,
  ) {
    this.requireFaucet();
    if (typeof assetId !== 'string' || !assetId.trim()) {
      throw new BadRequestException('assetId required');
    }
    const registered = await this.assets.register(assetId.trim(), caller);
    if (!registered) {
      throw new ConflictException(`Asset ${assetId.trim()} already registered`);
    }
    return { registry: this.assets.name, assetId: assetId.trim(), owner: caller };
  }

  private requireFaucet(): void {
    if (!this.config.get<boolean>('ledger.devFaucet')) {
      throw new ForbiddenException('Ledger faucet is disabled');
    }
  }
}
