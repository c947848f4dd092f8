import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RedisService } from '../redis/redis.service';
import { CapabilityError } from '../auction/engine';
import type { AssetRegistry } from '../auction/engine';

/**
 * Lua script for atomic custody transfer.
 * KEYS[1] = owner key
 * ARGV[1] = expected current owner, ARGV[2] = new owner
 * Returns 1 if moved, 0 if the asset is not held by ARGV[1].
 */
const TRANSFER_ASSET_SCRIPT = `
local owner = redis.call('GET', KEYS[1])
if owner ~= ARGV[1] then
  return 0
end
redis.call('SET', KEYS[1], ARGV[2])
return 1
`;

/**
 * Asset custody kept in Redis: one owner key per asset, namespaced by
 * registry name.
 */
@Injectable()
export class RedisAssetRegistry implements AssetRegistry {
  private readonly logger = new Logger(RedisAssetRegistry.name);
  readonly name: string;

  constructor(
    private readonly redis: RedisService,
    config: ConfigService,
  ) {
    this.name = config.get<string>('ledger.registry') ?? 'default';
  }

  ownerKey(assetId: string): string {
    return `registry:${this.name}:asset:${assetId}:owner`;
  }

  async transfer(from: string, to: string, assetId: string): Promise<void> {
    if (from === to) {
      throw new CapabilityError(
        'AssetRegistry',
        'UNAUTHORIZED',
        `Refusing self-transfer of ${assetId}`,
      );
    }
    const moved = await this.redis
      .getClient()
      .eval(TRANSFER_ASSET_SCRIPT, 1, this.ownerKey(assetId), from, to);
    if (moved !== 1) {
      throw new CapabilityError(
        'AssetRegistry',
        'NOT_OWNED',
        `Asset ${assetId} is not held by ${from}`,
      );
    }
    this.logger.debug(`Asset ${assetId} moved ${from} -> ${to}`);
  }

  async ownerOf(assetId: string): Promise<string | null> {
    return this.redis.getClient().get(this.ownerKey(assetId));
  }

  /** Record a new asset. Returns false if the id is already registered. */
  async register(assetId: string, owner: string): Promise<boolean> {
    const result = await this.redis
      .getClient()
      .set(this.ownerKey(assetId), owner, 'NX');
    return result === 'OK';
  }
}
