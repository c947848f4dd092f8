function flag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

export default () => ({
  port: parseInt(process.env.PORT ?? '3000', 10),
  cors: {
    origin: process.env.CORS_ORIGIN,
  },
  redis: {
    url: process.env.REDIS_URL ?? 'redis://localhost:6379',
  },
  clerk: {
    secretKey: process.env.CLERK_SECRET_KEY,
  },
  auction: {
    autoSettle: flag(process.env.AUCTION_AUTO_SETTLE, true),
  },
  ledger: {
    registry: process.env.ASSET_REGISTRY_NAME ?? 'default',
    devFaucet: flag(process.env.LEDGER_DEV_FAUCET, false),
  },
});
