import type pg from 'pg';
import type { Redis } from 'ioredis';
import pino from 'pino';
import type { AppConfig } from './config/index.js';
import { expandTiers, type ScannerConfig } from './config/scanner-config.js';
import { createPool } from './db/pool.js';
import { ArbitrageScanner } from './services/arbitrage/scanner.js';
import { TierRunner } from './services/arbitrage/tier-runner.js';
import type { OpportunityNotifier, TierDefinition } from './services/arbitrage/types.js';
import { BatchProcessor } from './services/batch/batch-processor.js';
import { createRedisClient, RedisCacheStore } from './services/cache/redis-store.js';
import { TieredCache } from './services/cache/tiered-cache.js';
import { MemoryCheckpointStore } from './services/checkpoint/memory-checkpoint-store.js';
import { PgCheckpointStore } from './services/checkpoint/pg-checkpoint-store.js';
import type { CheckpointStore } from './services/checkpoint/types.js';
import { JobScheduler } from './services/jobs/scheduler.js';
import { CircuitBreaker } from './services/market/circuit-breaker.js';
import { MarketClient } from './services/market/client.js';
import { RateLimiter } from './services/market/rate-limiter.js';
import { RequestExecutor, type FetchFn } from './services/market/request-executor.js';
import { RequestSigner } from './services/market/signer.js';
import { TelegramOpportunityNotifier } from './services/notifications/opportunity-alerts.js';
import { TelegramClient } from './services/notifications/telegram.js';

const log = pino({ name: 'container' });

export interface ContainerOverrides {
  fetchFn?: FetchFn;
  store?: CheckpointStore;
  notifier?: OpportunityNotifier | null;
}

export interface Container {
  limiter: RateLimiter;
  breaker: CircuitBreaker;
  executor: RequestExecutor;
  cache: TieredCache;
  client: MarketClient;
  store: CheckpointStore;
  scanner: ArbitrageScanner;
  tierRunner: TierRunner;
  scheduler: JobScheduler;
  telegram: TelegramClient | null;
  tiers: TierDefinition[];
  pool: pg.Pool | null;
  redis: Redis | null;
  close(): Promise<void>;
}

/**
 * Composition root: builds every service once from validated configuration.
 * Optional infrastructure (Postgres, Redis, Telegram) is wired only when configured.
 */
export function createContainer(
  env: AppConfig,
  config: ScannerConfig,
  overrides: ContainerOverrides = {},
): Container {
  const limiter = new RateLimiter(config.rateLimit);
  const breaker = new CircuitBreaker({ name: 'marketplace', ...config.circuitBreaker });
  const signer = new RequestSigner({ publicKey: env.MARKET_PUBLIC_KEY, secretKey: env.MARKET_SECRET_KEY });
  const executor = new RequestExecutor(
    { baseUrl: env.MARKET_API_URL.replace(/\/+$/, ''), ...config.request },
    { signer, limiter, breaker, fetchFn: overrides.fetchFn },
  );

  const redis = env.REDIS_URL ? createRedisClient(env.REDIS_URL) : null;
  const cache = new TieredCache(
    {
      maxEntries: config.cache.maxEntries,
      defaultTtlSeconds: config.cache.listingTtlSeconds,
      keyPrefix: config.cache.keyPrefix,
    },
    redis ? new RedisCacheStore(redis) : null,
  );
  const client = new MarketClient(executor, cache, {
    listingTtlSeconds: config.cache.listingTtlSeconds,
    referenceTtlSeconds: config.cache.referenceTtlSeconds,
  });

  const pool = env.DATABASE_URL && !overrides.store ? createPool(env.DATABASE_URL) : null;
  const store = overrides.store ?? (pool ? new PgCheckpointStore(pool) : new MemoryCheckpointStore());
  if (!pool && !overrides.store) {
    log.warn('DATABASE_URL not set: checkpoints are kept in memory and lost on restart');
  }

  const telegram =
    env.TELEGRAM_BOT_TOKEN && env.TELEGRAM_CHAT_ID
      ? new TelegramClient({ botToken: env.TELEGRAM_BOT_TOKEN, chatId: env.TELEGRAM_CHAT_ID })
      : null;
  const notifier =
    overrides.notifier !== undefined
      ? overrides.notifier
      : telegram
        ? new TelegramOpportunityNotifier(telegram, config.scan.notifyTopN)
        : null;

  const scanner = new ArbitrageScanner(
    {
      pageSize: config.scan.pageSize,
      maxPagesPerSegment: config.scan.maxPagesPerSegment,
      segmentsPerTier: config.scan.segmentsPerTier,
      commissionRate: config.scan.commissionRate,
      minProfit: config.scan.minProfit,
      maxProfitPercent: config.scan.maxProfitPercent,
      intramarketUndercut: config.scan.intramarketUndercut,
      useAggregatedPrices: config.scan.useAggregatedPrices,
      excludeKeywords: config.scan.excludeKeywords,
    },
    config.batch,
    { client, store, batch: new BatchProcessor('segments'), notifier },
  );

  const tiers = expandTiers(config);
  log.info(
    { tiers: tiers.length, l2Cache: redis !== null, durableCheckpoints: pool !== null, telegram: telegram !== null },
    'Services wired',
  );

  return {
    limiter,
    breaker,
    executor,
    cache,
    client,
    store,
    scanner,
    tierRunner: new TierRunner(scanner),
    scheduler: new JobScheduler(),
    telegram,
    tiers,
    pool,
    redis,
    async close() {
      if (redis) {
        await redis.quit();
      }
      if (pool) {
        await pool.end();
      }
    },
  };
}
