import { readFileSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { ArbitrageLevelName, TierDefinition } from '../services/arbitrage/types.js';
import { ConfigurationError, getErrorMessage } from '../utils/errors.js';

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

const levelSchema = z
  .object({
    priceFrom: nonNegativeInt,
    priceTo: positiveInt,
    minProfitPercent: z.number().nonnegative(),
  })
  .refine((level) => level.priceTo > level.priceFrom, { message: 'priceTo must be above priceFrom' });

const levelNames = ['boost', 'standard', 'medium', 'advanced', 'pro'] as const satisfies readonly ArbitrageLevelName[];

const scannerConfigSchema = z.object({
  rateLimit: z.object({
    capacity: positiveInt,
    periodMs: positiveInt,
  }),
  circuitBreaker: z.object({
    failureThreshold: positiveInt,
    windowMs: positiveInt,
    resetTimeoutMs: nonNegativeInt,
  }),
  request: z.object({
    timeoutMs: positiveInt,
    maxAttempts: positiveInt,
    backoffBaseMs: nonNegativeInt,
    backoffFactor: z.number().min(1),
    backoffMaxMs: nonNegativeInt,
    maxRetryAfterMs: nonNegativeInt,
  }),
  cache: z.object({
    maxEntries: positiveInt,
    listingTtlSeconds: positiveInt,
    referenceTtlSeconds: positiveInt,
    keyPrefix: z.string(),
  }),
  batch: z.object({
    chunkSize: positiveInt,
    maxConcurrency: positiveInt,
    checkpointEveryItems: positiveInt,
    checkpointIntervalMs: positiveInt,
  }),
  checkpoint: z.object({
    retentionDays: positiveInt,
    purgeSchedule: z.string().default('0 4 * * *'),
  }),
  scan: z.object({
    schedule: z.string(),
    pageSize: z.number().int().min(1).max(100),
    maxPagesPerSegment: positiveInt,
    segmentsPerTier: positiveInt,
    commissionRate: z.number().min(0).max(1),
    minProfit: nonNegativeInt,
    maxProfitPercent: z.number().positive(),
    intramarketUndercut: nonNegativeInt,
    useAggregatedPrices: z.boolean().default(true),
    excludeKeywords: z.array(z.string()).default([]),
    notifyTopN: positiveInt.default(5),
  }),
  gameIds: z.record(z.string(), z.string().min(1)),
  games: z.array(z.string()).min(1),
  levels: z.object({
    boost: levelSchema,
    standard: levelSchema,
    medium: levelSchema,
    advanced: levelSchema,
    pro: levelSchema,
  }),
  /** Levels to scan, in order. Defaults to all. */
  enabledLevels: z.array(z.enum(levelNames)).default([...levelNames]),
});

export type ScannerConfig = z.infer<typeof scannerConfigSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export function parseScannerConfig(raw: unknown): ScannerConfig {
  const parsed = scannerConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid scanner configuration', formatIssues(parsed.error));
  }

  const unknownGames = parsed.data.games.filter((game) => !(game in parsed.data.gameIds));
  if (unknownGames.length > 0) {
    throw new ConfigurationError('Scanner configuration names games without an id', unknownGames);
  }
  return parsed.data;
}

export function loadScannerConfig(filePath: string): ScannerConfig {
  const resolved = path.resolve(filePath);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(resolved, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read scanner configuration at ${resolved}`, [getErrorMessage(error)]);
  }
  return parseScannerConfig(raw);
}

/** One tier per game × enabled level, games outermost. */
export function expandTiers(config: ScannerConfig): TierDefinition[] {
  const tiers: TierDefinition[] = [];
  for (const gameName of config.games) {
    const gameId = config.gameIds[gameName];
    for (const level of config.enabledLevels) {
      const bounds = config.levels[level];
      tiers.push({
        key: `${gameName}:${level}`,
        gameName,
        gameId,
        level,
        priceFrom: bounds.priceFrom,
        priceTo: bounds.priceTo,
        minProfitPercent: bounds.minProfitPercent,
      });
    }
  }
  return tiers;
}
