import pino from 'pino';
import { z } from 'zod';
import { getErrorMessage } from '../../utils/errors.js';
import type { RequestSpec } from '../market/types.js';
import { cacheKey } from './cache-key.js';
import { MemoryCache } from './memory-cache.js';

const log = pino({ name: 'tiered-cache' });

/** Shared second-level store. Implementations throw on failure; the cache degrades to L1. */
export interface CacheStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
}

export interface TieredCacheOptions {
  maxEntries: number;
  defaultTtlSeconds: number;
  keyPrefix: string;
}

export interface CacheStats {
  l1Size: number;
  l1Hits: number;
  l2Hits: number;
  misses: number;
  l2Errors: number;
  l2Enabled: boolean;
}

const envelopeSchema = z.object({
  value: z.unknown(),
  expiresAt: z.number(),
});

/**
 * Two-tier response cache keyed by request. L1 is in-process; L2 is optional and shared.
 * An L2 hit is copied into L1 for the time it has left.
 */
export class TieredCache {
  private readonly l1: MemoryCache;
  private l1Hits = 0;
  private l2Hits = 0;
  private misses = 0;
  private l2Errors = 0;

  constructor(
    private readonly options: TieredCacheOptions,
    private readonly l2: CacheStore | null = null,
  ) {
    this.l1 = new MemoryCache(options.maxEntries);
  }

  /** Cached value for `spec`, or undefined on a miss. */
  async get(spec: RequestSpec): Promise<unknown> {
    const key = cacheKey(spec, this.options.keyPrefix);

    const local = this.l1.get(key);
    if (local !== undefined) {
      this.l1Hits++;
      return local;
    }

    if (!this.l2) {
      this.misses++;
      return undefined;
    }

    let raw: string | null;
    try {
      raw = await this.l2.get(key);
    } catch (error) {
      this.recordL2Error('get', key, error);
      this.misses++;
      return undefined;
    }

    const envelope = raw === null ? null : this.decode(key, raw);
    const remainingMs = envelope ? envelope.expiresAt - Date.now() : 0;
    if (!envelope || envelope.value === undefined || remainingMs <= 0) {
      this.misses++;
      return undefined;
    }

    this.l1.set(key, envelope.value, remainingMs);
    this.l2Hits++;
    return envelope.value;
  }

  async put(spec: RequestSpec, value: unknown, ttlSeconds = this.options.defaultTtlSeconds): Promise<void> {
    const key = cacheKey(spec, this.options.keyPrefix);
    const ttlMs = ttlSeconds * 1000;
    this.l1.set(key, value, ttlMs);

    if (!this.l2) return;
    try {
      await this.l2.set(key, JSON.stringify({ value, expiresAt: Date.now() + ttlMs }), ttlSeconds);
    } catch (error) {
      this.recordL2Error('set', key, error);
    }
  }

  async invalidate(spec: RequestSpec): Promise<void> {
    const key = cacheKey(spec, this.options.keyPrefix);
    this.l1.delete(key);

    if (!this.l2) return;
    try {
      await this.l2.delete(key);
    } catch (error) {
      this.recordL2Error('delete', key, error);
    }
  }

  stats(): CacheStats {
    return {
      l1Size: this.l1.size(),
      l1Hits: this.l1Hits,
      l2Hits: this.l2Hits,
      misses: this.misses,
      l2Errors: this.l2Errors,
      l2Enabled: this.l2 !== null,
    };
  }

  private decode(key: string, raw: string): z.infer<typeof envelopeSchema> | null {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.recordL2Error('decode', key, error);
      return null;
    }
    const parsed = envelopeSchema.safeParse(json);
    if (!parsed.success) {
      this.recordL2Error('decode', key, parsed.error);
      return null;
    }
    return parsed.data;
  }

  private recordL2Error(operation: string, key: string, error: unknown): void {
    this.l2Errors++;
    log.warn({ operation, key, err: getErrorMessage(error) }, 'L2 cache unavailable, using L1 only');
  }
}
