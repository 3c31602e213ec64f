import { Redis } from 'ioredis';
import pino from 'pino';
import { CacheError } from '../../utils/errors.js';
import type { CacheStore } from './tiered-cache.js';

const log = pino({ name: 'redis-store' });

const MAX_RECONNECT_ATTEMPTS = 5;

function maskUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password) parsed.password = '****';
    return parsed.toString();
  } catch (error) {
    log.debug({ err: error }, 'Redis URL could not be parsed for masking');
    return '[invalid-url]';
  }
}

/**
 * Create an ioredis client that gives up reconnecting after a few attempts.
 * Commands fail fast while disconnected so the cache can fall back to L1.
 */
export function createRedisClient(url: string): Redis {
  const redis = new Redis(url, {
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
    retryStrategy: (times: number) => {
      if (times > MAX_RECONNECT_ATTEMPTS) {
        log.warn({ times }, 'Redis reconnect attempts exhausted, continuing with L1 only');
        return null;
      }
      return Math.min(times * 500, 5_000);
    },
  });

  redis.on('connect', () => log.info({ url: maskUrl(url) }, 'Redis connected'));
  redis.on('error', (error: Error) => log.error({ err: error.message }, 'Redis error'));
  redis.on('close', () => log.warn('Redis connection closed'));

  return redis;
}

/**
 * L2 store on Redis. Values are opaque strings; expiry is delegated to Redis (PX).
 */
export class RedisCacheStore implements CacheStore {
  constructor(private readonly redis: Redis) {}

  async get(key: string): Promise<string | null> {
    try {
      return await this.redis.get(key);
    } catch (error) {
      throw new CacheError('get', key, error);
    }
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    try {
      await this.redis.set(key, value, 'PX', Math.max(1, Math.round(ttlSeconds * 1000)));
    } catch (error) {
      throw new CacheError('set', key, error);
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.redis.del(key);
    } catch (error) {
      throw new CacheError('delete', key, error);
    }
  }
}
