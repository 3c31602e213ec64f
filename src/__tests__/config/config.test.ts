import { readFileSync } from 'node:fs';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { expandTiers, loadScannerConfig, parseEnv, parseScannerConfig } from '../../config/index.js';
import { ConfigurationError } from '../../utils/errors.js';

const baseEnv = {
  MARKET_PUBLIC_KEY: 'test-public',
  MARKET_SECRET_KEY: 'test-secret',
};

function rawConfig(): Record<string, unknown> {
  return z.record(z.unknown()).parse(JSON.parse(readFileSync('config/scanner.json', 'utf8')));
}

describe('parseEnv', () => {
  it('applies defaults', () => {
    expect(parseEnv(baseEnv)).toEqual({
      MARKET_API_URL: 'https://api.dmarket.com',
      MARKET_PUBLIC_KEY: 'test-public',
      MARKET_SECRET_KEY: 'test-secret',
      DATABASE_URL: undefined,
      REDIS_URL: undefined,
      TELEGRAM_BOT_TOKEN: undefined,
      TELEGRAM_CHAT_ID: undefined,
      SCANNER_CONFIG: 'config/scanner.json',
      NODE_ENV: 'development',
      PORT: 3000,
    });
  });

  it('treats empty optional variables as unset', () => {
    const env = parseEnv({ ...baseEnv, REDIS_URL: '', DATABASE_URL: 'postgres://localhost/test', PORT: '8080' });

    expect(env.REDIS_URL).toBeUndefined();
    expect(env.DATABASE_URL).toBe('postgres://localhost/test');
    expect(env.PORT).toBe(8080);
  });

  it('lists every problem when credentials are missing', () => {
    let caught: unknown;
    try {
      parseEnv({ MARKET_API_URL: 'not a url' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toHaveProperty('message', 'Invalid environment configuration');
    expect(caught).toHaveProperty('context.issues', [
      'MARKET_API_URL: Invalid url',
      'MARKET_PUBLIC_KEY: Required',
      'MARKET_SECRET_KEY: Required',
    ]);
  });
});

describe('scanner configuration', () => {
  it('loads the shipped file', () => {
    const config = loadScannerConfig('config/scanner.json');

    expect(config.rateLimit).toEqual({ capacity: 30, periodMs: 60_000 });
    expect(config.enabledLevels).toEqual(['boost', 'standard', 'medium', 'advanced', 'pro']);
  });

  it('expands one tier per game and level, games outermost', () => {
    const tiers = expandTiers(loadScannerConfig('config/scanner.json'));

    expect(tiers).toHaveLength(10);
    expect(tiers[0]).toEqual({
      key: 'csgo:boost',
      gameName: 'csgo',
      gameId: 'a8db',
      level: 'boost',
      priceFrom: 50,
      priceTo: 300,
      minProfitPercent: 1,
    });
    expect(tiers[5].key).toBe('dota2:boost');
    expect(tiers[9].key).toBe('dota2:pro');
  });

  it('scans only the enabled levels', () => {
    const config = parseScannerConfig({ ...rawConfig(), enabledLevels: ['pro', 'medium'] });

    expect(expandTiers(config).map((t) => t.key)).toEqual([
      'csgo:pro',
      'csgo:medium',
      'dota2:pro',
      'dota2:medium',
    ]);
  });

  it('rejects games without an id', () => {
    expect(() => parseScannerConfig({ ...rawConfig(), games: ['csgo', 'valorant'] })).toThrow(
      'Scanner configuration names games without an id',
    );
  });

  it('rejects an inverted price window', () => {
    const raw = rawConfig();
    const levels = {
      boost: { priceFrom: 300, priceTo: 50, minProfitPercent: 1 },
      standard: { priceFrom: 300, priceTo: 1000, minProfitPercent: 3 },
      medium: { priceFrom: 1000, priceTo: 3000, minProfitPercent: 5 },
      advanced: { priceFrom: 3000, priceTo: 10000, minProfitPercent: 10 },
      pro: { priceFrom: 10000, priceTo: 100000, minProfitPercent: 20 },
    };

    expect(() => parseScannerConfig({ ...raw, levels })).toThrow(ConfigurationError);
  });

  it('reports an unreadable file', () => {
    expect(() => loadScannerConfig('config/missing.json')).toThrow(/^Cannot read scanner configuration at /);
  });
});
