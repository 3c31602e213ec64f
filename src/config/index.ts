import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';
import { formatIssues } from './scanner-config.js';

/** Unset and empty-string variables both read as absent. */
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  MARKET_API_URL: z.string().url().default('https://api.dmarket.com'),
  MARKET_PUBLIC_KEY: z.string().min(1),
  MARKET_SECRET_KEY: z.string().min(1),
  DATABASE_URL: optionalString,
  REDIS_URL: optionalString,
  TELEGRAM_BOT_TOKEN: optionalString,
  TELEGRAM_CHAT_ID: optionalString,
  SCANNER_CONFIG: z.string().default('config/scanner.json'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
});

export type AppConfig = z.infer<typeof envSchema>;

export function parseEnv(env: Record<string, string | undefined>): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid environment configuration', formatIssues(parsed.error));
  }
  return parsed.data;
}

/** Load `.env` into process.env, then validate it. */
export function loadEnv(): AppConfig {
  dotenv.config();
  return parseEnv(process.env);
}

export { loadScannerConfig, parseScannerConfig, expandTiers, type ScannerConfig } from './scanner-config.js';
