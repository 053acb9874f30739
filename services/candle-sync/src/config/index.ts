// src/config/index.ts
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const Env = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

  CANDLES_API_BASE_URL: z.string().url().default('https://api.exchange.coinbase.com'),
  CANDLES_PAGE_SIZE: z.coerce.number().int().min(1).max(300).default(300),
  USER_AGENT: z.string().min(1).default('candle-sync/1.0'),

  // exchange ceiling is 3 req/s; one per second leaves headroom
  RATE_LIMIT_INTERVAL_MS: z.coerce.number().int().nonnegative().default(1000),
  FETCH_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  HTTP_TIMEOUT_MS: z.coerce.number().int().min(1000).default(10000),

  SYNC_SETTLE_MINUTES: z.coerce.number().int().nonnegative().default(0),

  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  LOG_PRETTY: z.union([z.literal('1'), z.literal('0')]).default('1'),
});

export type AppConfig = {
  env: 'development' | 'test' | 'production';
  api: { baseUrl: string; userAgent: string; timeoutMs: number; pageSize: number };
  granularitySec: number;
  rateLimitIntervalMs: number;
  fetchAttempts: number;
  settleSec: number;
  logLevel: LogLevel;
  logPretty: boolean;
};

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = Env.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`invalid environment: ${issues}`);
  }
  const e = parsed.data;

  return {
    env: e.NODE_ENV,
    api: {
      baseUrl: e.CANDLES_API_BASE_URL.replace(/\/$/, ''),
      userAgent: e.USER_AGENT,
      timeoutMs: e.HTTP_TIMEOUT_MS,
      pageSize: e.CANDLES_PAGE_SIZE,
    },
    granularitySec: 60,
    rateLimitIntervalMs: e.RATE_LIMIT_INTERVAL_MS,
    fetchAttempts: e.FETCH_ATTEMPTS,
    settleSec: e.SYNC_SETTLE_MINUTES * 60,
    logLevel: e.LOG_LEVEL,
    logPretty: e.LOG_PRETTY === '1',
  };
}
