import * as path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../lib/errors';
import type { RiskConfig } from '../types';

export const STRATEGY_IDS = [
  'rsi_1m',
  'rsi_5m',
  'rsi_1h',
  'rsi_4h',
  'sma_5m',
  'scalping_1m',
  'range_24h_low',
  'range_7d_low',
  'macd_15m',
] as const;

export type StrategyId = (typeof STRATEGY_IDS)[number];

/** Check cadence per strategy, matched to the candle size it reads. */
const DEFAULT_INTERVALS: Record<StrategyId, number> = {
  rsi_1m: 60,
  rsi_5m: 300,
  rsi_1h: 3600,
  rsi_4h: 14400,
  sma_5m: 300,
  scalping_1m: 60,
  range_24h_low: 1800,
  range_7d_low: 3600,
  macd_15m: 900,
};

const DEFAULT_ENABLED: Record<StrategyId, boolean> = {
  rsi_1m: true,
  rsi_5m: true,
  rsi_1h: true,
  rsi_4h: true,
  sma_5m: true,
  scalping_1m: true,
  range_24h_low: false,
  range_7d_low: false,
  macd_15m: false,
};

export const RiskConfigSchema = z
  .object({
    maxPositions: z.number().int().positive(),
    positionSize: z.number().positive(),
    stopLossPercent: z.number().positive().lt(100),
    // a SHORT take-profit at 100% or more would sit at or below zero
    takeProfitPercent: z.number().positive().lt(100),
    trailingStopPercent: z.number().positive().lt(100),
    trailingActivationPercent: z.number().nonnegative(),
    minSignalStrength: z.number().min(0).max(1),
    cooldownSeconds: z.number().nonnegative(),
    maxCloseRetries: z.number().int().positive(),
  })
  .strict();

const StrategySettingSchema = z.object({
  id: z.enum(STRATEGY_IDS),
  enabled: z.boolean(),
  intervalSeconds: z.number().int().positive(),
});

const ConfigSchema = z.object({
  exchange: z.object({
    tickerUrl: z.string().url().default('wss://stream.binance.com:9443/ws'),
    restUrl: z.string().url().default('https://api.binance.com'),
    quoteAsset: z.string().min(1).default('USDT'),
    paperBalance: z.number().nonnegative().default(1000),
  }),
  trading: z.object({
    coins: z.array(z.string().min(1)).min(1),
  }),
  risk: RiskConfigSchema,
  scheduler: z.object({
    tickMs: z.number().int().positive().default(1000),
    queueCapacity: z.number().int().positive().default(256),
    strategies: z.array(StrategySettingSchema),
  }),
  monitor: z.object({
    tickMs: z.number().int().positive().default(3000),
  }),
  requests: z.object({
    timeoutMs: z.number().int().positive().default(10_000),
    minRequestIntervalMs: z.number().int().nonnegative().default(500),
  }),
  telegram: z.object({
    botToken: z.string().default(''),
    allowedUsers: z.array(z.string()).default([]),
  }),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export function parseRiskConfig(raw: unknown): RiskConfig {
  const result = RiskConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError('Invalid risk configuration', formatIssues(result.error));
  }
  return result.data;
}

export function parseConfig(raw: unknown): Config {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError('Invalid configuration', formatIssues(result.error));
  }
  return result.data;
}

type Env = Record<string, string | undefined>;

function num(env: Env, key: string, fallback: number): number {
  const value = env[key];
  if (value === undefined || value.trim() === '') return fallback;
  // NaN is left for the schema to reject
  return Number(value);
}

function bool(env: Env, key: string, fallback: boolean): boolean {
  const value = env[key];
  if (value === undefined || value.trim() === '') return fallback;
  return value.trim().toLowerCase() === 'true';
}

function list(env: Env, key: string, fallback: string): string[] {
  return (env[key] || fallback)
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

/** Build the raw config object from environment variables. */
export function configFromEnv(env: Env): unknown {
  const trailingStopPercent = num(env, 'TRAILING_STOP_PERCENT', 0.5);

  return {
    exchange: {
      tickerUrl: env.TICKER_WS_URL || undefined,
      restUrl: env.MARKET_REST_URL || undefined,
      quoteAsset: env.QUOTE_ASSET || undefined,
      paperBalance: num(env, 'PAPER_BALANCE', 1000),
    },
    trading: {
      coins: list(env, 'TRADING_COINS', 'BTC,ETH').map((c) => c.toUpperCase()),
    },
    risk: {
      maxPositions: num(env, 'MAX_POSITIONS', 3),
      positionSize: num(env, 'POSITION_SIZE_USD', 20),
      stopLossPercent: num(env, 'STOP_LOSS_PERCENT', 2.2),
      takeProfitPercent: num(env, 'TAKE_PROFIT_PERCENT', 4),
      trailingStopPercent,
      trailingActivationPercent: num(env, 'TRAILING_ACTIVATION_PERCENT', trailingStopPercent),
      minSignalStrength: num(env, 'MIN_SIGNAL_STRENGTH', 0.75),
      cooldownSeconds: num(env, 'COOLDOWN_SECONDS', 300),
      maxCloseRetries: num(env, 'MAX_CLOSE_RETRIES', 5),
    },
    scheduler: {
      tickMs: num(env, 'SCHEDULER_TICK_MS', 1000),
      queueCapacity: num(env, 'SIGNAL_QUEUE_CAPACITY', 256),
      strategies: STRATEGY_IDS.map((id) => {
        const key = `STRATEGY_${id.toUpperCase()}`;
        return {
          id,
          enabled: bool(env, `${key}_ENABLED`, DEFAULT_ENABLED[id]),
          intervalSeconds: num(env, `${key}_INTERVAL`, DEFAULT_INTERVALS[id]),
        };
      }),
    },
    monitor: {
      tickMs: num(env, 'MONITOR_TICK_MS', 3000),
    },
    requests: {
      timeoutMs: num(env, 'REQUEST_TIMEOUT_MS', 10_000),
      minRequestIntervalMs: num(env, 'MIN_REQUEST_INTERVAL_MS', 500),
    },
    telegram: {
      botToken: env.TELEGRAM_BOT_TOKEN || '',
      allowedUsers: list(env, 'ALLOWED_USERS', ''),
    },
    logLevel: (env.LOG_LEVEL || 'info').toLowerCase(),
  };
}

class ConfigLoader {
  private static instance: Config | null = null;

  static load(): Config {
    if (ConfigLoader.instance) {
      return ConfigLoader.instance;
    }
    return ConfigLoader.reload();
  }

  /** Re-read .env and the environment; the previous snapshot stays if parsing fails. */
  static reload(): Config {
    dotenv.config({ path: path.resolve(process.cwd(), '.env'), override: true });
    ConfigLoader.instance = parseConfig(configFromEnv(process.env));
    return ConfigLoader.instance;
  }
}

export const Config = ConfigLoader;
