import dotenv from 'dotenv';
import path from 'path';
import { Decimal } from '../utils/decimal.js';
import type { AppConfig, LogLevel } from '../types/index.js';
import { ConfigError } from '../utils/errors.js';
import {
  DEFAULT_DUST_THRESHOLD_USD,
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_SOL_RATE_MAX_AGE_HOURS,
  DEFAULT_SOL_RATE_USD,
  HELIUS_RPC_URL,
  LOOKBACK_WINDOWS,
  ON_CHAIN_PLATFORMS,
  SETTLEMENT_CURRENCY,
  WALLET_PLATFORM,
  YAHOO_QUOTE_API,
} from './constants.js';

type Env = Record<string, string | undefined>;

function required(env: Env, key: string): string {
  const val = env[key]?.trim();
  if (!val) {
    throw new ConfigError(`Missing required env var: ${key}`);
  }
  return val;
}

function envNum(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (!raw) return fallback;
  const val = parseFloat(raw);
  if (!Number.isFinite(val) || val <= 0) {
    throw new ConfigError(`Invalid numeric env var ${key}: ${raw}`);
  }
  return val;
}

function envDecimal(env: Env, key: string, fallback: string): Decimal {
  const raw = env[key] || fallback;
  try {
    return new Decimal(raw);
  } catch {
    throw new ConfigError(`Invalid decimal env var ${key}: ${raw}`);
  }
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

function envLogLevel(env: Env): LogLevel {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  if (!raw) return 'info';
  const level = LOG_LEVELS.find(l => l === raw);
  if (!level) {
    throw new ConfigError(`Invalid LOG_LEVEL: ${raw}`);
  }
  return level;
}

/**
 * Strip the scheme from a SQLite connection string.
 * Accepts `sqlite:path`, `sqlite://path`, `file:path` or a bare path.
 */
export function parseDatabaseUrl(url: string): string {
  const stripped = url.replace(/^(sqlite|file):(\/\/)?/, '');
  if (!stripped) {
    throw new ConfigError(`Invalid DATABASE_URL: ${url}`);
  }
  return stripped;
}

/** Read `.env` into the process environment. Call once, before `loadConfig`. */
export function loadDotenv(): void {
  dotenv.config({ path: path.resolve(process.cwd(), '.env') });
}

export function loadConfig(env: Env = process.env): AppConfig {
  const maxAgeHours = envNum(env, 'SOL_RATE_MAX_AGE_HOURS', DEFAULT_SOL_RATE_MAX_AGE_HOURS);

  return {
    databasePath: parseDatabaseUrl(required(env, 'DATABASE_URL')),
    heliusApiKey: required(env, 'HELIUS_API_KEY'),
    heliusRpcUrl: env.HELIUS_RPC_URL || HELIUS_RPC_URL,
    quoteApiBase: env.QUOTE_API_BASE || YAHOO_QUOTE_API,
    httpTimeoutMs: envNum(env, 'HTTP_TIMEOUT_MS', DEFAULT_HTTP_TIMEOUT_MS),
    settlementCurrency: SETTLEMENT_CURRENCY,
    lookbackWindows: LOOKBACK_WINDOWS,
    dustThreshold: envDecimal(env, 'DUST_THRESHOLD_USD', DEFAULT_DUST_THRESHOLD_USD),
    defaultSolRate: envDecimal(env, 'DEFAULT_SOL_RATE', DEFAULT_SOL_RATE_USD),
    solRateMaxAgeMs: maxAgeHours * 60 * 60 * 1000,
    onChainPlatforms: ON_CHAIN_PLATFORMS,
    walletPlatform: WALLET_PLATFORM,
    logLevel: envLogLevel(env),
    logDir: env.LOG_DIR?.trim() || undefined,
  };
}
