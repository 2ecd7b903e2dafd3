import type { Decimal } from '../utils/decimal.js';

// ─── Outcomes ─────────────────────────────────────────────────
export type Outcome<T, R extends string> =
  | { ok: true; value: T }
  | { ok: false; reason: R };

export type PriceOutcome = Outcome<Decimal, 'NOT_FOUND'>;
export type RateOutcome = Outcome<Decimal, 'NO_INSTRUMENT' | 'NO_PRICE'>;

// ─── Registry & Inputs ────────────────────────────────────────
export interface TrackedConversionInstrument {
  displayName: string;
  instrumentId: string;
  sourceCurrency: string;
  targetCurrency: string;
}

export interface ManualHolding {
  platform: string;
  account: string;
  category: string;
  assetName: string;
  instrumentId: string;
  quantity: Decimal;
  nativeCurrency: string;
}

export interface WalletReference {
  address: string;
  platform: string;
  alias: string;
}

// ─── Valuation ────────────────────────────────────────────────
export interface NormalizedAsset {
  symbol: string;
  quantity: Decimal;
  totalValue: Decimal; // settlement currency
}

export interface ValuationRecord {
  platform: string;
  account: string;
  category: string;
  assetName: string;
  instrumentId: string;
  quantity: Decimal;
  nativeCurrency: string;
  nativePrice: Decimal;
  settlementPrice: Decimal;
  nativeTotal: Decimal;
  settlementTotal: Decimal;
  snapshotAt: number; // unix ms
}

export interface RateObservation {
  instrumentId: string;
  price: Decimal;
  observedAt: number; // unix ms
}

export interface RunSummary {
  snapshotAt: number;
  holdingsValued: number;
  holdingsSkipped: number;
  ratesRecorded: number;
  ratesSkipped: number;
  walletsProcessed: number;
  walletAssetsRecorded: number;
}

// ─── Config ───────────────────────────────────────────────────
export type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'verbose' | 'debug' | 'silly';

export interface AppConfig {
  databasePath: string;
  heliusApiKey: string;
  heliusRpcUrl: string;
  quoteApiBase: string;
  httpTimeoutMs: number;
  settlementCurrency: string;
  lookbackWindows: readonly string[];
  dustThreshold: Decimal;
  defaultSolRate: Decimal;
  solRateMaxAgeMs: number;
  onChainPlatforms: readonly string[];
  walletPlatform: string;
  logLevel: LogLevel;
  logDir: string | undefined;
}
