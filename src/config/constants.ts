import type { TrackedConversionInstrument } from '../types/index.js';

// ─── Currencies ──────────────────────────────────────────────
export const SETTLEMENT_CURRENCY = 'USD';

// ─── Price Lookup ────────────────────────────────────────────
// Narrowest first; wider windows catch closed markets and thin listings
export const LOOKBACK_WINDOWS = ['1d', '5d'] as const;

// ─── Solana ──────────────────────────────────────────────────
export const SOL_DECIMALS = 9;
export const SOL_RATE_INSTRUMENT = 'SOL-USD';
export const NATIVE_SYMBOL = 'SOL';
export const WALLET_PLATFORM = 'Solana';
export const WALLET_ASSET_CATEGORY = 'Crypto';

// Holdings on these platforms are already quoted in the settlement currency
export const ON_CHAIN_PLATFORMS = ['Solana'] as const;

// ─── Defaults ────────────────────────────────────────────────
export const DEFAULT_DUST_THRESHOLD_USD = '10';
export const DEFAULT_SOL_RATE_USD = '20';
export const DEFAULT_SOL_RATE_MAX_AGE_HOURS = 24;
export const DEFAULT_HTTP_TIMEOUT_MS = 10_000;

// ─── API Endpoints ───────────────────────────────────────────
export const HELIUS_RPC_URL = 'https://mainnet.helius-rpc.com';
export const YAHOO_QUOTE_API = 'https://query1.finance.yahoo.com';

// ─── Tracked Conversion Instruments ──────────────────────────
export const TRACKED_INSTRUMENTS: readonly TrackedConversionInstrument[] = [
  { displayName: 'NOK/USD', instrumentId: 'NOKUSD=X', sourceCurrency: 'NOK', targetCurrency: 'USD' },
  { displayName: 'EUR/USD', instrumentId: 'EURUSD=X', sourceCurrency: 'EUR', targetCurrency: 'USD' },
  { displayName: 'SEK/USD', instrumentId: 'SEKUSD=X', sourceCurrency: 'SEK', targetCurrency: 'USD' },
  { displayName: 'BTC', instrumentId: 'BTC-USD', sourceCurrency: 'BTC', targetCurrency: 'USD' },
  { displayName: 'ETH', instrumentId: 'ETH-USD', sourceCurrency: 'ETH', targetCurrency: 'USD' },
  { displayName: 'SOL', instrumentId: SOL_RATE_INSTRUMENT, sourceCurrency: 'SOL', targetCurrency: 'USD' },
  { displayName: 'NASDAQ Composite', instrumentId: '^IXIC', sourceCurrency: 'NASDAQ', targetCurrency: 'USD' },
];
