import type Database from 'better-sqlite3';
import { Decimal } from '../utils/decimal.js';
import { insertRow, upsertRow } from '../utils/database.js';
import { createModuleLogger } from '../utils/logger.js';
import type {
  ManualHolding,
  RateObservation,
  TrackedConversionInstrument,
  ValuationRecord,
  WalletReference,
} from '../types/index.js';

const log = createModuleLogger('ledger');

interface InstrumentRow {
  display_name: string;
  instrument_id: string;
  source_currency: string;
  target_currency: string;
}

interface HoldingRow {
  platform: string;
  account: string;
  category: string;
  asset_name: string;
  instrument_id: string;
  quantity: string;
  native_currency: string;
}

interface WalletRow {
  address: string;
  platform: string;
  alias: string;
}

interface RateRow {
  instrument_id: string;
  price: string;
  observed_at: number;
}

interface TotalRow {
  settlement_total: string;
  snapshot_at: number;
}

function toInstrument(row: InstrumentRow): TrackedConversionInstrument {
  return {
    displayName: row.display_name,
    instrumentId: row.instrument_id,
    sourceCurrency: row.source_currency,
    targetCurrency: row.target_currency,
  };
}

/**
 * Reads and append-only writes over the portfolio tables. Valuation records
 * and rate observations are never updated or deleted here.
 */
export class Ledger {
  constructor(private readonly db: Database.Database) {}

  // ─── Tracked Instruments ────────────────────────────────────
  upsertTrackedInstrument(instrument: TrackedConversionInstrument): void {
    upsertRow(this.db, 'trackedInstruments', {
      display_name: instrument.displayName,
      instrument_id: instrument.instrumentId,
      source_currency: instrument.sourceCurrency,
      target_currency: instrument.targetCurrency,
    }, 'instrument_id');
  }

  syncTrackedInstruments(registry: readonly TrackedConversionInstrument[]): void {
    for (const instrument of registry) {
      this.upsertTrackedInstrument(instrument);
    }
    log.info('Tracked instruments synced', { count: registry.length });
  }

  listTrackedInstruments(): TrackedConversionInstrument[] {
    return this.db
      .prepare<[], InstrumentRow>(`
        SELECT display_name, instrument_id, source_currency, target_currency
        FROM tracked_instruments ORDER BY id
      `)
      .all()
      .map(toInstrument);
  }

  findConversionInstrument(source: string, target: string): TrackedConversionInstrument | null {
    const row = this.db
      .prepare<[string, string], InstrumentRow>(`
        SELECT display_name, instrument_id, source_currency, target_currency
        FROM tracked_instruments WHERE source_currency = ? AND target_currency = ?
        ORDER BY id LIMIT 1
      `)
      .get(source, target);
    return row ? toInstrument(row) : null;
  }

  // ─── Inputs ─────────────────────────────────────────────────
  addManualHolding(holding: ManualHolding): void {
    insertRow(this.db, 'manualHoldings', {
      platform: holding.platform,
      account: holding.account,
      category: holding.category,
      asset_name: holding.assetName,
      instrument_id: holding.instrumentId,
      quantity: holding.quantity.toString(),
      native_currency: holding.nativeCurrency,
    });
  }

  listManualHoldings(): ManualHolding[] {
    return this.db
      .prepare<[], HoldingRow>(`
        SELECT platform, account, category, asset_name, instrument_id, quantity, native_currency
        FROM manual_holdings ORDER BY id
      `)
      .all()
      .map(row => ({
        platform: row.platform,
        account: row.account,
        category: row.category,
        assetName: row.asset_name,
        instrumentId: row.instrument_id,
        quantity: new Decimal(row.quantity),
        nativeCurrency: row.native_currency,
      }));
  }

  addWallet(wallet: WalletReference): void {
    insertRow(this.db, 'cryptoWallets', {
      address: wallet.address,
      platform: wallet.platform,
      alias: wallet.alias,
    });
  }

  listWallets(platform: string): WalletReference[] {
    return this.db
      .prepare<[string], WalletRow>(`SELECT address, platform, alias FROM crypto_wallets WHERE platform = ? ORDER BY id`)
      .all(platform);
  }

  // ─── History ────────────────────────────────────────────────
  appendValuation(record: ValuationRecord): void {
    insertRow(this.db, 'valuationRecords', {
      platform: record.platform,
      account: record.account,
      category: record.category,
      asset_name: record.assetName,
      instrument_id: record.instrumentId,
      quantity: record.quantity.toString(),
      native_currency: record.nativeCurrency,
      native_price: record.nativePrice.toString(),
      settlement_price: record.settlementPrice.toString(),
      native_total: record.nativeTotal.toString(),
      settlement_total: record.settlementTotal.toString(),
      snapshot_at: record.snapshotAt,
    });
  }

  appendRateObservation(observation: RateObservation): void {
    insertRow(this.db, 'rateObservations', {
      instrument_id: observation.instrumentId,
      price: observation.price.toString(),
      observed_at: observation.observedAt,
    });
  }

  latestRate(instrumentId: string): RateObservation | null {
    const row = this.db
      .prepare<[string], RateRow>(`
        SELECT instrument_id, price, observed_at FROM rate_observations
        WHERE instrument_id = ? ORDER BY observed_at DESC, id DESC LIMIT 1
      `)
      .get(instrumentId);
    if (!row) return null;
    return { instrumentId: row.instrument_id, price: new Decimal(row.price), observedAt: row.observed_at };
  }

  /** Settlement totals of every record stamped with the most recent snapshot timestamp. */
  latestSnapshotTotals(): { snapshotAt: number; totals: Decimal[] } | null {
    const rows = this.db
      .prepare<[], TotalRow>(`
        SELECT settlement_total, snapshot_at FROM valuation_records
        WHERE snapshot_at = (SELECT MAX(snapshot_at) FROM valuation_records)
      `)
      .all();
    if (rows.length === 0) return null;
    return {
      snapshotAt: rows[0].snapshot_at,
      totals: rows.map(r => new Decimal(r.settlement_total)),
    };
  }
}
