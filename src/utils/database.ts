import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { createModuleLogger } from './logger.js';

const log = createModuleLogger('database');

// ─── Table Descriptors ────────────────────────────────────────
// Every identifier that reaches SQL text comes from this map.
export const TABLES = {
  trackedInstruments: {
    name: 'tracked_instruments',
    columns: ['display_name', 'instrument_id', 'source_currency', 'target_currency'],
    ddl: `
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      display_name TEXT NOT NULL,
      instrument_id TEXT NOT NULL,
      source_currency TEXT NOT NULL,
      target_currency TEXT NOT NULL
    `,
  },
  manualHoldings: {
    name: 'manual_holdings',
    columns: ['platform', 'account', 'category', 'asset_name', 'instrument_id', 'quantity', 'native_currency'],
    ddl: `
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      platform TEXT NOT NULL,
      account TEXT NOT NULL,
      category TEXT NOT NULL,
      asset_name TEXT NOT NULL,
      instrument_id TEXT NOT NULL,
      quantity TEXT NOT NULL,
      native_currency TEXT NOT NULL
    `,
  },
  cryptoWallets: {
    name: 'crypto_wallets',
    columns: ['address', 'platform', 'alias'],
    ddl: `
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      address TEXT NOT NULL,
      platform TEXT NOT NULL,
      alias TEXT NOT NULL
    `,
  },
  valuationRecords: {
    name: 'valuation_records',
    columns: [
      'platform', 'account', 'category', 'asset_name', 'instrument_id', 'quantity', 'native_currency',
      'native_price', 'settlement_price', 'native_total', 'settlement_total', 'snapshot_at',
    ],
    ddl: `
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      platform TEXT NOT NULL,
      account TEXT NOT NULL,
      category TEXT NOT NULL,
      asset_name TEXT NOT NULL,
      instrument_id TEXT NOT NULL,
      quantity TEXT NOT NULL,
      native_currency TEXT NOT NULL,
      native_price TEXT NOT NULL,
      settlement_price TEXT NOT NULL,
      native_total TEXT NOT NULL,
      settlement_total TEXT NOT NULL,
      snapshot_at INTEGER NOT NULL
    `,
  },
  rateObservations: {
    name: 'rate_observations',
    columns: ['instrument_id', 'price', 'observed_at'],
    ddl: `
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      instrument_id TEXT NOT NULL,
      price TEXT NOT NULL,
      observed_at INTEGER NOT NULL
    `,
  },
} as const;

export type TableKey = keyof typeof TABLES;
export type ColumnOf<T extends TableKey> = (typeof TABLES)[T]['columns'][number];
export type SqlValue = string | number | null;
export type Row<T extends TableKey> = Record<ColumnOf<T>, SqlValue>;

const TABLE_KEYS: readonly TableKey[] = [
  'trackedInstruments',
  'manualHoldings',
  'cryptoWallets',
  'valuationRecords',
  'rateObservations',
];

const INDEXES = [
  `CREATE INDEX IF NOT EXISTS idx_valuation_snapshot ON valuation_records(snapshot_at)`,
  `CREATE INDEX IF NOT EXISTS idx_rates_instrument ON rate_observations(instrument_id, observed_at)`,
  `CREATE INDEX IF NOT EXISTS idx_wallets_platform ON crypto_wallets(platform)`,
];

// ─── Connection ───────────────────────────────────────────────
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  log.info('Database opened', { path: dbPath });
  return db;
}

// ─── Schema ───────────────────────────────────────────────────
export function createTable(db: Database.Database, table: TableKey): void {
  const { name, ddl } = TABLES[table];
  db.exec(`CREATE TABLE IF NOT EXISTS ${name} (${ddl})`);
  log.debug('Table ready', { table: name });
}

function uniqueIndexName(table: TableKey, column: string): string {
  return `uq_${TABLES[table].name}_${column}`;
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

/**
 * Add a unique index on `column` unless it already exists. When existing rows
 * violate it, every duplicate but the first-inserted row is deleted and the
 * index is created again.
 */
export function ensureUniqueConstraint<T extends TableKey>(
  db: Database.Database,
  table: T,
  column: ColumnOf<T>,
): void {
  const tableName = TABLES[table].name;
  const indexName = uniqueIndexName(table, column);

  const existing = db
    .prepare(`SELECT name FROM sqlite_master WHERE type = 'index' AND tbl_name = ? AND name = ?`)
    .get(tableName, indexName);
  if (existing) {
    log.debug('Unique constraint already exists', { table: tableName, column });
    return;
  }

  const createIndex = `CREATE UNIQUE INDEX ${indexName} ON ${tableName}(${column})`;
  try {
    db.exec(createIndex);
    log.info('Added unique constraint', { table: tableName, column });
  } catch (err) {
    if (!isUniqueViolation(err)) throw err;

    log.warn('Duplicate values block unique constraint, cleaning up', { table: tableName, column });
    const removed = db
      .prepare(`DELETE FROM ${tableName} WHERE rowid NOT IN (SELECT MIN(rowid) FROM ${tableName} GROUP BY ${column})`)
      .run();
    db.exec(createIndex);
    log.info('Duplicates removed and unique constraint added', {
      table: tableName,
      column,
      removed: removed.changes,
    });
  }
}

export function setupSchema(db: Database.Database): void {
  for (const table of TABLE_KEYS) {
    createTable(db, table);
  }
  for (const stmt of INDEXES) {
    db.exec(stmt);
  }
  ensureUniqueConstraint(db, 'trackedInstruments', 'instrument_id');
}

// ─── Writes ───────────────────────────────────────────────────
export function insertRow<T extends TableKey>(db: Database.Database, table: T, row: Row<T>): void {
  const { name } = TABLES[table];
  const columns: readonly string[] = TABLES[table].columns;
  const placeholders = columns.map(c => `@${c}`).join(', ');
  db.prepare(`INSERT INTO ${name} (${columns.join(', ')}) VALUES (${placeholders})`).run(row);
}

/** Insert, or on a `key` collision overwrite every other column with the new values. */
export function upsertRow<T extends TableKey>(
  db: Database.Database,
  table: T,
  row: Row<T>,
  key: ColumnOf<T>,
): void {
  const { name } = TABLES[table];
  const columns: readonly string[] = TABLES[table].columns;
  const placeholders = columns.map(c => `@${c}`).join(', ');
  const updates = columns
    .filter(c => c !== key)
    .map(c => `${c} = excluded.${c}`)
    .join(', ');
  db.prepare(`
    INSERT INTO ${name} (${columns.join(', ')}) VALUES (${placeholders})
    ON CONFLICT(${key}) DO UPDATE SET ${updates}
  `).run(row);
}
