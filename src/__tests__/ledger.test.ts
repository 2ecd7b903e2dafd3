import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { Decimal } from '../utils/decimal.js';
import { TRACKED_INSTRUMENTS } from '../config/constants.js';
import { Ledger } from '../storage/ledger.js';
import { setupSchema } from '../utils/database.js';

describe('Ledger', () => {
  let db: Database.Database;
  let ledger: Ledger;

  beforeEach(() => {
    db = new Database(':memory:');
    setupSchema(db);
    ledger = new Ledger(db);
  });

  afterEach(() => {
    db.close();
  });

  it('syncs the registry idempotently', () => {
    ledger.syncTrackedInstruments(TRACKED_INSTRUMENTS);
    ledger.syncTrackedInstruments(TRACKED_INSTRUMENTS);

    expect(ledger.listTrackedInstruments()).toEqual(TRACKED_INSTRUMENTS);
  });

  it('finds the conversion instrument by currency pair', () => {
    ledger.syncTrackedInstruments(TRACKED_INSTRUMENTS);

    expect(ledger.findConversionInstrument('NOK', 'USD')?.instrumentId).toBe('NOKUSD=X');
    expect(ledger.findConversionInstrument('USD', 'NOK')).toBeNull();
  });

  it('round-trips holding quantities exactly', () => {
    ledger.addManualHolding({
      platform: 'Nordnet',
      account: 'ASK-1',
      category: 'Fund',
      assetName: 'Global Index',
      instrumentId: '0P0000TPOQ.IR',
      quantity: new Decimal('1234.567890123456789'),
      nativeCurrency: 'NOK',
    });

    const [h] = ledger.listManualHoldings();
    expect(h.quantity.toString()).toBe('1234.567890123456789');
    expect(h.nativeCurrency).toBe('NOK');
  });

  it('lists wallets of one platform only', () => {
    ledger.addWallet({ address: 'sol-1', platform: 'Solana', alias: 'hot' });
    ledger.addWallet({ address: 'eth-1', platform: 'Ethereum', alias: 'cold' });
    ledger.addWallet({ address: 'sol-2', platform: 'Solana', alias: 'savings' });

    expect(ledger.listWallets('Solana')).toEqual([
      { address: 'sol-1', platform: 'Solana', alias: 'hot' },
      { address: 'sol-2', platform: 'Solana', alias: 'savings' },
    ]);
  });

  it('returns the most recent rate observation', () => {
    ledger.appendRateObservation({ instrumentId: 'SOL-USD', price: new Decimal('140'), observedAt: 1000 });
    ledger.appendRateObservation({ instrumentId: 'SOL-USD', price: new Decimal('152.25'), observedAt: 3000 });
    ledger.appendRateObservation({ instrumentId: 'SOL-USD', price: new Decimal('148'), observedAt: 2000 });
    ledger.appendRateObservation({ instrumentId: 'BTC-USD', price: new Decimal('67000'), observedAt: 4000 });

    const latest = ledger.latestRate('SOL-USD');
    expect(latest?.price.toString()).toBe('152.25');
    expect(latest?.observedAt).toBe(3000);
    expect(ledger.latestRate('ETH-USD')).toBeNull();
  });
});
