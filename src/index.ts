#!/usr/bin/env node
import { loadConfig, loadDotenv } from './config/index.js';
import { TRACKED_INSTRUMENTS } from './config/constants.js';
import { CurrencyConverter } from './pricing/currency-converter.js';
import { PriceResolver } from './pricing/price-resolver.js';
import { YahooQuoteClient } from './pricing/quote-client.js';
import { Ledger } from './storage/ledger.js';
import { openDatabase, setupSchema } from './utils/database.js';
import { errorMessage } from './utils/errors.js';
import { configureLogger, createModuleLogger } from './utils/logger.js';
import { SnapshotAggregator } from './valuation/snapshot-aggregator.js';
import { ValuationPipeline } from './valuation/pipeline.js';
import { HeliusClient } from './wallets/helius-client.js';

const log = createModuleLogger('main');

async function main(): Promise<void> {
  loadDotenv();
  const config = loadConfig();
  configureLogger(config);

  const db = openDatabase(config.databasePath);
  try {
    setupSchema(db);
    const ledger = new Ledger(db);
    ledger.syncTrackedInstruments(TRACKED_INSTRUMENTS);

    const prices = new PriceResolver(new YahooQuoteClient(config), config.lookbackWindows);
    const converter = new CurrencyConverter(ledger, prices, config.settlementCurrency);
    const pipeline = new ValuationPipeline({
      config,
      ledger,
      prices,
      converter,
      wallets: new HeliusClient(config),
    });

    await pipeline.runOnce();

    const total = new SnapshotAggregator(ledger).totalSettlementValue();
    console.log(`Total USD value of all assets: $${total.toFixed(2)}`);
  } finally {
    db.close();
  }
}

main().catch(err => {
  log.error('Snapshot run aborted', { error: errorMessage(err) });
  process.exit(1);
});
