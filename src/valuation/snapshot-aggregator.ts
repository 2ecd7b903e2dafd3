import { Decimal } from '../utils/decimal.js';
import type { Ledger } from '../storage/ledger.js';
import { createModuleLogger } from '../utils/logger.js';

const log = createModuleLogger('aggregator');

export class SnapshotAggregator {
  constructor(private readonly ledger: Pick<Ledger, 'latestSnapshotTotals'>) {}

  /** Sum of settlement totals at the most recent snapshot timestamp; zero when the ledger is empty. */
  totalSettlementValue(): Decimal {
    const snapshot = this.ledger.latestSnapshotTotals();
    if (!snapshot) {
      log.warn('No valuation records, total is zero');
      return new Decimal(0);
    }

    const total = snapshot.totals.reduce((sum, t) => sum.plus(t), new Decimal(0));
    log.info('Snapshot total', {
      snapshotAt: new Date(snapshot.snapshotAt).toISOString(),
      records: snapshot.totals.length,
      totalUsd: total.toFixed(2),
    });
    return total;
  }

  latestSnapshotAt(): number | null {
    return this.ledger.latestSnapshotTotals()?.snapshotAt ?? null;
  }
}
