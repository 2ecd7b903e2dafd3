import { Decimal } from '../utils/decimal.js';
import type { Ledger } from '../storage/ledger.js';
import type { RateOutcome } from '../types/index.js';
import { createModuleLogger } from '../utils/logger.js';
import type { PriceResolver } from './price-resolver.js';

const log = createModuleLogger('currency-converter');

export class CurrencyConverter {
  constructor(
    private readonly ledger: Pick<Ledger, 'findConversionInstrument'>,
    private readonly prices: Pick<PriceResolver, 'resolve'>,
    private readonly settlementCurrency: string,
  ) {}

  async rateToSettlement(currency: string): Promise<RateOutcome> {
    if (currency === this.settlementCurrency) {
      return { ok: true, value: new Decimal(1) };
    }

    const instrument = this.ledger.findConversionInstrument(currency, this.settlementCurrency);
    if (!instrument) {
      log.warn('No conversion instrument', { from: currency, to: this.settlementCurrency });
      return { ok: false, reason: 'NO_INSTRUMENT' };
    }

    const price = await this.prices.resolve(instrument.instrumentId);
    if (!price.ok) {
      log.error('Conversion rate unavailable', { from: currency, instrumentId: instrument.instrumentId });
      return { ok: false, reason: 'NO_PRICE' };
    }
    return { ok: true, value: price.value };
  }
}
