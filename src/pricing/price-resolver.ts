import { Decimal } from '../utils/decimal.js';
import type { PriceOutcome } from '../types/index.js';
import { errorMessage } from '../utils/errors.js';
import { createModuleLogger } from '../utils/logger.js';
import type { QuoteProvider } from './quote-client.js';

const log = createModuleLogger('price-resolver');

export class PriceResolver {
  constructor(
    private readonly quotes: QuoteProvider,
    private readonly windows: readonly string[],
  ) {}

  /**
   * Latest close for `instrumentId`, taken from the first lookback window
   * that returns any history. Provider errors fall through to the next window.
   */
  async resolve(instrumentId: string): Promise<PriceOutcome> {
    for (const window of this.windows) {
      try {
        const closes = await this.quotes.fetchCloses(instrumentId, window);
        if (closes.length > 0) {
          const price = new Decimal(String(closes[closes.length - 1]));
          log.info('Latest price', { instrumentId, window, price: price.toString() });
          return { ok: true, value: price };
        }
        log.warn('No price data', { instrumentId, window });
      } catch (err) {
        log.error('Price fetch failed', { instrumentId, window, error: errorMessage(err) });
      }
    }

    log.error('Price not found in any window', { instrumentId, windows: this.windows });
    return { ok: false, reason: 'NOT_FOUND' };
  }
}
