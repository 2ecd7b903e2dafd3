import axios from 'axios';
import { z } from 'zod';
import type { AppConfig } from '../types/index.js';
import { QuoteProviderError, errorMessage } from '../utils/errors.js';

/**
 * Close-price history source. An empty array means the provider has no data
 * for the window; failures to reach or understand the provider throw
 * `QuoteProviderError`.
 */
export interface QuoteProvider {
  fetchCloses(instrumentId: string, window: string): Promise<number[]>;
}

const ChartResponseSchema = z.object({
  chart: z.object({
    result: z.array(z.object({
      indicators: z.object({
        quote: z.array(z.object({
          close: z.array(z.number().nullable()).optional(),
        })).optional(),
      }).optional(),
    })).nullable().optional(),
    error: z.object({
      code: z.string().optional(),
      description: z.string().optional(),
    }).nullable().optional(),
  }),
});

/** Daily closes from the Yahoo Finance chart API, oldest first, gaps removed. */
export class YahooQuoteClient implements QuoteProvider {
  constructor(private readonly config: Pick<AppConfig, 'quoteApiBase' | 'httpTimeoutMs'>) {}

  async fetchCloses(instrumentId: string, window: string): Promise<number[]> {
    const url = `${this.config.quoteApiBase}/v8/finance/chart/${encodeURIComponent(instrumentId)}`;

    let body: unknown;
    try {
      const resp = await axios.get<unknown>(url, {
        params: { range: window, interval: '1d' },
        timeout: this.config.httpTimeoutMs,
      });
      body = resp.data;
    } catch (err) {
      throw new QuoteProviderError(`Quote request failed: ${errorMessage(err)}`, instrumentId, window);
    }

    const parsed = ChartResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new QuoteProviderError('Unexpected quote response shape', instrumentId, window);
    }

    const { result, error } = parsed.data.chart;
    if (error) {
      throw new QuoteProviderError(
        `Quote provider error: ${error.description ?? error.code ?? 'unknown'}`,
        instrumentId,
        window,
      );
    }

    const closes = result?.[0]?.indicators?.quote?.[0]?.close ?? [];
    return closes.filter((c): c is number => c !== null && Number.isFinite(c));
  }
}
