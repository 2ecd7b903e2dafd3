import { describe, it, expect, vi } from 'vitest';
import { PriceResolver } from '../pricing/price-resolver.js';
import type { QuoteProvider } from '../pricing/quote-client.js';
import { QuoteProviderError } from '../utils/errors.js';

function fakeQuotes(byWindow: Record<string, number[] | Error>) {
  return {
    fetchCloses: vi.fn(async (_id: string, window: string): Promise<number[]> => {
      const entry = byWindow[window] ?? [];
      if (entry instanceof Error) throw entry;
      return entry;
    }),
  } satisfies QuoteProvider;
}

describe('PriceResolver', () => {
  const WINDOWS = ['1d', '5d'];

  it('returns the last close of the narrowest window with data', async () => {
    const quotes = fakeQuotes({ '1d': [101.5, 102.25], '5d': [90] });
    const resolver = new PriceResolver(quotes, WINDOWS);

    const result = await resolver.resolve('AAPL');

    expect(result.ok).toBe(true);
    if (result.ok) expect(result.value.toString()).toBe('102.25');
    expect(quotes.fetchCloses).toHaveBeenCalledTimes(1);
    expect(quotes.fetchCloses).toHaveBeenCalledWith('AAPL', '1d');
  });

  it('falls back to the wider window when the first is empty', async () => {
    const quotes = fakeQuotes({ '1d': [], '5d': [48.1, 49.9] });
    const resolver = new PriceResolver(quotes, WINDOWS);

    const result = await resolver.resolve('NEWCO');

    expect(result).toEqual({ ok: true, value: expect.anything() });
    if (result.ok) expect(result.value.toString()).toBe('49.9');
    expect(quotes.fetchCloses).toHaveBeenNthCalledWith(2, 'NEWCO', '5d');
  });

  it('falls back to the wider window when the first throws', async () => {
    const quotes = fakeQuotes({ '1d': new QuoteProviderError('HTTP 500', 'X', '1d'), '5d': [7] });
    const resolver = new PriceResolver(quotes, WINDOWS);

    const result = await resolver.resolve('X');

    expect(result.ok).toBe(true);
    if (result.ok) expect(result.value.toNumber()).toBe(7);
  });

  it('reports NOT_FOUND when every window is empty', async () => {
    const resolver = new PriceResolver(fakeQuotes({ '1d': [], '5d': [] }), WINDOWS);
    expect(await resolver.resolve('DELISTED')).toEqual({ ok: false, reason: 'NOT_FOUND' });
  });

  it('reports NOT_FOUND when every window errors', async () => {
    const quotes = fakeQuotes({ '1d': new Error('timeout'), '5d': new Error('timeout') });
    const resolver = new PriceResolver(quotes, WINDOWS);

    expect(await resolver.resolve('DOWN')).toEqual({ ok: false, reason: 'NOT_FOUND' });
    expect(quotes.fetchCloses).toHaveBeenCalledTimes(2);
  });
});
