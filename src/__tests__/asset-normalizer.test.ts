import { describe, it, expect } from 'vitest';
import { Decimal } from '../utils/decimal.js';
import {
  applyDustFilter,
  extractFungibleAssets,
  extractNativeBalance,
  normalizeWalletAssets,
} from '../wallets/asset-normalizer.js';
import { parseAssetPage, parseRpcJson, type AssetPage } from '../wallets/helius-client.js';
import type { NormalizedAsset } from '../types/index.js';

const OPTIONS = { solRate: new Decimal(20), dustThreshold: new Decimal(10) };

function token(symbol: string, balance: number, decimals: number, totalPrice: number): AssetPage['items'][number] {
  return { token_info: { symbol, balance, decimals, price_info: { total_price: totalPrice } } };
}

function asset(symbol: string, total: string): NormalizedAsset {
  return { symbol, quantity: new Decimal(1), totalValue: new Decimal(total) };
}

function summarize(assets: NormalizedAsset[]) {
  return assets.map(a => ({ symbol: a.symbol, quantity: a.quantity.toString(), total: a.totalValue.toString() }));
}

describe('extractNativeBalance', () => {
  it('converts lamports to SOL and values them at the cached rate', () => {
    const native = extractNativeBalance({ items: [], nativeBalance: { lamports: 1_500_000_000 } }, new Decimal(20));

    expect(native?.symbol).toBe('SOL');
    expect(native?.quantity.toString()).toBe('1.5');
    expect(native?.totalValue.toString()).toBe('30');
  });

  it('returns null when the response or its native balance is absent', () => {
    expect(extractNativeBalance(null, new Decimal(20))).toBeNull();
    expect(extractNativeBalance({ items: [] }, new Decimal(20))).toBeNull();
  });
});

describe('extractFungibleAssets', () => {
  it('scales balances by each token\'s decimals and keeps provider totals', () => {
    const page: AssetPage = { items: [token('USDC', 2_500_000, 6, 2.5), token('JUP', 1_234_500_000, 6, 1500.75)] };

    expect(summarize(extractFungibleAssets(page))).toEqual([
      { symbol: 'USDC', quantity: '2.5', total: '2.5' },
      { symbol: 'JUP', quantity: '1234.5', total: '1500.75' },
    ]);
  });

  it('defaults missing fields instead of failing', () => {
    const page: AssetPage = { items: [{ id: 'mint-without-info' }, { token_info: { balance: 42 } }] };

    expect(summarize(extractFungibleAssets(page))).toEqual([
      { symbol: 'N/A', quantity: '0', total: '0' },
      { symbol: 'N/A', quantity: '42', total: '0' },
    ]);
  });

  it('returns nothing for an absent response', () => {
    expect(extractFungibleAssets(null)).toEqual([]);
  });
});

describe('applyDustFilter', () => {
  it('drops assets at or below the threshold and keeps those above it', () => {
    const assets = [asset('ZERO', '0'), asset('EDGE', '10'), asset('JUST', '10.01'), asset('BIG', '500')];

    const kept = applyDustFilter(assets, new Decimal(10));

    expect(kept.map(a => a.symbol)).toEqual(['JUST', 'BIG']);
  });

  it('handles an empty list', () => {
    expect(applyDustFilter([], new Decimal(10))).toEqual([]);
  });
});

describe('normalizeWalletAssets', () => {
  const nativePage: AssetPage = { items: [], nativeBalance: { lamports: 1_500_000_000 } };
  const searchPage: AssetPage = {
    items: [token('JUP', 800_000_000, 6, 640), token('DUST', 1_000, 0, 0.42), token('WIF', 25_000_000, 6, 50)],
  };

  it('puts the native balance first and fungible tokens in response order', () => {
    expect(summarize(normalizeWalletAssets(nativePage, searchPage, OPTIONS))).toEqual([
      { symbol: 'SOL', quantity: '1.5', total: '30' },
      { symbol: 'JUP', quantity: '800', total: '640' },
      { symbol: 'WIF', quantity: '25', total: '50' },
    ]);
  });

  it('keeps fungible assets when the native balance query failed', () => {
    const result = normalizeWalletAssets(null, searchPage, OPTIONS);
    expect(result.map(a => a.symbol)).toEqual(['JUP', 'WIF']);
  });

  it('keeps the native balance when the search query failed', () => {
    const result = normalizeWalletAssets(nativePage, null, OPTIONS);
    expect(result.map(a => a.symbol)).toEqual(['SOL']);
  });

  it('filters a small native balance as dust', () => {
    const smallNative: AssetPage = { items: [], nativeBalance: { lamports: 250_000_000 } };
    const result = normalizeWalletAssets(smallNative, null, OPTIONS);
    expect(result).toEqual([]);
  });

  it('keeps balances beyond double precision exact', () => {
    const nativeBody = '{"result":{"items":[],"nativeBalance":{"lamports":9007199254740993}}}';
    const searchBody =
      '{"result":{"items":[{"token_info":{"symbol":"MEME","balance":12345678901234567891,"decimals":9,"price_info":{"total_price":500}}}]}}';

    const result = normalizeWalletAssets(
      parseAssetPage(parseRpcJson(nativeBody)),
      parseAssetPage(parseRpcJson(searchBody)),
      OPTIONS,
    );

    expect(summarize(result)).toEqual([
      { symbol: 'SOL', quantity: '9007199.254740993', total: '180143985.09481986' },
      { symbol: 'MEME', quantity: '12345678901.234567891', total: '500' },
    ]);
  });
});
