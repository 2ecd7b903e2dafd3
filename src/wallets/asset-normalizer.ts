import { Decimal } from '../utils/decimal.js';
import { NATIVE_SYMBOL, SOL_DECIMALS } from '../config/constants.js';
import type { NormalizedAsset } from '../types/index.js';
import type { AssetPage } from './helius-client.js';

export interface NormalizeOptions {
  solRate: Decimal;
  dustThreshold: Decimal;
}

function fromSmallestUnit(raw: number | string, decimals: number): Decimal {
  return new Decimal(raw).div(new Decimal(10).pow(decimals));
}

/** Native SOL balance valued at `solRate`, or null when the response carries none. */
export function extractNativeBalance(page: AssetPage | null, solRate: Decimal): NormalizedAsset | null {
  const lamports = page?.nativeBalance?.lamports;
  if (lamports === undefined) return null;

  const quantity = fromSmallestUnit(lamports, SOL_DECIMALS);
  return {
    symbol: NATIVE_SYMBOL,
    quantity,
    totalValue: quantity.times(solRate),
  };
}

/** Fungible tokens in response order, valued at the provider-reported total. */
export function extractFungibleAssets(page: AssetPage | null): NormalizedAsset[] {
  if (!page) return [];

  return page.items.map(item => {
    const info = item.token_info;
    return {
      symbol: info?.symbol ?? 'N/A',
      quantity: fromSmallestUnit(info?.balance ?? 0, info?.decimals ?? 0),
      totalValue: new Decimal(info?.price_info?.total_price ?? 0),
    };
  });
}

/** Keep only assets worth strictly more than `threshold`. */
export function applyDustFilter(assets: NormalizedAsset[], threshold: Decimal): NormalizedAsset[] {
  return assets.filter(a => a.totalValue.greaterThan(threshold));
}

/**
 * Merge the native balance (first) with fungible tokens and drop dust.
 * Either response may be null; its contribution is then empty.
 */
export function normalizeWalletAssets(
  nativePage: AssetPage | null,
  searchPage: AssetPage | null,
  options: NormalizeOptions,
): NormalizedAsset[] {
  const native = extractNativeBalance(nativePage, options.solRate);
  const fungible = extractFungibleAssets(searchPage);
  const combined = native ? [native, ...fungible] : fungible;
  return applyDustFilter(combined, options.dustThreshold);
}
