import { Decimal } from '../utils/decimal.js';
import { SOL_RATE_INSTRUMENT, WALLET_ASSET_CATEGORY } from '../config/constants.js';
import type { CurrencyConverter } from '../pricing/currency-converter.js';
import type { PriceResolver } from '../pricing/price-resolver.js';
import type { Ledger } from '../storage/ledger.js';
import type {
  AppConfig,
  ManualHolding,
  NormalizedAsset,
  RunSummary,
  ValuationRecord,
  WalletReference,
} from '../types/index.js';
import { createModuleLogger } from '../utils/logger.js';
import { normalizeWalletAssets } from '../wallets/asset-normalizer.js';
import type { WalletProvider } from '../wallets/helius-client.js';

const log = createModuleLogger('pipeline');

export interface PipelineDeps {
  config: Pick<
    AppConfig,
    'settlementCurrency' | 'onChainPlatforms' | 'walletPlatform' | 'dustThreshold' | 'defaultSolRate' | 'solRateMaxAgeMs'
  >;
  ledger: Ledger;
  prices: Pick<PriceResolver, 'resolve'>;
  converter: Pick<CurrencyConverter, 'rateToSettlement'>;
  wallets: WalletProvider;
  now?: () => number;
}

/**
 * One valuation run: manual holdings, then rate observations, then wallets.
 * Every row written by a run carries the same snapshot timestamp. Items that
 * cannot be priced are logged and skipped; the run itself always completes.
 */
export class ValuationPipeline {
  private readonly now: () => number;

  constructor(private readonly deps: PipelineDeps) {
    this.now = deps.now ?? Date.now;
  }

  async runOnce(): Promise<RunSummary> {
    const snapshotAt = this.now();
    const summary: RunSummary = {
      snapshotAt,
      holdingsValued: 0,
      holdingsSkipped: 0,
      ratesRecorded: 0,
      ratesSkipped: 0,
      walletsProcessed: 0,
      walletAssetsRecorded: 0,
    };

    log.info('Valuation run started', { snapshotAt: new Date(snapshotAt).toISOString() });

    for (const holding of this.deps.ledger.listManualHoldings()) {
      const record = await this.valueHolding(holding, snapshotAt);
      if (record) {
        this.deps.ledger.appendValuation(record);
        summary.holdingsValued++;
      } else {
        summary.holdingsSkipped++;
      }
    }

    for (const instrument of this.deps.ledger.listTrackedInstruments()) {
      const price = await this.deps.prices.resolve(instrument.instrumentId);
      if (!price.ok) {
        log.warn('Skipping rate observation', { instrumentId: instrument.instrumentId });
        summary.ratesSkipped++;
        continue;
      }
      this.deps.ledger.appendRateObservation({
        instrumentId: instrument.instrumentId,
        price: price.value,
        observedAt: snapshotAt,
      });
      summary.ratesRecorded++;
    }

    for (const wallet of this.deps.ledger.listWallets(this.deps.config.walletPlatform)) {
      summary.walletAssetsRecorded += await this.valueWallet(wallet, snapshotAt);
      summary.walletsProcessed++;
    }

    log.info('Valuation run complete', { ...summary });
    return summary;
  }

  async valueHolding(holding: ManualHolding, snapshotAt: number): Promise<ValuationRecord | null> {
    const { settlementCurrency, onChainPlatforms } = this.deps.config;

    const price = await this.deps.prices.resolve(holding.instrumentId);
    if (!price.ok) {
      log.warn('Skipping holding, price unavailable', { instrumentId: holding.instrumentId });
      return null;
    }

    let rate: Decimal;
    let nativeCurrency = holding.nativeCurrency;
    if (onChainPlatforms.includes(holding.platform)) {
      rate = new Decimal(1);
      nativeCurrency = settlementCurrency;
    } else {
      const conversion = await this.deps.converter.rateToSettlement(holding.nativeCurrency);
      if (!conversion.ok) {
        log.warn('Skipping holding, conversion rate unavailable', {
          instrumentId: holding.instrumentId,
          currency: holding.nativeCurrency,
          reason: conversion.reason,
        });
        return null;
      }
      rate = conversion.value;
    }

    const nativePrice = price.value;
    const settlementPrice = nativePrice.times(rate);
    return {
      platform: holding.platform,
      account: holding.account,
      category: holding.category,
      assetName: holding.assetName,
      instrumentId: holding.instrumentId,
      quantity: holding.quantity,
      nativeCurrency,
      nativePrice,
      settlementPrice,
      nativeTotal: holding.quantity.times(nativePrice),
      settlementTotal: holding.quantity.times(settlementPrice),
      snapshotAt,
    };
  }

  /**
   * SOL/USD rate for native balances: the latest recorded observation while it
   * is within the staleness bound, the configured default otherwise.
   */
  resolveNativeRate(asOf: number): Decimal {
    const { defaultSolRate, solRateMaxAgeMs } = this.deps.config;
    const latest = this.deps.ledger.latestRate(SOL_RATE_INSTRUMENT);
    if (!latest) {
      log.warn('No SOL rate recorded, using default', { rate: defaultSolRate.toString() });
      return defaultSolRate;
    }
    if (asOf - latest.observedAt > solRateMaxAgeMs) {
      log.warn('Recorded SOL rate is stale, using default', {
        observedAt: new Date(latest.observedAt).toISOString(),
        rate: defaultSolRate.toString(),
      });
      return defaultSolRate;
    }
    return latest.price;
  }

  private async valueWallet(wallet: WalletReference, snapshotAt: number): Promise<number> {
    const { settlementCurrency, dustThreshold } = this.deps.config;
    log.info('Processing wallet', { alias: wallet.alias, address: wallet.address });

    const nativePage = await this.deps.wallets.getAssetsByOwner(wallet.address);
    const searchPage = await this.deps.wallets.searchAssets(wallet.address);
    const assets = normalizeWalletAssets(nativePage, searchPage, {
      solRate: this.resolveNativeRate(snapshotAt),
      dustThreshold,
    });

    for (const asset of assets) {
      this.deps.ledger.appendValuation(walletRecord(wallet, asset, settlementCurrency, snapshotAt));
    }

    log.info('Wallet holdings', {
      alias: wallet.alias,
      assets: assets.map(a => `${a.symbol} ${a.quantity.toFixed(6)} = $${a.totalValue.toFixed(2)}`),
    });
    return assets.length;
  }
}

function walletRecord(
  wallet: WalletReference,
  asset: NormalizedAsset,
  settlementCurrency: string,
  snapshotAt: number,
): ValuationRecord {
  const unitPrice = asset.quantity.isZero() ? new Decimal(0) : asset.totalValue.div(asset.quantity);
  return {
    platform: wallet.platform,
    account: wallet.address,
    category: WALLET_ASSET_CATEGORY,
    assetName: asset.symbol,
    instrumentId: `${asset.symbol}-${settlementCurrency}`,
    quantity: asset.quantity,
    nativeCurrency: settlementCurrency,
    nativePrice: unitPrice,
    settlementPrice: unitPrice,
    nativeTotal: asset.totalValue,
    settlementTotal: asset.totalValue,
    snapshotAt,
  };
}
