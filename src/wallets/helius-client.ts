import axios from 'axios';
import { isSafeNumber, parse } from 'lossless-json';
import { z } from 'zod';
import type { AppConfig } from '../types/index.js';
import { errorMessage } from '../utils/errors.js';
import { createModuleLogger } from '../utils/logger.js';

const log = createModuleLogger('helius');

// ─── Response Schemas ─────────────────────────────────────────
// Amounts are smallest-unit integers; values past 2^53 arrive as digit strings.
const AmountSchema = z.union([z.number().nonnegative(), z.string().regex(/^\d+(\.\d+)?$/)]);

const TokenInfoSchema = z.object({
  symbol: z.string().nullish(),
  balance: AmountSchema.nullish(),
  decimals: z.number().int().nonnegative().nullish(),
  price_info: z.object({
    total_price: AmountSchema.nullish(),
  }).nullish(),
});

const AssetItemSchema = z.object({
  id: z.string().nullish(),
  token_info: TokenInfoSchema.nullish(),
});

const AssetPageSchema = z.object({
  // An unreadable item is dropped on its own; the rest of the page stays.
  items: z.array(AssetItemSchema.catch({})).default([]),
  nativeBalance: z.object({
    lamports: AmountSchema,
  }).optional(),
});

const RpcEnvelopeSchema = z.object({
  result: AssetPageSchema.optional(),
  error: z.object({ message: z.string().optional() }).optional(),
});

export type AssetPage = z.infer<typeof AssetPageSchema>;

/**
 * Owner-address asset queries. Each method resolves to `null` when the
 * provider call fails or the payload does not match the expected shape.
 */
export interface WalletProvider {
  getAssetsByOwner(ownerAddress: string): Promise<AssetPage | null>;
  searchAssets(ownerAddress: string): Promise<AssetPage | null>;
}

/**
 * JSON.parse that keeps every number a double cannot represent exactly as its
 * source digit string.
 */
export function parseRpcJson(text: string): unknown {
  return parse(text, null, value => (isSafeNumber(value) ? Number(value) : value));
}

export function parseAssetPage(body: unknown): AssetPage | null {
  const parsed = RpcEnvelopeSchema.safeParse(body);
  if (!parsed.success) {
    log.warn('Malformed RPC payload', { issues: parsed.error.issues.length });
    return null;
  }
  if (parsed.data.error) {
    log.warn('RPC returned error', { error: parsed.data.error.message ?? 'unknown' });
    return null;
  }
  return parsed.data.result ?? null;
}

export class HeliusClient implements WalletProvider {
  constructor(private readonly config: Pick<AppConfig, 'heliusApiKey' | 'heliusRpcUrl' | 'httpTimeoutMs'>) {}

  getAssetsByOwner(ownerAddress: string): Promise<AssetPage | null> {
    return this.call('getAssetsByOwner', {
      ownerAddress,
      displayOptions: {
        showFungible: true,
        showNativeBalance: true,
      },
    });
  }

  searchAssets(ownerAddress: string): Promise<AssetPage | null> {
    return this.call('searchAssets', {
      ownerAddress,
      tokenType: 'all',
    });
  }

  private async call(method: string, params: Record<string, unknown>): Promise<AssetPage | null> {
    const owner = params.ownerAddress;
    try {
      const resp = await axios.post<unknown>(
        `${this.config.heliusRpcUrl}/`,
        { jsonrpc: '2.0', id: 'portfolio-snapshot', method, params },
        {
          params: { 'api-key': this.config.heliusApiKey },
          headers: { 'Content-Type': 'application/json' },
          timeout: this.config.httpTimeoutMs,
          transformResponse: (data: unknown) => (typeof data === 'string' ? parseRpcJson(data) : data),
        },
      );
      return parseAssetPage(resp.data);
    } catch (err) {
      log.error('Wallet query failed', { method, owner, error: errorMessage(err) });
      return null;
    }
  }
}
