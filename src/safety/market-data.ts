import type { Connection } from '@solana/web3.js';
import axios from 'axios';
import { WSOL_MINT } from '../config/constants.js';
import type { JupiterClient } from '../trading/jupiter-client.js';
import { createModuleLogger, short } from '../utils/logger.js';
import { fetchTokenTaxes, type TokenTaxes } from './goplus-client.js';
import { countHolders } from './holder-analyzer.js';
import { fetchMintAuthorities, type MintAuthorities } from './mint-checker.js';

export type { TokenTaxes } from './goplus-client.js';
export type { MintAuthorities } from './mint-checker.js';

const log = createModuleLogger('market-data');

/**
 * Per-metric lookups behind the safety validator. A lookup resolves to null
 * when the source has no data for the token and rejects when the source
 * itself fails; the validator treats both as a missing metric.
 */
export interface MarketDataService {
  getLiquiditySol(mint: string, timeoutMs: number): Promise<number | null>;
  getPriceImpactPct(mint: string, tradeLamports: number, timeoutMs: number): Promise<number | null>;
  getTaxes(mint: string, timeoutMs: number): Promise<TokenTaxes | null>;
  getHolderCount(mint: string, timeoutMs: number): Promise<number | null>;
  getMintAuthorities(mint: string, timeoutMs: number): Promise<MintAuthorities | null>;
}

interface DexScreenerPair {
  chainId?: string;
  baseToken?: { address?: string };
  quoteToken?: { address?: string };
  liquidity?: { usd?: number; base?: number; quote?: number };
}

interface DexScreenerResponse {
  pairs?: DexScreenerPair[] | null;
}

/**
 * SOL on the quote side of every SOL-quoted pool of the mint. Pools quoted in
 * anything else carry no SOL figure and are ignored.
 */
export function solLiquidityFromPairs(mint: string, pairs: DexScreenerPair[]): number | null {
  const solPairs = pairs.filter(p =>
    (p.chainId ?? 'solana') === 'solana'
    && p.baseToken?.address === mint
    && p.quoteToken?.address === WSOL_MINT
    && typeof p.liquidity?.quote === 'number');
  if (solPairs.length === 0) return null;
  return solPairs.reduce((sum, p) => sum + (p.liquidity?.quote ?? 0), 0);
}

export interface LiveMarketDataOptions {
  connection: Connection;
  jupiter: JupiterClient;
  dexScreenerApiBase: string;
  goPlusApiBase: string;
}

export class LiveMarketDataService implements MarketDataService {
  constructor(private readonly opts: LiveMarketDataOptions) {}

  async getLiquiditySol(mint: string, timeoutMs: number): Promise<number | null> {
    const resp = await axios.get<DexScreenerResponse>(`${this.opts.dexScreenerApiBase}/tokens/${mint}`, {
      timeout: timeoutMs,
    });
    const liquidity = solLiquidityFromPairs(mint, resp.data.pairs ?? []);
    log.debug('Liquidity lookup', { mint: short(mint), liquiditySol: liquidity });
    return liquidity;
  }

  async getPriceImpactPct(mint: string, tradeLamports: number, timeoutMs: number): Promise<number | null> {
    const quote = await this.opts.jupiter.getQuote(WSOL_MINT, mint, tradeLamports, undefined, timeoutMs);
    return Number.isFinite(quote.priceImpactPct) ? quote.priceImpactPct : null;
  }

  getTaxes(mint: string, timeoutMs: number): Promise<TokenTaxes | null> {
    return fetchTokenTaxes(this.opts.goPlusApiBase, mint, timeoutMs);
  }

  // RPC calls carry no timeout of their own; the validator bounds them
  getHolderCount(mint: string, _timeoutMs: number): Promise<number | null> {
    return countHolders(this.opts.connection, mint);
  }

  getMintAuthorities(mint: string, _timeoutMs: number): Promise<MintAuthorities | null> {
    return fetchMintAuthorities(this.opts.connection, mint);
  }
}
