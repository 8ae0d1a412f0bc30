import axios from 'axios';
import { createModuleLogger, short } from '../utils/logger.js';

const log = createModuleLogger('goplus');

interface GoPlusResponse {
  code: number;
  message?: string;
  result?: Record<string, {
    buy_tax?: string;
    sell_tax?: string;
    is_honeypot?: string;
    transfer_pausable?: string;
  }>;
}

export interface TokenTaxes {
  buyTaxPct: number | null;
  sellTaxPct: number | null;
}

function toPct(fraction: string | undefined): number | null {
  if (fraction === undefined || fraction.trim() === '') return null;
  const value = parseFloat(fraction);
  return Number.isFinite(value) ? value * 100 : null;
}

/**
 * Buy/sell tax from GoPlus token security. The API reports fractions
 * ("0.05"); the result is in percent. Returns null when the token is unknown
 * to GoPlus. Request failures propagate.
 */
export async function fetchTokenTaxes(apiBase: string, mint: string, timeoutMs: number): Promise<TokenTaxes | null> {
  const resp = await axios.get<GoPlusResponse>(`${apiBase}/solana/token_security`, {
    params: { contract_addresses: mint },
    timeout: timeoutMs,
  });

  const tokenData = resp.data.result?.[mint] ?? resp.data.result?.[mint.toLowerCase()];
  if (!tokenData) {
    log.debug('GoPlus: no data for token', { mint: short(mint) });
    return null;
  }

  const taxes = { buyTaxPct: toPct(tokenData.buy_tax), sellTaxPct: toPct(tokenData.sell_tax) };
  log.debug('GoPlus taxes', { mint: short(mint), ...taxes });
  return taxes;
}
