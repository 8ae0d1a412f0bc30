import { VersionedTransaction } from '@solana/web3.js';
import axios from 'axios';
import { DEFAULT_SLIPPAGE_BPS } from '../config/constants.js';
import { createModuleLogger, short } from '../utils/logger.js';
import type { SwapQuote } from '../types/index.js';

const log = createModuleLogger('jupiter');

interface JupiterQuoteResponse {
  inputMint: string;
  outputMint: string;
  inAmount: string;
  outAmount: string;
  otherAmountThreshold: string;
  priceImpactPct: string;
  routePlan: Array<{ swapInfo: { label?: string } }>;
  contextSlot?: number;
  timeTaken?: number;
}

interface JupiterSwapResponse {
  swapTransaction: string;
  lastValidBlockHeight: number;
  prioritizationFeeLamports?: number;
}

export interface BuiltSwap {
  tx: VersionedTransaction;
  lastValidBlockHeight: number;
}

/**
 * Thin client for the aggregator's quote and swap endpoints. Errors are
 * thrown as-is; callers classify them.
 */
export class JupiterClient {
  constructor(
    private readonly apiBase: string,
    private readonly timeouts = { quoteMs: 5000, swapMs: 10_000 },
  ) {}

  async getQuote(
    inputMint: string,
    outputMint: string,
    amountLamports: number,
    slippageBps: number = DEFAULT_SLIPPAGE_BPS,
    timeoutMs: number = this.timeouts.quoteMs,
  ): Promise<SwapQuote> {
    const resp = await axios.get<JupiterQuoteResponse>(`${this.apiBase}/quote`, {
      params: {
        inputMint,
        outputMint,
        amount: amountLamports.toString(),
        slippageBps,
        restrictIntermediateTokens: true,
        maxAccounts: 64,
      },
      timeout: timeoutMs,
    });

    const data = resp.data;
    const routeLabels = (data.routePlan ?? []).map(r => r.swapInfo.label ?? '?').join(' -> ');

    log.debug('Quote received', {
      mint: short(outputMint),
      in: amountLamports,
      out: data.outAmount,
      impact: data.priceImpactPct,
      route: routeLabels,
    });

    return {
      inputMint: data.inputMint,
      outputMint: data.outputMint,
      inAmount: data.inAmount,
      outAmount: data.outAmount,
      priceImpactPct: parseFloat(data.priceImpactPct),
      slippageBps,
      routePlan: routeLabels,
      raw: data,
    };
  }

  async buildSwapTransaction(
    quote: SwapQuote,
    userPublicKey: string,
    priorityFeeLamports: number,
  ): Promise<BuiltSwap> {
    const resp = await axios.post<JupiterSwapResponse>(
      `${this.apiBase}/swap`,
      {
        quoteResponse: quote.raw,
        userPublicKey,
        wrapAndUnwrapSol: true,
        prioritizationFeeLamports: priorityFeeLamports,
        dynamicComputeUnitLimit: true,
      },
      { timeout: this.timeouts.swapMs },
    );

    const tx = VersionedTransaction.deserialize(Buffer.from(resp.data.swapTransaction, 'base64'));
    return { tx, lastValidBlockHeight: resp.data.lastValidBlockHeight };
  }
}
