import type { Connection } from '@solana/web3.js';
import bs58 from 'bs58';
import { WSOL_MINT } from '../config/constants.js';
import { validateSwapTransaction } from '../execution/tx-validator.js';
import { settleSignature, type SettleOptions } from '../execution/tx-confirmation.js';
import { createModuleLogger, short } from '../utils/logger.js';
import type { KeyRing } from '../utils/wallet.js';
import type { JupiterClient } from './jupiter-client.js';
import { classifySwapError, SwapError } from './swap-errors.js';
import type { SwapOutcome, SwapRequest } from '../types/index.js';

const log = createModuleLogger('swap');

/** One purchase attempt against the aggregator. Never throws. */
export interface SwapService {
  submit(request: SwapRequest): Promise<SwapOutcome>;
}

function failure(err: unknown, startTime: number, request: SwapRequest): SwapOutcome {
  const { kind, message } = classifySwapError(err);
  log.warn('Swap attempt failed', {
    mint: short(request.mint),
    account: short(request.accountRef),
    attempt: request.attempt,
    failure: kind,
    error: message,
  });
  return { ok: false, failure: kind, message, latencyMs: Date.now() - startTime };
}

export interface JupiterSwapServiceDeps {
  jupiter: JupiterClient;
  connection: Connection;
  keys: KeyRing;
  confirmTimeoutMs: number;
  /** Quotes above this impact are refused as slippage. */
  maxPriceImpactPct?: number;
  settle?: Omit<SettleOptions, 'maxWaitMs'>;
}

export class JupiterSwapService implements SwapService {
  constructor(private readonly deps: JupiterSwapServiceDeps) {}

  async submit(request: SwapRequest): Promise<SwapOutcome> {
    const startTime = Date.now();
    const { jupiter, connection, keys } = this.deps;

    try {
      const quote = await jupiter.getQuote(WSOL_MINT, request.mint, request.amountLamports, request.slippageBps);
      const maxImpact = this.deps.maxPriceImpactPct;
      if (maxImpact !== undefined && quote.priceImpactPct > maxImpact) {
        throw new SwapError('slippage-exceeded', `Price impact too high: ${quote.priceImpactPct.toFixed(2)}%`);
      }

      const wallet = keys.get(request.accountRef);
      const { tx, lastValidBlockHeight } = await jupiter.buildSwapTransaction(
        quote,
        request.accountRef,
        request.priorityFeeLamports,
      );

      const validation = validateSwapTransaction(tx, request.accountRef);
      if (!validation.valid) {
        throw new SwapError('unknown', `TX validation failed: ${validation.reason ?? 'unspecified'}`);
      }

      tx.sign([wallet]);
      const [feePayerSignature] = tx.signatures;
      if (!feePayerSignature) {
        throw new SwapError('unknown', 'Signed transaction carries no signature');
      }
      // known before sending, so a send that errors after reaching the network can still be followed
      const signature = bs58.encode(feePayerSignature);

      let sendError: unknown = null;
      try {
        await connection.sendRawTransaction(tx.serialize(), { skipPreflight: true, maxRetries: 2 });
      } catch (err) {
        sendError = err;
        log.warn('Send failed; following the signature until its blockhash expires', {
          sig: short(signature, 16),
          error: err instanceof Error ? err.message : String(err),
        });
      }

      const status = await settleSignature(connection, signature, lastValidBlockHeight, {
        ...this.deps.settle,
        maxWaitMs: this.deps.confirmTimeoutMs,
      });
      switch (status.state) {
        case 'confirmed':
          break;
        case 'failed':
          throw new Error(`TX failed: ${status.error ?? 'unknown error'}`);
        case 'expired':
          if (sendError !== null) throw sendError;
          throw new SwapError('timeout', `TX ${short(signature, 16)} expired unconfirmed: ${status.error ?? 'expired'}`);
        default:
          // may still land: another attempt could buy twice
          throw new SwapError(
            'unknown',
            `TX ${short(signature, 16)} unresolved: ${status.error ?? status.state}; not retried`,
          );
      }

      const latencyMs = Date.now() - startTime;
      log.info('Swap confirmed', {
        sig: short(signature, 16),
        mint: short(request.mint),
        account: short(request.accountRef),
        in: request.amountLamports,
        out: quote.outAmount,
        latency: latencyMs + 'ms',
      });
      return { ok: true, signature, outAmount: quote.outAmount, latencyMs };
    } catch (err) {
      return failure(err, startTime, request);
    }
  }
}

/**
 * Quotes the trade but never signs or sends it. Signatures are synthetic and
 * unique per process.
 */
export class PaperSwapService implements SwapService {
  private counter = 0;

  constructor(private readonly jupiter: Pick<JupiterClient, 'getQuote'>) {}

  async submit(request: SwapRequest): Promise<SwapOutcome> {
    const startTime = Date.now();
    try {
      const quote = await this.jupiter.getQuote(WSOL_MINT, request.mint, request.amountLamports, request.slippageBps);
      const signature = `paper_${++this.counter}`;
      log.info('PAPER TRADE executed', {
        mint: short(request.mint),
        account: short(request.accountRef),
        in: request.amountLamports,
        out: quote.outAmount,
        sig: signature,
      });
      return { ok: true, signature, outAmount: quote.outAmount, latencyMs: Date.now() - startTime };
    } catch (err) {
      return failure(err, startTime, request);
    }
  }
}
