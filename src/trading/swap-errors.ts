import axios from 'axios';
import { TimeoutError } from '../utils/async-timeout.js';
import type { SwapFailureKind } from '../types/index.js';

const TRANSIENT: ReadonlySet<SwapFailureKind> = new Set(['rate-limited', 'network-error', 'timeout']);

/** Only transient failures are worth another attempt. */
export function isTransientFailure(kind: SwapFailureKind): boolean {
  return TRANSIENT.has(kind);
}

export class SwapError extends Error {
  constructor(readonly kind: SwapFailureKind, message: string) {
    super(message);
    this.name = 'SwapError';
  }
}

export interface ClassifiedFailure {
  kind: SwapFailureKind;
  message: string;
}

// Checked in order; the first pattern that matches the message wins.
const MESSAGE_RULES: Array<[RegExp, SwapFailureKind]> = [
  [/insufficient (lamports|funds)|InsufficientFunds|no record of a prior credit/i, 'insufficient-funds'],
  [/0x1771|"Custom":6001|SlippageToleranceExceeded|slippage/i, 'slippage-exceeded'],
  [/\b429\b|too many requests|rate.?limit/i, 'rate-limited'],
  [/timed? ?out|timeout|block height exceeded|TransactionExpired/i, 'timeout'],
  [/ECONNRESET|ECONNREFUSED|ENOTFOUND|EAI_AGAIN|socket hang up|fetch failed|network/i, 'network-error'],
  [/could not find any route|no route|not tradable|invalid (mint|param|public key)|TOKEN_NOT_TRADABLE/i, 'invalid-identifier'],
];

function fromMessage(message: string): SwapFailureKind {
  for (const [pattern, kind] of MESSAGE_RULES) {
    if (pattern.test(message)) return kind;
  }
  return 'unknown';
}

function responseDetail(data: unknown): string | null {
  if (typeof data === 'string') return data || null;
  if (data && typeof data === 'object') {
    for (const key of ['error', 'errorCode', 'message']) {
      const value: unknown = Reflect.get(data, key);
      if (typeof value === 'string' && value) return value;
    }
  }
  return null;
}

/**
 * Maps anything thrown while quoting, building, sending or confirming a swap
 * to a failure kind. Unrecognized errors come out as `unknown`, which is
 * terminal.
 */
export function classifySwapError(err: unknown): ClassifiedFailure {
  if (err instanceof SwapError) {
    return { kind: err.kind, message: err.message };
  }
  if (err instanceof TimeoutError) {
    return { kind: 'timeout', message: err.message };
  }

  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    const detail = responseDetail(err.response?.data);
    const message = detail ? `${err.message}: ${detail}` : err.message;

    if (status === 429) return { kind: 'rate-limited', message };
    if (status !== undefined && status >= 500) return { kind: 'network-error', message };
    if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') return { kind: 'timeout', message };
    if (status === undefined) return { kind: 'network-error', message };
    if (detail) {
      const kind = fromMessage(detail);
      if (kind !== 'unknown') return { kind, message };
    }
    return { kind: status === 400 ? 'invalid-identifier' : 'unknown', message };
  }

  const message = err instanceof Error ? err.message : String(err);
  return { kind: fromMessage(message), message };
}
