import { isTransientFailure } from '../trading/swap-errors.js';
import type {
  LegStatus,
  PurchaseLeg,
  RetryParamsPolicy,
  RetryPolicy,
  SwapFailureKind,
  SwapOutcome,
} from '../types/index.js';

// ─── Transition Table ─────────────────────────────────────────
export const LEG_TRANSITIONS: Readonly<Record<LegStatus, readonly LegStatus[]>> = {
  PENDING: ['SUBMITTED', 'FAILED'],
  SUBMITTED: ['CONFIRMED', 'RETRY_PENDING', 'FAILED'],
  RETRY_PENDING: ['SUBMITTED', 'FAILED'],
  CONFIRMED: [],
  FAILED: [],
};

export class IllegalLegTransitionError extends Error {
  constructor(readonly from: LegStatus, readonly to: LegStatus, readonly legIndex: number) {
    super(`Illegal leg transition ${from} -> ${to} (leg ${legIndex})`);
    this.name = 'IllegalLegTransitionError';
  }
}

export function isTerminal(status: LegStatus): boolean {
  return LEG_TRANSITIONS[status].length === 0;
}

export function canTransition(from: LegStatus, to: LegStatus): boolean {
  return LEG_TRANSITIONS[from].includes(to);
}

type LegPatch = Partial<Pick<PurchaseLeg, 'resultSignature' | 'outAmount' | 'error' | 'failure'>>;

/**
 * Moves `leg` to `to`, stamping times and counting attempts. Entering
 * SUBMITTED is what counts as an attempt.
 */
export function transitionLeg(leg: PurchaseLeg, to: LegStatus, at: number, patch: LegPatch = {}): void {
  if (!canTransition(leg.status, to)) {
    throw new IllegalLegTransitionError(leg.status, to, leg.index);
  }
  leg.status = to;
  if (to === 'SUBMITTED') {
    leg.attempts += 1;
    leg.submittedAt = leg.submittedAt ?? at;
  }
  if (isTerminal(to)) leg.settledAt = at;
  Object.assign(leg, patch);
}

// ─── Retry Decisions ──────────────────────────────────────────
export type LegStep =
  | { next: 'CONFIRMED'; signature: string; outAmount: string | null }
  | { next: 'RETRY_PENDING'; delayMs: number; failure: SwapFailureKind; message: string }
  | { next: 'FAILED'; failure: SwapFailureKind; error: string };

/** Delay before attempt `attempt + 1`, after attempt `attempt` (1-based) failed. */
export function backoffDelayMs(attempt: number, policy: Pick<RetryPolicy, 'backoffBaseMs' | 'backoffMaxMs'>): number {
  const exp = policy.backoffBaseMs * 2 ** Math.max(0, attempt - 1);
  return Math.min(exp, policy.backoffMaxMs);
}

/**
 * What a leg does after its `attempt`-th submission returned `outcome`.
 * Transient failures retry until `maxAttempts` submissions have been made;
 * terminal failures stop at once.
 */
export function nextLegStep(attempt: number, outcome: SwapOutcome, policy: RetryPolicy): LegStep {
  if (outcome.ok) {
    return { next: 'CONFIRMED', signature: outcome.signature, outAmount: outcome.outAmount };
  }
  const transient = isTransientFailure(outcome.failure);
  if (transient && attempt < policy.maxAttempts) {
    return {
      next: 'RETRY_PENDING',
      delayMs: backoffDelayMs(attempt, policy),
      failure: outcome.failure,
      message: outcome.message,
    };
  }
  const suffix = transient ? ` (gave up after ${attempt} attempts)` : '';
  return { next: 'FAILED', failure: outcome.failure, error: `${outcome.failure}: ${outcome.message}${suffix}` };
}

export interface SwapParams {
  slippageBps: number;
  priorityFeeLamports: number;
}

/** Slippage and priority fee for the `attempt`-th submission (1-based). */
export function swapParamsForAttempt(base: SwapParams, attempt: number, policy: RetryParamsPolicy): SwapParams {
  if (policy.mode === 'reuse' || attempt <= 1) return { ...base };
  const retries = attempt - 1;
  return {
    slippageBps: Math.min(base.slippageBps + policy.slippageStepBps * retries, Math.max(base.slippageBps, policy.maxSlippageBps)),
    priorityFeeLamports: Math.round(base.priorityFeeLamports * policy.priorityFeeMultiplier ** retries),
  };
}
