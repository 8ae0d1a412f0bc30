import { randomUUID } from 'crypto';
import { PoolConflictError, type FundingAccountPool } from '../funding/account-pool.js';
import type { SwapService } from '../trading/swap-service.js';
import { sleep as defaultSleep } from '../utils/async-timeout.js';
import { createModuleLogger, short } from '../utils/logger.js';
import type { InFlightGate } from './in-flight-gate.js';
import { isTerminal, nextLegStep, swapParamsForAttempt, transitionLeg, type SwapParams } from './leg-state.js';
import type {
  PurchaseLeg,
  PurchasePlan,
  PurchaseStrategy,
  ResolvedCandidate,
  RetryPolicy,
  SignalSource,
  SwapOutcome,
} from '../types/index.js';

const log = createModuleLogger('distributor');

export const CANCELLED_REASON = 'cancelled';

export interface DistributorDeps {
  pool: FundingAccountPool;
  swap: SwapService;
  gate: InFlightGate;
  retry: RetryPolicy;
  trade: SwapParams;
  /** Backoff wait; resolves early once `signal` aborts. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
}

export type PlanResult =
  | { kind: 'planned'; plan: PurchasePlan }
  | { kind: 'no-eligible-accounts'; reason: string };

export interface ExecuteOptions {
  signal?: AbortSignal;
}

type LegResult = 'continue' | 'halt';

/** Legs grouped by account, in account-selection order. */
function lanesOf(legs: PurchaseLeg[]): PurchaseLeg[][] {
  const lanes = new Map<string, PurchaseLeg[]>();
  for (const leg of legs) {
    const lane = lanes.get(leg.accountRef);
    if (lane) lane.push(leg);
    else lanes.set(leg.accountRef, [leg]);
  }
  return Array.from(lanes.values());
}

/**
 * Plans purchase legs against the account pool and drives them to a terminal
 * state.
 *
 * Legs of one account run one after another (a lane); lanes run
 * concurrently. A leg holds an in-flight permit only while its swap is being
 * submitted and confirmed, never while it backs off. Cancellation takes effect
 * at leg boundaries and cuts a backoff short: a submitted swap is always
 * awaited.
 */
export class PurchaseDistributor {
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly now: () => number;
  private readonly shutdownController = new AbortController();
  private readonly active = new Set<Promise<PurchasePlan>>();

  constructor(private readonly deps: DistributorDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;
  }

  get activePlans(): number {
    return this.active.size;
  }

  async plan(candidate: ResolvedCandidate, source: SignalSource, strategy: PurchaseStrategy): Promise<PlanResult> {
    const id = randomUUID();
    const selection = await this.deps.pool.select(id, strategy);
    if (selection.kind === 'no-eligible-accounts') {
      log.warn('No eligible funding accounts', { mint: short(candidate.identifier), reason: selection.reason });
      return selection;
    }

    const legs: PurchaseLeg[] = selection.legs.map((leg, index) => ({
      index,
      accountRef: leg.accountRef,
      plannedLamports: leg.amountLamports,
      status: 'PENDING',
      attempts: 0,
      resultSignature: null,
      outAmount: null,
      error: null,
      failure: null,
      submittedAt: null,
      settledAt: null,
    }));

    return {
      kind: 'planned',
      plan: {
        id,
        candidate,
        source,
        strategy,
        legs,
        balancesAtCreation: selection.balancesAtSelection,
        createdAt: this.now(),
        completedAt: null,
      },
    };
  }

  /** Resolves once every leg is CONFIRMED or FAILED and every account is released. */
  execute(plan: PurchasePlan, options: ExecuteOptions = {}): Promise<PurchasePlan> {
    const run = this.run(plan, options);
    this.active.add(run);
    const forget = () => { this.active.delete(run); };
    run.then(forget, forget);
    return run;
  }

  /** Cancels every running and future plan at its next leg boundary. */
  cancelAll(): void {
    if (!this.shutdownController.signal.aborted) {
      log.warn('Cancelling all plans', { active: this.active.size });
      this.shutdownController.abort();
    }
  }

  /** Waits for running plans to finish their submitted legs. */
  async drain(): Promise<void> {
    await Promise.allSettled(Array.from(this.active));
  }

  private async run(plan: PurchasePlan, options: ExecuteOptions): Promise<PurchasePlan> {
    const controller = new AbortController();
    const abort = () => controller.abort();
    const sources = [this.shutdownController.signal, options.signal]
      .filter((s): s is AbortSignal => s !== undefined);
    for (const s of sources) {
      if (s.aborted) abort();
      else s.addEventListener('abort', abort, { once: true });
    }

    const lanes = lanesOf(plan.legs);
    log.info('Executing plan', {
      plan: short(plan.id),
      mint: short(plan.candidate.identifier),
      strategy: plan.strategy.kind,
      legs: plan.legs.length,
      accounts: lanes.length,
    });

    try {
      await Promise.all(lanes.map(lane => this.runLane(plan, lane, controller.signal)));
    } finally {
      for (const s of sources) s.removeEventListener('abort', abort);
    }

    plan.completedAt = this.now();
    return plan;
  }

  private async runLane(plan: PurchasePlan, lane: PurchaseLeg[], signal: AbortSignal): Promise<void> {
    const accountRef = lane[0].accountRef;
    let halted = false;
    try {
      for (const leg of lane) {
        if (halted) {
          this.fail(leg, 'pool-conflict', 'pool conflict: lane halted');
          continue;
        }
        halted = (await this.runLeg(plan, leg, signal)) === 'halt';
      }
    } finally {
      await this.releaseAccount(accountRef, plan.id);
    }
  }

  private async releaseAccount(accountRef: string, planId: string): Promise<void> {
    try {
      await this.deps.pool.release(accountRef, planId);
    } catch (err) {
      if (!(err instanceof PoolConflictError)) throw err;
      log.error('Release skipped: reservation not held', { account: short(accountRef), error: err.message });
    }
  }

  /** Leg-level exception boundary: nothing thrown here escapes to the plan. */
  private async runLeg(plan: PurchasePlan, leg: PurchaseLeg, signal: AbortSignal): Promise<LegResult> {
    const { pool, gate, swap, retry } = this.deps;
    try {
      for (;;) {
        if (signal.aborted) {
          this.fail(leg, 'cancelled', CANCELLED_REASON);
          return 'continue';
        }
        await pool.verifyReservation(leg.accountRef, plan.id);

        const admitted = await gate.acquire(signal);
        if (!admitted) {
          this.fail(leg, 'cancelled', CANCELLED_REASON);
          return 'continue';
        }

        let outcome: SwapOutcome;
        try {
          const params = swapParamsForAttempt(this.deps.trade, leg.attempts + 1, retry.params);
          transitionLeg(leg, 'SUBMITTED', this.now());
          outcome = await swap.submit({
            mint: plan.candidate.identifier,
            amountLamports: leg.plannedLamports,
            slippageBps: params.slippageBps,
            priorityFeeLamports: params.priorityFeeLamports,
            accountRef: leg.accountRef,
            attempt: leg.attempts,
          });
        } finally {
          gate.release();
        }

        const step = nextLegStep(leg.attempts, outcome, retry);
        switch (step.next) {
          case 'CONFIRMED':
            transitionLeg(leg, 'CONFIRMED', this.now(), {
              resultSignature: step.signature,
              outAmount: step.outAmount,
              error: null,
              failure: null,
            });
            await pool.commitSpend(leg.accountRef, plan.id, leg.plannedLamports);
            log.info('Leg confirmed', {
              plan: short(plan.id),
              leg: leg.index,
              account: short(leg.accountRef),
              attempts: leg.attempts,
              sig: short(step.signature, 16),
              out: step.outAmount,
            });
            return 'continue';
          case 'RETRY_PENDING':
            transitionLeg(leg, 'RETRY_PENDING', this.now(), { error: step.message, failure: step.failure });
            log.warn('Leg retrying', {
              plan: short(plan.id),
              leg: leg.index,
              attempt: leg.attempts,
              failure: step.failure,
              delayMs: step.delayMs,
            });
            await this.sleep(step.delayMs, signal);
            continue;
          case 'FAILED':
            transitionLeg(leg, 'FAILED', this.now(), { error: step.error, failure: step.failure });
            log.warn('Leg failed', { plan: short(plan.id), leg: leg.index, attempts: leg.attempts, error: step.error });
            return 'continue';
        }
      }
    } catch (err) {
      if (err instanceof PoolConflictError) {
        log.error('Pool conflict, halting lane', { plan: short(plan.id), leg: leg.index, error: err.message });
        if (!isTerminal(leg.status)) this.fail(leg, 'pool-conflict', `pool conflict: ${err.message}`);
        return 'halt';
      }
      const message = err instanceof Error ? err.message : String(err);
      log.error('Unexpected leg error', { plan: short(plan.id), leg: leg.index, error: message });
      if (!isTerminal(leg.status)) this.fail(leg, 'unknown', message);
      return 'continue';
    }
  }

  private fail(leg: PurchaseLeg, failure: NonNullable<PurchaseLeg['failure']>, error: string): void {
    transitionLeg(leg, 'FAILED', this.now(), { failure, error });
  }
}
