import { lamportsToSol } from '../config/constants.js';
import { isTerminal } from '../execution/leg-state.js';
import { createModuleLogger, short } from '../utils/logger.js';
import type {
  ExecutionSummary,
  PipelineOutcome,
  PurchasePlan,
  SignalSource,
  ValidationResult,
} from '../types/index.js';

const log = createModuleLogger('reporter');

const BASE_UNITS = /^\d+$/;

/** Exact sum of token base-unit amounts; amounts that are not plain integers are skipped. */
export function sumBaseUnits(amounts: Array<string | null>): string {
  let total = 0n;
  for (const amount of amounts) {
    if (amount !== null && BASE_UNITS.test(amount)) total += BigInt(amount);
  }
  return total.toString();
}

/**
 * Aggregates a finished plan. Only confirmed legs count toward the spend;
 * no funds leave the account for a failed one. Pure: reads the plan, never
 * touches it.
 */
export function summarize(plan: PurchasePlan): ExecutionSummary {
  const open = plan.legs.filter(l => !isTerminal(l.status));
  if (open.length > 0) {
    throw new Error(`Plan ${plan.id} still has ${open.length} unsettled legs`);
  }

  const confirmed = plan.legs.filter(l => l.status === 'CONFIRMED');
  const failed = plan.legs.filter(l => l.status === 'FAILED');
  const totalSpentLamports = confirmed.reduce((sum, l) => sum + l.plannedLamports, 0);

  return {
    planId: plan.id,
    mint: plan.candidate.identifier,
    source: plan.source,
    strategy: plan.strategy.kind,
    succeededCount: confirmed.length,
    failedCount: failed.length,
    totalSpentLamports,
    totalSpentSol: lamportsToSol(totalSpentLamports),
    totalTokensBought: sumBaseUnits(confirmed.map(l => l.outAmount)),
    confirmations: confirmed.flatMap(l => (l.resultSignature ? [l.resultSignature] : [])),
    failures: failed.map(l => ({ accountRef: l.accountRef, error: l.error ?? 'unknown error' })),
    elapsedMs: (plan.completedAt ?? plan.createdAt) - plan.createdAt,
  };
}

export function formatSummary(summary: ExecutionSummary): string {
  const total = summary.succeededCount + summary.failedCount;
  return `${summary.succeededCount}/${total} legs confirmed, `
    + `${summary.totalSpentSol} SOL spent on ${summary.totalTokensBought} units of ${short(summary.mint)} `
    + `in ${summary.elapsedMs}ms`;
}

/** One line per pipeline outcome, for console and log output. */
export function describeOutcome(outcome: PipelineOutcome): string {
  switch (outcome.kind) {
    case 'no-signal':
      return 'no signal';
    case 'duplicate':
      return `${short(outcome.identifier)} already processed`;
    case 'rejected':
      return `${short(outcome.validation.identifier)} rejected: ${outcome.validation.reason ?? 'no reason'}`;
    case 'no-eligible-accounts':
      return `${short(outcome.identifier)} skipped: ${outcome.reason}`;
    case 'executed':
      return formatSummary(outcome.summary);
  }
}

/** Where completed plans and policy rejections are reported. */
export interface ExecutionSink {
  recordExecution(plan: PurchasePlan, summary: ExecutionSummary): void;
  recordRejection(validation: ValidationResult, source: SignalSource): void;
}

export class LogSink implements ExecutionSink {
  recordExecution(_plan: PurchasePlan, summary: ExecutionSummary): void {
    const meta = {
      plan: short(summary.planId),
      source: summary.source,
      strategy: summary.strategy,
      confirmations: summary.confirmations.map(s => short(s, 16)),
    };
    if (summary.failedCount === 0) log.info(formatSummary(summary), meta);
    else log.warn(formatSummary(summary), { ...meta, failures: summary.failures });
  }

  recordRejection(validation: ValidationResult, source: SignalSource): void {
    log.info('Candidate rejected', { mint: short(validation.identifier), source, reason: validation.reason });
  }
}
