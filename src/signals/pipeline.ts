import { PROCESSED_CACHE_LIMIT } from '../config/constants.js';
import type { FundingAccountPool } from '../funding/account-pool.js';
import type { PurchaseDistributor } from '../execution/purchase-distributor.js';
import { summarize, type ExecutionSink } from '../reporting/execution-reporter.js';
import { VALIDATION_TIMEOUT_REASON, type SafetyValidator } from '../safety/safety-validator.js';
import { createModuleLogger, short } from '../utils/logger.js';
import { extract } from './reference-extractor.js';
import type {
  PipelineOutcome,
  PurchaseStrategy,
  ResolvedCandidate,
  SafetyThresholds,
  SignalSource,
} from '../types/index.js';

const log = createModuleLogger('pipeline');

export interface PipelineDeps {
  validator: SafetyValidator;
  thresholds: SafetyThresholds;
  pool: FundingAccountPool;
  fetchBalance: (accountRef: string) => Promise<number>;
  distributor: PurchaseDistributor;
  strategy: PurchaseStrategy;
  sinks: ExecutionSink[];
  cacheLimit?: number;
}

/** Outcomes that settle nothing about the token itself; a later announcement is evaluated again. */
function isInconclusive(outcome: PipelineOutcome): boolean {
  if (outcome.kind === 'no-eligible-accounts') return true;
  return outcome.kind === 'rejected' && outcome.validation.reason === VALIDATION_TIMEOUT_REASON;
}

/**
 * Routes one text event from any source through extraction, validation,
 * account selection, execution and reporting. Every candidate found in the
 * text is processed concurrently and yields exactly one outcome.
 */
export class SignalPipeline {
  private readonly processed = new Set<string>();
  private readonly cacheLimit: number;
  private readonly pending = new Set<Promise<PipelineOutcome[]>>();
  private stopped = false;

  constructor(private readonly deps: PipelineDeps) {
    this.cacheLimit = deps.cacheLimit ?? PROCESSED_CACHE_LIMIT;
  }

  get processedCount(): number {
    return this.processed.size;
  }

  /** Resolves to no outcomes at all once the pipeline has been stopped. */
  handle(text: string, source: SignalSource): Promise<PipelineOutcome[]> {
    if (this.stopped) {
      log.warn('Pipeline stopped, event dropped', { source });
      return Promise.resolve([]);
    }
    const run = this.route(text, source);
    this.pending.add(run);
    const settle = () => { this.pending.delete(run); };
    run.then(settle, settle);
    return run;
  }

  /**
   * Stops accepting new events and cancels running plans at their next leg
   * boundary. Resolves once every accepted event has reached its sinks.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    this.deps.distributor.cancelAll();
    await Promise.allSettled(Array.from(this.pending));
    await this.deps.distributor.drain();
  }

  private async route(text: string, source: SignalSource): Promise<PipelineOutcome[]> {
    const candidates = Array.from(extract(text));
    if (candidates.length === 0) {
      log.debug('No signal', { source, length: text.length });
      return [{ kind: 'no-signal', source }];
    }
    log.info('Candidates extracted', {
      source,
      candidates: candidates.map(c => `${short(c.identifier)} (${c.sourceFormat})`),
    });
    return Promise.all(candidates.map(c => this.process(c, source)));
  }

  private remember(identifier: string): boolean {
    if (this.processed.has(identifier)) return false;
    this.processed.add(identifier);
    if (this.processed.size > this.cacheLimit) {
      const oldest = this.processed.values().next().value;
      if (oldest !== undefined) this.processed.delete(oldest);
    }
    return true;
  }

  private async process(candidate: ResolvedCandidate, source: SignalSource): Promise<PipelineOutcome> {
    const { identifier } = candidate;
    if (!this.remember(identifier)) {
      return { kind: 'duplicate', identifier };
    }

    let outcome: PipelineOutcome | null = null;
    try {
      outcome = await this.evaluate(candidate, source);
      return outcome;
    } finally {
      if (outcome === null || isInconclusive(outcome)) this.processed.delete(identifier);
    }
  }

  private async evaluate(candidate: ResolvedCandidate, source: SignalSource): Promise<PipelineOutcome> {
    const { identifier } = candidate;
    const validation = await this.deps.validator.validate(identifier, this.deps.thresholds);
    if (validation.decision === 'REJECT') {
      for (const sink of this.deps.sinks) sink.recordRejection(validation, source);
      return { kind: 'rejected', validation };
    }

    await this.deps.pool.refreshBalances(this.deps.fetchBalance);
    const planned = await this.deps.distributor.plan(candidate, source, this.deps.strategy);
    if (planned.kind === 'no-eligible-accounts') {
      return { kind: 'no-eligible-accounts', identifier, reason: planned.reason };
    }

    const plan = await this.deps.distributor.execute(planned.plan);
    const summary = summarize(plan);
    for (const sink of this.deps.sinks) sink.recordExecution(plan, summary);
    return { kind: 'executed', summary };
  }
}
