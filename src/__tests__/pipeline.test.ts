import { describe, it, expect, vi } from 'vitest';
import { FundingAccountPool } from '../funding/account-pool.js';
import { InFlightGate } from '../execution/in-flight-gate.js';
import { PurchaseDistributor } from '../execution/purchase-distributor.js';
import { TradeJournal } from '../reporting/trade-journal.js';
import { SafetyValidator } from '../safety/safety-validator.js';
import { SignalPipeline } from '../signals/pipeline.js';
import type { ExecutionSink } from '../reporting/execution-reporter.js';
import type { MarketDataService } from '../safety/market-data.js';
import type { SwapService } from '../trading/swap-service.js';
import type {
  ExecutionSummary,
  PurchasePlan,
  SafetyThresholds,
  SignalSource,
  SwapOutcome,
  SwapRequest,
  ValidationResult,
} from '../types/index.js';

const BONK = 'DezXAZ8z7PnrnRJjz3wXBoRgixCa6xjnB7YaB1pPB263';
const JUP = 'JUPyiwrYJFskUPiHa7hkeR8VUtAeFoSYbKedZNsDvCN';

class RecordingSink implements ExecutionSink {
  readonly executions: ExecutionSummary[] = [];
  readonly rejections: Array<{ validation: ValidationResult; source: SignalSource }> = [];

  recordExecution(_plan: PurchasePlan, summary: ExecutionSummary): void {
    this.executions.push(summary);
  }

  recordRejection(validation: ValidationResult, source: SignalSource): void {
    this.rejections.push({ validation, source });
  }
}

class InstantSwap implements SwapService {
  readonly requests: SwapRequest[] = [];

  async submit(req: SwapRequest): Promise<SwapOutcome> {
    this.requests.push(req);
    return { ok: true, signature: `sig-${this.requests.length}`, outAmount: '1', latencyMs: 1 };
  }
}

const market: MarketDataService = {
  getLiquiditySol: async () => 50,
  getPriceImpactPct: async () => 1,
  getTaxes: async () => ({ buyTaxPct: 0, sellTaxPct: 0 }),
  getHolderCount: async () => 500,
  getMintAuthorities: async () => ({ mintAuthorityRevoked: true, freezeAuthorityRevoked: true }),
};

const thresholds: SafetyThresholds = {
  enabled: true,
  minLiquiditySol: 10,
  requireMintAuthorityRevoked: true,
  requireFreezeAuthorityRevoked: false,
  impactTradeLamports: 100_000_000,
  validationTimeoutMs: 1000,
  lookupTimeoutMs: 500,
  blacklist: [JUP],
};

interface SetupOptions {
  cacheLimit?: number;
  market?: MarketDataService;
  thresholds?: Partial<SafetyThresholds>;
  sinks?: ExecutionSink[];
}

function setup(balances: Record<string, number>, opts: SetupOptions = {}) {
  const pool = new FundingAccountPool(Object.keys(balances).map(accountRef => ({ accountRef })), 20_000_000);
  const swap = new InstantSwap();
  const sink = new RecordingSink();
  const distributor = new PurchaseDistributor({
    pool,
    swap,
    gate: new InFlightGate(4),
    retry: { maxAttempts: 3, backoffBaseMs: 1, backoffMaxMs: 10, params: { mode: 'reuse' } },
    trade: { slippageBps: 500, priorityFeeLamports: 100_000 },
  });
  const pipeline = new SignalPipeline({
    validator: new SafetyValidator(opts.market ?? market),
    thresholds: { ...thresholds, ...opts.thresholds },
    pool,
    fetchBalance: async ref => balances[ref] ?? 0,
    distributor,
    strategy: { kind: 'single-fixed', amountLamports: 100_000_000, legs: 1 },
    sinks: [sink, ...(opts.sinks ?? [])],
    cacheLimit: opts.cacheLimit,
  });
  return { pool, swap, sink, distributor, pipeline };
}

describe('SignalPipeline', () => {
  it('reports text without a reference as no signal', async () => {
    const { pipeline, swap } = setup({ A: 1_000_000_000 });
    expect(await pipeline.handle('gm, nothing here', 'telegram')).toEqual([{ kind: 'no-signal', source: 'telegram' }]);
    expect(swap.requests).toHaveLength(0);
  });

  it('executes an accepted candidate and reports it', async () => {
    const { pipeline, sink, pool } = setup({ A: 1_000_000_000 });
    const [outcome] = await pipeline.handle(`new launch CA: ${BONK}`, 'telegram');

    expect(outcome.kind).toBe('executed');
    if (outcome.kind !== 'executed') return;
    expect(outcome.summary).toMatchObject({
      mint: BONK,
      source: 'telegram',
      succeededCount: 1,
      failedCount: 0,
      totalSpentLamports: 100_000_000,
      totalTokensBought: '1',
      confirmations: ['sig-1'],
    });
    expect(sink.executions).toEqual([outcome.summary]);
    expect(pool.get('A')).toMatchObject({ reserved: false, availableLamports: 900_000_000 });
  });

  it('processes a token at most once', async () => {
    const { pipeline, swap } = setup({ A: 1_000_000_000 });
    await pipeline.handle(BONK, 'telegram');
    expect(await pipeline.handle(`again ${BONK}`, 'twitter')).toEqual([{ kind: 'duplicate', identifier: BONK }]);
    expect(swap.requests).toHaveLength(1);
  });

  it('reports rejections to every sink without trading', async () => {
    const { pipeline, sink, swap } = setup({ A: 1_000_000_000 });
    const [outcome] = await pipeline.handle(JUP, 'website');

    expect(outcome).toMatchObject({ kind: 'rejected', validation: { identifier: JUP, reason: 'blacklisted' } });
    expect(sink.rejections.map(r => [r.validation.reason, r.source])).toEqual([['blacklisted', 'website']]);
    expect(swap.requests).toHaveLength(0);
  });

  it('reports when no account can fund the purchase', async () => {
    const { pipeline, sink } = setup({ A: 50_000_000 });
    expect(await pipeline.handle(BONK, 'manual')).toEqual([
      { kind: 'no-eligible-accounts', identifier: BONK, reason: 'no account can fund a single-fixed leg' },
    ]);
    expect(sink.executions).toHaveLength(0);
  });

  it('gives each candidate in one message its own outcome', async () => {
    const { pipeline, swap } = setup({ A: 1_000_000_000, B: 1_000_000_000 });
    const outcomes = await pipeline.handle(`${BONK} and ${JUP}`, 'telegram');

    expect(outcomes.map(o => o.kind)).toEqual(['executed', 'rejected']);
    expect(swap.requests.map(r => r.mint)).toEqual([BONK]);
  });

  it('uses separate accounts for concurrent candidates', async () => {
    const accepted = setup({ A: 1_000_000_000, B: 1_000_000_000 });
    const noBlacklist = new SignalPipeline({
      validator: new SafetyValidator(market),
      thresholds: { ...thresholds, blacklist: [] },
      pool: accepted.pool,
      fetchBalance: async () => 1_000_000_000,
      distributor: accepted.distributor,
      strategy: { kind: 'single-fixed', amountLamports: 100_000_000, legs: 1 },
      sinks: [],
    });
    const outcomes = await noBlacklist.handle(`${BONK} ${JUP}`, 'telegram');

    expect(outcomes.map(o => o.kind)).toEqual(['executed', 'executed']);
    expect(new Set(accepted.swap.requests.map(r => r.accountRef))).toEqual(new Set(['A', 'B']));
  });

  it('drops events after stop', async () => {
    const { pipeline, distributor } = setup({ A: 1_000_000_000 });
    const cancel = vi.spyOn(distributor, 'cancelAll');
    await pipeline.stop();
    expect(cancel).toHaveBeenCalledOnce();
    expect(await pipeline.handle(BONK, 'telegram')).toEqual([]);
  });

  it('lets a candidate still validating reach its sinks before stop resolves', async () => {
    const journal = new TradeJournal(':memory:');
    const slow: MarketDataService = {
      ...market,
      getLiquiditySol: () => new Promise<number>(resolve => setTimeout(() => resolve(50), 50)),
    };
    const { pipeline, swap } = setup({ A: 1_000_000_000 }, { market: slow, sinks: [journal] });

    const handled = pipeline.handle(BONK, 'telegram');
    await pipeline.stop();
    const executions = journal.getRecentExecutions();
    const legs = executions.length === 1 ? journal.getLegs(executions[0].plan_id) : [];
    journal.close();

    expect(executions).toEqual([expect.objectContaining({ mint: BONK, succeeded: 0, failed: 1, spent_lamports: 0 })]);
    expect(legs.map(l => [l.status, l.failure])).toEqual([['FAILED', 'cancelled']]);
    expect((await handled).map(o => o.kind)).toEqual(['executed']);
    expect(swap.requests).toHaveLength(0);
  });

  it('evaluates a token again after it could not be funded', async () => {
    const balances = { A: 50_000_000 };
    const { pipeline, swap } = setup(balances);
    const [first] = await pipeline.handle(BONK, 'telegram');
    expect(first.kind).toBe('no-eligible-accounts');

    balances.A = 1_000_000_000;
    const [second] = await pipeline.handle(BONK, 'telegram');
    expect(second.kind).toBe('executed');
    expect(swap.requests).toHaveLength(1);
  });

  it('evaluates a token again after its validation timed out', async () => {
    let calls = 0;
    const flaky: MarketDataService = {
      ...market,
      getLiquiditySol: () => (++calls === 1
        ? new Promise<number>(resolve => setTimeout(() => resolve(50), 100))
        : Promise.resolve(50)),
    };
    const { pipeline, sink } = setup({ A: 1_000_000_000 }, { market: flaky, thresholds: { validationTimeoutMs: 20 } });

    const [first] = await pipeline.handle(BONK, 'telegram');
    expect(first).toMatchObject({ kind: 'rejected', validation: { reason: 'validation timeout' } });
    const [second] = await pipeline.handle(BONK, 'telegram');
    expect(second.kind).toBe('executed');
    expect(sink.rejections).toHaveLength(1);
  });

  it('keeps a policy rejection remembered', async () => {
    const { pipeline } = setup({ A: 1_000_000_000 });
    await pipeline.handle(JUP, 'telegram');
    expect(await pipeline.handle(JUP, 'telegram')).toEqual([{ kind: 'duplicate', identifier: JUP }]);
  });

  it('forgets the oldest token past the cache limit', async () => {
    const { pipeline, swap } = setup({ A: 1_000_000_000 }, { cacheLimit: 1 });
    await pipeline.handle(BONK, 'telegram');
    await pipeline.handle(JUP, 'telegram');
    expect(pipeline.processedCount).toBe(1);

    const [again] = await pipeline.handle(BONK, 'telegram');
    expect(again.kind).toBe('executed');
    expect(swap.requests).toHaveLength(2);
  });
});
