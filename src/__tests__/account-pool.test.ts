import { describe, it, expect } from 'vitest';
import { FundingAccountPool, PoolConflictError } from '../funding/account-pool.js';
import {
  overcommittedAccounts,
  planLegs,
  planMultiFixed,
  planMultiProportional,
  planSingleFixed,
  type AccountBalance,
} from '../funding/strategies.js';
import type { PurchaseStrategy } from '../types/index.js';

const SOL = 1_000_000_000;
const RESERVE = 20_000_000; // 0.02 SOL

function balance(accountRef: string, availableLamports: number, feeReserveLamports = RESERVE): AccountBalance {
  return { accountRef, availableLamports, feeReserveLamports };
}

async function poolWith(balances: Record<string, number>): Promise<FundingAccountPool> {
  const pool = new FundingAccountPool(Object.keys(balances).map(accountRef => ({ accountRef })), RESERVE);
  await pool.refreshBalances(async ref => balances[ref] ?? 0);
  return pool;
}

describe('strategies', () => {
  it('single-fixed: three 0.1 legs from a 1.0 account', () => {
    const legs = planSingleFixed([balance('A', SOL)], 100_000_000, 3);
    expect(legs).toEqual([
      { accountRef: 'A', amountLamports: 100_000_000 },
      { accountRef: 'A', amountLamports: 100_000_000 },
      { accountRef: 'A', amountLamports: 100_000_000 },
    ]);
  });

  it('single-fixed: picks the richest account, ties to configuration order', () => {
    const accounts = [balance('A', 300_000_000), balance('B', 500_000_000), balance('C', 500_000_000)];
    const legs = planSingleFixed(accounts, 100_000_000, 10);
    // 0.5 - 0.02 covers four legs of 0.1
    expect(legs).toHaveLength(4);
    expect(new Set(legs.map(l => l.accountRef))).toEqual(new Set(['B']));
  });

  it('single-fixed: nothing when the amount does not fit', () => {
    expect(planSingleFixed([balance('A', 100_000_000)], 100_000_000, 1)).toEqual([]);
  });

  it('multi-fixed: only accounts that cover every leg plus the reserve', () => {
    const legs = planMultiFixed([balance('A', 300_000_000), balance('B', 150_000_000)], 100_000_000, 2);
    expect(legs).toEqual([
      { accountRef: 'A', amountLamports: 100_000_000 },
      { accountRef: 'A', amountLamports: 100_000_000 },
    ]);
  });

  it('multi-proportional: one leg of the whole spendable balance per funded account', () => {
    const legs = planMultiProportional([balance('A', 500_000_000), balance('B', 0)]);
    expect(legs).toEqual([{ accountRef: 'A', amountLamports: 480_000_000 }]);
  });

  it('multi-proportional: caps each leg', () => {
    const legs = planMultiProportional([balance('A', 500_000_000), balance('B', 50_000_000)], 100_000_000);
    expect(legs).toEqual([
      { accountRef: 'A', amountLamports: 100_000_000 },
      { accountRef: 'B', amountLamports: 30_000_000 },
    ]);
  });

  it('never plans into the fee reserve', () => {
    const accounts = [balance('A', 1_234_000_000), balance('B', 370_000_000), balance('C', 21_000_000), balance('D', 0)];
    const strategies: PurchaseStrategy[] = [
      { kind: 'single-fixed', amountLamports: 100_000_000, legs: 20 },
      { kind: 'multi-fixed', amountLamports: 50_000_000, legsPerAccount: 3 },
      { kind: 'multi-proportional' },
      { kind: 'multi-proportional', maxLegLamports: 200_000_000 },
    ];
    for (const strategy of strategies) {
      const legs = planLegs(strategy, accounts);
      expect(legs.length).toBeGreaterThan(0);
      expect(overcommittedAccounts(legs, accounts)).toEqual([]);
      for (const account of accounts) {
        const total = legs.filter(l => l.accountRef === account.accountRef).reduce((s, l) => s + l.amountLamports, 0);
        if (total > 0) expect(total + account.feeReserveLamports).toBeLessThanOrEqual(account.availableLamports);
      }
    }
  });
});

describe('FundingAccountPool', () => {
  it('reserves the accounts it plans from', async () => {
    const pool = await poolWith({ A: SOL });
    const selection = await pool.select('plan-1', { kind: 'single-fixed', amountLamports: 100_000_000, legs: 3 });

    expect(selection).toEqual({
      kind: 'planned',
      legs: [
        { accountRef: 'A', amountLamports: 100_000_000 },
        { accountRef: 'A', amountLamports: 100_000_000 },
        { accountRef: 'A', amountLamports: 100_000_000 },
      ],
      balancesAtSelection: { A: SOL },
    });
    expect(pool.get('A')).toMatchObject({ reserved: true, reservedBy: 'plan-1' });
  });

  it('reports pool exhaustion as an outcome', async () => {
    const empty = new FundingAccountPool([], RESERVE);
    expect(await empty.select('p', { kind: 'multi-proportional' }))
      .toEqual({ kind: 'no-eligible-accounts', reason: 'no funding accounts configured' });

    const pool = await poolWith({ A: SOL });
    await pool.select('plan-1', { kind: 'multi-proportional' });
    expect(await pool.select('plan-2', { kind: 'multi-proportional' }))
      .toEqual({ kind: 'no-eligible-accounts', reason: 'all funding accounts are reserved' });

    const poor = await poolWith({ A: 10_000_000 });
    expect(await poor.select('plan-3', { kind: 'single-fixed', amountLamports: 100_000_000, legs: 1 }))
      .toEqual({ kind: 'no-eligible-accounts', reason: 'no account can fund a single-fixed leg' });
  });

  it('never hands one account to two concurrent plans', async () => {
    const pool = await poolWith({ A: SOL });
    const strategy: PurchaseStrategy = { kind: 'single-fixed', amountLamports: 100_000_000, legs: 1 };
    const [first, second] = await Promise.all([pool.select('plan-1', strategy), pool.select('plan-2', strategy)]);
    expect(first.kind).toBe('planned');
    expect(second.kind).toBe('no-eligible-accounts');
  });

  it('checks reservation ownership', async () => {
    const pool = await poolWith({ A: SOL });
    await pool.select('plan-1', { kind: 'multi-proportional' });

    await expect(pool.verifyReservation('A', 'plan-2')).rejects.toBeInstanceOf(PoolConflictError);
    await expect(pool.commitSpend('A', 'plan-2', 1)).rejects.toBeInstanceOf(PoolConflictError);
    await expect(pool.release('Z', 'plan-1')).rejects.toBeInstanceOf(PoolConflictError);

    expect(await pool.commitSpend('A', 'plan-1', 400_000_000)).toBe(600_000_000);
    await pool.release('A', 'plan-1');
    expect(pool.get('A')).toMatchObject({ reserved: false, reservedBy: null, availableLamports: 600_000_000 });
    await expect(pool.release('A', 'plan-1')).rejects.toBeInstanceOf(PoolConflictError);
  });

  it('refreshes only unreserved accounts and keeps balances on fetch failure', async () => {
    const pool = await poolWith({ A: SOL, B: SOL, C: SOL });
    await pool.select('plan-1', { kind: 'single-fixed', amountLamports: 100_000_000, legs: 1 });

    await pool.refreshBalances(async ref => {
      if (ref === 'C') throw new Error('rpc down');
      return 7;
    });

    expect(pool.get('A')?.availableLamports).toBe(SOL); // reserved by plan-1
    expect(pool.get('B')?.availableLamports).toBe(7);
    expect(pool.get('C')?.availableLamports).toBe(SOL);
  });
});
