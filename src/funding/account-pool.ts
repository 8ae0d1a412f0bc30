import { createModuleLogger, short } from '../utils/logger.js';
import { SerialQueue } from '../utils/serial-queue.js';
import { overcommittedAccounts, planLegs } from './strategies.js';
import type { FundingAccount, PurchaseStrategy, SelectionResult } from '../types/index.js';

const log = createModuleLogger('account-pool');

export class PoolConflictError extends Error {
  constructor(readonly accountRef: string, readonly planId: string, detail: string) {
    super(`Account ${short(accountRef)} ${detail} (plan ${short(planId)})`);
    this.name = 'PoolConflictError';
  }
}

export interface AccountSpec {
  accountRef: string;
  label?: string;
}

/**
 * The funding accounts and their reservations. Every mutation goes through a
 * single serial queue, so two plans can never hold the same account and a
 * balance refresh never lands on a reserved account.
 */
export class FundingAccountPool {
  private readonly accounts = new Map<string, FundingAccount>();
  private readonly queue = new SerialQueue();

  constructor(specs: AccountSpec[], feeReserveLamports: number, private readonly now: () => number = Date.now) {
    specs.forEach((spec, i) => {
      if (this.accounts.has(spec.accountRef)) return;
      this.accounts.set(spec.accountRef, {
        accountRef: spec.accountRef,
        label: spec.label ?? `account-${i + 1}`,
        availableLamports: 0,
        feeReserveLamports,
        reserved: false,
        reservedBy: null,
        lastRefreshedAt: null,
      });
    });
  }

  get size(): number {
    return this.accounts.size;
  }

  snapshot(): FundingAccount[] {
    return Array.from(this.accounts.values(), a => ({ ...a }));
  }

  get(accountRef: string): FundingAccount | undefined {
    const account = this.accounts.get(accountRef);
    return account ? { ...account } : undefined;
  }

  /**
   * Fetches balances for the unreserved accounts. Fetches run outside the
   * queue; results are applied inside it and only to accounts that are still
   * unreserved. A failed fetch keeps the previous balance.
   */
  async refreshBalances(fetchBalance: (accountRef: string) => Promise<number>): Promise<void> {
    const targets = Array.from(this.accounts.values()).filter(a => !a.reserved).map(a => a.accountRef);
    const results = await Promise.allSettled(targets.map(ref => fetchBalance(ref)));

    await this.queue.run(() => {
      const at = this.now();
      results.forEach((result, i) => {
        const ref = targets[i];
        const account = this.accounts.get(ref);
        if (result.status === 'rejected') {
          log.warn('Balance refresh failed', { account: short(ref), error: String(result.reason) });
          return;
        }
        if (!account || account.reserved) return;
        account.availableLamports = result.value;
        account.lastRefreshedAt = at;
      });
    });
  }

  /**
   * Plans legs for `planId` under `strategy` and reserves every account that
   * got a leg, as one atomic step.
   */
  select(planId: string, strategy: PurchaseStrategy): Promise<SelectionResult> {
    return this.queue.run((): SelectionResult => {
      if (this.accounts.size === 0) {
        return { kind: 'no-eligible-accounts', reason: 'no funding accounts configured' };
      }
      const free = Array.from(this.accounts.values()).filter(a => !a.reserved);
      if (free.length === 0) {
        return { kind: 'no-eligible-accounts', reason: 'all funding accounts are reserved' };
      }

      const legs = planLegs(strategy, free);
      if (legs.length === 0) {
        return { kind: 'no-eligible-accounts', reason: `no account can fund a ${strategy.kind} leg` };
      }
      const over = overcommittedAccounts(legs, free);
      if (over.length > 0) {
        throw new Error(`Plan would dip into the fee reserve of ${over.map(r => short(r)).join(', ')}`);
      }

      const balancesAtSelection: Record<string, number> = {};
      for (const leg of legs) {
        const account = this.accounts.get(leg.accountRef);
        if (!account || account.reserved) continue;
        account.reserved = true;
        account.reservedBy = planId;
        balancesAtSelection[leg.accountRef] = account.availableLamports;
      }

      log.info('Accounts reserved', {
        plan: short(planId),
        strategy: strategy.kind,
        accounts: Object.keys(balancesAtSelection).length,
        legs: legs.length,
      });
      return { kind: 'planned', legs, balancesAtSelection };
    });
  }

  /** Throws PoolConflictError unless `planId` still holds the account. */
  verifyReservation(accountRef: string, planId: string): Promise<void> {
    return this.queue.run(() => {
      this.requireOwner(accountRef, planId);
    });
  }

  /** Deducts a confirmed leg from the local balance. Returns the new balance. */
  commitSpend(accountRef: string, planId: string, lamports: number): Promise<number> {
    return this.queue.run(() => {
      const account = this.requireOwner(accountRef, planId);
      account.availableLamports = Math.max(0, account.availableLamports - lamports);
      return account.availableLamports;
    });
  }

  release(accountRef: string, planId: string): Promise<void> {
    return this.queue.run(() => {
      const account = this.requireOwner(accountRef, planId);
      account.reserved = false;
      account.reservedBy = null;
      log.debug('Account released', { account: short(accountRef), plan: short(planId) });
    });
  }

  private requireOwner(accountRef: string, planId: string): FundingAccount {
    const account = this.accounts.get(accountRef);
    if (!account) throw new PoolConflictError(accountRef, planId, 'is not in the pool');
    if (!account.reserved || account.reservedBy !== planId) {
      throw new PoolConflictError(accountRef, planId, `is not reserved by this plan`);
    }
    return account;
  }
}
