import type { PlannedLeg, PurchaseStrategy } from '../types/index.js';

export interface AccountBalance {
  accountRef: string;
  availableLamports: number;
  feeReserveLamports: number;
}

/** Lamports an account can put into legs without touching its fee reserve. */
export function spendableLamports(account: AccountBalance): number {
  return Math.max(0, account.availableLamports - account.feeReserveLamports);
}

// ─── Single account, fixed amount ─────────────────────────────
// The account with the most spendable balance; ties go to configuration order.
// Legs are trimmed to what that account can cover.
export function planSingleFixed(accounts: AccountBalance[], amountLamports: number, legs: number): PlannedLeg[] {
  if (amountLamports <= 0 || legs <= 0) return [];

  let best: AccountBalance | null = null;
  for (const account of accounts) {
    if (!best || spendableLamports(account) > spendableLamports(best)) best = account;
  }
  if (!best) return [];

  const accountRef = best.accountRef;
  const count = Math.min(legs, Math.floor(spendableLamports(best) / amountLamports));
  return Array.from({ length: count }, () => ({ accountRef, amountLamports }));
}

// ─── Every account, fixed amount ──────────────────────────────
export function planMultiFixed(accounts: AccountBalance[], amountLamports: number, legsPerAccount: number): PlannedLeg[] {
  if (amountLamports <= 0 || legsPerAccount <= 0) return [];

  const legs: PlannedLeg[] = [];
  for (const account of accounts) {
    if (spendableLamports(account) < amountLamports * legsPerAccount) continue;
    for (let i = 0; i < legsPerAccount; i++) {
      legs.push({ accountRef: account.accountRef, amountLamports });
    }
  }
  return legs;
}

// ─── Every account, its whole spendable balance ───────────────
export function planMultiProportional(accounts: AccountBalance[], maxLegLamports?: number): PlannedLeg[] {
  const legs: PlannedLeg[] = [];
  for (const account of accounts) {
    const spendable = spendableLamports(account);
    const amountLamports = maxLegLamports === undefined ? spendable : Math.min(spendable, maxLegLamports);
    if (amountLamports <= 0) continue;
    legs.push({ accountRef: account.accountRef, amountLamports });
  }
  return legs;
}

export function planLegs(strategy: PurchaseStrategy, accounts: AccountBalance[]): PlannedLeg[] {
  switch (strategy.kind) {
    case 'single-fixed':
      return planSingleFixed(accounts, strategy.amountLamports, strategy.legs);
    case 'multi-fixed':
      return planMultiFixed(accounts, strategy.amountLamports, strategy.legsPerAccount);
    case 'multi-proportional':
      return planMultiProportional(accounts, strategy.maxLegLamports);
  }
}

/**
 * Accounts whose legs would together dip into their fee reserve. Empty for
 * any plan the strategies above produce.
 */
export function overcommittedAccounts(legs: PlannedLeg[], accounts: AccountBalance[]): string[] {
  const committed = new Map<string, number>();
  for (const leg of legs) {
    committed.set(leg.accountRef, (committed.get(leg.accountRef) ?? 0) + leg.amountLamports);
  }
  const byRef = new Map(accounts.map(a => [a.accountRef, a]));
  const over: string[] = [];
  for (const [ref, total] of committed) {
    const account = byRef.get(ref);
    if (!account || total > spendableLamports(account)) over.push(ref);
  }
  return over;
}
