import { settleWithin, TimeoutError, withTimeout } from '../utils/async-timeout.js';
import { createModuleLogger, short } from '../utils/logger.js';
import type { MarketDataService, MintAuthorities, TokenTaxes } from './market-data.js';
import type { SafetyThresholds, ValidationMetrics, ValidationResult } from '../types/index.js';

const log = createModuleLogger('safety');

export const VALIDATION_TIMEOUT_REASON = 'validation timeout';
export const BLACKLISTED_REASON = 'blacklisted';

interface PendingLookups {
  liquidity?: Promise<number | null | undefined>;
  impact?: Promise<number | null | undefined>;
  taxes?: Promise<TokenTaxes | null | undefined>;
  authorities?: Promise<MintAuthorities | null | undefined>;
  holders?: Promise<number | null | undefined>;
}

function fmt(n: number): string {
  return String(Math.round(n * 10_000) / 10_000);
}

/**
 * Decides ACCEPT / REJECT for a candidate against the configured thresholds.
 *
 * Lookups run concurrently, each bounded by `lookupTimeoutMs`. A metric that
 * cannot be obtained is skipped (fail-open); if the validation as a whole
 * overruns `validationTimeoutMs` the candidate is rejected (fail-closed).
 * Checks are evaluated in a fixed order and the first violation is the reason.
 */
export class SafetyValidator {
  constructor(
    private readonly market: MarketDataService,
    private readonly now: () => number = Date.now,
  ) {}

  async validate(identifier: string, thresholds: SafetyThresholds): Promise<ValidationResult> {
    const startedAt = this.now();
    const metrics: ValidationMetrics = {};
    const done = (reason: string | null): ValidationResult => {
      const result: ValidationResult = {
        identifier,
        decision: reason === null ? 'ACCEPT' : 'REJECT',
        reason,
        metrics: { ...metrics },
        checkedAt: this.now(),
        latencyMs: this.now() - startedAt,
      };
      log.info(result.decision === 'ACCEPT' ? 'Candidate accepted' : 'Candidate rejected', {
        mint: short(identifier),
        reason,
        latency: result.latencyMs + 'ms',
      });
      return result;
    };

    if (!thresholds.enabled) return done(null);
    if (thresholds.blacklist.includes(identifier)) return done(BLACKLISTED_REASON);

    const lookups = this.startLookups(identifier, thresholds);
    try {
      const reason = await withTimeout(
        this.evaluate(lookups, thresholds, metrics),
        thresholds.validationTimeoutMs,
        `validate ${short(identifier)}`,
      );
      return done(reason);
    } catch (err) {
      if (err instanceof TimeoutError) return done(VALIDATION_TIMEOUT_REASON);
      throw err;
    }
  }

  private startLookups(mint: string, t: SafetyThresholds): PendingLookups {
    const settle = <T>(promise: Promise<T>, metric: string) =>
      settleWithin(promise, t.lookupTimeoutMs, `${metric} ${short(mint)}`, err =>
        log.warn('Metric unavailable', { mint: short(mint), metric, error: err.message }));
    const ms = t.lookupTimeoutMs;
    // Thunks so a synchronous throw from a lookup becomes a missing metric too
    const call = <T>(fn: () => Promise<T>) => Promise.resolve().then(fn);

    const lookups: PendingLookups = {};
    if (t.minLiquiditySol !== undefined) {
      lookups.liquidity = settle(call(() => this.market.getLiquiditySol(mint, ms)), 'liquidity');
    }
    if (t.maxPriceImpactPct !== undefined) {
      lookups.impact = settle(call(() => this.market.getPriceImpactPct(mint, t.impactTradeLamports, ms)), 'price-impact');
    }
    if (t.maxBuyTaxPct !== undefined || t.maxSellTaxPct !== undefined) {
      lookups.taxes = settle(call(() => this.market.getTaxes(mint, ms)), 'taxes');
    }
    if (t.requireMintAuthorityRevoked || t.requireFreezeAuthorityRevoked) {
      lookups.authorities = settle(call(() => this.market.getMintAuthorities(mint, ms)), 'authorities');
    }
    if (t.minHolders !== undefined) {
      lookups.holders = settle(call(() => this.market.getHolderCount(mint, ms)), 'holders');
    }
    return lookups;
  }

  /** Returns the first violated check, or null when every available metric passes. */
  private async evaluate(
    lookups: PendingLookups,
    t: SafetyThresholds,
    metrics: ValidationMetrics,
  ): Promise<string | null> {
    const liquidity = await lookups.liquidity;
    if (liquidity != null && t.minLiquiditySol !== undefined) {
      metrics.liquiditySol = liquidity;
      if (liquidity < t.minLiquiditySol) {
        return `liquidity ${fmt(liquidity)} SOL below minimum ${fmt(t.minLiquiditySol)} SOL`;
      }
    }

    const impact = await lookups.impact;
    if (impact != null && t.maxPriceImpactPct !== undefined) {
      metrics.priceImpactPct = impact;
      if (impact > t.maxPriceImpactPct) {
        return `price impact ${fmt(impact)}% above maximum ${fmt(t.maxPriceImpactPct)}%`;
      }
    }

    const taxes = await lookups.taxes;
    if (taxes) {
      if (taxes.buyTaxPct !== null) metrics.buyTaxPct = taxes.buyTaxPct;
      if (taxes.sellTaxPct !== null) metrics.sellTaxPct = taxes.sellTaxPct;
      if (taxes.buyTaxPct !== null && t.maxBuyTaxPct !== undefined && taxes.buyTaxPct > t.maxBuyTaxPct) {
        return `buy tax ${fmt(taxes.buyTaxPct)}% above maximum ${fmt(t.maxBuyTaxPct)}%`;
      }
      if (taxes.sellTaxPct !== null && t.maxSellTaxPct !== undefined && taxes.sellTaxPct > t.maxSellTaxPct) {
        return `sell tax ${fmt(taxes.sellTaxPct)}% above maximum ${fmt(t.maxSellTaxPct)}%`;
      }
    }

    const authorities = await lookups.authorities;
    if (authorities) {
      metrics.mintAuthorityRevoked = authorities.mintAuthorityRevoked;
      metrics.freezeAuthorityRevoked = authorities.freezeAuthorityRevoked;
      if (t.requireMintAuthorityRevoked && !authorities.mintAuthorityRevoked) {
        return 'mint authority not revoked';
      }
      if (t.requireFreezeAuthorityRevoked && !authorities.freezeAuthorityRevoked) {
        return 'freeze authority not revoked';
      }
    }

    const holders = await lookups.holders;
    if (holders != null && t.minHolders !== undefined) {
      metrics.holderCount = holders;
      if (holders < t.minHolders) {
        return `holder count ${holders} below minimum ${t.minHolders}`;
      }
    }

    return null;
  }
}
