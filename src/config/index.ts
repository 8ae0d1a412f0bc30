import dotenv from 'dotenv';
import path from 'path';
import { AppConfigSchema, type AppConfig } from './schema.js';
import {
  DEFAULT_FEE_RESERVE_SOL,
  DEFAULT_PRIORITY_FEE_LAMPORTS,
  DEFAULT_SLIPPAGE_BPS,
  DEXSCREENER_API,
  GOPLUS_API,
  JUPITER_SWAP_API,
  solToLamports,
} from './constants.js';
import type { PurchaseStrategy, RetryPolicy, SafetyThresholds } from '../types/index.js';

export type { AppConfig, AccountMode } from './schema.js';

type EnvSource = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function readers(source: EnvSource) {
  function env(key: string, fallback?: string): string {
    const val = source[key] ?? fallback;
    if (val === undefined) {
      throw new ConfigError(`Missing required env var: ${key}`);
    }
    return val;
  }

  function envNum(key: string, fallback: number): number {
    const val = source[key];
    return val ? parseFloat(val) : fallback;
  }

  function envOptionalNum(key: string): number | undefined {
    const val = source[key]?.trim();
    return val ? parseFloat(val) : undefined;
  }

  function envBool(key: string, fallback: boolean): boolean {
    const val = source[key]?.trim().toLowerCase();
    if (!val) return fallback;
    return ['true', '1', 'yes'].includes(val);
  }

  function envList(key: string): string[] {
    return (source[key] ?? '').split(',').map(s => s.trim()).filter(Boolean);
  }

  return { env, envNum, envOptionalNum, envBool, envList };
}

/**
 * Builds and validates the settings object. Throws ConfigError when a value
 * is out of range so a misconfigured process never starts trading.
 */
export function loadConfig(source: EnvSource = process.env): AppConfig {
  const { env, envNum, envOptionalNum, envBool, envList } = readers(source);

  const keys = envList('FUNDING_PRIVATE_KEYS');
  const singleKey = source.WALLET_PRIVATE_KEY?.trim();
  if (keys.length === 0 && singleKey) keys.push(singleKey);

  const retryMode = env('RETRY_PARAMS', 'reuse');
  const retryParams = retryMode === 'escalate'
    ? {
        mode: 'escalate' as const,
        slippageStepBps: envNum('RETRY_SLIPPAGE_STEP_BPS', 100),
        maxSlippageBps: envNum('RETRY_MAX_SLIPPAGE_BPS', 1500),
        priorityFeeMultiplier: envNum('RETRY_PRIORITY_FEE_MULTIPLIER', 1.5),
      }
    : { mode: retryMode };

  const journalPath = env('JOURNAL_PATH', 'data/executions.db').trim();

  const raw = {
    rpcUrl: env('SOLANA_RPC_URL', 'https://api.mainnet-beta.solana.com'),
    jupiterApiBase: env('JUPITER_API_BASE', JUPITER_SWAP_API),
    dexScreenerApiBase: env('DEXSCREENER_API_BASE', DEXSCREENER_API),
    goPlusApiBase: env('GOPLUS_API_BASE', GOPLUS_API),
    tradingMode: env('TRADING_MODE', 'paper'),
    fundingKeys: keys,
    trading: {
      tradeAmountSol: envNum('TRADE_AMOUNT_SOL', 0.1),
      purchaseCount: envNum('NUM_PURCHASES', 1),
      slippageBps: envNum('SLIPPAGE_BPS', DEFAULT_SLIPPAGE_BPS),
      priorityFeeLamports: envNum('PRIORITY_FEE_LAMPORTS', DEFAULT_PRIORITY_FEE_LAMPORTS),
      maxTradeAmountSol: envNum('MAX_TRADE_AMOUNT_SOL', 1.0),
    },
    accounts: {
      mode: env('ACCOUNT_MODE', 'single'),
      feeReserveSol: envNum('FEE_RESERVE_SOL', DEFAULT_FEE_RESERVE_SOL),
      legsPerAccount: envNum('LEGS_PER_ACCOUNT', 1),
    },
    safety: {
      enabled: envBool('SAFETY_CHECKS_ENABLED', true),
      minLiquiditySol: envOptionalNum('MIN_LIQUIDITY_SOL'),
      maxPriceImpactPct: envOptionalNum('MAX_PRICE_IMPACT_PCT'),
      maxBuyTaxPct: envOptionalNum('MAX_BUY_TAX_PCT'),
      maxSellTaxPct: envOptionalNum('MAX_SELL_TAX_PCT'),
      minHolders: envOptionalNum('MIN_HOLDERS'),
      requireMintAuthorityRevoked: envBool('REQUIRE_MINT_REVOKED', false),
      requireFreezeAuthorityRevoked: envBool('REQUIRE_FREEZE_REVOKED', false),
      validationTimeoutMs: envNum('VALIDATION_TIMEOUT_MS', 2000),
      lookupTimeoutMs: envNum('LOOKUP_TIMEOUT_MS', 1500),
      blacklist: envList('BLACKLISTED_TOKENS'),
    },
    execution: {
      maxInFlight: envNum('MAX_IN_FLIGHT', 20),
      maxAttempts: envNum('MAX_ATTEMPTS', 3),
      backoffBaseMs: envNum('BACKOFF_BASE_MS', 500),
      backoffMaxMs: envNum('BACKOFF_MAX_MS', 8000),
      retryParams,
      confirmTimeoutMs: envNum('CONFIRM_TIMEOUT_MS', 90_000),
    },
    journalPath: journalPath === '' ? null : journalPath,
  };

  const parsed = AppConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}

let _config: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!_config) {
    dotenv.config({ path: path.resolve(process.cwd(), '.env') });
    _config = loadConfig(process.env);
  }
  return _config;
}

export function toSafetyThresholds(cfg: AppConfig): SafetyThresholds {
  return {
    ...cfg.safety,
    impactTradeLamports: solToLamports(cfg.trading.tradeAmountSol),
  };
}

export function toRetryPolicy(cfg: AppConfig): RetryPolicy {
  return {
    maxAttempts: cfg.execution.maxAttempts,
    backoffBaseMs: cfg.execution.backoffBaseMs,
    backoffMaxMs: cfg.execution.backoffMaxMs,
    params: cfg.execution.retryParams,
  };
}

export function toPurchaseStrategy(cfg: AppConfig): PurchaseStrategy {
  const amountLamports = solToLamports(cfg.trading.tradeAmountSol);
  switch (cfg.accounts.mode) {
    case 'single':
      return { kind: 'single-fixed', amountLamports, legs: cfg.trading.purchaseCount };
    case 'multi-fixed':
      return { kind: 'multi-fixed', amountLamports, legsPerAccount: cfg.accounts.legsPerAccount };
    case 'multi-proportional':
      return { kind: 'multi-proportional', maxLegLamports: solToLamports(cfg.trading.maxTradeAmountSol) };
  }
}
