// ─── Extraction ───────────────────────────────────────────────
export type SourceFormat = 'bare' | 'swap-link' | 'explorer-link' | 'free-text';

export interface CandidateReference {
  rawText: string;
  identifier: string | null;
  sourceFormat: SourceFormat;
}

export type ResolvedCandidate = CandidateReference & { identifier: string };

/** Tag of the ingestion adapter a text event came from. */
export type SignalSource = 'telegram' | 'twitter' | 'website' | 'manual' | (string & {});

// ─── Safety Validation ────────────────────────────────────────
export type ValidationDecision = 'ACCEPT' | 'REJECT';

export interface ValidationMetrics {
  liquiditySol?: number;
  priceImpactPct?: number;
  buyTaxPct?: number;
  sellTaxPct?: number;
  holderCount?: number;
  mintAuthorityRevoked?: boolean;
  freezeAuthorityRevoked?: boolean;
}

export interface ValidationResult {
  identifier: string;
  decision: ValidationDecision;
  reason: string | null;
  metrics: ValidationMetrics;
  checkedAt: number;
  latencyMs: number;
}

/** An unset threshold is not configured and its check never runs. */
export interface SafetyThresholds {
  enabled: boolean;
  minLiquiditySol?: number;
  maxPriceImpactPct?: number;
  maxBuyTaxPct?: number;
  maxSellTaxPct?: number;
  minHolders?: number;
  requireMintAuthorityRevoked: boolean;
  requireFreezeAuthorityRevoked: boolean;
  /** Trade size used for the price-impact quote. */
  impactTradeLamports: number;
  validationTimeoutMs: number;
  lookupTimeoutMs: number;
  blacklist: string[];
}

// ─── Funding Accounts ─────────────────────────────────────────
export interface FundingAccount {
  accountRef: string;
  label: string;
  availableLamports: number;
  feeReserveLamports: number;
  reserved: boolean;
  /** Plan id holding the reservation. */
  reservedBy: string | null;
  lastRefreshedAt: number | null;
}

export type PurchaseStrategy =
  | { kind: 'single-fixed'; amountLamports: number; legs: number }
  | { kind: 'multi-fixed'; amountLamports: number; legsPerAccount: number }
  | { kind: 'multi-proportional'; maxLegLamports?: number };

export type StrategyKind = PurchaseStrategy['kind'];

export interface PlannedLeg {
  accountRef: string;
  amountLamports: number;
}

export type SelectionResult =
  | { kind: 'planned'; legs: PlannedLeg[]; balancesAtSelection: Record<string, number> }
  | { kind: 'no-eligible-accounts'; reason: string };

// ─── Purchase Legs & Plans ────────────────────────────────────
export type LegStatus = 'PENDING' | 'SUBMITTED' | 'RETRY_PENDING' | 'CONFIRMED' | 'FAILED';

export interface PurchaseLeg {
  index: number;
  accountRef: string;
  plannedLamports: number;
  status: LegStatus;
  attempts: number;
  resultSignature: string | null;
  /** Token base units received, as reported for the confirmed swap. */
  outAmount: string | null;
  error: string | null;
  failure: SwapFailureKind | 'cancelled' | 'pool-conflict' | null;
  submittedAt: number | null;
  settledAt: number | null;
}

export interface PurchasePlan {
  id: string;
  candidate: ResolvedCandidate;
  source: SignalSource;
  strategy: PurchaseStrategy;
  legs: PurchaseLeg[];
  /** Per-account balance snapshot taken when the plan was created. */
  balancesAtCreation: Record<string, number>;
  createdAt: number;
  completedAt: number | null;
}

// ─── Swap Aggregator ──────────────────────────────────────────
export type SwapFailureKind =
  | 'insufficient-funds'
  | 'slippage-exceeded'
  | 'invalid-identifier'
  | 'rate-limited'
  | 'network-error'
  | 'timeout'
  | 'unknown';

export interface SwapRequest {
  mint: string;
  amountLamports: number;
  slippageBps: number;
  priorityFeeLamports: number;
  accountRef: string;
  attempt: number;
}

export type SwapOutcome =
  | { ok: true; signature: string; outAmount: string | null; latencyMs: number }
  | { ok: false; failure: SwapFailureKind; message: string; latencyMs: number };

export interface SwapQuote {
  inputMint: string;
  outputMint: string;
  inAmount: string;
  outAmount: string;
  priceImpactPct: number;
  slippageBps: number;
  routePlan: string;
  raw: unknown;
}

// ─── Retry / Execution Policy ─────────────────────────────────
export type RetryParamsPolicy =
  | { mode: 'reuse' }
  | { mode: 'escalate'; slippageStepBps: number; maxSlippageBps: number; priorityFeeMultiplier: number };

export interface RetryPolicy {
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  params: RetryParamsPolicy;
}

// ─── Reporting ────────────────────────────────────────────────
export interface ExecutionSummary {
  planId: string;
  mint: string;
  source: SignalSource;
  strategy: StrategyKind;
  succeededCount: number;
  failedCount: number;
  totalSpentLamports: number;
  totalSpentSol: number;
  /** Sum of the confirmed legs' token base units; decimal string, may exceed 2^53. */
  totalTokensBought: string;
  confirmations: string[];
  failures: Array<{ accountRef: string; error: string }>;
  elapsedMs: number;
}

export type PipelineOutcome =
  | { kind: 'no-signal'; source: SignalSource }
  | { kind: 'duplicate'; identifier: string }
  | { kind: 'rejected'; validation: ValidationResult }
  | { kind: 'no-eligible-accounts'; identifier: string; reason: string }
  | { kind: 'executed'; summary: ExecutionSummary };
