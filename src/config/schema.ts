import { z } from 'zod';

const optionalThreshold = z.number().min(0).optional();

export const RetryParamsSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('reuse') }),
  z.object({
    mode: z.literal('escalate'),
    slippageStepBps: z.number().int().min(0),
    maxSlippageBps: z.number().int().min(1).max(10_000),
    priorityFeeMultiplier: z.number().min(1),
  }),
]);

export const AppConfigSchema = z.object({
  rpcUrl: z.string().url(),
  jupiterApiBase: z.string().url(),
  dexScreenerApiBase: z.string().url(),
  goPlusApiBase: z.string().url(),
  tradingMode: z.enum(['paper', 'live']),
  fundingKeys: z.array(z.string().min(1)),
  trading: z.object({
    tradeAmountSol: z.number().positive(),
    purchaseCount: z.number().int().min(1),
    slippageBps: z.number().int().min(1).max(10_000),
    priorityFeeLamports: z.number().int().min(0),
    maxTradeAmountSol: z.number().positive(),
  }),
  accounts: z.object({
    mode: z.enum(['single', 'multi-fixed', 'multi-proportional']),
    feeReserveSol: z.number().min(0),
    legsPerAccount: z.number().int().min(1),
  }),
  safety: z.object({
    enabled: z.boolean(),
    minLiquiditySol: optionalThreshold,
    maxPriceImpactPct: optionalThreshold,
    maxBuyTaxPct: optionalThreshold,
    maxSellTaxPct: optionalThreshold,
    minHolders: z.number().int().min(0).optional(),
    requireMintAuthorityRevoked: z.boolean(),
    requireFreezeAuthorityRevoked: z.boolean(),
    validationTimeoutMs: z.number().int().positive(),
    lookupTimeoutMs: z.number().int().positive(),
    blacklist: z.array(z.string()),
  }),
  execution: z.object({
    maxInFlight: z.number().int().min(1),
    maxAttempts: z.number().int().min(1),
    backoffBaseMs: z.number().int().min(0),
    backoffMaxMs: z.number().int().min(0),
    retryParams: RetryParamsSchema,
    confirmTimeoutMs: z.number().int().positive(),
  }),
  journalPath: z.string().min(1).nullable(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AccountMode = AppConfig['accounts']['mode'];
