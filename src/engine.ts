import { ConfigError, toPurchaseStrategy, toRetryPolicy, toSafetyThresholds, type AppConfig } from './config/index.js';
import { solToLamports } from './config/constants.js';
import { InFlightGate } from './execution/in-flight-gate.js';
import { PurchaseDistributor } from './execution/purchase-distributor.js';
import { FundingAccountPool } from './funding/account-pool.js';
import { LogSink, type ExecutionSink } from './reporting/execution-reporter.js';
import { TradeJournal } from './reporting/trade-journal.js';
import { LiveMarketDataService } from './safety/market-data.js';
import { SafetyValidator } from './safety/safety-validator.js';
import { SignalPipeline } from './signals/pipeline.js';
import { JupiterClient } from './trading/jupiter-client.js';
import { JupiterSwapService, PaperSwapService, type SwapService } from './trading/swap-service.js';
import { createBalanceFetcher, getConnection, KeyRing } from './utils/wallet.js';

export interface Engine {
  pipeline: SignalPipeline;
  pool: FundingAccountPool;
  distributor: PurchaseDistributor;
  journal: TradeJournal | null;
  fetchBalance: (accountRef: string) => Promise<number>;
  shutdown(): Promise<void>;
}

/** Wires the live collaborators for `cfg`. Throws ConfigError when no funding key loads. */
export function createEngine(cfg: AppConfig): Engine {
  const keys = KeyRing.fromSecretKeys(cfg.fundingKeys);
  if (keys.size === 0) {
    throw new ConfigError('No usable funding keys: set FUNDING_PRIVATE_KEYS or WALLET_PRIVATE_KEY');
  }

  const connection = getConnection(cfg.rpcUrl);
  const jupiter = new JupiterClient(cfg.jupiterApiBase);
  const swap: SwapService = cfg.tradingMode === 'live'
    ? new JupiterSwapService({
        jupiter,
        connection,
        keys,
        confirmTimeoutMs: cfg.execution.confirmTimeoutMs,
        maxPriceImpactPct: cfg.safety.maxPriceImpactPct,
      })
    : new PaperSwapService(jupiter);

  const pool = new FundingAccountPool(
    keys.refs().map((accountRef, i) => ({ accountRef, label: `wallet-${i + 1}` })),
    solToLamports(cfg.accounts.feeReserveSol),
  );

  const distributor = new PurchaseDistributor({
    pool,
    swap,
    gate: new InFlightGate(cfg.execution.maxInFlight),
    retry: toRetryPolicy(cfg),
    trade: { slippageBps: cfg.trading.slippageBps, priorityFeeLamports: cfg.trading.priorityFeeLamports },
  });

  const journal = cfg.journalPath ? new TradeJournal(cfg.journalPath) : null;
  const sinks: ExecutionSink[] = journal ? [new LogSink(), journal] : [new LogSink()];

  const validator = new SafetyValidator(new LiveMarketDataService({
    connection,
    jupiter,
    dexScreenerApiBase: cfg.dexScreenerApiBase,
    goPlusApiBase: cfg.goPlusApiBase,
  }));

  const fetchBalance = createBalanceFetcher(connection);
  const pipeline = new SignalPipeline({
    validator,
    thresholds: toSafetyThresholds(cfg),
    pool,
    fetchBalance,
    distributor,
    strategy: toPurchaseStrategy(cfg),
    sinks,
  });

  return {
    pipeline,
    pool,
    distributor,
    journal,
    fetchBalance,
    async shutdown() {
      await pipeline.stop();
      journal?.close();
    },
  };
}
