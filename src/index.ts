import readline from 'readline';
import { getConfig } from './config/index.js';
import { lamportsToSol } from './config/constants.js';
import { createEngine, type Engine } from './engine.js';
import { createModuleLogger, short } from './utils/logger.js';
import { describeOutcome } from './reporting/execution-reporter.js';
import type { SignalSource } from './types/index.js';

const log = createModuleLogger('supervisor');

/**
 * Reads text events from stdin, one per line, and feeds them to the pipeline.
 * A line of the form `[source] text` tags the event with that source.
 */
class Supervisor {
  private readonly engine: Engine;
  private readonly inflight = new Set<Promise<void>>();
  private reader: readline.Interface | null = null;
  private stopping = false;

  constructor() {
    this.engine = createEngine(getConfig());
  }

  async start(): Promise<void> {
    const cfg = getConfig();
    log.info('═══════════════════════════════════════════');
    log.info('    SIGNAL SNIPER - Starting Up');
    log.info('═══════════════════════════════════════════');
    log.info(`Mode: ${cfg.tradingMode.toUpperCase()} | Accounts: ${cfg.accounts.mode} | Max in-flight: ${cfg.execution.maxInFlight}`);

    try {
      await this.engine.pool.refreshBalances(this.engine.fetchBalance);
      for (const account of this.engine.pool.snapshot()) {
        log.info(`${account.label}: ${lamportsToSol(account.availableLamports).toFixed(4)} SOL`, {
          account: short(account.accountRef),
        });
      }
    } catch (err) {
      log.warn('Could not read balances at startup', { error: err instanceof Error ? err.message : String(err) });
    }

    this.reader = readline.createInterface({ input: process.stdin, terminal: false });
    this.reader.on('line', line => this.dispatch(line));
    this.reader.on('close', () => {
      log.info('Input closed, finishing pending signals');
      this.finish().catch((err: unknown) => {
        log.error('Shutdown failed', { error: err instanceof Error ? err.message : String(err) });
      });
    });
    log.info('Listening for signals on stdin');
  }

  private dispatch(line: string): void {
    const text = line.trim();
    if (!text || this.stopping) return;

    const tagged = /^\[([\w-]{1,32})\]\s*(.*)$/.exec(text);
    const source: SignalSource = tagged ? tagged[1].toLowerCase() : 'manual';
    const body = tagged ? tagged[2] : text;

    const task = this.engine.pipeline.handle(body, source)
      .then(outcomes => {
        for (const outcome of outcomes) log.info(describeOutcome(outcome), { source });
      })
      .catch((err: unknown) => {
        log.error('Error processing signal', { source, error: err instanceof Error ? err.message : String(err) });
      });
    this.inflight.add(task);
    void task.finally(() => this.inflight.delete(task));
  }

  /** Lets pending signals run to completion, then stops. */
  async finish(): Promise<void> {
    await Promise.allSettled(Array.from(this.inflight));
    await this.stop();
  }

  /** Cancels unsubmitted legs and waits for submitted ones. */
  async stop(): Promise<void> {
    if (this.stopping) return;
    this.stopping = true;
    log.info('Shutting down...');
    this.reader?.close();
    await this.engine.shutdown();
    await Promise.allSettled(Array.from(this.inflight));
    log.info('Shutdown complete');
  }
}

// ─── Main Entry Point ────────────────────────────────────────
async function main(): Promise<void> {
  const supervisor = new Supervisor();

  const shutdown = (signal: string) => {
    log.info(`Received ${signal}`);
    supervisor.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error('Shutdown failed', { error: err instanceof Error ? err.message : String(err) });
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  process.on('unhandledRejection', (err) => {
    log.error('Unhandled rejection', { error: String(err) });
  });

  await supervisor.start();
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
