#!/usr/bin/env node
/**
 * Runs the pipeline once on a piece of text and prints the outcome.
 * Usage: quick-buy "<text containing a contract address>" [source]
 */
import { getConfig } from '../config/index.js';
import { lamportsToSol } from '../config/constants.js';
import { createEngine } from '../engine.js';
import { describeOutcome } from '../reporting/execution-reporter.js';

async function main(): Promise<void> {
  const [text, source = 'manual'] = process.argv.slice(2);
  if (!text) {
    console.error('Usage: quick-buy "<text containing a contract address>" [source]');
    process.exitCode = 2;
    return;
  }

  const cfg = getConfig();
  const engine = createEngine(cfg);
  console.log(`Mode: ${cfg.tradingMode.toUpperCase()} | Accounts: ${cfg.accounts.mode}`);

  try {
    const outcomes = await engine.pipeline.handle(text, source);
    for (const outcome of outcomes) {
      console.log(describeOutcome(outcome));
      if (outcome.kind !== 'executed') continue;

      const { summary } = outcome;
      console.log(`  spent: ${lamportsToSol(summary.totalSpentLamports)} SOL`);
      for (const sig of summary.confirmations) console.log(`  ok    ${sig}`);
      for (const f of summary.failures) console.log(`  fail  ${f.accountRef}: ${f.error}`);
    }
    if (!outcomes.some(o => o.kind === 'executed' && o.summary.succeededCount > 0)) {
      process.exitCode = 1;
    }
  } finally {
    await engine.shutdown();
  }
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
