import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { createModuleLogger } from '../utils/logger.js';
import type { ExecutionSink } from './execution-reporter.js';
import type { ExecutionSummary, PurchasePlan, SignalSource, ValidationResult } from '../types/index.js';

const log = createModuleLogger('journal');

export interface ExecutionRow {
  plan_id: string;
  mint: string;
  source: string;
  strategy: string;
  succeeded: number;
  failed: number;
  spent_lamports: number;
  tokens_bought: string;
  elapsed_ms: number;
  created_at: number;
  completed_at: number | null;
}

export interface LegRow {
  plan_id: string;
  leg_index: number;
  account_ref: string;
  planned_lamports: number;
  status: string;
  attempts: number;
  signature: string | null;
  out_amount: string | null;
  failure: string | null;
  error: string | null;
}

export interface RejectionRow {
  id: number;
  mint: string;
  source: string;
  reason: string | null;
  metrics: string;
  checked_at: number;
}

/** Append-only sqlite record of executions and rejections. */
export class TradeJournal implements ExecutionSink {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.initSchema();
    log.info('Journal opened', { path: dbPath });
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS executions (
        plan_id TEXT PRIMARY KEY,
        mint TEXT NOT NULL,
        source TEXT NOT NULL,
        strategy TEXT NOT NULL,
        succeeded INTEGER NOT NULL,
        failed INTEGER NOT NULL,
        spent_lamports INTEGER NOT NULL,
        tokens_bought TEXT NOT NULL DEFAULT '0',
        elapsed_ms INTEGER NOT NULL,
        created_at INTEGER NOT NULL,
        completed_at INTEGER
      );

      CREATE TABLE IF NOT EXISTS legs (
        plan_id TEXT NOT NULL,
        leg_index INTEGER NOT NULL,
        account_ref TEXT NOT NULL,
        planned_lamports INTEGER NOT NULL,
        status TEXT NOT NULL,
        attempts INTEGER NOT NULL,
        signature TEXT,
        out_amount TEXT,
        failure TEXT,
        error TEXT,
        PRIMARY KEY (plan_id, leg_index)
      );

      CREATE TABLE IF NOT EXISTS rejections (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        mint TEXT NOT NULL,
        source TEXT NOT NULL,
        reason TEXT,
        metrics TEXT NOT NULL DEFAULT '{}',
        checked_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_executions_mint ON executions(mint);
      CREATE INDEX IF NOT EXISTS idx_rejections_mint ON rejections(mint);
    `);
  }

  recordExecution(plan: PurchasePlan, summary: ExecutionSummary): void {
    const insertExecution = this.db.prepare(`
      INSERT OR REPLACE INTO executions (plan_id, mint, source, strategy, succeeded, failed,
        spent_lamports, tokens_bought, elapsed_ms, created_at, completed_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertLeg = this.db.prepare(`
      INSERT OR REPLACE INTO legs (plan_id, leg_index, account_ref, planned_lamports, status,
        attempts, signature, out_amount, failure, error)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    this.db.transaction(() => {
      insertExecution.run(
        plan.id, summary.mint, summary.source, summary.strategy, summary.succeededCount,
        summary.failedCount, summary.totalSpentLamports, summary.totalTokensBought, summary.elapsedMs,
        plan.createdAt, plan.completedAt,
      );
      for (const leg of plan.legs) {
        insertLeg.run(
          plan.id, leg.index, leg.accountRef, leg.plannedLamports, leg.status,
          leg.attempts, leg.resultSignature, leg.outAmount, leg.failure, leg.error,
        );
      }
    })();
  }

  recordRejection(validation: ValidationResult, source: SignalSource): void {
    this.db.prepare(`
      INSERT INTO rejections (mint, source, reason, metrics, checked_at) VALUES (?, ?, ?, ?, ?)
    `).run(validation.identifier, source, validation.reason, JSON.stringify(validation.metrics), validation.checkedAt);
  }

  // ─── Read-back ────────────────────────────────────────────────
  getExecution(planId: string): ExecutionRow | undefined {
    return this.db.prepare<[string], ExecutionRow>(`SELECT * FROM executions WHERE plan_id = ?`).get(planId);
  }

  getLegs(planId: string): LegRow[] {
    return this.db
      .prepare<[string], LegRow>(`SELECT * FROM legs WHERE plan_id = ? ORDER BY leg_index`)
      .all(planId);
  }

  getRecentExecutions(limit = 20): ExecutionRow[] {
    return this.db
      .prepare<[number], ExecutionRow>(`SELECT * FROM executions ORDER BY created_at DESC LIMIT ?`)
      .all(limit);
  }

  getRejections(mint: string): RejectionRow[] {
    return this.db
      .prepare<[string], RejectionRow>(`SELECT * FROM rejections WHERE mint = ? ORDER BY id`)
      .all(mint);
  }

  getTotalSpentLamports(mint?: string): number {
    const row = mint
      ? this.db.prepare<[string], { total: number | null }>(
          `SELECT SUM(spent_lamports) as total FROM executions WHERE mint = ?`).get(mint)
      : this.db.prepare<[], { total: number | null }>(`SELECT SUM(spent_lamports) as total FROM executions`).get();
    return row?.total ?? 0;
  }

  close(): void {
    this.db.close();
  }
}
