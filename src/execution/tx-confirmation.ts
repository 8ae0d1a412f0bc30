import type { Connection, SignatureStatus } from '@solana/web3.js';
import { sleep } from '../utils/async-timeout.js';
import { createModuleLogger, short } from '../utils/logger.js';

const log = createModuleLogger('settle');

export type SettlementState = 'settling' | 'confirmed' | 'failed' | 'expired' | 'unresolved';

export interface SettlementResult {
  state: SettlementState;
  error?: string;
  confirmationStatus?: string | null;
  slot?: number | null;
}

export interface SettleOptions {
  maxWaitMs?: number;
  pollMs?: number;
  wait?: (ms: number) => Promise<void>;
  now?: () => number;
}

const DEFAULT_MAX_WAIT_MS = 90_000;
const DEFAULT_POLL_MS = 1_000;

export function mapRpcStatus(status: SignatureStatus | null): SettlementResult {
  if (!status) {
    return { state: 'settling' };
  }

  if (status.err) {
    return {
      state: 'failed',
      error: typeof status.err === 'string' ? status.err : JSON.stringify(status.err),
      confirmationStatus: status.confirmationStatus ?? null,
      slot: status.slot ?? null,
    };
  }

  const c = status.confirmationStatus ?? null;
  if (c === 'confirmed' || c === 'finalized') {
    return { state: 'confirmed', confirmationStatus: c, slot: status.slot ?? null };
  }

  return { state: 'settling', confirmationStatus: c, slot: status.slot ?? null };
}

function isFinal(result: SettlementResult): boolean {
  return result.state === 'confirmed' || result.state === 'failed';
}

async function readStatus(
  connection: Pick<Connection, 'getSignatureStatuses'>,
  signature: string,
): Promise<SettlementResult> {
  try {
    const statuses = await connection.getSignatureStatuses([signature], { searchTransactionHistory: true });
    return mapRpcStatus(statuses?.value?.[0] ?? null);
  } catch (err) {
    log.warn('Signature status read failed', {
      sig: short(signature, 16),
      error: err instanceof Error ? err.message : String(err),
    });
    return { state: 'settling' };
  }
}

async function readBlockHeight(connection: Pick<Connection, 'getBlockHeight'>): Promise<number | null> {
  try {
    return await connection.getBlockHeight('confirmed');
  } catch (err) {
    log.warn('Block height read failed', { error: err instanceof Error ? err.message : String(err) });
    return null;
  }
}

/**
 * Follows a sent transaction until the chain gives a definite answer.
 *
 * `expired` means the blockhash is past `lastValidBlockHeight` and the
 * signature is still unknown, so the transaction can never land and a fresh
 * attempt cannot double-spend. `unresolved` means the wait bound ran out
 * first; the transaction may still land.
 */
export async function settleSignature(
  connection: Pick<Connection, 'getSignatureStatuses' | 'getBlockHeight'>,
  signature: string,
  lastValidBlockHeight: number,
  options?: SettleOptions,
): Promise<SettlementResult> {
  const maxWaitMs = Math.max(1_000, options?.maxWaitMs ?? DEFAULT_MAX_WAIT_MS);
  const pollMs = Math.max(250, options?.pollMs ?? DEFAULT_POLL_MS);
  const wait = options?.wait ?? sleep;
  const now = options?.now ?? Date.now;

  const startedAt = now();
  for (;;) {
    const status = await readStatus(connection, signature);
    if (isFinal(status)) return status;

    const height = await readBlockHeight(connection);
    if (height !== null && height > lastValidBlockHeight) {
      // it may have landed between the two reads
      const last = await readStatus(connection, signature);
      if (isFinal(last)) return last;
      return { state: 'expired', error: `Blockhash expired at height ${height} (valid through ${lastValidBlockHeight})` };
    }

    if (now() - startedAt >= maxWaitMs) {
      return { state: 'unresolved', error: `No final signature status within ${maxWaitMs}ms` };
    }
    await wait(pollMs);
  }
}
