import type { VersionedTransaction } from '@solana/web3.js';
import { SYSTEM_PROGRAM, TOKEN_PROGRAM } from '../config/constants.js';
import { createModuleLogger } from '../utils/logger.js';

const log = createModuleLogger('tx-validator');

// Programs an aggregator buy is expected to touch
const KNOWN_PROGRAMS = new Set([
  SYSTEM_PROGRAM,
  TOKEN_PROGRAM,
  'TokenzQdBNbLqP5VEhdkAS6EPFLC1PHnBqCXEpPxuEb', // Token-2022
  'ATokenGPvbdGVxr1b2hvZbsiqW5xWH25efTNsLJA8knL', // ATA Program
  'ComputeBudget111111111111111111111111111111',
  'JUP6LkbZbjS1jKKwapdHNy74zcZ3tLUZoi5QNyVTaV4', // Jupiter V6
]);

const MAX_INSTRUCTIONS = 15;
const MAX_REQUIRED_SIGNATURES = 3;

export interface TxValidationResult {
  valid: boolean;
  reason?: string;
  programIds: string[];
  unknownPrograms: string[];
}

/**
 * Sanity checks on an aggregator-built transaction before a funding key signs
 * it. When `expectedPayer` is given the fee payer must be that account.
 */
export function validateSwapTransaction(tx: VersionedTransaction, expectedPayer?: string): TxValidationResult {
  const programIds: string[] = [];
  const unknownPrograms: string[] = [];
  try {
    const message = tx.message;
    const accountKeys = message.staticAccountKeys.map(k => k.toBase58());

    if (expectedPayer && accountKeys[0] !== expectedPayer) {
      return { valid: false, reason: `Fee payer mismatch: ${accountKeys[0] ?? 'none'}`, programIds, unknownPrograms };
    }

    const instructions = message.compiledInstructions;
    for (const ix of instructions) {
      const programId = accountKeys[ix.programIdIndex];
      if (!programId) {
        return { valid: false, reason: 'Invalid program index in instruction', programIds, unknownPrograms };
      }
      programIds.push(programId);
      if (!KNOWN_PROGRAMS.has(programId) && !unknownPrograms.includes(programId)) {
        unknownPrograms.push(programId);
      }
    }

    if (instructions.length > MAX_INSTRUCTIONS) {
      return { valid: false, reason: `Too many instructions: ${instructions.length}`, programIds, unknownPrograms };
    }
    if (message.header.numRequiredSignatures > MAX_REQUIRED_SIGNATURES) {
      return {
        valid: false,
        reason: `Too many required signatures: ${message.header.numRequiredSignatures}`,
        programIds,
        unknownPrograms,
      };
    }

    // Route programs (AMMs) sit behind the aggregator; log rather than refuse
    if (unknownPrograms.length > 0) {
      log.debug('Transaction touches unlisted programs', { programs: unknownPrograms });
    }
    return { valid: true, programIds, unknownPrograms };
  } catch (err) {
    return { valid: false, reason: `Validation error: ${err instanceof Error ? err.message : String(err)}`, programIds: [], unknownPrograms: [] };
  }
}
