import { Block, ValidationFailureReason, ValidationResult } from './types.js';
import { hashBlock, meetsDifficulty } from './block.js';
import { log } from './logger.js';

export type TransactionErrorCode = 'INVALID_ADDRESS' | 'INVALID_AMOUNT' | 'INVALID_PARAMS';

export class TransactionError extends Error {
  constructor(public readonly code: TransactionErrorCode, message: string) {
    super(message);
    this.name = 'TransactionError';
  }
}

export interface TransactionInput {
  sender: string;
  receiver: string;
  amount: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Checks a transfer request arriving from outside the process.
 * The ledger itself accepts any transaction; this is applied at the RPC boundary.
 * @throws TransactionError if the input is malformed
 */
export function validateTransactionInput(input: unknown): asserts input is TransactionInput {
  if (!isRecord(input)) {
    throw new TransactionError('INVALID_PARAMS', 'Transaction is not an object');
  }

  for (const field of ['sender', 'receiver'] as const) {
    const value = input[field];
    if (typeof value !== 'string' || value.trim() === '') {
      throw new TransactionError('INVALID_ADDRESS', `Invalid ${field}: expected non-empty string, got ${typeof value}`);
    }
  }

  const { amount } = input;
  if (typeof amount !== 'number' || !Number.isFinite(amount) || amount <= 0) {
    throw new TransactionError('INVALID_AMOUNT', `Invalid amount: expected positive number, got ${String(amount)}`);
  }
}

function invalid(reason: ValidationFailureReason, index: number, message: string): ValidationResult {
  log.warn(`Block #${index} failed validation (${reason}): ${message}`);
  return { valid: false, reason, index, message };
}

/**
 * Walks the chain from block 1, genesis being trusted, and reports the first
 * block that fails. Checks per block, in order: recomputed hash, link to the
 * previous block, proof of work against `difficulty`. Index continuity is
 * checked last, on top of those three, so a block with a bad index is
 * reported as INDEX_MISMATCH only when its hash, link and work are sound.
 */
export function validateChain(chain: readonly Block[], difficulty: number): ValidationResult {
  for (let i = 1; i < chain.length; i++) {
    const current = chain[i];
    const previous = chain[i - 1];

    const recomputed = hashBlock(current);
    if (recomputed !== current.hash) {
      return invalid('HASH_MISMATCH', i, `stored hash ${current.hash}, recomputed ${recomputed}`);
    }

    if (current.header.previousHash !== previous.hash) {
      return invalid('BROKEN_LINK', i, `previous hash ${current.header.previousHash}, expected ${previous.hash}`);
    }

    if (!meetsDifficulty(current.hash, difficulty)) {
      return invalid('PROOF_OF_WORK_NOT_MET', i, `hash ${current.hash} has fewer than ${difficulty} leading zeros`);
    }

    if (current.header.index !== previous.header.index + 1) {
      return invalid('INDEX_MISMATCH', i, `index ${current.header.index}, expected ${previous.header.index + 1}`);
    }
  }

  return { valid: true };
}
