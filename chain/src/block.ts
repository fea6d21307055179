import crypto from 'crypto';
import { Block, DraftBlock, Hash, Transaction } from './types.js';

export const HASH_ENCODING = 'ledger-sha256-v2';

// JSON.stringify writes NaN and ±Infinity as null and -0 as 0; strings keep them apart.
export function encodeNumber(n: number): string {
  return Object.is(n, -0) ? '-0' : String(n);
}

// Consensus-critical: field order is fixed. Changing it invalidates every mined block.
export function encodeTransaction(tx: Transaction): [string, string, string, string] {
  return [tx.sender, tx.receiver, encodeNumber(tx.amount), encodeNumber(tx.timestamp)];
}

export function encodeBlock(b: DraftBlock): string {
  const { index, timestamp, previousHash, nonce } = b.header;
  return JSON.stringify([
    HASH_ENCODING,
    encodeNumber(index),
    encodeNumber(timestamp),
    b.transactions.map(tx => encodeTransaction(tx)),
    previousHash,
    encodeNumber(nonce),
  ]);
}

/**
 * SHA-256 over the canonical encoding, as lowercase hex.
 * Difficulty is a search parameter and is not part of the payload.
 */
export function hashBlock(b: DraftBlock | Block): Hash {
  const h = crypto.createHash('sha256');
  h.update(encodeBlock(b));
  return h.digest('hex');
}

export function meetsDifficulty(hash: Hash, difficulty: number): boolean {
  return hash.startsWith('0'.repeat(difficulty));
}

export function createDraftBlock(
  index: number,
  transactions: Transaction[],
  previousHash: Hash,
  difficulty: number,
  timestamp: number = Date.now()
): DraftBlock {
  return {
    header: { index, timestamp, previousHash, nonce: 0, difficulty },
    transactions: transactions.slice(),
  };
}
