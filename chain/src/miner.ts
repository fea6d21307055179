import { hashBlock, meetsDifficulty } from './block.js';
import { Block, DraftBlock, Hash } from './types.js';

export const DEFAULT_BATCH_SIZE = 10_000;

export interface NonceSolution {
  nonce: number;
  hash: Hash;
}

export interface MineOptions {
  signal?: AbortSignal;
  /** Resume a search that was aborted, see {@link MiningAbortedError.nextNonce}. */
  startNonce?: number;
  batchSize?: number;
  /** Called after each exhausted batch with the number of nonces tried so far. */
  onProgress?: (attempts: number) => void;
}

export class MiningAbortedError extends Error {
  constructor(
    public readonly index: number,
    public readonly nextNonce: number
  ) {
    super(`Mining of block #${index} aborted at nonce ${nextNonce}`);
    this.name = 'MiningAbortedError';
  }
}

/**
 * Sequential search over `[startNonce, startNonce + limit)` for the smallest
 * nonce whose hash meets the draft's difficulty.
 */
export function searchNonce(draft: DraftBlock, startNonce = 0, limit = Infinity): NonceSolution | undefined {
  const end = startNonce + limit;
  for (let nonce = startNonce; nonce < end; nonce++) {
    const hash = hashBlock({ header: { ...draft.header, nonce }, transactions: draft.transactions });
    if (meetsDifficulty(hash, draft.header.difficulty)) {
      return { nonce, hash };
    }
  }
  return undefined;
}

function seal(draft: DraftBlock, solution: NonceSolution): Block {
  return {
    header: { ...draft.header, nonce: solution.nonce },
    transactions: draft.transactions.slice(),
    hash: solution.hash,
  };
}

export function mineBlockSync(draft: DraftBlock): Block {
  const solution = searchNonce(draft);
  if (!solution) throw new Error(`No nonce found for block #${draft.header.index}`);
  return seal(draft, solution);
}

export async function mineBlock(draft: DraftBlock, options: MineOptions = {}): Promise<Block> {
  const { signal, onProgress } = options;
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  const startNonce = options.startNonce ?? 0;
  if (!Number.isSafeInteger(batchSize) || batchSize <= 0) {
    throw new RangeError(`Invalid batchSize: expected positive integer, got ${batchSize}`);
  }
  if (!Number.isSafeInteger(startNonce) || startNonce < 0) {
    throw new RangeError(`Invalid startNonce: expected non-negative integer, got ${startNonce}`);
  }
  let next = startNonce;

  while (true) {
    if (signal?.aborted) throw new MiningAbortedError(draft.header.index, next);

    const solution = searchNonce(draft, next, batchSize);
    if (solution) return seal(draft, solution);

    next += batchSize;
    onProgress?.(next - startNonce);
    await new Promise<void>(r => setImmediate(r));
  }
}
