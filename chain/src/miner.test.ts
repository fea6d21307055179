import { describe, it, expect, vi } from 'vitest';
import { createDraftBlock, hashBlock, meetsDifficulty } from './block.js';
import { mineBlock, mineBlockSync, searchNonce, MiningAbortedError } from './miner.js';
import { createTransaction } from './transaction.js';

const draft = (difficulty: number) =>
  createDraftBlock(3, [createTransaction('alice', 'bob', 10, 1000)], 'f'.repeat(64), difficulty, 2000);

describe('Miner', () => {
  it('should find the smallest nonce that meets the difficulty', () => {
    const d = draft(2);
    const solution = searchNonce(d);
    expect(solution).toBeDefined();
    if (!solution) return;

    expect(meetsDifficulty(solution.hash, 2)).toBe(true);
    for (let n = 0; n < solution.nonce; n++) {
      const h = hashBlock({ header: { ...d.header, nonce: n }, transactions: d.transactions });
      expect(meetsDifficulty(h, 2)).toBe(false);
    }
  });

  it('should return undefined when the range holds no solution', () => {
    const d = draft(2);
    const solution = searchNonce(d);
    if (!solution) throw new Error('expected a solution');
    expect(searchNonce(d, solution.nonce + 1, 0)).toBeUndefined();
    if (solution.nonce > 0) {
      expect(searchNonce(d, 0, solution.nonce)).toBeUndefined();
    }
  });

  it('should accept nonce 0 at difficulty 0', () => {
    expect(searchNonce(draft(0))?.nonce).toBe(0);
  });

  it('should mine a block whose hash matches its contents', async () => {
    const d = draft(2);
    const block = await mineBlock(d, { batchSize: 16 });

    expect(block.hash).toBe(hashBlock(block));
    expect(block.hash.startsWith('00')).toBe(true);
    expect(block.header.nonce).toBe(searchNonce(d)?.nonce);
    expect(d.header.nonce).toBe(0);
  });

  it('should agree between sync and async mining', async () => {
    const d = draft(2);
    expect(mineBlockSync(d)).toEqual(await mineBlock(d, { batchSize: 7 }));
  });

  it('should report progress per exhausted batch', async () => {
    const d = draft(2);
    const expected = searchNonce(d)?.nonce ?? 0;
    const onProgress = vi.fn();

    await mineBlock(d, { batchSize: 1, onProgress });

    expect(onProgress).toHaveBeenCalledTimes(expected);
    if (expected > 0) expect(onProgress).toHaveBeenLastCalledWith(expected);
  });

  it('should reject batch sizes that would never advance the search', async () => {
    for (const batchSize of [0, -1, 1.5, Number.NaN]) {
      await expect(mineBlock(draft(3), { batchSize })).rejects.toThrow(RangeError);
    }
  });

  it('should reject an invalid start nonce', async () => {
    for (const startNonce of [-1, 0.5, Number.NaN]) {
      await expect(mineBlock(draft(1), { startNonce })).rejects.toThrow(RangeError);
    }
  });

  it('should reject when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(mineBlock(draft(1), { signal: controller.signal })).rejects.toBeInstanceOf(MiningAbortedError);
  });

  it('should stop between batches and resume from where it stopped', async () => {
    const d = draft(3);
    const expected = mineBlockSync(d);
    const controller = new AbortController();

    const aborted = await mineBlock(d, {
      batchSize: 1,
      signal: controller.signal,
      onProgress: () => controller.abort(),
    }).catch((err: unknown) => err);

    if (expected.header.nonce === 0) {
      expect(aborted).toEqual(expected);
      return;
    }
    expect(aborted).toBeInstanceOf(MiningAbortedError);
    if (!(aborted instanceof MiningAbortedError)) return;
    expect(aborted.index).toBe(3);
    expect(aborted.nextNonce).toBe(1);

    const resumed = await mineBlock(d, { startNonce: aborted.nextNonce });
    expect(resumed).toEqual(expected);
  });
});
