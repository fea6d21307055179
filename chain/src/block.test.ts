import { describe, it, expect } from 'vitest';
import { createDraftBlock, encodeBlock, encodeNumber, hashBlock, meetsDifficulty, HASH_ENCODING } from './block.js';
import { createTransaction } from './transaction.js';
import { DraftBlock } from './types.js';

describe('Block hashing', () => {
  const createDraft = (): DraftBlock =>
    createDraftBlock(1, [createTransaction('alice', 'bob', 50, 1000)], 'abc', 2, 2000);

  it('should encode fields in a fixed order', () => {
    expect(encodeBlock(createDraft())).toBe(
      JSON.stringify([HASH_ENCODING, '1', '2000', [['alice', 'bob', '50', '1000']], 'abc', '0'])
    );
  });

  it('should produce the same hash for the same contents', () => {
    expect(hashBlock(createDraft())).toBe(hashBlock(createDraft()));
  });

  it('should produce a 64-char lowercase hex digest', () => {
    expect(hashBlock(createDraft())).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should change the hash when any hashed field changes', () => {
    const base = hashBlock(createDraft());

    const nonce = createDraft();
    nonce.header.nonce = 1;
    expect(hashBlock(nonce)).not.toBe(base);

    const amount = createDraft();
    amount.transactions[0] = { ...amount.transactions[0], amount: 51 };
    expect(hashBlock(amount)).not.toBe(base);

    const prev = createDraft();
    prev.header.previousHash = 'abd';
    expect(hashBlock(prev)).not.toBe(base);

    const ts = createDraft();
    ts.header.timestamp = 2001;
    expect(hashBlock(ts)).not.toBe(base);
  });

  it('should keep non-finite amounts and negative zero apart', () => {
    const withAmount = (amount: number) =>
      hashBlock(createDraftBlock(1, [createTransaction('alice', 'bob', amount, 1000)], 'abc', 2, 2000));

    const hashes = [Number.NaN, Number.POSITIVE_INFINITY, Number.NEGATIVE_INFINITY, 0, -0].map(withAmount);
    expect(new Set(hashes).size).toBe(5);
    expect(encodeNumber(-0)).toBe('-0');
    expect(encodeNumber(Number.NaN)).toBe('NaN');
    expect(encodeNumber(Number.NEGATIVE_INFINITY)).toBe('-Infinity');
  });

  it('should not hash the difficulty', () => {
    const other = createDraft();
    other.header.difficulty = 5;
    expect(hashBlock(other)).toBe(hashBlock(createDraft()));
  });

  it('should be sensitive to transaction order', () => {
    const a = createTransaction('a', 'b', 1, 1);
    const b = createTransaction('b', 'c', 2, 1);
    const ab = createDraftBlock(1, [a, b], '0', 0, 5);
    const ba = createDraftBlock(1, [b, a], '0', 0, 5);
    expect(hashBlock(ab)).not.toBe(hashBlock(ba));
  });

  it('should copy the transaction list into the draft', () => {
    const txs = [createTransaction('a', 'b', 1, 1)];
    const draft = createDraftBlock(1, txs, '0', 0, 5);
    txs.push(createTransaction('b', 'c', 2, 1));
    expect(draft.transactions).toHaveLength(1);
    expect(draft.header.nonce).toBe(0);
  });

  describe('meetsDifficulty', () => {
    it('should require the given number of leading zeros', () => {
      expect(meetsDifficulty('00ab', 2)).toBe(true);
      expect(meetsDifficulty('000b', 2)).toBe(true);
      expect(meetsDifficulty('0a0b', 2)).toBe(false);
    });

    it('should accept any hash at difficulty 0', () => {
      expect(meetsDifficulty('ffff', 0)).toBe(true);
    });
  });
});
