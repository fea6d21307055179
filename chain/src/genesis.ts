import { createDraftBlock } from './block.js';
import { mineBlockSync } from './miner.js';
import { Block } from './types.js';

export const GENESIS_PREVIOUS_HASH = '0';
export const GENESIS_TIMESTAMP = 1735689600000; // 2025-01-01 00:00:00 UTC

// Fixed timestamp, so the genesis hash depends on the difficulty alone.
export function createGenesisBlock(difficulty: number): Block {
  return mineBlockSync(createDraftBlock(0, [], GENESIS_PREVIOUS_HASH, difficulty, GENESIS_TIMESTAMP));
}
