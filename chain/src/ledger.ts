import { Block, Transaction, ValidationResult } from './types.js';
import { createDraftBlock } from './block.js';
import { createGenesisBlock } from './genesis.js';
import { Mempool } from './mempool.js';
import { mineBlock, MineOptions } from './miner.js';
import { copyTransaction, createRewardTransaction, createTransaction } from './transaction.js';
import { getBalance, getBalances } from './balance.js';
import { validateChain } from './validation.js';
import { assertDifficulty, assertMiningReward } from './config.js';
import { log } from './logger.js';

export interface LedgerOptions {
  difficulty: number;
  miningReward: number;
  /** Clock for transaction and block timestamps, ms since epoch. */
  now?: () => number;
}

export type MinePendingOptions = Pick<MineOptions, 'signal' | 'onProgress' | 'batchSize'>;

export class Ledger {
  readonly difficulty: number;
  readonly miningReward: number;
  private readonly blocks: Block[];
  private readonly mempool = new Mempool();
  private readonly now: () => number;
  // Tail of the mining queue; each call waits for the previous one.
  private mining: Promise<unknown> = Promise.resolve();

  constructor(options: LedgerOptions) {
    assertDifficulty(options.difficulty);
    assertMiningReward(options.miningReward);
    this.difficulty = options.difficulty;
    this.miningReward = options.miningReward;
    this.now = options.now ?? Date.now;
    this.blocks = [createGenesisBlock(this.difficulty)];
  }

  get chain(): readonly Block[] {
    return this.blocks;
  }

  get pending(): readonly Transaction[] {
    return this.mempool.list();
  }

  get latestBlock(): Block {
    return this.blocks[this.blocks.length - 1];
  }

  get height(): number {
    return this.latestBlock.header.index;
  }

  addTransaction(tx: Transaction) {
    this.mempool.add(copyTransaction(tx));
  }

  submitTransaction(sender: string, receiver: string, amount: number): Transaction {
    const tx = createTransaction(sender, receiver, amount, this.now());
    this.mempool.add(tx);
    return tx;
  }

  /**
   * Mines every pending transaction plus the reward for `minerAddress` into one
   * block and appends it. Calls are serialised; the pool is taken when a call's
   * turn comes, so transactions submitted during a search go into the next block.
   */
  minePendingTransactions(minerAddress: string, options: MinePendingOptions = {}): Promise<Block> {
    const run = this.mining.then(() => this.mineNext(minerAddress, options));
    this.mining = run.catch(() => undefined);
    return run;
  }

  private async mineNext(minerAddress: string, options: MinePendingOptions): Promise<Block> {
    const taken = this.mempool.takeAll();
    const timestamp = this.now();
    const txs = [...taken, createRewardTransaction(minerAddress, this.miningReward, timestamp)];
    const draft = createDraftBlock(this.blocks.length, txs, this.latestBlock.hash, this.difficulty, timestamp);

    let block: Block;
    try {
      block = await mineBlock(draft, options);
    } catch (err) {
      this.mempool.restore(taken);
      throw err;
    }

    this.blocks.push(block);
    log.info(`🔨 Imported #${block.header.index} (${block.hash.slice(0, 10)}…) with ${block.transactions.length} txs, nonce ${block.header.nonce}`);
    return block;
  }

  getBalance(address: string): number {
    return getBalance(this.blocks, address);
  }

  getBalances(): Map<string, number> {
    return getBalances(this.blocks);
  }

  isValid(): ValidationResult {
    return validateChain(this.blocks, this.difficulty);
  }
}
