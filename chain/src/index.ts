export * from './types.js';
export { SYSTEM_ADDRESS, createTransaction, createRewardTransaction, copyTransaction } from './transaction.js';
export { HASH_ENCODING, encodeNumber, encodeBlock, hashBlock, meetsDifficulty, createDraftBlock } from './block.js';
export { searchNonce, mineBlock, mineBlockSync, MiningAbortedError } from './miner.js';
export type { MineOptions, NonceSolution } from './miner.js';
export { GENESIS_PREVIOUS_HASH, GENESIS_TIMESTAMP, createGenesisBlock } from './genesis.js';
export { getBalance, getBalances } from './balance.js';
export { validateChain, validateTransactionInput, TransactionError } from './validation.js';
export { Ledger } from './ledger.js';
export type { LedgerOptions, MinePendingOptions } from './ledger.js';
export { ConfigError, loadConfig } from './config.js';
export type { NodeConfig } from './config.js';
export { createRpcApp, dispatchRpc, startRpc, MethodNotFoundError } from './rpc.js';
