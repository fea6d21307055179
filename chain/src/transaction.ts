import { Transaction } from './types.js';

// Sender of mining rewards. It never holds a real balance.
export const SYSTEM_ADDRESS = 'SYSTEM';

export function createTransaction(
  sender: string,
  receiver: string,
  amount: number,
  timestamp: number = Date.now()
): Transaction {
  return Object.freeze({ sender, receiver, amount, timestamp });
}

// Frozen copy, so the caller's object never ends up inside a block.
export function copyTransaction(tx: Transaction): Transaction {
  return createTransaction(tx.sender, tx.receiver, tx.amount, tx.timestamp);
}

export function createRewardTransaction(miner: string, amount: number, timestamp: number): Transaction {
  return createTransaction(SYSTEM_ADDRESS, miner, amount, timestamp);
}
