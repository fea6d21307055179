import { Block } from './types.js';

/**
 * Net amount received minus amount sent over the whole chain.
 * Sufficient funds are never enforced, so the result can be negative.
 */
export function getBalance(chain: readonly Block[], address: string): number {
  let balance = 0;
  for (const block of chain) {
    for (const tx of block.transactions) {
      if (tx.sender === address) balance -= tx.amount;
      if (tx.receiver === address) balance += tx.amount;
    }
  }
  return balance;
}

export function getBalances(chain: readonly Block[]): Map<string, number> {
  const balances = new Map<string, number>();
  for (const block of chain) {
    for (const tx of block.transactions) {
      balances.set(tx.sender, (balances.get(tx.sender) ?? 0) - tx.amount);
      balances.set(tx.receiver, (balances.get(tx.receiver) ?? 0) + tx.amount);
    }
  }
  return balances;
}
