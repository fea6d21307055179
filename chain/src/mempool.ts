import { Transaction } from './types.js';

export class Mempool {
  private buf: Transaction[] = [];

  get size(): number { return this.buf.length; }

  add(tx: Transaction) { this.buf.push(tx); }

  list(): readonly Transaction[] { return this.buf.slice(); }

  takeAll(): Transaction[] {
    const out = this.buf;
    this.buf = [];
    return out;
  }

  // Puts transactions back ahead of anything submitted since they were taken.
  restore(txs: Transaction[]) {
    this.buf = txs.concat(this.buf);
  }
}
