import { Ledger } from './ledger.js';
import { Block, ValidationResult } from './types.js';
import { log } from './logger.js';

export interface DemoReport {
  balances: Record<string, number>;
  before: ValidationResult;
  after: ValidationResult;
}

const ACCOUNTS = ['Alice', 'Bob', 'Charlie'];

function logBlock(block: Block) {
  const { index, timestamp, previousHash, nonce, difficulty } = block.header;
  log.info(`📦 Block #${index} ts=${timestamp} nonce=${nonce} difficulty=${difficulty}`);
  log.info(`   prev ${previousHash}`);
  log.info(`   hash ${block.hash}`);
  block.transactions.forEach((tx, i) => {
    log.info(`   ${i + 1}. ${tx.sender} → ${tx.receiver} ${tx.amount} coins`);
  });
}

function summarize(result: ValidationResult): string {
  return result.valid ? 'valid' : `invalid at #${result.index} (${result.reason})`;
}

/**
 * Two rounds of transfers and mining, a balance report, then tampers with
 * block #1 of `ledger` to show that validation catches it.
 */
export async function runDemo(ledger: Ledger, minerAddress: string): Promise<DemoReport> {
  log.info('📝 Adding transactions...');
  ledger.submitTransaction('Alice', 'Bob', 50);
  ledger.submitTransaction('Bob', 'Charlie', 25);

  log.info('⛏️  Mining block #1...');
  await ledger.minePendingTransactions(minerAddress, {
    onProgress: attempts => log.info(`   tried ${attempts} nonces`),
  });

  log.info('📝 Adding more transactions...');
  ledger.submitTransaction('Charlie', 'Alice', 10);
  ledger.submitTransaction('Alice', minerAddress, 5);

  log.info('⛏️  Mining block #2...');
  await ledger.minePendingTransactions(minerAddress, {
    onProgress: attempts => log.info(`   tried ${attempts} nonces`),
  });

  ledger.chain.forEach(logBlock);

  const balances: Record<string, number> = {};
  log.info('💰 Account balances:');
  for (const address of [...ACCOUNTS, minerAddress]) {
    balances[address] = ledger.getBalance(address);
    log.info(`   ${address}: ${balances[address]} coins`);
  }

  const before = ledger.isValid();
  log.info(`🔍 Chain is ${summarize(before)}`);

  log.info('🔓 Tampering with block #1...');
  const target = ledger.chain[1].transactions;
  target[0] = { ...target[0], amount: 1000 };

  const after = ledger.isValid();
  log.info(`🔍 Chain is ${summarize(after)}`);

  return { balances, before, after };
}
