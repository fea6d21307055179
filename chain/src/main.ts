import 'dotenv/config';
import os from 'os';
import { loadConfig } from './config.js';
import { Ledger } from './ledger.js';
import { runDemo } from './demo.js';
import { startRpc } from './rpc.js';
import { log } from './logger.js';

(async () => {
  const config = loadConfig();

  log.info('Proof-of-work ledger');
  log.info('✌️  version 0.1.0');
  log.info(`🏷  Node name: ${config.nodeId}`);
  log.info(`⛏️  Difficulty: ${config.difficulty}, mining reward: ${config.miningReward}`);
  log.info('💾 Storage: in-memory');
  log.info(`💻 Operating system: ${os.type().toLowerCase()} ${os.arch()}`);

  if (config.runDemo) {
    // Separate ledger: the demo tampers with its chain.
    await runDemo(new Ledger(config), config.minerAddress);
  }

  const ledger = new Ledger(config);
  log.info(`🌱 Genesis ${ledger.chain[0].hash.slice(0, 10)}…`);
  startRpc(ledger, config.rpcPort);
})().catch(err => {
  log.error('Fatal error', err);
  process.exit(1);
});
