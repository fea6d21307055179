export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface NodeConfig {
  nodeId: string;
  difficulty: number;
  miningReward: number;
  rpcPort: number;
  minerAddress: string;
  runDemo: boolean;
}

// A SHA-256 hex digest has 64 characters.
export const MAX_DIFFICULTY = 64;

export function assertDifficulty(difficulty: number) {
  if (!Number.isInteger(difficulty) || difficulty < 0 || difficulty > MAX_DIFFICULTY) {
    throw new ConfigError(`Invalid difficulty: expected integer in 0..${MAX_DIFFICULTY}, got ${difficulty}`);
  }
}

export function assertMiningReward(reward: number) {
  if (!Number.isFinite(reward)) {
    throw new ConfigError(`Invalid mining reward: expected finite number, got ${reward}`);
  }
}

function readInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n)) throw new ConfigError(`${key} must be an integer, got "${raw}"`);
  return n;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): NodeConfig {
  const difficulty = readInt(env, 'DIFFICULTY', 4);
  assertDifficulty(difficulty);

  const miningReward = Number(env.MINING_REWARD || 100);
  assertMiningReward(miningReward);

  const rpcPort = readInt(env, 'RPC_PORT', 8545);
  if (rpcPort < 0 || rpcPort > 65535) throw new ConfigError(`RPC_PORT out of range: ${rpcPort}`);

  return {
    nodeId: env.NODE_ID || 'node1',
    difficulty,
    miningReward,
    rpcPort,
    minerAddress: env.MINER_ADDRESS || 'miner1',
    runDemo: env.RUN_DEMO === 'true' || env.RUN_DEMO === '1',
  };
}
