import type { ScheduleConfig } from './chain/schedule';

export interface LedgerConfig extends ScheduleConfig {
  maxNonce: number;
  minerAddress: string;
}

export interface AppConfig {
  port: number;
  host: string;
  databaseUrl: string | undefined;
  logLevel: string;
  ledger: LedgerConfig;
}

export const DEFAULT_LEDGER_CONFIG: LedgerConfig = {
  initialReward: 50,
  rewardHalvingInterval: 1000,
  difficultyBitsInterval: 100,
  difficultyRecomputeInterval: 100,
  maxNonce: 2 ** 32,
  minerAddress: '00000000000000000000x1',
};

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number, integer = true): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
    throw new Error(`${name} must be a positive ${integer ? 'integer' : 'number'}, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: readNumber(env, 'PORT', 3000),
    host: env.HOST || '0.0.0.0',
    databaseUrl: env.DATABASE_URL,
    logLevel: env.LOG_LEVEL || 'info',
    ledger: {
      initialReward: readNumber(env, 'INITIAL_REWARD', DEFAULT_LEDGER_CONFIG.initialReward, false),
      rewardHalvingInterval: readNumber(env, 'REWARD_HALVING_INTERVAL', DEFAULT_LEDGER_CONFIG.rewardHalvingInterval),
      difficultyBitsInterval: readNumber(env, 'DIFFICULTY_BITS_INTERVAL', DEFAULT_LEDGER_CONFIG.difficultyBitsInterval),
      difficultyRecomputeInterval: readNumber(
        env,
        'DIFFICULTY_RECOMPUTE_INTERVAL',
        DEFAULT_LEDGER_CONFIG.difficultyRecomputeInterval,
      ),
      maxNonce: readNumber(env, 'MAX_NONCE', DEFAULT_LEDGER_CONFIG.maxNonce),
      minerAddress: env.MINER_ADDRESS || DEFAULT_LEDGER_CONFIG.minerAddress,
    },
  };
}
