import pino from 'pino';
import type { Block } from '../../src/interfaces';
import { DEFAULT_LEDGER_CONFIG } from '../../src/config';
import type { LedgerConfig } from '../../src/config';

export const silentLogger = pino({ level: 'silent' });

export const FIXED_DATE = new Date('2026-01-01T00:00:00.000Z');

export function ledgerConfig(overrides: Partial<LedgerConfig> = {}): LedgerConfig {
  return { ...DEFAULT_LEDGER_CONFIG, ...overrides };
}

export function storedBlock(overrides: Partial<Block> = {}): Block {
  return {
    height: 1,
    previousHash: null,
    merkleRoot: null,
    transactions: [],
    numberOfTransactions: 0,
    difficultyBits: 0,
    difficulty: 1,
    blockReward: 50,
    timestamp: FIXED_DATE.toISOString(),
    nonce: 0,
    elapsedTime: 0,
    hashPower: 0,
    ...overrides,
  };
}
