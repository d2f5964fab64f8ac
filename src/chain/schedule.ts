import type { Block } from '../interfaces';

export interface ScheduleConfig {
  initialReward: number;
  rewardHalvingInterval: number;
  difficultyBitsInterval: number;
  difficultyRecomputeInterval: number;
}

export type PreviousBlock = Pick<Block, 'height' | 'blockReward' | 'difficultyBits' | 'difficulty'> | null;

// Halves every `rewardHalvingInterval` blocks; once below 1 it drops to 0 for good.
export function nextBlockReward(previous: PreviousBlock, config: ScheduleConfig): number {
  if (previous === null) return config.initialReward;

  const { blockReward, height } = previous;
  if (blockReward > 1 && height % config.rewardHalvingInterval === 0) {
    return blockReward / 2;
  }
  if (blockReward < 1) {
    return 0;
  }
  return blockReward;
}

export function nextDifficultyBits(previous: PreviousBlock, config: ScheduleConfig): number {
  if (previous === null) return 0;

  if (previous.height % config.difficultyBitsInterval === 0) {
    return previous.difficultyBits + 1;
  }
  return previous.difficultyBits;
}

/**
 * Recomputed from the previous block's stored bits on its own interval, not
 * from `nextDifficultyBits`. The two only agree while both intervals match.
 */
export function nextDifficulty(previous: PreviousBlock, config: ScheduleConfig): number {
  if (previous === null) return 1;

  if (previous.height % config.difficultyRecomputeInterval === 0) {
    const bits = previous.difficultyBits + 1;
    return 2 ** bits;
  }
  return previous.difficulty;
}
