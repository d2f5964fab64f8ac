import type { BlockCandidate } from '../interfaces';
import { canonicalStringify, sha256Hex } from './hasher';

export const DEFAULT_MAX_NONCE = 2 ** 32;

export type NonceSearchResult = { found: true; nonce: number; hash: string } | { found: false };

export function targetFor(difficultyBits: number): bigint {
  return 2n ** BigInt(256 - difficultyBits);
}

export function meetsTarget(hash: string, difficultyBits: number): boolean {
  return BigInt(`0x${hash}`) < targetFor(difficultyBits);
}

export function proofHash(candidate: BlockCandidate, nonce: number): string {
  return sha256Hex(canonicalStringify(candidate) + String(nonce));
}

export function isValidProof(candidate: BlockCandidate, nonce: number, difficultyBits: number): boolean {
  return meetsTarget(proofHash(candidate, nonce), difficultyBits);
}

/**
 * Tries nonces 0, 1, 2, ... up to `maxNonce - 1` and returns the first one whose
 * hash falls below the target. Runs synchronously to completion.
 */
export function findNonce(
  candidate: BlockCandidate,
  difficultyBits: number,
  maxNonce: number = DEFAULT_MAX_NONCE,
): NonceSearchResult {
  const target = targetFor(difficultyBits);
  const prefix = canonicalStringify(candidate);

  for (let nonce = 0; nonce < maxNonce; nonce++) {
    const hash = sha256Hex(prefix + String(nonce));
    if (BigInt(`0x${hash}`) < target) {
      return { found: true, nonce, hash };
    }
  }

  return { found: false };
}
