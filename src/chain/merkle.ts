import { hashPair } from './hasher';

/**
 * Reduces transaction ids pairwise until one digest is left. An odd id at the
 * end of a level is paired with itself; a single id is returned as is.
 */
export function merkleRoot(ids: readonly string[]): string | null {
  if (ids.length === 0) return null;
  if (ids.length === 1) return ids[0];

  const level: string[] = [];
  for (let i = 0; i + 1 < ids.length; i += 2) {
    level.push(hashPair(ids[i], ids[i + 1]));
  }
  if (ids.length % 2 === 1) {
    const last = ids[ids.length - 1];
    level.push(hashPair(last, last));
  }

  return merkleRoot(level);
}
