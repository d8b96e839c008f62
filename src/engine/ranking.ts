import { RankedEntry } from './types';

/**
 * Standard competition ranking (1, 2, 2, 4) by score, highest first.
 * Equal scores keep their input order.
 */
export function assignRanks<T extends RankedEntry>(entries: readonly T[]): Array<T & { rank: number }> {
  const sorted = [...entries].sort((a, b) => b.score - a.score);

  let rank = 0;
  let lastScore: number | null = null;
  return sorted.map((entry, i) => {
    if (entry.score !== lastScore) {
      rank = i + 1;
      lastScore = entry.score;
    }
    return { ...entry, rank };
  });
}
