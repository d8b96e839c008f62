import { describe, it, expect } from 'vitest';
import { assignRanks } from '../../src/engine/ranking';

describe('assignRanks', () => {
  it('gives tied scores the same rank and skips the following ones', () => {
    const ranked = assignRanks([
      { name: 'a', score: 50 },
      { name: 'b', score: 50 },
      { name: 'c', score: 30 },
      { name: 'd', score: 10 },
    ]);
    expect(ranked.map(r => r.rank)).toEqual([1, 1, 3, 4]);
  });

  it('ranks everyone first when all scores are equal', () => {
    expect(assignRanks([{ score: 10 }, { score: 10 }, { score: 10 }]).map(r => r.rank)).toEqual([1, 1, 1]);
  });

  it('sorts by score and keeps input order among ties', () => {
    const ranked = assignRanks([
      { name: 'low', score: 10 },
      { name: 'first', score: 30 },
      { name: 'second', score: 30 },
    ]);
    expect(ranked).toEqual([
      { name: 'first', score: 30, rank: 1 },
      { name: 'second', score: 30, rank: 1 },
      { name: 'low', score: 10, rank: 3 },
    ]);
  });

  it('returns an empty list for no entries', () => {
    expect(assignRanks([])).toEqual([]);
  });
});
