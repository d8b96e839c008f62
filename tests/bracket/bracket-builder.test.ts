import { describe, it, expect } from 'vitest';
import {
  createTournament,
  getAllEntrantNames,
  getDraw,
  getSeedMap,
} from '../../src/bracket/bracket-builder';
import { BracketTopologyError } from '../../src/core/errors';
import { makeMatchups } from '../helpers/fixtures';

describe('createTournament', () => {
  it('sizes the scoring config from the draws', () => {
    const tournament = createTournament({
      draws: {
        mens: makeMatchups(['A', 'B', 'C', 'D']),
        womens: makeMatchups(['E', 'F', 'G', 'H']),
      },
    });
    expect(tournament.config.rounds.map(r => r.key)).toEqual(['sf', 'f']);
    expect([...tournament.draws.keys()]).toEqual(['mens', 'womens']);
  });

  it('trims entrant names and seeds', () => {
    const tournament = createTournament({
      draws: { mens: [{ players: [{ seed: ' 1 ', name: ' Ann ' }, { seed: '2', name: 'Bea\t' }] }] },
    });
    expect(getSeedMap(tournament)).toEqual({ mens: { Ann: '1', Bea: '2' } });
  });

  it('rejects draws of different sizes', () => {
    expect(() => createTournament({
      draws: { mens: makeMatchups(['A', 'B', 'C', 'D']), womens: makeMatchups(['E', 'F']) },
    })).toThrow('Draws have different sizes: 4, 2');
  });

  it('rejects a tournament with no draws', () => {
    expect(() => createTournament({ draws: {} })).toThrow(BracketTopologyError);
  });
});

describe('tournament lookups', () => {
  const tournament = createTournament({
    draws: { mens: makeMatchups(['A', 'B']), womens: makeMatchups(['C', 'D']) },
  });

  it('finds a draw by category', () => {
    expect(getDraw(tournament, 'womens').category).toBe('womens');
  });

  it('names the available categories for an unknown one', () => {
    expect(() => getDraw(tournament, 'mixed'))
      .toThrow('Unknown category: "mixed". Available categories: mens, womens');
  });

  it('collects entrants across every category', () => {
    expect([...getAllEntrantNames(tournament)].sort()).toEqual(['A', 'B', 'C', 'D']);
  });
});
