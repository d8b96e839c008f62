import { describe, it, expect } from 'vitest';
import {
  collectPlayerNames,
  parseEntrants,
  parsePlayer,
  serializeTournamentData,
} from '../../src/data/entrants-parser';
import { parseTournamentData } from '../../src/data/loader';
import { DataFileError } from '../../src/core/errors';

const ENTRANTS = `
Spring Open draw sheet
Stray vs Line

mens
Top Half (Day 1)
(1) Ann Lee vs Bea Cole
(4) Cat Dunn vs (5) Dee Fox
Bottom Half (Day 2)
(3) Eve Gray vs Fay Hill
(2) Gus Ive VS. Hal Jay

womens
(1) Ida Kay vs Jo Lin
`;

const WOMENS_TOP_ONLY = `
womens
Top Half (Day 3)
(1) Ida Kay vs Jo Lin
(2) Kim Moe vs Liv Ng
Bottom Half (Day 4)
`;

describe('parsePlayer', () => {
  it('splits an optional seed from the name', () => {
    expect(parsePlayer(' (3) Jane Doe ')).toEqual({ seed: '3', name: 'Jane Doe' });
    expect(parsePlayer('Jane Doe')).toEqual({ seed: '', name: 'Jane Doe' });
    expect(parsePlayer('(WC) Jane Doe')).toEqual({ seed: 'WC', name: 'Jane Doe' });
  });
});

describe('parseEntrants', () => {
  it('groups matchups by category and half', () => {
    const data = parseEntrants(ENTRANTS, { categories: ['mens', 'womens'] });
    expect(Object.keys(data.draws)).toEqual(['mens', 'womens']);
    expect(data.draws.mens.map(m => [m.players[0].name, m.players[1].name, m.day])).toEqual([
      ['Ann Lee', 'Bea Cole', 1],
      ['Cat Dunn', 'Dee Fox', 1],
      ['Eve Gray', 'Fay Hill', 2],
      ['Gus Ive', 'Hal Jay', 2],
    ]);
    expect(data.draws.mens[1].players[1]).toEqual({ seed: '5', name: 'Dee Fox' });
    expect(data.draws.womens).toEqual([
      { players: [{ seed: '1', name: 'Ida Kay' }, { seed: '', name: 'Jo Lin' }] },
    ]);
  });

  it('fills an empty half with placeholder matches', () => {
    const data = parseEntrants(WOMENS_TOP_ONLY, { categories: ['womens'], halfSize: 2 });
    expect(data.draws.womens).toHaveLength(4);
    expect(data.draws.womens[2]).toEqual({
      players: [{ seed: '', name: 'TBD' }, { seed: '', name: 'TBD' }],
      day: 4,
    });
  });

  it('fills a category missing from the file entirely', () => {
    const data = parseEntrants(WOMENS_TOP_ONLY, { categories: ['womens', 'mixed'], halfSize: 2 });
    expect(data.draws.mixed).toHaveLength(4);
    expect(collectPlayerNames({ draws: { mixed: data.draws.mixed } }).size).toBe(0);
  });

  it('rejects a half with the wrong number of matchups', () => {
    expect(() => parseEntrants(ENTRANTS, { categories: ['mens'], halfSize: 3, source: 'entrants.txt' }))
      .toThrow('entrants.txt: mens top half has 2 matchups; each half must have exactly 3');
    expect(() => parseEntrants(ENTRANTS, { categories: ['womens'], halfSize: 2 })).toThrow(DataFileError);
  });

  it('rejects a half size that is not a positive integer', () => {
    expect(() => parseEntrants(ENTRANTS, { categories: ['mens'], halfSize: Number('four') }))
      .toThrow('Half size must be a positive integer, got NaN');
    expect(() => parseEntrants(ENTRANTS, { categories: ['mens'], halfSize: 0 }))
      .toThrow('Half size must be a positive integer, got 0');
  });
});

describe('serializeTournamentData', () => {
  it('writes the on-disk draw shape', () => {
    const data = parseEntrants(WOMENS_TOP_ONLY, { categories: ['womens'], halfSize: 2 });
    const out = serializeTournamentData(data);
    expect(Object.keys(out)).toEqual(['womens_draw']);
    expect(out.womens_draw[0]).toEqual({ players: [['1', 'Ida Kay'], ['', 'Jo Lin']], day: 3 });
  });

  it('is read back by the tournament loader', () => {
    const data = parseEntrants(ENTRANTS, { categories: ['mens', 'womens'] });
    expect(parseTournamentData(serializeTournamentData(data))).toEqual(data);
  });
});

describe('collectPlayerNames', () => {
  it('lists real players across categories', () => {
    const data = parseEntrants(ENTRANTS, { categories: ['mens', 'womens'] });
    expect([...collectPlayerNames(data)].sort()).toEqual([
      'Ann Lee', 'Bea Cole', 'Cat Dunn', 'Dee Fox', 'Eve Gray', 'Fay Hill', 'Gus Ive', 'Hal Jay', 'Ida Kay', 'Jo Lin',
    ]);
  });
});
