import { describe, it, expect } from 'vitest';
import {
  createScoringConfig,
  getPresetPoints,
  isRoundKey,
  parsePointsOverride,
  pointsForRound,
  roundCountForEntrants,
} from '../../src/core/scoring-config';
import { POINTS_PRESETS } from '../../src/core/constants';
import { ScoringConfigError } from '../../src/core/errors';

describe('createScoringConfig', () => {
  it('plays the last log2(N) rounds with the standard points', () => {
    const config = createScoringConfig(8);
    expect(config.rounds).toEqual([
      { key: 'qf', name: 'Quarterfinals', points: 5 },
      { key: 'sf', name: 'Semifinals', points: 8 },
      { key: 'f', name: 'Final', points: 13 },
    ]);
  });

  it('covers a 32-entrant draw with the standard preset', () => {
    const config = createScoringConfig(32);
    expect(config.rounds.map(r => r.key)).toEqual(['r32', 'r16', 'qf', 'sf', 'f']);
  });

  it('rejects a draw whose first round the table does not price', () => {
    expect(() => createScoringConfig(64)).toThrow('Points table has no value for round "r64"');
  });

  it('accepts explicit round keys', () => {
    const config = createScoringConfig(4, { points: { r16: 3, f: 13 }, roundKeys: ['r16', 'f'] });
    expect(config.rounds.map(r => [r.key, r.points])).toEqual([['r16', 3], ['f', 13]]);
  });

  it('rejects round keys that do not match the draw size', () => {
    expect(() => createScoringConfig(8, { roundKeys: ['sf', 'f'] })).toThrow(ScoringConfigError);
  });

  it('rejects round keys out of tournament order', () => {
    expect(() => createScoringConfig(4, { points: { r16: 3, f: 13 }, roundKeys: ['f', 'r16'] }))
      .toThrow('Round "r16" cannot follow "f"');
  });

  it('rejects points that do not strictly increase', () => {
    expect(() => createScoringConfig(8, { points: { qf: 5, sf: 5, f: 13 } }))
      .toThrow('Points must increase each round: qf=5 then sf=5');
  });

  it('rejects negative and fractional points', () => {
    expect(() => createScoringConfig(2, { points: { f: -1 } })).toThrow(ScoringConfigError);
    expect(() => createScoringConfig(2, { points: { f: 1.5 } })).toThrow(ScoringConfigError);
  });

  it('returns a frozen config', () => {
    const config = createScoringConfig(8);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.rounds)).toBe(true);
    expect(Object.isFrozen(config.points)).toBe(true);
  });
});

describe('roundCountForEntrants', () => {
  it('is log2 of a power of two', () => {
    expect(roundCountForEntrants(2)).toBe(1);
    expect(roundCountForEntrants(128)).toBe(7);
  });

  it('rejects other sizes', () => {
    expect(() => roundCountForEntrants(6)).toThrow(ScoringConfigError);
    expect(() => roundCountForEntrants(1)).toThrow(ScoringConfigError);
    expect(() => roundCountForEntrants(0)).toThrow(ScoringConfigError);
  });
});

describe('points tables', () => {
  it('looks up presets by name', () => {
    expect(getPresetPoints('doubling')).toEqual(POINTS_PRESETS.doubling);
    expect(() => getPresetPoints('bogus')).toThrow('Unknown points preset: "bogus"');
  });

  it('parses an override string', () => {
    expect(parsePointsOverride('r16:1, qf:2,sf:4 ,f:8')).toEqual({ r16: 1, qf: 2, sf: 4, f: 8 });
  });

  it('rejects unknown rounds and bad values in an override', () => {
    expect(() => parsePointsOverride('r2:1')).toThrow(ScoringConfigError);
    expect(() => parsePointsOverride('qf:abc')).toThrow(ScoringConfigError);
    expect(() => parsePointsOverride('qf')).toThrow(ScoringConfigError);
  });

  it('scores unknown rounds as 0', () => {
    expect(pointsForRound(POINTS_PRESETS.standard, 'qf')).toBe(5);
    expect(pointsForRound(POINTS_PRESETS.standard, 'r64')).toBe(0);
    expect(pointsForRound(POINTS_PRESETS.standard, 'zz')).toBe(0);
  });

  it('recognizes round keys', () => {
    expect(isRoundKey('r128')).toBe(true);
    expect(isRoundKey('QF')).toBe(false);
  });
});
