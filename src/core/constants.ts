import { RoundKey, PointsTable } from './types';

export const DEFAULT_CATEGORIES = ['mens', 'womens'];

// Every round a draw can have, earliest first. A draw of N entrants plays the
// last log2(N) of these.
export const ROUND_SEQUENCE: RoundKey[] = ['r128', 'r64', 'r32', 'r16', 'qf', 'sf', 'f'];

export const ROUND_NAMES: Record<RoundKey, string> = {
  r128: 'Round of 128',
  r64: 'Round of 64',
  r32: 'Round of 32',
  r16: 'Round of 16',
  qf: 'Quarterfinals',
  sf: 'Semifinals',
  f: 'Final',
};

// Draws larger than 32 need an override covering r64 / r128.
export const POINTS_PRESETS = {
  standard: { r32: 2, r16: 3, qf: 5, sf: 8, f: 13 },
  doubling: { r32: 1, r16: 2, qf: 4, sf: 8, f: 16 },
} satisfies Record<string, PointsTable>;

export type PointsPreset = keyof typeof POINTS_PRESETS;

export const PLACEHOLDER_NAME = 'TBD';

// Marker the entry form writes for a match left blank
export const NO_PICK = 'NONE';
