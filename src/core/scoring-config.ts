import { PointsTable, RoundDefinition, RoundKey, ScoringConfig } from './types';
import { POINTS_PRESETS, PointsPreset, ROUND_NAMES, ROUND_SEQUENCE } from './constants';
import { ScoringConfigError } from './errors';

export interface ScoringConfigOptions {
  points?: PointsTable;
  /** Explicit round keys, first round first. Defaults to the tail of ROUND_SEQUENCE. */
  roundKeys?: RoundKey[];
}

export function isRoundKey(value: string): value is RoundKey {
  return ROUND_SEQUENCE.some(key => key === value);
}

export function roundCountForEntrants(entrantCount: number): number {
  if (!Number.isInteger(entrantCount) || entrantCount < 2 || (entrantCount & (entrantCount - 1)) !== 0) {
    throw new ScoringConfigError(`Entrant count must be a power of two >= 2, got ${entrantCount}`);
  }
  return Math.log2(entrantCount);
}

/**
 * Build the immutable scoring configuration for a draw of `entrantCount`.
 * Point values must rise strictly from one round to the next.
 */
export function createScoringConfig(
  entrantCount: number,
  options: ScoringConfigOptions = {},
): ScoringConfig {
  const roundCount = roundCountForEntrants(entrantCount);
  const points: PointsTable = options.points ?? POINTS_PRESETS.standard;

  let roundKeys: RoundKey[];
  if (options.roundKeys) {
    roundKeys = options.roundKeys;
    if (roundKeys.length !== roundCount) {
      throw new ScoringConfigError(
        `A draw of ${entrantCount} needs ${roundCount} rounds, got ${roundKeys.length} (${roundKeys.join(', ')})`,
      );
    }
    for (let i = 1; i < roundKeys.length; i++) {
      if (ROUND_SEQUENCE.indexOf(roundKeys[i]) <= ROUND_SEQUENCE.indexOf(roundKeys[i - 1])) {
        throw new ScoringConfigError(`Round "${roundKeys[i]}" cannot follow "${roundKeys[i - 1]}"`);
      }
    }
  } else {
    if (roundCount > ROUND_SEQUENCE.length) {
      throw new ScoringConfigError(`No round keys for a draw of ${entrantCount}`);
    }
    roundKeys = ROUND_SEQUENCE.slice(ROUND_SEQUENCE.length - roundCount);
  }

  const rounds: RoundDefinition[] = [];
  for (const key of roundKeys) {
    const value = points[key];
    if (value === undefined) {
      throw new ScoringConfigError(`Points table has no value for round "${key}"`);
    }
    if (!Number.isInteger(value) || value < 0) {
      throw new ScoringConfigError(`Points for round "${key}" must be a non-negative integer, got ${value}`);
    }
    const previous = rounds[rounds.length - 1];
    if (previous && value <= previous.points) {
      throw new ScoringConfigError(
        `Points must increase each round: ${previous.key}=${previous.points} then ${key}=${value}`,
      );
    }
    rounds.push({ key, name: ROUND_NAMES[key], points: value });
  }

  return Object.freeze({
    rounds: Object.freeze(rounds),
    points: Object.freeze({ ...points }),
  });
}

function isPointsPreset(value: string): value is PointsPreset {
  return Object.prototype.hasOwnProperty.call(POINTS_PRESETS, value);
}

export function getPresetPoints(preset: string): PointsTable {
  if (!isPointsPreset(preset)) {
    const available = Object.keys(POINTS_PRESETS).join(', ');
    throw new ScoringConfigError(`Unknown points preset: "${preset}". Available presets: ${available}`);
  }
  return POINTS_PRESETS[preset];
}

/**
 * Parse a "r32:2,r16:3,qf:5" override string into a points table.
 */
export function parsePointsOverride(text: string): PointsTable {
  const table: Partial<Record<RoundKey, number>> = {};
  for (const part of text.split(',').map(s => s.trim()).filter(Boolean)) {
    const [key, raw] = part.split(':').map(s => s.trim());
    if (!key || !isRoundKey(key)) {
      throw new ScoringConfigError(`Unknown round key in points override: "${part}"`);
    }
    const value = Number(raw);
    if (raw === undefined || raw === '' || !Number.isInteger(value)) {
      throw new ScoringConfigError(`Invalid point value in points override: "${part}"`);
    }
    table[key] = value;
  }
  return table;
}

/** Points for a round key; 0 for anything the table does not know. */
export function pointsForRound(points: PointsTable, roundKey: string): number {
  if (!isRoundKey(roundKey)) return 0;
  return points[roundKey] ?? 0;
}
