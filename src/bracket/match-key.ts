import { MatchRef, RoundDefinition } from '../core/types';
import { BracketTopologyError, MatchKeyError } from '../core/errors';
import { ParsedMatchKey } from './types';

/**
 * Match key convention:
 *   {category}-{roundKey}-match-{index}     e.g. "mens-qf-match-3"
 *
 * The category may itself contain dashes; the round key never does. Indices
 * are written without leading zeros, so every match has exactly one key.
 */
const MATCH_KEY_PATTERN = /^(.+)-([a-z0-9]+)-match-(0|[1-9]\d*)$/;

export function formatMatchKey(ref: MatchRef, rounds: readonly RoundDefinition[]): string {
  const round = rounds[ref.roundIndex];
  if (!round) {
    throw new BracketTopologyError(`Round index ${ref.roundIndex} is out of range (0-${rounds.length - 1})`);
  }
  if (!Number.isInteger(ref.matchIndex) || ref.matchIndex < 0) {
    throw new BracketTopologyError(`Match index must be a non-negative integer, got ${ref.matchIndex}`);
  }
  return `${ref.category}-${round.key}-match-${ref.matchIndex}`;
}

export function splitMatchKey(key: string): ParsedMatchKey | null {
  const match = MATCH_KEY_PATTERN.exec(key.trim());
  if (!match) return null;
  return {
    category: match[1],
    roundKey: match[2],
    matchIndex: parseInt(match[3], 10),
  };
}

export function parseMatchKey(key: string, rounds: readonly RoundDefinition[]): MatchRef {
  const parsed = splitMatchKey(key);
  if (!parsed) {
    throw new MatchKeyError(key, 'expected {category}-{round}-match-{index}');
  }
  const roundIndex = rounds.findIndex(r => r.key === parsed.roundKey);
  if (roundIndex === -1) {
    throw new MatchKeyError(key, `round "${parsed.roundKey}" is not played in this draw`);
  }
  return { category: parsed.category, roundIndex, matchIndex: parsed.matchIndex };
}

/** Round portion of a match key, or null when the key is not in match-key form. */
export function roundKeyOf(key: string): string | null {
  return splitMatchKey(key)?.roundKey ?? null;
}
