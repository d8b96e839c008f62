import { ActualResults, MatchRef } from '../core/types';
import { getDraw } from '../bracket/bracket-builder';
import { parseMatchKey } from '../bracket/match-key';
import { Tournament } from '../bracket/types';
import { MatchOccupants } from './types';

/**
 * Who occupies the two slots of a match.
 *
 * First-round occupants come straight from the draw. For later rounds only the
 * recorded winners of the two feeder matches are read; a feeder without a
 * recorded result leaves its slot null even if the winner could be inferred.
 *
 * Throws BracketTopologyError for a category, round or index not in the draw.
 */
export function resolveMatch(
  tournament: Tournament,
  ref: MatchRef,
  results: ActualResults,
): MatchOccupants {
  const draw = getDraw(tournament, ref.category);
  draw.assertMatch(ref.roundIndex, ref.matchIndex);

  if (ref.roundIndex === 0) {
    const [a, b] = draw.firstRoundPair(ref.matchIndex);
    return [a.name, b.name];
  }

  const [first, second] = draw.feederIndices(ref.roundIndex, ref.matchIndex);
  const previousRound = ref.roundIndex - 1;
  return [
    results[draw.matchKey(previousRound, first)] ?? null,
    results[draw.matchKey(previousRound, second)] ?? null,
  ];
}

export function resolveMatchKey(
  tournament: Tournament,
  key: string,
  results: ActualResults,
): MatchOccupants {
  return resolveMatch(tournament, parseMatchKey(key, tournament.config.rounds), results);
}

/**
 * Parse a match key and check it against the tournament's draws.
 * Returns null instead of throwing for anything that is not a real match.
 */
export function findMatchRef(tournament: Tournament, key: string): MatchRef | null {
  let ref: MatchRef;
  try {
    ref = parseMatchKey(key, tournament.config.rounds);
  } catch {
    return null;
  }
  const draw = tournament.draws.get(ref.category);
  if (!draw || !draw.contains(ref)) return null;
  return ref;
}
