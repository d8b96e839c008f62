import { ActualResults } from '../core/types';
import { getAllEntrantNames } from '../bracket/bracket-builder';
import { Tournament } from '../bracket/types';
import { findMatchRef, resolveMatch } from './match-resolver';

export interface EliminationDecision {
  matchKey: string;
  winner: string;
  occupants: [string | null, string | null];
  loser: string | null;
}

/**
 * Resolve every recorded match and name its loser.
 *
 * A match whose occupants are not both known, or whose recorded winner is
 * neither occupant, yields `loser: null`. Keys that are not matches of the
 * draw are left out.
 */
export function explainEliminations(
  tournament: Tournament,
  results: ActualResults,
): EliminationDecision[] {
  const decisions: EliminationDecision[] = [];

  for (const [matchKey, winner] of Object.entries(results)) {
    const ref = findMatchRef(tournament, matchKey);
    if (!ref) continue;

    const occupants = resolveMatch(tournament, ref, results);
    const [p1, p2] = occupants;
    let loser: string | null = null;
    if (p1 !== null && p2 !== null && p1 !== p2) {
      if (winner === p1) loser = p2;
      else if (winner === p2) loser = p1;
    }

    decisions.push({ matchKey, winner, occupants, loser });
  }

  return decisions;
}

/**
 * Everyone who has lost a resolved match. Recomputed from the full results
 * map on every call.
 */
export function getEliminatedPlayers(tournament: Tournament, results: ActualResults): Set<string> {
  const eliminated = new Set<string>();
  for (const decision of explainEliminations(tournament, results)) {
    if (decision.loser !== null) eliminated.add(decision.loser);
  }
  return eliminated;
}

export function getActivePlayers(tournament: Tournament, eliminated: ReadonlySet<string>): Set<string> {
  const active = getAllEntrantNames(tournament);
  for (const name of eliminated) {
    active.delete(name);
  }
  return active;
}
