import { ActualResults, Picks, PointsTable } from '../core/types';
import { isRoundKey, pointsForRound } from '../core/scoring-config';
import { roundKeyOf } from '../bracket/match-key';
import { ScoreBreakdown } from './types';

/**
 * Score one participant's picks.
 *
 * A pick on a decided match earns its round's points when it names the
 * recorded winner. A pick on an undecided match counts toward `potential`
 * while the picked entrant is still active. Picks on rounds the points table
 * does not know are worth 0.
 */
export function scoreParticipant(
  picks: Picks,
  results: ActualResults,
  activePlayers: ReadonlySet<string>,
  points: PointsTable,
): ScoreBreakdown {
  const breakdown: ScoreBreakdown = { current: 0, potential: 0, max: 0, byRound: {} };

  for (const [matchKey, predicted] of Object.entries(picks)) {
    const roundKey = roundKeyOf(matchKey);
    const value = roundKey === null ? 0 : pointsForRound(points, roundKey);
    const actual = results[matchKey];

    if (actual !== undefined) {
      if (predicted !== actual) continue;
      breakdown.current += value;
      if (roundKey !== null && isRoundKey(roundKey)) {
        const round = breakdown.byRound[roundKey] ?? { correct: 0, points: 0 };
        round.correct += 1;
        round.points += value;
        breakdown.byRound[roundKey] = round;
      }
    } else if (activePlayers.has(predicted)) {
      breakdown.potential += value;
    }
  }

  breakdown.max = breakdown.current + breakdown.potential;
  return breakdown;
}
