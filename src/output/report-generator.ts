import { ScoringConfig } from '../core/types';
import { ScoreBreakdown, ViewerData } from '../engine/types';
import { LeaderboardRow, RoundBoard, ScoreReport } from './types';

export interface ScoredEntry {
  name: string;
  breakdown: ScoreBreakdown;
}

export function generateLeaderboard(viewer: ViewerData): LeaderboardRow[] {
  return viewer.participants.map(p => ({
    rank: p.rank,
    name: p.name,
    score: p.score,
    maxScore: p.maxScore,
  }));
}

/**
 * Per-round report for one participant. Every round in play gets a row,
 * including rounds with no correct picks.
 */
export function generateScoreReport(
  participantName: string,
  breakdown: ScoreBreakdown,
  config: ScoringConfig,
): ScoreReport {
  return {
    participantName,
    rounds: config.rounds.map(round => ({
      roundKey: round.key,
      roundName: round.name,
      correct: breakdown.byRound[round.key]?.correct ?? 0,
      points: breakdown.byRound[round.key]?.points ?? 0,
    })),
    totalScore: breakdown.current,
    maxScore: breakdown.max,
  };
}

/**
 * Round-by-round points for every participant, names in alphabetical order.
 */
export function generateRoundBoard(entries: readonly ScoredEntry[], config: ScoringConfig): RoundBoard {
  const sorted = [...entries].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  return {
    participants: sorted.map(e => e.name),
    rounds: config.rounds.map(round => ({
      roundKey: round.key,
      roundName: round.name,
      points: sorted.map(e => e.breakdown.byRound[round.key]?.points ?? 0),
    })),
    totals: sorted.map(e => e.breakdown.current),
  };
}
