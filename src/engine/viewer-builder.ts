import { Category, Matchup, Participant, RawWinnerMap } from '../core/types';
import { getSeedMap } from '../bracket/bracket-builder';
import { Tournament } from '../bracket/types';
import { normalizePicks, normalizeResults } from '../data/normalize';
import { getActivePlayers, getEliminatedPlayers } from './elimination';
import { scoreParticipant } from './scoring';
import { assignRanks } from './ranking';
import { ViewerData, ViewerParticipant } from './types';

export interface BuildViewerOptions {
  /** Score only participants who have locked in their picks. */
  lockedOnly?: boolean;
  now?: Date;
}

/**
 * Full scoring pass: normalize inputs, infer eliminations, score and rank
 * every participant, and assemble the document the viewer renders.
 * Nothing is carried over from earlier passes.
 */
export function buildViewerData(
  tournament: Tournament,
  rawResults: RawWinnerMap,
  participants: readonly Participant[],
  options: BuildViewerOptions = {},
): ViewerData {
  const results = normalizeResults(rawResults);
  const eliminated = getEliminatedPlayers(tournament, results);
  const active = getActivePlayers(tournament, eliminated);

  const scored: Omit<ViewerParticipant, 'rank'>[] = [];
  for (const participant of participants) {
    if (options.lockedOnly && !participant.isLocked) continue;

    const picks = normalizePicks(participant.picks);
    const breakdown = scoreParticipant(picks, results, active, tournament.config.points);

    scored.push({
      name: participant.name,
      fullName: participant.fullName,
      score: breakdown.current,
      maxScore: breakdown.max,
      picks: participant.picks,
    });
  }

  const initialEntrants: Record<Category, Matchup[]> = {};
  for (const [category, draw] of tournament.draws) {
    initialEntrants[category] = [...draw.getMatchups()];
  }

  return {
    generatedAt: (options.now ?? new Date()).toISOString(),
    initialEntrants,
    seedMap: getSeedMap(tournament),
    actualResults: { ...results },
    eliminatedPlayers: [...eliminated].sort(),
    participants: assignRanks(scored),
  };
}
