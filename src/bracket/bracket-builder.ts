import { Category, Matchup, RoundDefinition, ScoringConfig } from '../core/types';
import { BracketTopologyError } from '../core/errors';
import { createScoringConfig, ScoringConfigOptions } from '../core/scoring-config';
import { BracketTopology } from './bracket-state';
import { Tournament, TournamentData } from './types';

/**
 * Build one category's draw from its first-round matchups.
 * Entrant names and seeds are trimmed; they are used as keys everywhere else.
 */
export function buildDraw(
  category: Category,
  matchups: readonly Matchup[],
  rounds: readonly RoundDefinition[],
): BracketTopology {
  const cleaned: Matchup[] = matchups.map((m): Matchup => ({
    ...m,
    players: [
      { seed: m.players[0].seed.trim(), name: m.players[0].name.trim() },
      { seed: m.players[1].seed.trim(), name: m.players[1].name.trim() },
    ],
  }));
  return new BracketTopology(category, cleaned, rounds);
}

export function buildTournament(data: TournamentData, config: ScoringConfig): Tournament {
  const draws = new Map<Category, BracketTopology>();
  for (const [category, matchups] of Object.entries(data.draws)) {
    draws.set(category, buildDraw(category, matchups, config.rounds));
  }
  if (draws.size === 0) {
    throw new BracketTopologyError('Tournament has no draws');
  }
  return { config, draws };
}

/**
 * Build a tournament whose scoring config is sized from its draws.
 * All categories must share one draw size.
 */
export function createTournament(data: TournamentData, options: ScoringConfigOptions = {}): Tournament {
  const sizes = new Set(Object.values(data.draws).map(m => m.length * 2));
  if (sizes.size === 0) {
    throw new BracketTopologyError('Tournament has no draws');
  }
  if (sizes.size > 1) {
    throw new BracketTopologyError(`Draws have different sizes: ${[...sizes].join(', ')}`);
  }
  const [entrantCount] = sizes;
  return buildTournament(data, createScoringConfig(entrantCount, options));
}

export function getDraw(tournament: Tournament, category: Category): BracketTopology {
  const draw = tournament.draws.get(category);
  if (!draw) {
    const available = [...tournament.draws.keys()].join(', ');
    throw new BracketTopologyError(`Unknown category: "${category}". Available categories: ${available}`);
  }
  return draw;
}

/** The full entrant universe across every category. */
export function getAllEntrantNames(tournament: Tournament): Set<string> {
  const names = new Set<string>();
  for (const draw of tournament.draws.values()) {
    for (const entrant of draw.entrants()) {
      names.add(entrant.name);
    }
  }
  return names;
}

export function getSeedMap(tournament: Tournament): Record<Category, Record<string, string>> {
  const seedMap: Record<Category, Record<string, string>> = {};
  for (const [category, draw] of tournament.draws) {
    seedMap[category] = draw.seedMap();
  }
  return seedMap;
}
