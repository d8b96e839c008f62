import { Category, Matchup, ScoringConfig } from '../core/types';
import type { BracketTopology } from './bracket-state';

/** First-round matchups per category, as read from the tournament data file. */
export interface TournamentData {
  draws: Record<Category, Matchup[]>;
}

export interface Tournament {
  config: ScoringConfig;
  draws: ReadonlyMap<Category, BracketTopology>;
}

/** Match key split into its parts, before checking it against a draw. */
export interface ParsedMatchKey {
  category: Category;
  roundKey: string;
  matchIndex: number;
}
