import { Category, Matchup, RawWinnerMap, RoundKey } from '../core/types';

/** Occupants of a match's two slots; null where the feeder is undecided. */
export type MatchOccupants = [string | null, string | null];

export interface RoundScore {
  correct: number;
  points: number;
}

export interface ScoreBreakdown {
  current: number;
  potential: number;
  max: number;
  byRound: Partial<Record<RoundKey, RoundScore>>;
}

export interface RankedEntry {
  score: number;
}

export interface ViewerParticipant {
  name: string;
  fullName?: string;
  score: number;
  maxScore: number;
  rank: number;
  picks: RawWinnerMap;
}

export interface ViewerData {
  generatedAt: string;
  initialEntrants: Record<Category, Matchup[]>;
  seedMap: Record<Category, Record<string, string>>;
  actualResults: Record<string, string>;
  eliminatedPlayers: string[];
  participants: ViewerParticipant[];
}
