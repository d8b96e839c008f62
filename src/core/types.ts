// === TOURNAMENT STRUCTURE ===

/** Draw category, e.g. "mens" or "womens". Categories never cross-reference. */
export type Category = string;

export type RoundKey = 'r128' | 'r64' | 'r32' | 'r16' | 'qf' | 'sf' | 'f';

export interface Entrant {
  seed: string;                     // Display label, empty for unseeded
  name: string;                     // Unique key within the draw
}

export interface Matchup {
  players: [Entrant, Entrant];
  day?: number;                     // Play day of the half this match sits in
}

export interface RoundDefinition {
  key: RoundKey;
  name: string;
  points: number;
}

/** Position of a match inside one category's draw. */
export interface MatchRef {
  category: Category;
  roundIndex: number;
  matchIndex: number;
}

// === SCORING CONFIGURATION ===

export type PointsTable = Readonly<Partial<Record<RoundKey, number>>>;

export interface ScoringConfig {
  /** Rounds in play, first round first. */
  rounds: readonly RoundDefinition[];
  points: PointsTable;
}

// === RAW INPUT SHAPES ===

/** A winner as stored by the entry form: a bare name or a `[seed, name]` pair. */
export type RawWinner = string | [string, string];

export type RawWinnerMap = Record<string, RawWinner>;

/** Match key → bare, trimmed winner name. */
export type ActualResults = Readonly<Record<string, string>>;

export type Picks = Readonly<Record<string, string>>;

export interface Participant {
  name: string;
  fullName?: string;
  isLocked: boolean;
  picks: RawWinnerMap;
}
