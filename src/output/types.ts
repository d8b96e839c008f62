import { RoundKey } from '../core/types';

export interface LeaderboardRow {
  rank: number;
  name: string;
  score: number;
  maxScore: number;
}

export interface RoundReportRow {
  roundKey: RoundKey;
  roundName: string;
  correct: number;
  points: number;
}

export interface ScoreReport {
  participantName: string;
  rounds: RoundReportRow[];
  totalScore: number;
  maxScore: number;
}

export interface RoundBoardRow {
  roundKey: RoundKey;
  roundName: string;
  /** Points per participant, in `participants` order. */
  points: number[];
}

/** Points earned per round for every participant, side by side. */
export interface RoundBoard {
  participants: string[];
  rounds: RoundBoardRow[];
  totals: number[];
}
