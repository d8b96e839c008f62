import { splitCsvLine } from './csv';

/** One day's `Name,Current Score` export. */
export interface DailyScores {
  label: string;
  scores: Map<string, number>;
}

export interface ScoreHistory {
  /** Column labels, one per day, in file order. */
  days: string[];
  rows: Array<{ name: string; scores: number[] }>;
}

const DAY_FILE = /^day_(.+)\.csv$/;

/** "day_03.csv" → "Day 03"; null for any other file name. */
export function dayLabelFromFile(filename: string): string | null {
  const match = DAY_FILE.exec(filename);
  return match ? `Day ${match[1]}` : null;
}

function toScore(text: string | undefined): number {
  const value = Number((text ?? '').trim());
  return Number.isFinite(value) ? Math.trunc(value) : 0;
}

/**
 * Read a daily scores CSV into name → score. Returns null when the header
 * has no `Name` or no `Current Score` column.
 */
export function parseScoresCsv(text: string): Map<string, number> | null {
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/).filter(line => line.trim() !== '');
  const headerLine = lines.shift();
  if (headerLine === undefined) return null;

  const header = splitCsvLine(headerLine).map(h => h.trim());
  const nameColumn = header.indexOf('Name');
  const scoreColumn = header.indexOf('Current Score');
  if (nameColumn === -1 || scoreColumn === -1) return null;

  const scores = new Map<string, number>();
  for (const line of lines) {
    const row = splitCsvLine(line);
    const name = (row[nameColumn] ?? '').trim();
    if (name) scores.set(name, toScore(row[scoreColumn]));
  }
  return scores;
}

/**
 * Join daily tables on participant name. Names are sorted; a participant
 * missing from a day scores 0 for it.
 */
export function combineDailyScores(daily: readonly DailyScores[]): ScoreHistory {
  const names = new Set<string>();
  for (const day of daily) {
    for (const name of day.scores.keys()) names.add(name);
  }

  return {
    days: daily.map(day => day.label),
    rows: [...names].sort().map(name => ({
      name,
      scores: daily.map(day => day.scores.get(name) ?? 0),
    })),
  };
}
