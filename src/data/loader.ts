import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { CONFIG } from '../config';
import { Entrant, Matchup, Participant, RawWinnerMap } from '../core/types';
import { DataFileError } from '../core/errors';
import { NO_PICK } from '../core/constants';
import { TournamentData } from '../bracket/types';
import { rawWinnerSchema } from './normalize';
import { splitCsvLine } from './csv';

const entrantSchema = z.tuple([z.string(), z.string()]);

// Matchups appear either as { players, day } objects or as bare player pairs.
const matchupSchema = z.union([
  z.object({
    players: z.tuple([entrantSchema, entrantSchema]),
    day: z.number().int().optional(),
  }),
  z.tuple([entrantSchema, entrantSchema]),
]);

const tournamentFileSchema = z.record(z.string(), z.array(matchupSchema));

const participantRecordSchema = z.object({
  nickname: z.string().optional(),
  name: z.string().optional(),
  fullName: z.string().optional(),
  isLocked: z.boolean().optional(),
  picks: z.record(z.string(), z.unknown()).optional(),
});

const participantsFileSchema = z.union([
  z.array(participantRecordSchema),
  z.object({ participants: z.array(participantRecordSchema) }),
]);

const resultsFileSchema = z.union([
  z.object({ winners: z.record(z.string(), z.unknown()) }),
  z.record(z.string(), z.unknown()),
]);

const PREDICTION_HEADER = ['category', 'round', 'matchid', 'predictedwinner'];

export interface PredictionDirectory {
  results: RawWinnerMap;
  participants: Participant[];
  /** Prediction files that could not be read as picks. */
  skipped: string[];
}

export interface PredictionDirectoryOptions {
  suffix?: string;
  resultsFilename?: string;
}

function readJsonFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    throw new DataFileError(filePath, 'file not found');
  }
  try {
    return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DataFileError(filePath, `not valid JSON (${reason})`);
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ');
}

function toEntrant([seed, name]: [string, string]): Entrant {
  return { seed, name };
}

function keepWinnerValues(raw: Record<string, unknown>): RawWinnerMap {
  const kept: RawWinnerMap = {};
  for (const [key, value] of Object.entries(raw)) {
    const parsed = rawWinnerSchema.safeParse(value);
    if (parsed.success) kept[key] = parsed.data;
  }
  return kept;
}

/**
 * Validate the tournament data file contents. Keys are category names, with
 * or without a `_draw` suffix ("mens_draw" and "mens" both mean "mens").
 */
export function parseTournamentData(raw: unknown, source = 'tournament data'): TournamentData {
  const parsed = tournamentFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DataFileError(source, describeIssues(parsed.error));
  }

  const draws: Record<string, Matchup[]> = {};
  for (const [key, matchups] of Object.entries(parsed.data)) {
    const category = key.replace(/_draw$/, '');
    draws[category] = matchups.map((m): Matchup => {
      if (Array.isArray(m)) {
        return { players: [toEntrant(m[0]), toEntrant(m[1])] };
      }
      const matchup: Matchup = { players: [toEntrant(m.players[0]), toEntrant(m.players[1])] };
      if (m.day !== undefined) matchup.day = m.day;
      return matchup;
    });
  }
  return { draws };
}

export function loadTournamentData(filePath: string = CONFIG.TOURNAMENT_DATA_PATH): TournamentData {
  return parseTournamentData(readJsonFile(filePath), filePath);
}

/**
 * Parse a prediction CSV (Category,Round,MatchID,PredictedWinner) into a
 * match key → winner map. Blank and malformed rows and "NONE" picks are
 * skipped. Returns null when the header is not a prediction header.
 */
export function parsePredictionCsv(text: string): Record<string, string> | null {
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);
  const headerLine = lines.shift();
  if (headerLine === undefined || headerLine.trim() === '') return {};

  const header = splitCsvLine(headerLine).map(h => h.trim().toLowerCase());
  if (header.join(',') !== PREDICTION_HEADER.join(',')) return null;

  const picks: Record<string, string> = {};
  for (const line of lines) {
    if (line.trim() === '') continue;
    const row = splitCsvLine(line);
    if (row.length !== 4) continue;

    const matchId = row[2].trim();
    const winner = row[3].trim();
    if (matchId && winner && winner !== NO_PICK) {
      picks[matchId] = winner;
    }
  }
  return picks;
}

/** "jane_doe_predictions.csv" → "Jane Doe" */
export function participantNameFromFile(filename: string, suffix: string = CONFIG.PREDICTION_SUFFIX): string {
  const base = filename.endsWith(suffix) ? filename.slice(0, -suffix.length) : path.parse(filename).name;
  return base
    .replace(/_/g, ' ')
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_m, before: string, letter: string) => before + letter.toUpperCase());
}

/**
 * Read every prediction file in a directory. The master file holds the
 * actual results; every other `*{suffix}` file is one participant.
 */
export function loadPredictionDirectory(
  dir: string,
  options: PredictionDirectoryOptions = {},
): PredictionDirectory {
  const suffix = options.suffix ?? CONFIG.PREDICTION_SUFFIX;
  const resultsFilename = options.resultsFilename ?? CONFIG.RESULTS_FILENAME;

  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    throw new DataFileError(dir, 'directory not found');
  }

  const masterPath = path.join(dir, resultsFilename);
  if (!fs.existsSync(masterPath)) {
    throw new DataFileError(masterPath, 'master results file not found');
  }
  const results = parsePredictionCsv(fs.readFileSync(masterPath, 'utf-8'));
  if (results === null) {
    throw new DataFileError(masterPath, `expected header ${PREDICTION_HEADER.join(',')}`);
  }

  const participants: Participant[] = [];
  const skipped: string[] = [];

  for (const filename of fs.readdirSync(dir).sort()) {
    if (!filename.endsWith(suffix) || filename === resultsFilename) continue;

    const picks = parsePredictionCsv(fs.readFileSync(path.join(dir, filename), 'utf-8'));
    if (picks === null || Object.keys(picks).length === 0) {
      skipped.push(filename);
      continue;
    }

    participants.push({
      name: participantNameFromFile(filename, suffix),
      isLocked: true,
      picks,
    });
  }

  return { results, participants, skipped };
}

/** Participants as exported from the live entry service. */
export function parseParticipants(raw: unknown, source = 'participants'): Participant[] {
  const parsed = participantsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DataFileError(source, describeIssues(parsed.error));
  }

  const records = Array.isArray(parsed.data) ? parsed.data : parsed.data.participants;
  return records.map(record => ({
    name: record.nickname ?? record.name ?? 'Unknown',
    fullName: record.fullName,
    isLocked: record.isLocked ?? false,
    picks: keepWinnerValues(record.picks ?? {}),
  }));
}

export function loadParticipantsFile(filePath: string): Participant[] {
  return parseParticipants(readJsonFile(filePath), filePath);
}

/** Results as `{ "winners": {...} }` or as a bare match key → winner map. */
export function parseResults(raw: unknown, source = 'results'): RawWinnerMap {
  const parsed = resultsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DataFileError(source, describeIssues(parsed.error));
  }
  const winners = 'winners' in parsed.data && isPlainRecord(parsed.data.winners)
    ? parsed.data.winners
    : parsed.data;
  return keepWinnerValues(winners);
}

export function loadResultsFile(filePath: string): RawWinnerMap {
  return parseResults(readJsonFile(filePath), filePath);
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
