import fs from 'fs';
import path from 'path';
import { CONFIG, resolvePointsTable, resolveRoundKeys } from '../config';
import { Participant, PointsTable, RawWinnerMap, RoundKey } from '../core/types';
import { DataFileError } from '../core/errors';
import { createTournament } from '../bracket/bracket-builder';
import { Tournament } from '../bracket/types';
import {
  loadParticipantsFile, loadPredictionDirectory, loadResultsFile, loadTournamentData, parsePredictionCsv,
  participantNameFromFile } from '../data/loader';
import { normalizePicks, normalizeResults } from '../data/normalize';
import { explainEliminations, getActivePlayers, getEliminatedPlayers } from '../engine/elimination';
import { scoreParticipant } from '../engine/scoring';
import { buildViewerData } from '../engine/viewer-builder';
import { ViewerData } from '../engine/types';
import { eventBus, ScoringFailedPayload } from '../ingestion/event-bus';
import { generateLeaderboard, generateRoundBoard, generateScoreReport, ScoredEntry } from '../output/report-generator';
import { renderLeaderboard, renderRoundBoard, renderScoreReport } from '../output/cli-renderer';
import { exportViewerToJson } from '../output/json-exporter';
import { exportScoresToCsv } from '../output/csv-exporter';
import { ScoreReport } from '../output/types';
import { ScoringLoop } from './scoring-loop';

export interface TournamentOptions {
  dataPath?: string;
  points?: PointsTable;
  roundKeys?: RoundKey[];
}

export interface BoardOptions extends TournamentOptions {
  predictionsDir: string;
  outputPath?: string;
  csvPath?: string;
  /** Also print the per-round points board. */
  rounds?: boolean;
  debug?: boolean;
  silent?: boolean;
}

export interface ScoreFileOptions extends TournamentOptions {
  predictionFile: string;
  resultsFile?: string;
  silent?: boolean;
}

export interface LivePassOptions extends TournamentOptions {
  tournamentId?: string;
  participantsPath: string;
  resultsPath: string;
  outputPath?: string;
  silent?: boolean;
}

export function loadTournament(options: TournamentOptions = {}): Tournament {
  const data = loadTournamentData(options.dataPath ?? CONFIG.TOURNAMENT_DATA_PATH);
  return createTournament(data, {
    points: options.points ?? resolvePointsTable(),
    roundKeys: options.roundKeys ?? resolveRoundKeys(),
  });
}

/**
 * Offline scoring of a directory of prediction files:
 * 1. Load the draw and every prediction file
 * 2. Score and rank everyone with readable picks
 * 3. Write the viewer JSON (and optionally a scores CSV)
 * 4. Print the leaderboard (and the per-round board when asked)
 */
export function runBoard(options: BoardOptions): ViewerData {
  const log = (message: string) => { if (!options.silent) console.log(message); };

  const tournament = loadTournament(options);
  log(`Loaded ${tournament.draws.size} draws (${[...tournament.draws.keys()].join(', ')}).`);

  const board = loadPredictionDirectory(options.predictionsDir);
  for (const filename of board.skipped) {
    console.warn(`[Board] Skipping ${filename}: not a prediction file or no picks`);
  }
  log(`Scoring ${board.participants.length} participants against ${Object.keys(board.results).length} results...`);

  if (options.debug) {
    for (const decision of explainEliminations(tournament, normalizeResults(board.results))) {
      const [p1, p2] = decision.occupants;
      console.log(
        `[Board] ${decision.matchKey}: ${p1 ?? '?'} vs ${p2 ?? '?'} → ${decision.winner}` +
        (decision.loser ? ` (out: ${decision.loser})` : ' (unresolved)'),
      );
    }
  }

  const viewer = buildViewerData(tournament, board.results, board.participants);

  const outputPath = options.outputPath ?? path.join(options.predictionsDir, 'viewer-data.json');
  log(`Viewer data written to: ${exportViewerToJson(viewer, outputPath)}`);

  if (options.csvPath) {
    log(`Scores exported to: ${exportScoresToCsv(viewer.participants, options.csvPath)}`);
  }

  log('\n' + renderLeaderboard(generateLeaderboard(viewer)));
  if (options.rounds) {
    const entries = scoreEntries(tournament, board.results, board.participants);
    log('\n' + renderRoundBoard(generateRoundBoard(entries, tournament.config)));
  }
  return viewer;
}

/** Full score breakdown for each participant against one results map. */
export function scoreEntries(
  tournament: Tournament,
  rawResults: RawWinnerMap,
  participants: readonly Participant[],
): ScoredEntry[] {
  const results = normalizeResults(rawResults);
  const active = getActivePlayers(tournament, getEliminatedPlayers(tournament, results));
  return participants.map(p => ({
    name: p.name,
    breakdown: scoreParticipant(normalizePicks(p.picks), results, active, tournament.config.points),
  }));
}

/**
 * Per-round score report for a single prediction file.
 */
export function runScoreFile(options: ScoreFileOptions): ScoreReport {
  const tournament = loadTournament(options);
  const resultsFile = options.resultsFile
    ?? path.join(path.dirname(options.predictionFile), CONFIG.RESULTS_FILENAME);

  const results = normalizeResults(readPredictionFile(resultsFile));
  const picks = normalizePicks(readPredictionFile(options.predictionFile));

  const eliminated = getEliminatedPlayers(tournament, results);
  const active = getActivePlayers(tournament, eliminated);
  const breakdown = scoreParticipant(picks, results, active, tournament.config.points);

  const name = participantNameFromFile(path.basename(options.predictionFile));
  const report = generateScoreReport(name, breakdown, tournament.config);
  if (!options.silent) console.log('\n' + renderScoreReport(report));
  return report;
}

/**
 * One pass of the live entry service: locked participants only, rescored
 * through the scoring loop exactly as a results update would trigger it.
 */
export function runLivePass(options: LivePassOptions): ViewerData {
  const tournamentId = options.tournamentId ?? 'default';
  const tournament = loadTournament(options);
  const participants = loadParticipantsFile(options.participantsPath);
  const results = loadResultsFile(options.resultsPath);

  const loop = new ScoringLoop({
    tournamentId,
    tournament,
    participants: () => participants,
    silent: options.silent,
  });

  const failures: string[] = [];
  const onFailed = (payload: ScoringFailedPayload) => {
    if (payload.tournamentId === tournamentId) failures.push(payload.error);
  };

  eventBus.on('scoring-failed', onFailed);
  loop.start();
  try {
    eventBus.emit('results-updated', { tournamentId, results });
  } finally {
    loop.stop();
    eventBus.off('scoring-failed', onFailed);
  }

  const viewer = loop.latestViewer;
  if (!viewer) {
    throw new Error(`Scoring failed for tournament ${tournamentId}: ${failures[0] ?? 'no viewer published'}`);
  }

  if (options.outputPath) {
    const filePath = exportViewerToJson(viewer, options.outputPath);
    if (!options.silent) console.log(`Viewer data written to: ${filePath}`);
  }
  if (!options.silent) console.log('\n' + renderLeaderboard(generateLeaderboard(viewer)));
  return viewer;
}

function readPredictionFile(filePath: string): Record<string, string> {
  if (!fs.existsSync(filePath)) {
    throw new DataFileError(filePath, 'file not found');
  }
  const picks = parsePredictionCsv(fs.readFileSync(filePath, 'utf-8'));
  if (picks === null) {
    throw new DataFileError(filePath, 'not a prediction file (expected Category,Round,MatchID,PredictedWinner)');
  }
  return picks;
}
