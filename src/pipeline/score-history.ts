import fs from 'fs';
import path from 'path';
import { DataFileError } from '../core/errors';
import { combineDailyScores, DailyScores, dayLabelFromFile, parseScoresCsv, ScoreHistory } from '../data/score-history';
import { exportScoreHistoryToCsv } from '../output/csv-exporter';

export interface CombineOptions {
  dir: string;
  outputPath?: string;
  silent?: boolean;
}

export interface CombineResult {
  history: ScoreHistory;
  outputPath: string;
  skipped: string[];
}

/**
 * Merge the daily `day_XX.csv` score exports in a directory into one
 * history table (`combined_scores.csv` beside them by default).
 */
export function runCombine(options: CombineOptions): CombineResult {
  const log = (message: string) => { if (!options.silent) console.log(message); };

  if (!fs.existsSync(options.dir) || !fs.statSync(options.dir).isDirectory()) {
    throw new DataFileError(options.dir, 'directory not found');
  }

  const files = fs.readdirSync(options.dir).filter(f => dayLabelFromFile(f) !== null).sort();
  if (files.length === 0) {
    throw new DataFileError(options.dir, "no files matching 'day_*.csv'");
  }
  log(`Found files: ${files.join(', ')}`);

  const daily: DailyScores[] = [];
  const skipped: string[] = [];
  for (const filename of files) {
    const label = dayLabelFromFile(filename);
    const scores = parseScoresCsv(fs.readFileSync(path.join(options.dir, filename), 'utf-8'));
    if (label === null || scores === null) {
      console.warn(`[Combine] Skipping ${filename}: no Name / Current Score columns`);
      skipped.push(filename);
      continue;
    }
    daily.push({ label, scores });
  }
  if (daily.length === 0) {
    throw new DataFileError(options.dir, 'no daily score file could be read');
  }

  const history = combineDailyScores(daily);
  const outputPath = exportScoreHistoryToCsv(
    history,
    options.outputPath ?? path.join(options.dir, 'combined_scores.csv'),
  );
  log(`Combined ${daily.length} days for ${history.rows.length} participants into: ${outputPath}`);

  return { history, outputPath, skipped };
}
