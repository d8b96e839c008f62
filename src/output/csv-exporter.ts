import fs from 'fs';
import path from 'path';
import { formatCsvRow } from '../data/csv';
import { ViewerParticipant } from '../engine/types';
import { ScoreHistory } from '../data/score-history';

/** `Name,Current Score` rows, alphabetical by name. */
export function formatScoresCsv(participants: readonly ViewerParticipant[]): string {
  const sorted = [...participants].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  const lines = [formatCsvRow(['Name', 'Current Score'])];
  for (const p of sorted) {
    lines.push(formatCsvRow([p.name, p.score]));
  }
  return lines.join('\n') + '\n';
}

/** `Name,Day 01,Day 02,...` with one row per participant. */
export function formatScoreHistoryCsv(history: ScoreHistory): string {
  const lines = [formatCsvRow(['Name', ...history.days])];
  for (const row of history.rows) {
    lines.push(formatCsvRow([row.name, ...row.scores]));
  }
  return lines.join('\n') + '\n';
}

export function exportScoresToCsv(participants: readonly ViewerParticipant[], filePath: string): string {
  return writeCsv(filePath, formatScoresCsv(participants));
}

export function exportScoreHistoryToCsv(history: ScoreHistory, filePath: string): string {
  return writeCsv(filePath, formatScoreHistoryCsv(history));
}

function writeCsv(filePath: string, content: string): string {
  const outputDir = path.dirname(filePath);
  if (!fs.existsSync(outputDir)) {
    fs.mkdirSync(outputDir, { recursive: true });
  }
  fs.writeFileSync(filePath, content, 'utf-8');
  return filePath;
}
