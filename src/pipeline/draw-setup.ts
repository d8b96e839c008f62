import fs from 'fs';
import path from 'path';
import { CONFIG } from '../config';
import { DataFileError } from '../core/errors';
import { TournamentData } from '../bracket/types';
import { collectPlayerNames, parseEntrants, serializeTournamentData } from '../data/entrants-parser';
import { compareDrawPlayers, DrawComparison } from '../data/draw-validator';
import { loadTournamentData } from '../data/loader';

export interface SetupOptions {
  entrantsPath: string;
  outputPath?: string;
  halfSize?: number;
  categories?: string[];
  silent?: boolean;
}

export interface ValidateOptions {
  entrantsPath: string;
  dataPath?: string;
  categories?: string[];
}

function readEntrants(entrantsPath: string, categories: string[], halfSize?: number): TournamentData {
  if (!fs.existsSync(entrantsPath)) {
    throw new DataFileError(entrantsPath, 'entrants file not found');
  }
  return parseEntrants(fs.readFileSync(entrantsPath, 'utf-8'), {
    categories,
    halfSize,
    source: entrantsPath,
  });
}

/**
 * Turn an entrants text file into the tournament data JSON the scorer reads.
 */
export function runSetup(options: SetupOptions): string {
  const categories = options.categories ?? CONFIG.CATEGORIES;
  const data = readEntrants(options.entrantsPath, categories, options.halfSize ?? CONFIG.HALF_SIZE);

  const outputPath = options.outputPath ?? CONFIG.TOURNAMENT_DATA_PATH;
  const outputDir = path.dirname(outputPath);
  if (!fs.existsSync(outputDir)) {
    fs.mkdirSync(outputDir, { recursive: true });
  }
  fs.writeFileSync(outputPath, JSON.stringify(serializeTournamentData(data), null, 4) + '\n', 'utf-8');

  if (!options.silent) {
    const counts = Object.entries(data.draws).map(([c, m]) => `${c}: ${m.length} matches`).join(', ');
    console.log(`Generated tournament data at: ${outputPath} (${counts})`);
  }
  return outputPath;
}

/**
 * Compare the players of a new entrants file with an existing tournament
 * data file, flagging likely renames.
 */
export function runValidate(options: ValidateOptions): DrawComparison {
  const categories = options.categories ?? CONFIG.CATEGORIES;
  const previous = collectPlayerNames(loadTournamentData(options.dataPath ?? CONFIG.TOURNAMENT_DATA_PATH));
  const next = collectPlayerNames(readEntrants(options.entrantsPath, categories));
  return compareDrawPlayers(previous, next);
}

export function renderDrawComparison(comparison: DrawComparison): string {
  const lines: string[] = ['', '--- Data Validation Report ---'];

  if (comparison.renamed.length === 0 && comparison.added.length === 0 && comparison.removed.length === 0) {
    lines.push('No significant changes to player names found. Data is consistent.');
    return lines.join('\n');
  }

  if (comparison.renamed.length > 0) {
    lines.push('', 'Potential name changes:');
    for (const rename of comparison.renamed) {
      lines.push(`  - '${rename.from}'  ->  '${rename.to}'`);
    }
  }
  if (comparison.added.length > 0) {
    lines.push('', 'New players added:');
    for (const name of comparison.added) lines.push(`  - ${name}`);
  }
  if (comparison.removed.length > 0) {
    lines.push('', 'Players removed:');
    for (const name of comparison.removed) lines.push(`  - ${name}`);
  }
  return lines.join('\n');
}
