import { CONFIG } from './config';
import { parsePointsOverride } from './core/scoring-config';
import { PointsTable } from './core/types';
import { runBoard, runLivePass, runScoreFile } from './pipeline/runner';
import { renderDrawComparison, runSetup, runValidate } from './pipeline/draw-setup';
import { runCombine } from './pipeline/score-history';

function printUsage(): void {
  console.log(`
Bracket Pool Scorer: prediction scoring and leaderboards

Usage:
  npm run dev -- board [options]         Score a directory of prediction files
  npm run dev -- score [options]         Per-round report for one prediction file
  npm run dev -- live [options]          Score locked entries from the live entry service
  npm run dev -- setup [options]         Build tournament data from an entrants file
  npm run dev -- validate [options]      Compare an entrants file with tournament data
  npm run dev -- combine [options]       Merge daily day_XX.csv score exports into one table

Common options:
  --data <file>               Tournament data JSON (default: ${CONFIG.TOURNAMENT_DATA_PATH})
  --points <table>            Points per round, e.g. "r16:1,qf:2,sf:4,f:8" (default preset: ${CONFIG.POINTS_PRESET})

Board options:
  --dir <dir>                 Directory of *${CONFIG.PREDICTION_SUFFIX} files (required)
  --out <file>                Viewer JSON path (default: <dir>/viewer-data.json)
  --csv <file>                Also write a Name,Current Score CSV
  --rounds                    Also print points per round for every participant
  --debug                     Print every elimination decision

Score options:
  --file <file>               Prediction file to score (required)
  --results <file>            Master results file (default: ${CONFIG.RESULTS_FILENAME} beside --file)

Live options:
  --participants <file>       Participants JSON export (required)
  --results <file>            Results JSON (required)
  --out <file>                Viewer JSON path

Setup / validate options:
  --entrants <file>           Entrants text file (required)
  --out <file>                Tournament data output (setup only)
  --half-size <n>             Matches per half (setup only, default: ${CONFIG.HALF_SIZE})

Combine options:
  --dir <dir>                 Directory of day_XX.csv files (required)
  --out <file>                Combined CSV (default: <dir>/combined_scores.csv)

Examples:
  npm run dev -- board --dir ./predictions --csv ./output/scores.csv
  npm run dev -- score --file ./predictions/jane_doe_predictions.csv
  npm run dev -- setup --entrants ./data/entrants.txt --half-size 4
  npm run dev -- combine --dir ./output/daily
  `);
}

function parseArgs(args: string[]): Record<string, string> {
  const parsed: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith('--')) {
      const key = args[i].slice(2);
      const next = args[i + 1];
      if (next && !next.startsWith('--')) {
        parsed[key] = next;
        i++;
      } else {
        parsed[key] = 'true';
      }
    }
  }
  return parsed;
}

function requireFlag(flags: Record<string, string>, name: string): string {
  const value = flags[name];
  if (!value || value === 'true') {
    throw new Error(`Missing required option --${name}`);
  }
  return value;
}

function positiveIntFlag(flags: Record<string, string>, name: string): number | undefined {
  const raw = flags[name];
  if (raw === undefined) return undefined;
  if (!/^[1-9]\d*$/.test(raw)) {
    throw new Error(`--${name} must be a positive integer, got "${raw}"`);
  }
  return Number(raw);
}

function pointsFlag(flags: Record<string, string>): PointsTable | undefined {
  return flags.points ? parsePointsOverride(flags.points) : undefined;
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];
  const flags = parseArgs(args.slice(1));

  switch (command) {
    case 'board': {
      runBoard({
        predictionsDir: requireFlag(flags, 'dir'),
        dataPath: flags.data,
        points: pointsFlag(flags),
        outputPath: flags.out,
        csvPath: flags.csv,
        rounds: flags.rounds === 'true',
        debug: flags.debug === 'true' || CONFIG.DEBUG,
      });
      break;
    }

    case 'score': {
      runScoreFile({
        predictionFile: requireFlag(flags, 'file'),
        resultsFile: flags.results,
        dataPath: flags.data,
        points: pointsFlag(flags),
      });
      break;
    }

    case 'live': {
      runLivePass({
        participantsPath: requireFlag(flags, 'participants'),
        resultsPath: requireFlag(flags, 'results'),
        dataPath: flags.data,
        points: pointsFlag(flags),
        outputPath: flags.out,
      });
      break;
    }

    case 'setup': {
      runSetup({
        entrantsPath: requireFlag(flags, 'entrants'),
        outputPath: flags.out,
        halfSize: positiveIntFlag(flags, 'half-size'),
      });
      break;
    }

    case 'validate': {
      const comparison = runValidate({
        entrantsPath: requireFlag(flags, 'entrants'),
        dataPath: flags.data,
      });
      console.log(renderDrawComparison(comparison));
      break;
    }

    case 'combine': {
      runCombine({
        dir: requireFlag(flags, 'dir'),
        outputPath: flags.out,
      });
      break;
    }

    default:
      printUsage();
  }
}

main().catch(err => {
  console.error('Fatal error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
