import path from 'path';
import { PointsTable, RoundKey } from './core/types';
import { ScoringConfigError } from './core/errors';
import { DEFAULT_CATEGORIES } from './core/constants';
import { getPresetPoints, isRoundKey, parsePointsOverride } from './core/scoring-config';

export const CONFIG = {
  // Paths
  OUTPUT_DIR: process.env.OUTPUT_DIR || path.resolve(__dirname, '..', 'output'),
  TOURNAMENT_DATA_PATH: process.env.TOURNAMENT_DATA_PATH || path.resolve(__dirname, '..', 'data', 'tournament_data.json'),

  // Offline prediction files
  PREDICTION_SUFFIX: process.env.PREDICTION_SUFFIX || '_predictions.csv',
  RESULTS_FILENAME: process.env.RESULTS_FILENAME || 'actual_results_predictions.csv',

  // Scoring
  POINTS_PRESET: process.env.POINTS_PRESET || 'standard',
  POINTS_OVERRIDE: process.env.POINTS_OVERRIDE || '',        // e.g. "r64:1,r32:2,r16:3,qf:5,sf:8,f:13"
  ROUND_KEYS: (process.env.ROUND_KEYS || '').split(',').map(s => s.trim()).filter(Boolean),

  // Draw setup
  CATEGORIES: process.env.CATEGORIES
    ? process.env.CATEGORIES.split(',').map(s => s.trim()).filter(Boolean)
    : [...DEFAULT_CATEGORIES],
  HALF_SIZE: Number(process.env.HALF_SIZE || '8'),

  DEBUG: process.env.DEBUG === 'true',
};

/** Points table from POINTS_OVERRIDE when set, else from POINTS_PRESET. */
export function resolvePointsTable(): PointsTable {
  if (CONFIG.POINTS_OVERRIDE) return parsePointsOverride(CONFIG.POINTS_OVERRIDE);
  return getPresetPoints(CONFIG.POINTS_PRESET);
}

export function resolveRoundKeys(): RoundKey[] | undefined {
  if (CONFIG.ROUND_KEYS.length === 0) return undefined;
  const unknown = CONFIG.ROUND_KEYS.filter(k => !isRoundKey(k));
  if (unknown.length > 0) {
    throw new ScoringConfigError(`Unknown round keys in ROUND_KEYS: ${unknown.join(', ')}`);
  }
  return CONFIG.ROUND_KEYS.filter(isRoundKey);
}
