import { Category, Entrant, Matchup } from '../core/types';
import { PLACEHOLDER_NAME } from '../core/constants';
import { DataFileError } from '../core/errors';
import { TournamentData } from '../bracket/types';

type Half = 'top' | 'bottom';

interface CategoryHalves {
  top: Matchup[];
  bottom: Matchup[];
  topDay?: number;
  bottomDay?: number;
}

export interface ParseEntrantsOptions {
  categories: string[];
  /**
   * Matches per half. When set, an empty half is filled with placeholder
   * matches and any other half must have exactly this many.
   */
  halfSize?: number;
  source?: string;
}

const HALF_HEADER = /^(top|bottom)\s+half\s*(?:\(\s*day\s*(\d+)\s*\))?$/i;
const VERSUS = /\s+vs\.?\s+/i;
const SEEDED_PLAYER = /^\((.*?)\)\s*(.*)$/;

/** "(3) Jane Doe" → { seed: "3", name: "Jane Doe" }; the seed is optional. */
export function parsePlayer(text: string): Entrant {
  const trimmed = text.trim();
  const seeded = SEEDED_PLAYER.exec(trimmed);
  if (seeded) {
    return { seed: seeded[1].trim(), name: seeded[2].trim() };
  }
  return { seed: '', name: trimmed };
}

function placeholderMatch(day?: number): Matchup {
  const matchup: Matchup = {
    players: [{ seed: '', name: PLACEHOLDER_NAME }, { seed: '', name: PLACEHOLDER_NAME }],
  };
  if (day !== undefined) matchup.day = day;
  return matchup;
}

/**
 * Parse an entrants text file:
 *
 *   mens
 *   Top Half (Day 1)
 *   (1) Jane Doe vs Ann Smith
 *   ...
 *   Bottom Half (Day 2)
 *   ...
 *   womens
 *   ...
 *
 * Category lines switch the current draw. Half headers are optional; without
 * them every matchup lands in the top half with no play day.
 */
export function parseEntrants(text: string, options: ParseEntrantsOptions): TournamentData {
  const source = options.source ?? 'entrants';
  if (options.halfSize !== undefined && (!Number.isInteger(options.halfSize) || options.halfSize < 1)) {
    throw new Error(`Half size must be a positive integer, got ${options.halfSize}`);
  }
  const categories = new Map<string, CategoryHalves>();
  for (const category of options.categories) {
    categories.set(category.toLowerCase(), { top: [], bottom: [] });
  }

  let current: CategoryHalves | null = null;
  let half: Half = 'top';

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    const categoryHalves = categories.get(line.toLowerCase());
    if (categoryHalves) {
      current = categoryHalves;
      half = 'top';
      continue;
    }
    if (!current) continue;

    const header = HALF_HEADER.exec(line);
    if (header) {
      half = header[1].toLowerCase() === 'bottom' ? 'bottom' : 'top';
      if (header[2] !== undefined) {
        const day = parseInt(header[2], 10);
        if (half === 'top') current.topDay = day;
        else current.bottomDay = day;
      }
      continue;
    }

    const parts = line.split(VERSUS);
    if (parts.length !== 2) continue;

    const day = half === 'top' ? current.topDay : current.bottomDay;
    const matchup: Matchup = { players: [parsePlayer(parts[0]), parsePlayer(parts[1])] };
    if (day !== undefined) matchup.day = day;
    current[half].push(matchup);
  }

  const draws: Record<Category, Matchup[]> = {};
  for (const [category, halves] of categories) {
    if (options.halfSize !== undefined) {
      fillAndCheckHalves(category, halves, options.halfSize, source);
    }
    const matchups = [...halves.top, ...halves.bottom];
    if (matchups.length > 0) draws[category] = matchups;
  }
  return { draws };
}

function fillAndCheckHalves(category: string, halves: CategoryHalves, halfSize: number, source: string): void {
  for (const half of ['top', 'bottom'] as const) {
    const day = half === 'top' ? halves.topDay : halves.bottomDay;
    if (halves[half].length === 0) {
      halves[half] = Array.from({ length: halfSize }, () => placeholderMatch(day));
    } else if (halves[half].length !== halfSize) {
      throw new DataFileError(
        source,
        `${category} ${half} half has ${halves[half].length} matchups; each half must have exactly ${halfSize}`,
      );
    }
  }
}

/** Tournament data in the on-disk shape: `{ "<category>_draw": [{ players, day }] }`. */
export function serializeTournamentData(data: TournamentData): Record<string, unknown[]> {
  const out: Record<string, unknown[]> = {};
  for (const [category, matchups] of Object.entries(data.draws)) {
    out[`${category}_draw`] = matchups.map(m => ({
      players: m.players.map(p => [p.seed, p.name]),
      ...(m.day !== undefined ? { day: m.day } : {}),
    }));
  }
  return out;
}

/** Names in a draw, without placeholders. */
export function collectPlayerNames(data: TournamentData): Set<string> {
  const names = new Set<string>();
  for (const matchups of Object.values(data.draws)) {
    for (const matchup of matchups) {
      for (const player of matchup.players) {
        if (player.name && player.name.toUpperCase() !== PLACEHOLDER_NAME) names.add(player.name);
      }
    }
  }
  return names;
}
