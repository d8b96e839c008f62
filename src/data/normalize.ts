import { z } from 'zod';
import { ActualResults, Picks } from '../core/types';
import { NO_PICK } from '../core/constants';

/** A winner is stored either as a bare name or as a `[seed, name]` pair. */
export const rawWinnerSchema = z.union([
  z.string(),
  z.tuple([z.string(), z.string()]),
]);

/**
 * Reduce a stored winner to its bare, trimmed name.
 * Returns null for blanks, the "NONE" marker, and values of any other shape.
 */
export function normalizeWinner(value: unknown): string | null {
  const parsed = rawWinnerSchema.safeParse(value);
  if (!parsed.success) return null;

  const name = (typeof parsed.data === 'string' ? parsed.data : parsed.data[1]).trim();
  if (name === '' || name === NO_PICK) return null;
  return name;
}

function normalizeWinnerMap(raw: Readonly<Record<string, unknown>>): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    const matchKey = key.trim();
    const name = normalizeWinner(value);
    if (matchKey && name !== null) normalized[matchKey] = name;
  }
  return normalized;
}

export function normalizeResults(raw: Readonly<Record<string, unknown>>): ActualResults {
  return normalizeWinnerMap(raw);
}

export function normalizePicks(raw: Readonly<Record<string, unknown>>): Picks {
  return normalizeWinnerMap(raw);
}
