export interface PlayerRename {
  from: string;
  to: string;
  similarity: number;
}

export interface DrawComparison {
  renamed: PlayerRename[];
  added: string[];
  removed: string[];
}

export const RENAME_SIMILARITY_CUTOFF = 0.8;

function matchingCharacters(a: string, b: string): number {
  if (!a || !b) return 0;

  // Longest common substring, then recurse on both sides of it
  let bestLength = 0;
  let bestA = 0;
  let bestB = 0;
  let previous = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    const row = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      if (a[i - 1] === b[j - 1]) {
        row[j] = previous[j - 1] + 1;
        if (row[j] > bestLength) {
          bestLength = row[j];
          bestA = i - bestLength;
          bestB = j - bestLength;
        }
      }
    }
    previous = row;
  }
  if (bestLength === 0) return 0;

  return bestLength
    + matchingCharacters(a.slice(0, bestA), b.slice(0, bestB))
    + matchingCharacters(a.slice(bestA + bestLength), b.slice(bestB + bestLength));
}

/** Ratcliff/Obershelp similarity in [0, 1]. */
export function nameSimilarity(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * matchingCharacters(a, b)) / total;
}

/**
 * Compare the player names of two versions of a draw. A removed name whose
 * closest added name scores at least `cutoff` is reported as a rename; each
 * added name is used for at most one rename.
 */
export function compareDrawPlayers(
  previous: ReadonlySet<string>,
  next: ReadonlySet<string>,
  cutoff = RENAME_SIMILARITY_CUTOFF,
): DrawComparison {
  const added = new Set([...next].filter(name => !previous.has(name)));
  const removed = [...previous].filter(name => !next.has(name)).sort();
  const renamed: PlayerRename[] = [];
  const stillRemoved: string[] = [];

  for (const from of removed) {
    let best: PlayerRename | null = null;
    for (const to of [...added].sort()) {
      const similarity = nameSimilarity(from, to);
      if (similarity >= cutoff && (!best || similarity > best.similarity)) {
        best = { from, to, similarity };
      }
    }
    if (best) {
      renamed.push(best);
      added.delete(best.to);
    } else {
      stillRemoved.push(from);
    }
  }

  return { renamed, added: [...added].sort(), removed: stillRemoved };
}
