import { Category, Entrant, Matchup, MatchRef, RoundDefinition } from '../core/types';
import { BracketTopologyError } from '../core/errors';
import { formatMatchKey } from './match-key';

/**
 * Immutable single-elimination draw for one category.
 *
 * Round 0 holds the static first-round pairs. Match j of round i+1 is fed by
 * matches 2j and 2j+1 of round i; the last round has exactly one match.
 */
export class BracketTopology {
  readonly entrantCount: number;
  private readonly matchups: readonly Matchup[];

  constructor(
    readonly category: Category,
    matchups: readonly Matchup[],
    readonly rounds: readonly RoundDefinition[],
  ) {
    const entrantCount = matchups.length * 2;
    if (entrantCount < 2 || (entrantCount & (entrantCount - 1)) !== 0) {
      throw new BracketTopologyError(
        `Draw "${category}" has ${entrantCount} entrants; a single-elimination draw needs a power of two`,
      );
    }
    if (rounds.length !== Math.log2(entrantCount)) {
      throw new BracketTopologyError(
        `Draw "${category}" has ${entrantCount} entrants but ${rounds.length} rounds are configured`,
      );
    }

    this.entrantCount = entrantCount;
    this.matchups = matchups;
  }

  get roundCount(): number {
    return this.rounds.length;
  }

  matchCount(roundIndex: number): number {
    this.assertRound(roundIndex);
    return this.entrantCount / (2 * 2 ** roundIndex);
  }

  hasMatch(roundIndex: number, matchIndex: number): boolean {
    return Number.isInteger(roundIndex)
      && roundIndex >= 0
      && roundIndex < this.rounds.length
      && Number.isInteger(matchIndex)
      && matchIndex >= 0
      && matchIndex < this.matchCount(roundIndex);
  }

  /**
   * Indices, in round `roundIndex - 1`, of the two matches whose winners meet
   * in match `matchIndex` of round `roundIndex`.
   */
  feederIndices(roundIndex: number, matchIndex: number): [number, number] {
    this.assertMatch(roundIndex, matchIndex);
    if (roundIndex === 0) {
      throw new BracketTopologyError(`First-round matches of "${this.category}" have no feeders`);
    }
    return [matchIndex * 2, matchIndex * 2 + 1];
  }

  firstRoundPair(matchIndex: number): [Entrant, Entrant] {
    this.assertMatch(0, matchIndex);
    const [a, b] = this.matchups[matchIndex].players;
    return [a, b];
  }

  getMatchups(): readonly Matchup[] {
    return this.matchups;
  }

  matchKey(roundIndex: number, matchIndex: number): string {
    this.assertMatch(roundIndex, matchIndex);
    return formatMatchKey({ category: this.category, roundIndex, matchIndex }, this.rounds);
  }

  /** Every entrant in both slots of every first-round match. */
  entrants(): Entrant[] {
    return this.matchups.flatMap(m => [m.players[0], m.players[1]]);
  }

  seedMap(): Record<string, string> {
    const seeds: Record<string, string> = {};
    for (const entrant of this.entrants()) {
      seeds[entrant.name] = entrant.seed;
    }
    return seeds;
  }

  contains(ref: MatchRef): boolean {
    return ref.category === this.category && this.hasMatch(ref.roundIndex, ref.matchIndex);
  }

  assertMatch(roundIndex: number, matchIndex: number): void {
    this.assertRound(roundIndex);
    if (!this.hasMatch(roundIndex, matchIndex)) {
      throw new BracketTopologyError(
        `Match index ${matchIndex} is out of range for ${this.category} ${this.rounds[roundIndex].key} ` +
        `(0-${this.matchCount(roundIndex) - 1})`,
      );
    }
  }

  private assertRound(roundIndex: number): void {
    if (!Number.isInteger(roundIndex) || roundIndex < 0 || roundIndex >= this.rounds.length) {
      throw new BracketTopologyError(
        `Round index ${roundIndex} is out of range for "${this.category}" (0-${this.rounds.length - 1})`,
      );
    }
  }
}
