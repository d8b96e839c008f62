import { Matchup, Participant, RawWinnerMap } from '../../src/core/types';
import { createTournament } from '../../src/bracket/bracket-builder';
import { Tournament, TournamentData } from '../../src/bracket/types';

/** First-round matchups pairing names in order; seeds follow list position. */
export function makeMatchups(names: string[]): Matchup[] {
  const matchups: Matchup[] = [];
  for (let i = 0; i + 1 < names.length; i += 2) {
    matchups.push({
      players: [
        { seed: String(i + 1), name: names[i] },
        { seed: String(i + 2), name: names[i + 1] },
      ],
    });
  }
  return matchups;
}

/** 8-entrant "mens" draw played as qf / sf / f with the standard points. */
export function makeEightDraw(): Tournament {
  return createTournament({
    draws: { mens: makeMatchups(['P1', 'P2', 'P3', 'P4', 'P5', 'P6', 'P7', 'P8']) },
  });
}

export function fourEntrantData(): TournamentData {
  return {
    draws: {
      cat: [
        { players: [{ seed: '1', name: 'A' }, { seed: '4', name: 'B' }] },
        { players: [{ seed: '2', name: 'C' }, { seed: '3', name: 'D' }] },
      ],
    },
  };
}

/** 4 entrants A, B, C, D played as r16 then f, worth 3 and 13. */
export function makeFourDraw(): Tournament {
  return createTournament(fourEntrantData(), { points: { r16: 3, f: 13 }, roundKeys: ['r16', 'f'] });
}

export function participant(name: string, picks: RawWinnerMap, isLocked = true): Participant {
  return { name, isLocked, picks };
}
