import { describe, it, expect } from 'vitest';
import { scoreParticipant } from '../../src/engine/scoring';
import { getActivePlayers, getEliminatedPlayers } from '../../src/engine/elimination';
import { makeEightDraw } from '../helpers/fixtures';

const tournament = makeEightDraw();
const points = tournament.config.points;
const results = { 'mens-qf-match-0': 'P1', 'mens-qf-match-1': 'P4' };
const active = getActivePlayers(tournament, getEliminatedPlayers(tournament, results));

describe('scoreParticipant', () => {
  it('splits picks into current and potential points', () => {
    const picks = {
      'mens-qf-match-0': 'P1', // correct, +5
      'mens-qf-match-1': 'P3', // wrong
      'mens-sf-match-0': 'P1', // undecided, P1 still in, +8 potential
      'mens-f-match-0': 'P3', // undecided, P3 out
      'mens-qf-match-2': 'P5', // undecided, +5 potential
    };
    expect(scoreParticipant(picks, results, active, points)).toEqual({
      current: 5,
      potential: 13,
      max: 18,
      byRound: { qf: { correct: 1, points: 5 } },
    });
  });

  it('adds up correct picks per round', () => {
    const decided = { ...results, 'mens-qf-match-2': 'P5', 'mens-sf-match-0': 'P4' };
    const picks = { 'mens-qf-match-0': 'P1', 'mens-qf-match-2': 'P5', 'mens-sf-match-0': 'P4' };
    const breakdown = scoreParticipant(picks, decided, active, points);
    expect(breakdown.current).toBe(18);
    expect(breakdown.byRound).toEqual({
      qf: { correct: 2, points: 10 },
      sf: { correct: 1, points: 8 },
    });
  });

  it('scores picks on unknown rounds and non-match keys as 0', () => {
    const picks = { 'mens-zz-match-0': 'P1', notes: 'P4' };
    const breakdown = scoreParticipant(picks, { 'mens-zz-match-0': 'P1', notes: 'P4' }, active, points);
    expect(breakdown).toEqual({ current: 0, potential: 0, max: 0, byRound: {} });
  });

  it('scores an empty pick set as zero', () => {
    expect(scoreParticipant({}, results, active, points)).toEqual({ current: 0, potential: 0, max: 0, byRound: {} });
  });

  it('does not depend on pick order', () => {
    const picks = { 'mens-qf-match-0': 'P1', 'mens-sf-match-1': 'P6', 'mens-qf-match-1': 'P4' };
    const reversed = Object.fromEntries(Object.entries(picks).reverse());
    expect(scoreParticipant(reversed, results, active, points)).toEqual(scoreParticipant(picks, results, active, points));
  });
});
