import { describe, it, expect, beforeEach } from 'vitest';
import { eventBus } from '../../src/ingestion/event-bus';
import type { ResultsUpdatedPayload, ScoringFailedPayload } from '../../src/ingestion/event-bus';

describe('event-bus', () => {
  beforeEach(() => {
    eventBus.removeAllListeners();
  });

  it('emits and receives typed events', () => {
    let received: ResultsUpdatedPayload | null = null;

    eventBus.on('results-updated', (payload) => {
      received = payload;
    });

    const payload: ResultsUpdatedPayload = {
      tournamentId: 'spring-open',
      results: { 'mens-f-match-0': ['1', 'Ann'] },
    };

    eventBus.emit('results-updated', payload);
    expect(received).toEqual(payload);
  });

  it('supports multiple listeners for the same event', () => {
    let count = 0;
    const listener1 = () => { count++; };
    const listener2 = () => { count++; };

    eventBus.on('scoring-failed', listener1);
    eventBus.on('scoring-failed', listener2);

    const payload: ScoringFailedPayload = { tournamentId: 'spring-open', error: 'boom' };
    eventBus.emit('scoring-failed', payload);

    expect(count).toBe(2);
    expect(eventBus.listenerCount('scoring-failed')).toBe(2);
  });

  it('off() unsubscribes correctly', () => {
    let count = 0;
    const listener = () => { count++; };

    eventBus.on('results-updated', listener);
    eventBus.emit('results-updated', { tournamentId: 'a', results: {} });
    expect(count).toBe(1);

    eventBus.off('results-updated', listener);
    eventBus.emit('results-updated', { tournamentId: 'b', results: {} });
    expect(count).toBe(1);
  });

  it('removeAllListeners clears everything', () => {
    let count = 0;

    eventBus.on('results-updated', () => { count++; });
    eventBus.on('scoring-failed', () => { count++; });

    eventBus.removeAllListeners();

    eventBus.emit('results-updated', { tournamentId: 'x', results: {} });
    eventBus.emit('scoring-failed', { tournamentId: 'x', error: 'boom' });

    expect(count).toBe(0);
  });
});
