import { EventEmitter } from 'events';
import { RawWinnerMap } from '../core/types';
import { ViewerData } from '../engine/types';

// === Typed Event Payloads ===

export interface ResultsUpdatedPayload {
  tournamentId: string;
  results: RawWinnerMap;
}

export interface ViewerPublishedPayload {
  tournamentId: string;
  viewer: ViewerData;
  elapsedMs: number;
}

export interface ScoringFailedPayload {
  tournamentId: string;
  error: string;
}

// === Event Map ===

export interface ScoringEventMap {
  'results-updated': ResultsUpdatedPayload;
  'viewer-published': ViewerPublishedPayload;
  'scoring-failed': ScoringFailedPayload;
}

// === Typed Event Bus ===

class TypedEventBus {
  private emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(50);
  }

  on<K extends keyof ScoringEventMap>(
    event: K,
    listener: (payload: ScoringEventMap[K]) => void,
  ): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof ScoringEventMap>(
    event: K,
    listener: (payload: ScoringEventMap[K]) => void,
  ): void {
    this.emitter.off(event, listener);
  }

  emit<K extends keyof ScoringEventMap>(
    event: K,
    payload: ScoringEventMap[K],
  ): void {
    this.emitter.emit(event, payload);
  }

  listenerCount<K extends keyof ScoringEventMap>(event: K): number {
    return this.emitter.listenerCount(event);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}

// Singleton export
export const eventBus = new TypedEventBus();
