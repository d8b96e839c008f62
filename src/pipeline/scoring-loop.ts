import { Participant } from '../core/types';
import { Tournament } from '../bracket/types';
import { buildViewerData } from '../engine/viewer-builder';
import { ViewerData } from '../engine/types';
import { eventBus, ResultsUpdatedPayload } from '../ingestion/event-bus';

export interface ScoringLoopOptions {
  tournamentId: string;
  tournament: Tournament;
  /** Current participants; read afresh on every results update. */
  participants: () => readonly Participant[];
  /** Score unlocked participants too. Off for the live entry service. */
  includeUnlocked?: boolean;
  silent?: boolean;
}

/**
 * Rescores a tournament whenever its results change and publishes the new
 * viewer document on the event bus.
 */
export class ScoringLoop {
  private readonly tournamentId: string;
  private readonly tournament: Tournament;
  private readonly participants: () => readonly Participant[];
  private readonly includeUnlocked: boolean;
  private readonly silent: boolean;

  private isRunning = false;
  private latest: ViewerData | null = null;

  // Bound handler for event bus (needed for cleanup)
  private onResultsUpdatedBound: (payload: ResultsUpdatedPayload) => void;

  constructor(options: ScoringLoopOptions) {
    this.tournamentId = options.tournamentId;
    this.tournament = options.tournament;
    this.participants = options.participants;
    this.includeUnlocked = options.includeUnlocked ?? false;
    this.silent = options.silent ?? false;

    this.onResultsUpdatedBound = this.onResultsUpdated.bind(this);
  }

  start(): void {
    if (this.isRunning) return;
    this.isRunning = true;

    eventBus.on('results-updated', this.onResultsUpdatedBound);
    if (!this.silent) console.log(`[ScoringLoop] Started (tournament: ${this.tournamentId})`);
  }

  stop(): void {
    if (!this.isRunning) return;
    this.isRunning = false;

    eventBus.off('results-updated', this.onResultsUpdatedBound);
    if (!this.silent) console.log('[ScoringLoop] Stopped');
  }

  private onResultsUpdated(payload: ResultsUpdatedPayload): void {
    if (payload.tournamentId !== this.tournamentId) return;

    const startTime = Date.now();
    try {
      const participants = this.participants();
      const viewer = buildViewerData(this.tournament, payload.results, participants, {
        lockedOnly: !this.includeUnlocked,
      });
      this.latest = viewer;

      const elapsedMs = Date.now() - startTime;
      if (!this.silent) {
        console.log(
          `[ScoringLoop] Scored ${viewer.participants.length} participants ` +
          `(${Object.keys(viewer.actualResults).length} results) in ${elapsedMs}ms`,
        );
      }
      eventBus.emit('viewer-published', { tournamentId: this.tournamentId, viewer, elapsedMs });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error('[ScoringLoop] Scoring error:', message);
      eventBus.emit('scoring-failed', { tournamentId: this.tournamentId, error: message });
    }
  }

  get latestViewer(): ViewerData | null {
    return this.latest;
  }

  get running(): boolean {
    return this.isRunning;
  }
}
