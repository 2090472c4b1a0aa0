/**
 * Progress Tracker
 * 
 * Per-job accumulator turning time markers into monotonic progress and an
 * ETA. One instance per job; it is the only writer of that job's progress.
 */

import type { ProgressSnapshot } from '@transcoder/core';
import type { TimeMarker } from './telemetryParser.js';

/** ETA is withheld until progress passes this fraction */
export const ETA_MIN_FRACTION = 0.05;

export interface ProgressTrackerOptions {
  durationMs: number | null;
  /** Ignore log-channel markers once statistics have arrived */
  preferStatistics?: boolean;
  now?: () => number;
}

export class ProgressTracker {
  private readonly durationMs: number | null;
  private readonly preferStatistics: boolean;
  private readonly now: () => number;
  private readonly startedAt: number;

  private processedMs = 0;
  private fraction = 0;
  private etaMs: number | null = null;
  private sizeBytes = 0;
  private sawStatistics = false;

  constructor(options: ProgressTrackerOptions) {
    this.durationMs = options.durationMs !== null && options.durationMs > 0
      ? options.durationMs
      : null;
    this.preferStatistics = options.preferStatistics ?? true;
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();
  }

  update(marker: TimeMarker): ProgressSnapshot {
    if (marker.channel === 'statistics') {
      this.sawStatistics = true;
    } else if (this.preferStatistics && this.sawStatistics) {
      return this.snapshot();
    }

    // Channels may deliver out of order; processed time never regresses
    this.processedMs = Math.max(this.processedMs, marker.timeMs);
    if (marker.sizeBytes !== undefined) {
      this.sizeBytes = Math.max(this.sizeBytes, marker.sizeBytes);
    }

    if (this.durationMs !== null) {
      const next = Math.min(1, Math.max(0, this.processedMs / this.durationMs));
      this.fraction = Math.max(this.fraction, next);
    }

    if (this.fraction > ETA_MIN_FRACTION) {
      const elapsed = this.elapsedMs();
      const totalEstimate = elapsed / this.fraction;
      this.etaMs = Math.max(totalEstimate - elapsed, 0);
    }

    return this.snapshot();
  }

  snapshot(): ProgressSnapshot {
    return Object.freeze({
      fraction: this.fraction,
      processedMs: this.processedMs,
      etaMs: this.etaMs,
      sizeBytes: this.sizeBytes,
      durationMs: this.durationMs,
      elapsedMs: this.elapsedMs(),
    });
  }

  private elapsedMs(): number {
    return Math.max(0, this.now() - this.startedAt);
  }
}
