/**
 * Telemetry Parser
 * 
 * Stateless parsing of the two telemetry channels a running transcode emits:
 * free-text log lines and structured statistics snapshots. Neither channel
 * is ordered relative to the other; ordering is the tracker's concern.
 */

import { parseTimecode } from '@transcoder/utils';

export type TelemetryChannel = 'log' | 'statistics';

export interface TimeMarker {
  /** Elapsed media time in milliseconds */
  timeMs: number;
  /** Cumulative output bytes, when the channel reports it */
  sizeBytes?: number;
  channel: TelemetryChannel;
}

export interface StatisticsSnapshot {
  timeMs: number;
  sizeBytes: number;
}

// frame=  240 fps= 48 q=30.0 size=    512kB time=00:00:10.00 bitrate= 419.4kbits/s speed=2.01x
const LOG_TIME_PATTERN = /time=(\d+:\d{2}:\d{2}\.\d{2})/;

const DURATION_PATTERN = /Duration:\s*(\d+:\d{2}:\d{2}\.\d{2})/;

/**
 * Extract the media time marker from a log line
 */
export function parseLogLine(line: string): TimeMarker | null {
  const match = LOG_TIME_PATTERN.exec(line);
  if (!match?.[1]) return null;

  const timeMs = parseTimecode(match[1]);
  if (timeMs === null) return null;

  return { timeMs, channel: 'log' };
}

/**
 * Convert a statistics snapshot into a marker; zero or negative time carries
 * no progress information
 */
export function parseStatistics(snapshot: StatisticsSnapshot): TimeMarker | null {
  if (!Number.isFinite(snapshot.timeMs) || snapshot.timeMs <= 0) return null;

  return {
    timeMs: snapshot.timeMs,
    sizeBytes: Number.isFinite(snapshot.sizeBytes) && snapshot.sizeBytes >= 0
      ? snapshot.sizeBytes
      : undefined,
    channel: 'statistics',
  };
}

/**
 * Find the `Duration: HH:MM:SS.cc` token in inspection output
 */
export function parseDuration(output: string): number | null {
  const match = DURATION_PATTERN.exec(output);
  if (!match?.[1]) return null;
  return parseTimecode(match[1]);
}
