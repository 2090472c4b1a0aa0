/**
 * Job Types
 * 
 * Shapes shared between the orchestrator and its callers.
 */

import type { JobState } from '../stateMachine.js';

export const TRANSCODE_MODES = ['fast', 'standard', 'compressed', 'hardware'] as const;

export type TranscodeMode = typeof TRANSCODE_MODES[number];

export function isTranscodeMode(value: string): value is TranscodeMode {
  return TRANSCODE_MODES.some((mode) => mode === value);
}

export interface TranscodeRequest {
  readonly inputPath: string;
  /** Unknown modes resolve to the default profile */
  readonly mode: TranscodeMode | (string & {});
  readonly outputPath?: string;
  /** Caller-chosen job id; generated when omitted */
  readonly id?: string;
}

export type HardwareEncoder = 'mediacodec' | 'videotoolbox' | 'nvenc' | 'qsv';

export interface PlatformCapabilities {
  readonly hardwareEncoder: HardwareEncoder | null;
}

export interface CommandProfile {
  readonly key: string;
  readonly description: string;
  /** Container file extension, without the dot */
  readonly extension: 'webm' | 'mp4';
  readonly videoCodec: string;
  readonly crf?: number;
  readonly videoBitrate?: string;
  readonly threads?: number;
  readonly audioCodec: string;
  readonly audioBitrate?: string;
  readonly overwrite: boolean;
  readonly hardware: boolean;
  /** Declared output path; the last argument */
  readonly outputPath: string;
  /** Full ffmpeg argument list, input and output included */
  readonly args: readonly string[];
}

export interface ProgressSnapshot {
  /** 0..1, never decreases for a job */
  readonly fraction: number;
  readonly processedMs: number;
  /** null until enough progress has been made to estimate */
  readonly etaMs: number | null;
  readonly sizeBytes: number;
  readonly durationMs: number | null;
  readonly elapsedMs: number;
}

/** `io`: the output location could not be prepared or inspected */
export type FailureKind = 'process' | 'stall' | 'spawn' | 'io';

export interface FailureDiagnostic {
  readonly kind: FailureKind;
  readonly message: string;
  readonly exitCode: number | null;
  readonly signal: string | null;
  readonly logExcerpt: readonly string[];
}

interface TerminalResultBase {
  readonly jobId: string;
  readonly outputPath: string;
  readonly inputSizeBytes: number;
  readonly elapsedMs: number;
}

export interface SuccessResult extends TerminalResultBase {
  readonly outcome: 'success';
  readonly outputSizeBytes: number;
  readonly compressionRatio: number;
  /** Media seconds processed per wall-clock second, when duration is known */
  readonly speedRatio: number | null;
}

export interface FailureResult extends TerminalResultBase {
  readonly outcome: 'failure';
  readonly diagnostic: FailureDiagnostic;
}

export interface CancelledResult extends TerminalResultBase {
  readonly outcome: 'cancelled';
}

export type TerminalResult = SuccessResult | FailureResult | CancelledResult;

export type JobEvent =
  | { readonly type: 'progress'; readonly jobId: string; readonly snapshot: ProgressSnapshot }
  | { readonly type: 'terminal'; readonly jobId: string; readonly result: TerminalResult };

export interface JobHandle {
  readonly id: string;
  readonly outputPath: string;
  readonly profile: CommandProfile;
}

export interface JobStatus {
  readonly id: string;
  readonly state: JobState;
  readonly request: TranscodeRequest;
  readonly profile: CommandProfile;
  readonly outputPath: string;
  readonly durationMs: number | null;
  readonly progress: ProgressSnapshot | null;
  readonly result: TerminalResult | null;
  readonly createdAt: Date;
}

export interface CancelAck {
  readonly jobId: string;
  readonly state: JobState;
}
