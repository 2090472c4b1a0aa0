/**
 * @transcoder/processing
 *
 * Transcode execution layer: profiles, ffmpeg process handling, telemetry
 * parsing, progress tracking and the job orchestrator.
 */

// Orchestrator
export {
  JobOrchestrator,
  computeCompressionRatio,
  type JobOrchestratorOptions,
  type MediaProber,
  type StateChangeEvent,
} from './orchestrator.js';

// Profiles
export {
  DEFAULT_PROFILE,
  PROFILE_TABLE,
  selectProfile,
  resolveProfile,
  listProfiles,
  detectPlatformCapabilities,
  type ProfileDefinition,
  type ProfilePaths,
  type ProfileListing,
} from './profiles.js';

// Command Builder
export {
  FFmpegCommandBuilder,
  type VideoCodecOptions,
  type AudioCodecOptions,
} from './commandBuilder.js';

// FFmpeg process
export {
  FFmpegLauncher,
  LineSplitter,
  ProgressBlockReader,
  type ProcessExit,
  type TranscodeInvocation,
  type TranscodeProcessHandle,
  type TranscodeLauncher,
} from './ffmpeg.js';

// Probe
export { ProbeService, type ProbeServiceOptions } from './probe.js';

// Telemetry
export {
  parseLogLine,
  parseStatistics,
  parseDuration,
  type TelemetryChannel,
  type TimeMarker,
  type StatisticsSnapshot,
} from './telemetryParser.js';

export {
  ProgressTracker,
  ETA_MIN_FRACTION,
  type ProgressTrackerOptions,
} from './progressTracker.js';

export { JobEventChannel } from './eventStream.js';
