/**
 * @transcoder/core
 * 
 * Core domain package containing:
 * - Job state machine
 * - Shared job, profile and result types
 * - Error handling
 * - Configuration
 */

// State machine
export { 
  JobState, 
  JobStateMachine,
  isValidTransition,
  isTerminalState,
} from './stateMachine.js';

export type { 
  JobStateTransition, 
} from './stateMachine.js';

// Types
export {
  TRANSCODE_MODES,
  isTranscodeMode,
} from './types/job.js';

export type {
  TranscodeMode,
  TranscodeRequest,
  HardwareEncoder,
  PlatformCapabilities,
  CommandProfile,
  ProgressSnapshot,
  FailureKind,
  FailureDiagnostic,
  SuccessResult,
  FailureResult,
  CancelledResult,
  TerminalResult,
  JobEvent,
  JobHandle,
  JobStatus,
  CancelAck,
} from './types/job.js';

// Errors
export { 
  TranscoderError,
  InvalidRequestError,
  InvalidStateError,
  StateTransitionError,
  NotFoundError,
  ConfigurationError,
} from './errors/index.js';

// Configuration
export {
  loadConfig,
  type TranscoderConfig,
  type HardwareEncoderSetting,
} from './config/index.js';

export {
  resolveBinaryPath,
  getBinaryFolders,
  type BinaryConfig,
  type BinarySource,
} from './config/binaries.js';
