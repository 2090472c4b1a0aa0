/**
 * Custom Error Classes
 */

import type { JobState } from '../stateMachine.js';

/**
 * Base error class for all transcoder errors
 */
export class TranscoderError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TranscoderError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Transcode request rejected before anything was spawned
 */
export class InvalidRequestError extends TranscoderError {
  constructor(inputPath: string, reason: string) {
    super(
      `Invalid transcode request for ${inputPath}: ${reason}`,
      'INVALID_REQUEST',
      400,
      { inputPath, reason }
    );
    this.name = 'InvalidRequestError';
  }
}

/**
 * Operation not allowed in the job's current state (e.g. double start)
 */
export class InvalidStateError extends TranscoderError {
  constructor(jobId: string, state: JobState | 'UNKNOWN', operation: string) {
    super(
      `Cannot ${operation} job ${jobId} in state ${state}`,
      'INVALID_STATE',
      409,
      { jobId, state, operation }
    );
    this.name = 'InvalidStateError';
  }
}

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends TranscoderError {
  constructor(
    jobId: string,
    fromState: JobState,
    toState: JobState,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      400,
      { jobId, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * Not found error for missing resources
 */
export class NotFoundError extends TranscoderError {
  constructor(resource: string, identifier: string) {
    super(
      `${resource} not found: ${identifier}`,
      'NOT_FOUND',
      404,
      { resource, identifier }
    );
    this.name = 'NotFoundError';
  }
}

/**
 * Environment configuration failed validation
 */
export class ConfigurationError extends TranscoderError {
  constructor(issues: string[]) {
    super(
      `Invalid configuration: ${issues.join('; ')}`,
      'CONFIGURATION_ERROR',
      500,
      { issues }
    );
    this.name = 'ConfigurationError';
  }
}
