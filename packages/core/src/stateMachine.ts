/**
 * Job State Machine
 * 
 * Strict state machine for transcode job lifecycle management.
 * 
 * State Flow:
 * IDLE → PROBING → RUNNING → COMPLETED
 *                ↘        ↘ FAILED
 *                 ↘ CANCELLED (from PROBING or RUNNING)
 * 
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 * - Terminal states are never left
 */

import { StateTransitionError } from './errors/index.js';

export const JobState = {
  IDLE: 'IDLE',
  PROBING: 'PROBING',
  RUNNING: 'RUNNING',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
  CANCELLED: 'CANCELLED',
} as const;

export type JobState = typeof JobState[keyof typeof JobState];

/**
 * A recorded state transition
 */
export interface JobStateTransition {
  from: JobState;
  to: JobState;
  timestamp: Date;
  reason?: string;
}

/**
 * Valid state transitions
 * Maps each state to the set of states it can transition to
 */
const validTransitions: Record<JobState, ReadonlySet<JobState>> = {
  IDLE: new Set<JobState>([
    'PROBING',
    'CANCELLED',
    'FAILED',
  ]),
  PROBING: new Set<JobState>([
    'RUNNING',
    'CANCELLED',
    'FAILED',
  ]),
  RUNNING: new Set<JobState>([
    'COMPLETED',
    'CANCELLED',
    'FAILED',
  ]),
  COMPLETED: new Set<JobState>([]),
  FAILED: new Set<JobState>([]),
  CANCELLED: new Set<JobState>([]),
};

const terminalStates: ReadonlySet<JobState> = new Set<JobState>([
  'COMPLETED',
  'FAILED',
  'CANCELLED',
]);

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: JobState, to: JobState): boolean {
  return validTransitions[from].has(to);
}

export function isTerminalState(state: JobState): boolean {
  return terminalStates.has(state);
}

/**
 * Job State Machine class
 * Manages state transitions with validation
 */
export class JobStateMachine {
  private currentState: JobState;
  private history: JobStateTransition[];
  private readonly jobId: string;

  constructor(jobId: string, initialState: JobState = 'IDLE') {
    this.jobId = jobId;
    this.currentState = initialState;
    this.history = [];
  }

  /**
   * Get the current state
   */
  getState(): JobState {
    return this.currentState;
  }

  /**
   * Get the full transition history
   */
  getHistory(): ReadonlyArray<JobStateTransition> {
    return [...this.history];
  }

  /**
   * Check if a transition to the target state is valid
   */
  canTransitionTo(targetState: JobState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(targetState: JobState, reason?: string): JobStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(
        this.jobId,
        this.currentState,
        targetState
      );
    }

    const transition: JobStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
    };

    this.history.push(transition);
    this.currentState = targetState;

    return transition;
  }

  /**
   * Check if the job is in a terminal state
   */
  isTerminal(): boolean {
    return isTerminalState(this.currentState);
  }
}
