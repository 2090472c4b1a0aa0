/**
 * Job Orchestrator
 *
 * Owns the lifecycle of transcode jobs: validates requests, probes the
 * source, spawns one transcoder process per job, routes its telemetry
 * through the job's ProgressTracker and publishes snapshots and exactly one
 * terminal result per job.
 *
 * Every callback for a job (log line, statistics block, exit, stall timer,
 * cancel) runs on the event loop and enters the job through a synchronous
 * handler, so a job's updates are applied one at a time. Registry mutations
 * are synchronous as well; ids are reserved before the first await.
 */

import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';
import { dirname, resolve } from 'node:path';
import {
  InvalidRequestError,
  InvalidStateError,
  JobStateMachine,
  NotFoundError,
  type CancelAck,
  type CommandProfile,
  type FailureKind,
  type JobEvent,
  type JobHandle,
  type JobState,
  type JobStatus,
  type PlatformCapabilities,
  type ProgressSnapshot,
  type TerminalResult,
  type TranscodeRequest,
  type TranscoderConfig,
} from '@transcoder/core';
import {
  createLogger,
  ensureDir,
  getFileSizeBytes,
  isReadableFile,
  removeFile,
  statFileSize,
  type Logger,
} from '@transcoder/utils';
import { JobEventChannel } from './eventStream.js';
import { FFmpegLauncher, type ProcessExit, type TranscodeLauncher, type TranscodeProcessHandle } from './ffmpeg.js';
import { ProbeService } from './probe.js';
import { detectPlatformCapabilities, resolveProfile } from './profiles.js';
import { ProgressTracker } from './progressTracker.js';
import { parseLogLine, parseStatistics, type StatisticsSnapshot, type TimeMarker } from './telemetryParser.js';

const log = createLogger({ component: 'orchestrator' });

export interface MediaProber {
  probe(inputPath: string, signal?: AbortSignal): Promise<number | null>;
}

export interface JobOrchestratorOptions {
  launcher?: TranscodeLauncher;
  prober?: MediaProber;
  capabilities?: PlatformCapabilities;
  /** Default directory for derived output paths; the input's directory otherwise */
  outputDir?: string;
  /** 0 disables stall detection */
  stallTimeoutMs?: number;
  cancelGraceMs?: number;
  logTailLines?: number;
  preferStatistics?: boolean;
  now?: () => number;
  idFactory?: () => string;
}

export interface StateChangeEvent {
  jobId: string;
  from: JobState;
  to: JobState;
  reason?: string;
}

interface JobRecord {
  id: string;
  request: TranscodeRequest;
  inputPath: string;
  profile: CommandProfile;
  machine: JobStateMachine;
  channel: JobEventChannel;
  log: string[];
  logger: Logger;
  abort: AbortController;
  createdAt: Date;
  startedAtMs: number;
  /** Set when the transcoder is spawned; speed is measured from here */
  runningSinceMs: number | null;
  inputSizeBytes: number;
  durationMs: number | null;
  tracker: ProgressTracker | null;
  process: TranscodeProcessHandle | null;
  stallTimer: NodeJS.Timeout | null;
  result: TerminalResult | null;
}

/**
 * (input - output) / input; 0 for an empty input
 */
export function computeCompressionRatio(inputSizeBytes: number, outputSizeBytes: number): number {
  if (inputSizeBytes <= 0) return 0;
  return (inputSizeBytes - outputSizeBytes) / inputSizeBytes;
}

export class JobOrchestrator extends EventEmitter {
  private readonly jobs = new Map<string, JobRecord>();
  private readonly reserved = new Set<string>();

  private readonly launcher: TranscodeLauncher;
  private readonly prober: MediaProber;
  private readonly capabilities: PlatformCapabilities;
  private readonly outputDir: string | undefined;
  private readonly stallTimeoutMs: number;
  private readonly cancelGraceMs: number;
  private readonly logTailLines: number;
  private readonly preferStatistics: boolean;
  private readonly now: () => number;
  private readonly idFactory: () => string;

  constructor(options: JobOrchestratorOptions = {}) {
    super();
    this.launcher = options.launcher ?? new FFmpegLauncher();
    this.prober = options.prober ?? new ProbeService();
    this.capabilities = options.capabilities ?? detectPlatformCapabilities(process.platform);
    this.outputDir = options.outputDir;
    this.stallTimeoutMs = options.stallTimeoutMs ?? 45000;
    this.cancelGraceMs = options.cancelGraceMs ?? 5000;
    this.logTailLines = options.logTailLines ?? 20;
    this.preferStatistics = options.preferStatistics ?? true;
    this.now = options.now ?? Date.now;
    this.idFactory = options.idFactory ?? randomUUID;
  }

  /**
   * Build an orchestrator wired to the real ffmpeg binary
   */
  static fromConfig(
    config: TranscoderConfig,
    overrides: JobOrchestratorOptions = {}
  ): JobOrchestrator {
    return new JobOrchestrator({
      launcher: new FFmpegLauncher(config.mediaTools.ffmpeg),
      prober: new ProbeService({
        ffmpegPath: config.mediaTools.ffmpeg,
        timeoutMs: config.jobs.probeTimeoutMs,
      }),
      capabilities: detectPlatformCapabilities(process.platform, config.hardwareEncoder),
      outputDir: config.outputDir,
      stallTimeoutMs: config.jobs.stallTimeoutMs,
      cancelGraceMs: config.jobs.cancelGraceMs,
      logTailLines: config.jobs.logTailLines,
      ...overrides,
    });
  }

  /**
   * Validate and register a job, then probe and transcode in the background.
   * Resolves as soon as the job is registered.
   */
  async start(request: TranscodeRequest): Promise<JobHandle> {
    const id = request.id ?? this.idFactory();

    const existing = this.jobs.get(id);
    if (existing || this.reserved.has(id)) {
      throw new InvalidStateError(id, existing?.machine.getState() ?? 'IDLE', 'start');
    }
    this.reserved.add(id);

    let job: JobRecord;
    try {
      job = await this.createJob(id, request);
    } finally {
      this.reserved.delete(id);
    }

    this.jobs.set(id, job);
    job.logger.info(
      { input: job.inputPath, output: job.profile.outputPath, profile: job.profile.key },
      'Job registered'
    );
    this.transition(job, 'PROBING');

    this.run(job).catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      job.logger.error({ err: error }, 'Job execution error');
      this.finishFailure(job, 'io', `Output handling failed: ${message}`, null);
    });

    return { id, outputPath: job.profile.outputPath, profile: job.profile };
  }

  /**
   * Stream of progress snapshots ending with the terminal result
   */
  subscribe(jobId: string): AsyncIterableIterator<JobEvent> {
    return this.getJob(jobId).channel.subscribe();
  }

  /**
   * Cancel a probing or running job. Returns immediately; process teardown
   * continues in the background. Cancelling a finished job is a no-op.
   */
  cancel(jobId: string): CancelAck {
    const job = this.getJob(jobId);

    if (job.machine.isTerminal()) {
      return { jobId, state: job.machine.getState() };
    }

    job.abort.abort();
    this.finish(job, {
      jobId,
      outcome: 'cancelled',
      outputPath: job.profile.outputPath,
      inputSizeBytes: job.inputSizeBytes,
      elapsedMs: this.elapsed(job),
    }, 'CANCELLED', 'Cancelled by caller');

    return { jobId, state: job.machine.getState() };
  }

  status(jobId: string): JobStatus {
    return this.toStatus(this.getJob(jobId));
  }

  list(): JobStatus[] {
    return Array.from(this.jobs.values(), (job) => this.toStatus(job));
  }

  /**
   * Forget a finished job
   */
  release(jobId: string): void {
    const job = this.getJob(jobId);
    if (!job.machine.isTerminal()) {
      throw new InvalidStateError(jobId, job.machine.getState(), 'release');
    }
    this.jobs.delete(jobId);
  }

  /**
   * Cancel every job that has not finished
   */
  shutdown(): CancelAck[] {
    const active = Array.from(this.jobs.values()).filter((job) => !job.machine.isTerminal());
    return active.map((job) => this.cancel(job.id));
  }

  private async createJob(id: string, request: TranscodeRequest): Promise<JobRecord> {
    const inputPath = resolve(request.inputPath);

    if (!(await isReadableFile(inputPath))) {
      throw new InvalidRequestError(request.inputPath, 'input file does not exist or is not readable');
    }

    const profile = resolveProfile(request.mode, this.capabilities, {
      inputPath,
      outputPath: request.outputPath !== undefined ? resolve(request.outputPath) : undefined,
      outputDir: this.outputDir,
    });

    if (profile.outputPath === inputPath) {
      throw new InvalidRequestError(request.inputPath, 'output path must differ from the input path');
    }

    const inputSizeBytes = await getFileSizeBytes(inputPath);

    return {
      id,
      request,
      inputPath,
      profile,
      machine: new JobStateMachine(id),
      channel: new JobEventChannel(id),
      log: [],
      logger: log.child({ jobId: id }),
      abort: new AbortController(),
      createdAt: new Date(),
      startedAtMs: this.now(),
      runningSinceMs: null,
      inputSizeBytes,
      durationMs: null,
      tracker: null,
      process: null,
      stallTimer: null,
      result: null,
    };
  }

  private async run(job: JobRecord): Promise<void> {
    const durationMs = await this.prober.probe(job.inputPath, job.abort.signal);
    if (job.result) return;

    job.durationMs = durationMs;
    if (durationMs === null) {
      job.logger.warn('Duration unknown, progress will be indeterminate');
    }

    // A stale artifact from an earlier run must not count as output
    await removeFile(job.profile.outputPath);
    await ensureDir(dirname(job.profile.outputPath));
    if (job.result) return;

    const tracker = new ProgressTracker({
      durationMs,
      preferStatistics: this.preferStatistics,
      now: this.now,
    });
    job.tracker = tracker;
    job.runningSinceMs = this.now();
    this.transition(job, 'RUNNING');

    let handle: TranscodeProcessHandle;
    try {
      handle = this.launcher.launch({
        args: job.profile.args,
        onLog: (line) => this.handleLog(job, line),
        onStatistics: (snapshot) => this.handleStatistics(job, snapshot),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.finishFailure(job, 'spawn', `Failed to start transcoder: ${message}`, null);
      return;
    }
    job.process = handle;

    this.publish(job, tracker.snapshot());
    this.armStallTimer(job);

    const exit = await handle.exited;
    job.process = null;
    this.clearStallTimer(job);
    if (job.result) return;

    await this.complete(job, exit);
  }

  private handleLog(job: JobRecord, line: string): void {
    if (job.result) return;
    job.log.push(line);
    this.armStallTimer(job);

    const marker = parseLogLine(line);
    if (marker) this.applyMarker(job, marker);
  }

  private handleStatistics(job: JobRecord, snapshot: StatisticsSnapshot): void {
    if (job.result) return;
    this.armStallTimer(job);

    const marker = parseStatistics(snapshot);
    if (marker) this.applyMarker(job, marker);
  }

  private applyMarker(job: JobRecord, marker: TimeMarker): void {
    if (!job.tracker) return;
    this.publish(job, job.tracker.update(marker));
  }

  private publish(job: JobRecord, snapshot: ProgressSnapshot): void {
    job.channel.publishProgress(snapshot);
    const event: JobEvent = { type: 'progress', jobId: job.id, snapshot };
    this.emit('progress', event);
  }

  private async complete(job: JobRecord, exit: ProcessExit): Promise<void> {
    if (exit.error) {
      this.finishFailure(job, 'spawn', `Failed to start transcoder: ${exit.error.message}`, exit);
      return;
    }

    // Only read the output once the process has fully exited
    const outputSizeBytes = exit.exitCode === 0 ? await statFileSize(job.profile.outputPath) : null;
    if (job.result) return;

    if (exit.exitCode === 0 && outputSizeBytes !== null && outputSizeBytes > 0) {
      const elapsedMs = this.elapsed(job);
      const transcodeMs = job.runningSinceMs === null ? 0 : this.now() - job.runningSinceMs;
      this.finish(job, {
        jobId: job.id,
        outcome: 'success',
        outputPath: job.profile.outputPath,
        inputSizeBytes: job.inputSizeBytes,
        outputSizeBytes,
        compressionRatio: computeCompressionRatio(job.inputSizeBytes, outputSizeBytes),
        speedRatio: job.durationMs !== null && transcodeMs > 0 ? job.durationMs / transcodeMs : null,
        elapsedMs,
      }, 'COMPLETED', 'Transcode completed');
      return;
    }

    const message = exit.exitCode !== 0
      ? `Transcoder exited with ${exit.signal ? `signal ${exit.signal}` : `code ${exit.exitCode}`}`
      : 'Transcoder exited successfully but produced no output';
    this.finishFailure(job, 'process', message, exit);
  }

  private finishFailure(
    job: JobRecord,
    kind: FailureKind,
    message: string,
    exit: ProcessExit | null
  ): void {
    this.finish(job, {
      jobId: job.id,
      outcome: 'failure',
      outputPath: job.profile.outputPath,
      inputSizeBytes: job.inputSizeBytes,
      elapsedMs: this.elapsed(job),
      diagnostic: Object.freeze({
        kind,
        message,
        exitCode: exit?.exitCode ?? null,
        signal: exit?.signal ?? null,
        logExcerpt: Object.freeze(this.logTailLines > 0 ? job.log.slice(-this.logTailLines) : []),
      }),
    }, 'FAILED', message);
  }

  /**
   * Record the terminal result exactly once and release the job's resources
   */
  private finish(job: JobRecord, result: TerminalResult, state: JobState, reason: string): void {
    if (job.result) return;

    job.result = Object.freeze(result);
    this.transition(job, state, reason);
    this.clearStallTimer(job);
    this.teardown(job);

    job.channel.publishTerminal(job.result);
    const event: JobEvent = { type: 'terminal', jobId: job.id, result: job.result };
    this.emit('terminal', event);

    job.logger.info({ outcome: result.outcome, elapsedMs: result.elapsedMs }, 'Job finished');
  }

  /**
   * Stop the process if it is still alive: SIGTERM, then SIGKILL after the
   * grace period
   */
  private teardown(job: JobRecord): void {
    const handle = job.process;
    if (!handle) return;

    handle.kill('SIGTERM');
    const forceKill = setTimeout(() => {
      job.logger.warn('Process ignored SIGTERM, sending SIGKILL');
      handle.kill('SIGKILL');
    }, this.cancelGraceMs);
    forceKill.unref();

    void handle.exited.then(() => clearTimeout(forceKill));
  }

  private armStallTimer(job: JobRecord): void {
    if (this.stallTimeoutMs <= 0 || job.result) return;

    this.clearStallTimer(job);
    job.stallTimer = setTimeout(() => {
      job.stallTimer = null;
      job.logger.warn({ stallTimeoutMs: this.stallTimeoutMs }, 'No telemetry received, treating job as stalled');
      this.finishFailure(
        job,
        'stall',
        `No telemetry received for ${this.stallTimeoutMs}ms`,
        null
      );
    }, this.stallTimeoutMs);
  }

  private clearStallTimer(job: JobRecord): void {
    if (job.stallTimer) {
      clearTimeout(job.stallTimer);
      job.stallTimer = null;
    }
  }

  private transition(job: JobRecord, to: JobState, reason?: string): void {
    const transition = job.machine.transitionTo(to, reason);
    job.logger.info({ from: transition.from, to }, 'Job state changed');

    const event: StateChangeEvent = { jobId: job.id, from: transition.from, to, reason };
    this.emit('state', event);
  }

  private elapsed(job: JobRecord): number {
    return Math.max(0, this.now() - job.startedAtMs);
  }

  private getJob(jobId: string): JobRecord {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new NotFoundError('Job', jobId);
    }
    return job;
  }

  private toStatus(job: JobRecord): JobStatus {
    return Object.freeze({
      id: job.id,
      state: job.machine.getState(),
      request: job.request,
      profile: job.profile,
      outputPath: job.profile.outputPath,
      durationMs: job.durationMs,
      progress: job.channel.latestSnapshot,
      result: job.result,
      createdAt: job.createdAt,
    });
  }
}
