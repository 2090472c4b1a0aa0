/**
 * Probe Service
 * 
 * Runs a lightweight inspection invocation to read the source duration.
 * Probing is best effort: every failure mode yields null so the job can
 * continue with indeterminate progress.
 */

import { createLogger, executeCommand, type CommandRunner } from '@transcoder/utils';
import { parseDuration } from './telemetryParser.js';

const log = createLogger({ component: 'probe' });

export interface ProbeServiceOptions {
  ffmpegPath?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
}

export class ProbeService {
  private readonly ffmpegPath: string;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;

  constructor(options: ProbeServiceOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.timeoutMs = options.timeoutMs ?? 8000;
    this.runner = options.runner ?? executeCommand;
  }

  /**
   * Media duration in milliseconds, or null when it cannot be determined
   */
  async probe(inputPath: string, signal?: AbortSignal): Promise<number | null> {
    // With no output file ffmpeg prints the input header and exits non-zero
    const args = ['-hide_banner', '-nostdin', '-i', inputPath];
    log.debug({ command: `${this.ffmpegPath} ${args.join(' ')}` }, 'Probing media');

    try {
      const result = await this.runner(this.ffmpegPath, args, {
        timeout: this.timeoutMs,
        signal,
      });

      if (result.timedOut) {
        log.warn({ inputPath, timeoutMs: this.timeoutMs }, 'Probe timed out');
        return null;
      }
      if (result.aborted) {
        return null;
      }

      const durationMs = parseDuration(`${result.stderr}\n${result.stdout}`);
      if (durationMs === null) {
        log.warn({ inputPath, exitCode: result.exitCode }, 'No duration found in probe output');
      } else {
        log.debug({ inputPath, durationMs }, 'Probed media duration');
      }
      return durationMs;
    } catch (error) {
      log.warn({ inputPath, err: error }, 'Probe failed to run');
      return null;
    }
  }
}
