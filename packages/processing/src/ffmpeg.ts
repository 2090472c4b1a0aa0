/**
 * FFmpeg Process Launcher
 * 
 * Spawns a long-running ffmpeg transcode and splits its output into the two
 * telemetry channels: stderr log lines, and `-progress pipe:1` key=value
 * blocks on stdout turned into statistics snapshots.
 */

import { spawn } from 'node:child_process';
import { createLogger } from '@transcoder/utils';
import type { StatisticsSnapshot } from './telemetryParser.js';

const log = createLogger({ component: 'ffmpeg' });

export interface ProcessExit {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be started */
  error?: Error;
}

export interface TranscodeInvocation {
  args: readonly string[];
  onLog: (line: string) => void;
  onStatistics: (snapshot: StatisticsSnapshot) => void;
}

export interface TranscodeProcessHandle {
  readonly pid: number | undefined;
  /** Resolves once the process has fully exited and its streams are closed; never rejects */
  readonly exited: Promise<ProcessExit>;
  kill(signal?: NodeJS.Signals): void;
}

export interface TranscodeLauncher {
  launch(invocation: TranscodeInvocation): TranscodeProcessHandle;
}

/**
 * Splits a chunked text stream into lines. ffmpeg terminates its stats
 * line with a bare carriage return.
 */
export class LineSplitter {
  private buffer = '';

  push(chunk: string): string[] {
    this.buffer += chunk;
    const parts = this.buffer.split(/\r\n|\r|\n/);
    this.buffer = parts.pop() ?? '';
    return parts.filter((line) => line.length > 0);
  }

  flush(): string[] {
    const rest = this.buffer;
    this.buffer = '';
    return rest.length > 0 ? [rest] : [];
  }
}

/**
 * Accumulates `-progress` key=value lines and yields a snapshot at the
 * `progress=continue|end` line closing each block
 */
export class ProgressBlockReader {
  private current: Record<string, string> = {};

  push(line: string): StatisticsSnapshot | null {
    const match = /^\s*(\w+)=(.*)$/.exec(line);
    if (!match) return null;

    const [, key = '', value = ''] = match;
    if (key !== 'progress') {
      this.current[key] = value.trim();
      return null;
    }

    const block = this.current;
    this.current = {};

    // out_time_ms is also reported in microseconds
    return {
      timeMs: readInteger(block['out_time_us'] ?? block['out_time_ms']) / 1000,
      sizeBytes: readInteger(block['total_size']),
    };
  }
}

function readInteger(value: string | undefined): number {
  if (value === undefined) return 0;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : 0;
}

export class FFmpegLauncher implements TranscodeLauncher {
  private ffmpegPath: string;

  constructor(ffmpegPath: string = 'ffmpeg') {
    this.ffmpegPath = ffmpegPath;
  }

  launch(invocation: TranscodeInvocation): TranscodeProcessHandle {
    const fullArgs = [
      '-hide_banner',
      '-nostdin',
      '-progress', 'pipe:1',
      ...invocation.args,
    ];

    log.debug({ command: `${this.ffmpegPath} ${fullArgs.join(' ')}` }, 'Spawning ffmpeg');

    const child = spawn(this.ffmpegPath, fullArgs, {
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const stdoutLines = new LineSplitter();
    const stderrLines = new LineSplitter();
    const blocks = new ProgressBlockReader();

    const readStatistics = (lines: string[]): void => {
      for (const line of lines) {
        const snapshot = blocks.push(line);
        if (snapshot) invocation.onStatistics(snapshot);
      }
    };

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');

    child.stdout.on('data', (chunk: string) => readStatistics(stdoutLines.push(chunk)));
    child.stderr.on('data', (chunk: string) => {
      for (const line of stderrLines.push(chunk)) invocation.onLog(line);
    });

    const exited = new Promise<ProcessExit>((resolve) => {
      let settled = false;

      child.on('close', (exitCode, signal) => {
        if (settled) return;
        settled = true;
        readStatistics(stdoutLines.flush());
        for (const line of stderrLines.flush()) invocation.onLog(line);
        resolve({ exitCode, signal });
      });

      child.on('error', (error) => {
        if (settled) return;
        settled = true;
        resolve({ exitCode: null, signal: null, error });
      });
    });

    return {
      pid: child.pid,
      exited,
      kill: (signal: NodeJS.Signals = 'SIGTERM') => {
        if (child.exitCode === null && child.signalCode === null) {
          child.kill(signal);
        }
      },
    };
  }
}
