import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { FFmpegLauncher, LineSplitter, ProgressBlockReader } from './ffmpeg.js';
import type { StatisticsSnapshot } from './telemetryParser.js';
import { writeStandInFfmpeg } from './testing/standInFfmpeg.js';

describe('LineSplitter', () => {
  it('splits on newlines and carriage returns across chunks', () => {
    const splitter = new LineSplitter();

    expect(splitter.push('frame=1 time=00:00:0')).toEqual([]);
    expect(splitter.push('1.00\rframe=2 time=00:00:02.00\r')).toEqual([
      'frame=1 time=00:00:01.00',
      'frame=2 time=00:00:02.00',
    ]);
    expect(splitter.push('Error opening output\r\nlast')).toEqual(['Error opening output']);
    expect(splitter.flush()).toEqual(['last']);
    expect(splitter.flush()).toEqual([]);
  });
});

describe('ProgressBlockReader', () => {
  it('emits one snapshot per progress block', () => {
    const reader = new ProgressBlockReader();
    const block = [
      'frame=720',
      'fps=48.00',
      'total_size=1048576',
      'out_time_us=30000000',
      'out_time_ms=30000000',
      'out_time=00:00:30.000000',
      'speed=2.01x',
    ];

    for (const line of block) {
      expect(reader.push(line)).toBeNull();
    }
    expect(reader.push('progress=continue')).toEqual({ timeMs: 30000, sizeBytes: 1048576 });
  });

  it('starts each block fresh', () => {
    const reader = new ProgressBlockReader();

    reader.push('out_time_us=5000000');
    reader.push('progress=continue');

    expect(reader.push('progress=end')).toEqual({ timeMs: 0, sizeBytes: 0 });
  });

  it('treats unavailable values as zero', () => {
    const reader = new ProgressBlockReader();

    reader.push('total_size=N/A');
    reader.push('out_time_us=N/A');

    expect(reader.push('progress=continue')).toEqual({ timeMs: 0, sizeBytes: 0 });
  });

  it('ignores lines that are not key=value', () => {
    expect(new ProgressBlockReader().push('garbage')).toBeNull();
  });
});

describe.skipIf(process.platform === 'win32')('FFmpegLauncher', () => {
  let dir: string;
  let ffmpegPath: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'transcoder-ffmpeg-'));
    ffmpegPath = await writeStandInFfmpeg(dir);
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function launch(scenario: string, binary = ffmpegPath) {
    const logs: string[] = [];
    const statistics: StatisticsSnapshot[] = [];
    const handle = new FFmpegLauncher(binary).launch({
      args: ['-i', 'in.mp4', scenario],
      onLog: (line) => logs.push(line),
      onStatistics: (snapshot) => statistics.push(snapshot),
    });
    return { handle, logs, statistics };
  }

  it('routes stderr lines to the log and progress blocks to statistics', async () => {
    const { handle, logs, statistics } = launch('transcode');

    await expect(handle.exited).resolves.toEqual({ exitCode: 0, signal: null });
    expect(logs).toEqual([
      'args:-hide_banner -nostdin -progress pipe:1 -i in.mp4 transcode',
      'frame=   24 fps=0.0 q=30.0 size=       0kB time=00:00:01.00 bitrate=N/A',
      'frame=   48 fps= 48 q=30.0 size=     256kB time=00:00:02.00 bitrate=1048.6kbits/s',
    ]);
    expect(statistics).toEqual([
      { timeMs: 1000, sizeBytes: 1024 },
      { timeMs: 2000, sizeBytes: 262144 },
    ]);
  });

  it('reports a non-zero exit code', async () => {
    const { handle, logs } = launch('broken');

    await expect(handle.exited).resolves.toEqual({ exitCode: 1, signal: null });
    expect(logs.at(-1)).toBe('Error opening output file');
  });

  it('terminates a running process and ignores kills after exit', async () => {
    const { handle } = launch('hang');
    expect(handle.pid).toBeTypeOf('number');

    handle.kill();

    await expect(handle.exited).resolves.toEqual({ exitCode: null, signal: 'SIGTERM' });
    expect(() => handle.kill('SIGKILL')).not.toThrow();
  });

  it('resolves with the spawn error when the binary is missing', async () => {
    const { handle, logs } = launch('transcode', join(dir, 'missing-ffmpeg'));

    const exit = await handle.exited;

    expect(exit).toMatchObject({ exitCode: null, signal: null });
    expect(exit.error).toMatchObject({ code: 'ENOENT' });
    expect(logs).toEqual([]);
  });
});
