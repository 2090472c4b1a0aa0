import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import type { CommandResult, CommandRunner } from '@transcoder/utils';
import { ProbeService } from './probe.js';
import { writeStandInFfmpeg } from './testing/standInFfmpeg.js';

function result(overrides: Partial<CommandResult>): CommandResult {
  return {
    exitCode: 1,
    stdout: '',
    stderr: '',
    duration: 12,
    timedOut: false,
    aborted: false,
    ...overrides,
  };
}

const HEADER = [
  "Input #0, mov,mp4,m4a,3gp,3g2,mj2, from '/media/clip.mp4':",
  '  Duration: 00:02:00.00, start: 0.000000, bitrate: 1205 kb/s',
  'At least one output file must be specified',
].join('\n');

describe('ProbeService', () => {
  it('extracts the duration from inspection output', async () => {
    const runner = vi.fn<CommandRunner>().mockResolvedValue(result({ stderr: HEADER }));
    const probe = new ProbeService({ ffmpegPath: '/usr/bin/ffmpeg', timeoutMs: 5000, runner });

    await expect(probe.probe('/media/clip.mp4')).resolves.toBe(120000);
    expect(runner).toHaveBeenCalledWith(
      '/usr/bin/ffmpeg',
      ['-hide_banner', '-nostdin', '-i', '/media/clip.mp4'],
      { timeout: 5000, signal: undefined }
    );
  });

  it('returns null when there is no duration token', async () => {
    const runner = vi.fn<CommandRunner>().mockResolvedValue(
      result({ stderr: '/media/clip.mp4: Invalid data found when processing input' })
    );

    await expect(new ProbeService({ runner }).probe('/media/clip.mp4')).resolves.toBeNull();
  });

  it('returns null for empty output', async () => {
    const runner = vi.fn<CommandRunner>().mockResolvedValue(result({}));

    await expect(new ProbeService({ runner }).probe('/media/clip.mp4')).resolves.toBeNull();
  });

  it('treats a timeout as not found', async () => {
    const runner = vi.fn<CommandRunner>().mockResolvedValue(result({ stderr: HEADER, timedOut: true }));

    await expect(new ProbeService({ runner }).probe('/media/clip.mp4')).resolves.toBeNull();
  });

  it('absorbs spawn failures', async () => {
    const runner = vi.fn<CommandRunner>().mockRejectedValue(new Error('spawn ffmpeg ENOENT'));

    await expect(new ProbeService({ runner }).probe('/media/clip.mp4')).resolves.toBeNull();
  });

  it('passes the abort signal through', async () => {
    const controller = new AbortController();
    const runner = vi.fn<CommandRunner>().mockResolvedValue(result({ aborted: true, stderr: HEADER }));

    await expect(new ProbeService({ runner }).probe('/media/clip.mp4', controller.signal)).resolves.toBeNull();
    expect(runner.mock.calls[0]?.[2]).toEqual({ timeout: 8000, signal: controller.signal });
  });
});

describe.skipIf(process.platform === 'win32')('ProbeService with a child process', () => {
  let dir: string;
  let ffmpegPath: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'transcoder-probe-'));
    ffmpegPath = await writeStandInFfmpeg(dir);
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads the duration despite the non-zero exit', async () => {
    await expect(new ProbeService({ ffmpegPath }).probe('header')).resolves.toBe(120000);
  });

  it('gives up once the timeout elapses', async () => {
    const started = Date.now();

    await expect(new ProbeService({ ffmpegPath, timeoutMs: 300 }).probe('hang')).resolves.toBeNull();
    expect(Date.now() - started).toBeLessThan(4000);
  });

  it('returns null when the binary is missing', async () => {
    const probe = new ProbeService({ ffmpegPath: join(dir, 'missing-ffmpeg') });

    await expect(probe.probe('header')).resolves.toBeNull();
  });
});
