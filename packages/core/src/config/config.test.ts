import { describe, expect, it } from 'vitest';
import { loadConfig } from './index.js';
import { ConfigurationError } from '../errors/index.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ FFMPEG_PATH: '/opt/ffmpeg/bin/ffmpeg' });

    expect(config.nodeEnv).toBe('development');
    expect(config.mediaTools.ffmpeg).toBe('/opt/ffmpeg/bin/ffmpeg');
    expect(config.outputDir).toBeUndefined();
    expect(config.jobs).toEqual({
      probeTimeoutMs: 8000,
      stallTimeoutMs: 45000,
      cancelGraceMs: 5000,
      logTailLines: 20,
    });
    expect(config.hardwareEncoder).toBe('auto');
  });

  it('parses numeric settings', () => {
    const config = loadConfig({
      FFMPEG_PATH: 'ffmpeg',
      STALL_TIMEOUT_MS: '60000',
      LOG_TAIL_LINES: '5',
      HW_ENCODER: 'nvenc',
      TRANSCODE_OUTPUT_DIR: '/exports',
    });

    expect(config.jobs.stallTimeoutMs).toBe(60000);
    expect(config.jobs.logTailLines).toBe(5);
    expect(config.hardwareEncoder).toBe('nvenc');
    expect(config.outputDir).toBe('/exports');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ PROBE_TIMEOUT_MS: 'soon' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ HW_ENCODER: 'cuda' })).toThrow(/HW_ENCODER/);
  });
});
