/**
 * Transcoder Configuration
 * 
 * Environment variables validated with zod into a typed config object.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { resolveBinaryPath } from './binaries.js';

const HW_ENCODER_VALUES = ['auto', 'none', 'mediacodec', 'videotoolbox', 'nvenc', 'qsv'] as const;

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Media tools
  FFMPEG_PATH: z.string().min(1).optional(),

  // Output
  TRANSCODE_OUTPUT_DIR: z.string().min(1).optional(),

  // Job settings
  PROBE_TIMEOUT_MS: z.string().regex(/^\d+$/).transform(Number).default('8000'),
  STALL_TIMEOUT_MS: z.string().regex(/^\d+$/).transform(Number).default('45000'),
  CANCEL_GRACE_MS: z.string().regex(/^\d+$/).transform(Number).default('5000'),
  LOG_TAIL_LINES: z.string().regex(/^\d+$/).transform(Number).default('20'),

  // Hardware encoder selection
  HW_ENCODER: z.enum(HW_ENCODER_VALUES).default('auto'),
});

export type HardwareEncoderSetting = typeof HW_ENCODER_VALUES[number];

export interface TranscoderConfig {
  readonly nodeEnv: 'development' | 'production' | 'test';
  readonly logLevel: string;
  readonly mediaTools: {
    readonly ffmpeg: string;
  };
  readonly outputDir: string | undefined;
  readonly jobs: {
    readonly probeTimeoutMs: number;
    readonly stallTimeoutMs: number;
    readonly cancelGraceMs: number;
    readonly logTailLines: number;
  };
  readonly hardwareEncoder: HardwareEncoderSetting;
}

/**
 * Parse and validate configuration from an environment map
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TranscoderConfig {
  const parseResult = envSchema.safeParse(env);

  if (!parseResult.success) {
    throw new ConfigurationError(
      parseResult.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const parsed = parseResult.data;

  return Object.freeze({
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    mediaTools: {
      ffmpeg: parsed.FFMPEG_PATH ?? resolveBinaryPath('ffmpeg', 'FFMPEG_PATH', env).resolvedPath,
    },
    outputDir: parsed.TRANSCODE_OUTPUT_DIR,
    jobs: {
      probeTimeoutMs: parsed.PROBE_TIMEOUT_MS,
      stallTimeoutMs: parsed.STALL_TIMEOUT_MS,
      cancelGraceMs: parsed.CANCEL_GRACE_MS,
      logTailLines: parsed.LOG_TAIL_LINES,
    },
    hardwareEncoder: parsed.HW_ENCODER,
  });
}
