/**
 * Transcode Profiles
 * 
 * Declarative profile table keyed by mode, with hardware variants keyed by
 * encoder. Resolution is pure: no I/O, every mode string maps to a profile.
 */

import { TRANSCODE_MODES, isTranscodeMode } from '@transcoder/core';
import type {
  CommandProfile,
  HardwareEncoder,
  HardwareEncoderSetting,
  PlatformCapabilities,
  TranscodeMode,
} from '@transcoder/core';
import { deriveOutputPath } from '@transcoder/utils';
import { FFmpegCommandBuilder, type AudioCodecOptions, type VideoCodecOptions } from './commandBuilder.js';

export interface ProfileDefinition {
  key: string;
  description: string;
  extension: CommandProfile['extension'];
  video: VideoCodecOptions;
  audio: AudioCodecOptions;
  overwrite: boolean;
  hardware: boolean;
}

interface ModeEntry {
  software: ProfileDefinition;
  hardwareVariants?: Partial<Record<HardwareEncoder, ProfileDefinition>>;
}

const FAST_VIDEO: VideoCodecOptions = {
  codec: 'libvpx',
  crf: 30,
  bitrate: '1M',
  deadline: 'realtime',
  threads: 0,
};

const FAST_AUDIO: AudioCodecOptions = { codec: 'libvorbis', bitrate: '128k' };

const VP9_VIDEO: VideoCodecOptions = { codec: 'libvpx-vp9', crf: 30, bitrate: '0' };

const OPUS_AUDIO: AudioCodecOptions = { codec: 'libopus', bitrate: '128k' };

function hardwareVariant(
  encoder: HardwareEncoder,
  codec: VideoCodecOptions['codec'],
  label: string
): ProfileDefinition {
  return {
    key: `hardware-${encoder}`,
    description: `Hardware H.264 (${label})`,
    // H.264/AAC cannot be muxed into WebM
    extension: 'mp4',
    video: { codec, bitrate: '2M' },
    audio: { codec: 'aac', bitrate: '128k' },
    overwrite: true,
    hardware: true,
  };
}

export const DEFAULT_PROFILE: ProfileDefinition = {
  key: 'default',
  description: 'Default WebM conversion',
  extension: 'webm',
  video: VP9_VIDEO,
  audio: OPUS_AUDIO,
  overwrite: true,
  hardware: false,
};

export const PROFILE_TABLE: Readonly<Record<TranscodeMode, ModeEntry>> = {
  fast: {
    software: {
      key: 'fast',
      description: 'Fast WebM (VP8 + Vorbis, Optimized)',
      extension: 'webm',
      video: FAST_VIDEO,
      audio: FAST_AUDIO,
      overwrite: true,
      hardware: false,
    },
  },
  standard: {
    software: {
      key: 'standard',
      description: 'Standard WebM (VP9 + Opus)',
      extension: 'webm',
      video: VP9_VIDEO,
      audio: OPUS_AUDIO,
      overwrite: true,
      hardware: false,
    },
  },
  compressed: {
    software: {
      key: 'compressed',
      description: 'Compressed WebM (High compression)',
      extension: 'webm',
      video: { codec: 'libvpx-vp9', crf: 40, bitrate: '0', deadline: 'good', cpuUsed: 1 },
      audio: { codec: 'libopus', bitrate: '96k' },
      overwrite: true,
      hardware: false,
    },
  },
  hardware: {
    software: {
      key: 'hardware-software',
      description: 'Fast WebM (Software fallback)',
      extension: 'webm',
      video: FAST_VIDEO,
      audio: FAST_AUDIO,
      overwrite: true,
      hardware: false,
    },
    hardwareVariants: {
      mediacodec: hardwareVariant('mediacodec', 'h264_mediacodec', 'Android MediaCodec'),
      videotoolbox: hardwareVariant('videotoolbox', 'h264_videotoolbox', 'VideoToolbox'),
      nvenc: hardwareVariant('nvenc', 'h264_nvenc', 'NVIDIA NVENC'),
      qsv: hardwareVariant('qsv', 'h264_qsv', 'Intel Quick Sync'),
    },
  },
};

/**
 * Look up the profile definition for a mode on a platform
 */
export function selectProfile(
  mode: string,
  capabilities: PlatformCapabilities
): ProfileDefinition {
  if (!isTranscodeMode(mode)) {
    return DEFAULT_PROFILE;
  }

  const entry = PROFILE_TABLE[mode];
  const encoder = capabilities.hardwareEncoder;
  if (encoder && entry.hardwareVariants) {
    return entry.hardwareVariants[encoder] ?? entry.software;
  }
  return entry.software;
}

export interface ProfilePaths {
  inputPath: string;
  outputPath?: string;
  outputDir?: string;
}

/**
 * Resolve a mode into a complete, immutable command profile
 */
export function resolveProfile(
  mode: string,
  capabilities: PlatformCapabilities,
  paths: ProfilePaths
): CommandProfile {
  const definition = selectProfile(mode, capabilities);
  const outputPath = paths.outputPath
    ?? deriveOutputPath(paths.inputPath, definition.extension, paths.outputDir);

  const args = new FFmpegCommandBuilder()
    .setOverwrite(definition.overwrite)
    .addInput(paths.inputPath)
    .setVideoCodec(definition.video)
    .setAudioCodec(definition.audio)
    .setOutput(outputPath)
    .build();

  return Object.freeze({
    key: definition.key,
    description: definition.description,
    extension: definition.extension,
    videoCodec: definition.video.codec,
    crf: definition.video.crf,
    videoBitrate: definition.video.bitrate,
    threads: definition.video.threads,
    audioCodec: definition.audio.codec,
    audioBitrate: definition.audio.bitrate,
    overwrite: definition.overwrite,
    hardware: definition.hardware,
    outputPath,
    args: Object.freeze(args),
  });
}

const HARDWARE_ENCODERS: readonly HardwareEncoder[] = ['mediacodec', 'videotoolbox', 'nvenc', 'qsv'];

export interface ProfileListing {
  mode: TranscodeMode | 'default';
  encoder: HardwareEncoder | null;
  profile: ProfileDefinition;
}

/**
 * Every definition in the table, hardware variants included
 */
export function listProfiles(): ProfileListing[] {
  const rows: ProfileListing[] = [];

  for (const mode of TRANSCODE_MODES) {
    const entry = PROFILE_TABLE[mode];
    rows.push({ mode, encoder: null, profile: entry.software });
    for (const encoder of HARDWARE_ENCODERS) {
      const profile = entry.hardwareVariants?.[encoder];
      if (profile) rows.push({ mode, encoder, profile });
    }
  }
  rows.push({ mode: 'default', encoder: null, profile: DEFAULT_PROFILE });

  return rows;
}

/**
 * Map the host platform (or an explicit setting) to encoder capabilities
 */
export function detectPlatformCapabilities(
  platform: string,
  setting: HardwareEncoderSetting = 'auto'
): PlatformCapabilities {
  if (setting === 'none') return { hardwareEncoder: null };
  if (setting !== 'auto') return { hardwareEncoder: setting };

  switch (platform) {
    case 'darwin':
    case 'ios':
      return { hardwareEncoder: 'videotoolbox' };
    case 'android':
      return { hardwareEncoder: 'mediacodec' };
    default:
      return { hardwareEncoder: null };
  }
}
