/**
 * Binary Configuration
 * 
 * Resolves the transcoder executable with automatic OS detection.
 * 
 * Priority order:
 * 1. Environment variable (FFMPEG_PATH)
 * 2. Bundled binary folder (packages/core/binaries/<os>/)
 * 3. System PATH
 */

import { existsSync } from 'node:fs';
import { join, resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Binary folder location - relative to packages/core/
const BINARY_ROOT = resolve(__dirname, '../../binaries');

/**
 * OS-specific subfolder
 */
function getOsFolder(platform: NodeJS.Platform): string {
  switch (platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    default:
      return 'linux';
  }
}

export type BinarySource = 'env' | 'bundled' | 'system';

export interface BinaryConfig {
  name: string;
  envVar: string;
  resolvedPath: string;
  source: BinarySource;
}

/**
 * Resolve a binary path by priority
 */
export function resolveBinaryPath(
  name: string,
  envVar: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): BinaryConfig {
  const exeName = platform === 'win32' ? `${name}.exe` : name;

  const envPath = env[envVar];
  if (envPath && existsSync(envPath)) {
    return { name, envVar, resolvedPath: envPath, source: 'env' };
  }

  const bundledPath = join(BINARY_ROOT, getOsFolder(platform), exeName);
  if (existsSync(bundledPath)) {
    return { name, envVar, resolvedPath: bundledPath, source: 'bundled' };
  }

  // Let the system PATH resolve it; a missing binary surfaces as a spawn failure
  return { name, envVar, resolvedPath: exeName, source: 'system' };
}

/**
 * Get binary folder paths for user reference
 */
export function getBinaryFolders(platform: NodeJS.Platform = process.platform): { root: string; os: string } {
  return {
    root: BINARY_ROOT,
    os: join(BINARY_ROOT, getOsFolder(platform)),
  };
}
