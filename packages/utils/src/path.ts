/**
 * Path Utilities
 */

import { basename, dirname, extname, join, resolve } from 'node:path';

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}

/**
 * Derive `<dir>/<name>_converted.<ext>` for an input file
 */
export function deriveOutputPath(
  inputPath: string,
  extension: string,
  outputDir?: string
): string {
  const dir = outputDir ?? dirname(inputPath);
  return resolve(join(dir, `${getBasename(inputPath)}_converted.${extension}`));
}
