/**
 * CLI Configuration
 */

import { loadConfig, type TranscoderConfig } from '@transcoder/core';

let cached: TranscoderConfig | null = null;

/**
 * Validated configuration from the environment, parsed on first use
 */
export function getConfig(): TranscoderConfig {
  cached ??= loadConfig(process.env);
  return cached;
}
