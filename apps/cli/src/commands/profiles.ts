/**
 * Profiles Command
 *
 * Lists every profile definition and marks the ones this host resolves to.
 */

import { TRANSCODE_MODES } from '@transcoder/core';
import { detectPlatformCapabilities, listProfiles, selectProfile } from '@transcoder/processing';
import { getConfig } from '../config/index.js';
import { printHeader, printJson, printKeyValue, printTable } from '../lib/output.js';

interface ProfilesOptions {
  json?: boolean;
}

export function profilesCommand(options: ProfilesOptions): void {
  const capabilities = detectPlatformCapabilities(process.platform, getConfig().hardwareEncoder);
  const active = new Set(TRANSCODE_MODES.map((mode) => selectProfile(mode, capabilities).key));

  const rows = listProfiles().map(({ mode, encoder, profile }) => ({
    mode,
    encoder: encoder ?? 'software',
    key: profile.key,
    container: profile.extension,
    video: profile.video.codec,
    audio: profile.audio.codec,
    active: active.has(profile.key),
  }));

  if (options.json) {
    printJson({ capabilities, profiles: rows });
    return;
  }

  printHeader('Transcode Profiles');
  printKeyValue('Hardware encoder', capabilities.hardwareEncoder ?? 'none');
  console.log();
  printTable(rows.map((row) => ({ ...row, active: row.active ? '*' : '' })));
}
