/**
 * Probe Command
 *
 * Reads the duration of a media file.
 */

import ora from 'ora';
import { ProbeService } from '@transcoder/processing';
import { formatClock, getBasename } from '@transcoder/utils';
import { getConfig } from '../config/index.js';
import { printError, printJson, printKeyValue } from '../lib/output.js';

interface ProbeOptions {
  json?: boolean;
}

export async function probeCommand(input: string, options: ProbeOptions): Promise<void> {
  const config = getConfig();
  const prober = new ProbeService({
    ffmpegPath: config.mediaTools.ffmpeg,
    timeoutMs: config.jobs.probeTimeoutMs,
  });

  const spinner = options.json ? null : ora(`Probing ${getBasename(input)}...`).start();
  const durationMs = await prober.probe(input);

  if (options.json) {
    printJson({ inputPath: input, durationMs });
  } else if (durationMs === null) {
    spinner?.fail('Duration could not be determined');
  } else {
    spinner?.succeed('Probe complete');
    printKeyValue('Duration', `${formatClock(durationMs)} (${durationMs} ms)`);
  }

  if (durationMs === null) {
    if (!options.json) printError(`ffmpeg did not report a duration for ${input}`);
    process.exitCode = 1;
  }
}
