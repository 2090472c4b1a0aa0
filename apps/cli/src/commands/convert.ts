/**
 * Convert Command
 *
 * Runs a single transcode job in-process and reports progress until it
 * finishes. Ctrl+C cancels the job and waits for the transcoder to stop.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import { getBinaryFolders, type JobHandle, type TerminalResult } from '@transcoder/core';
import { JobOrchestrator, type StateChangeEvent } from '@transcoder/processing';
import { getBasename } from '@transcoder/utils';
import { getConfig } from '../config/index.js';
import {
  formatProgressLine,
  printError,
  printHeader,
  printInfo,
  printJson,
  printKeyValue,
  printResult,
  printSuccess,
  printWarning,
} from '../lib/output.js';

interface ConvertOptions {
  mode: string;
  output?: string;
  json?: boolean;
}

export async function convertCommand(input: string, options: ConvertOptions): Promise<void> {
  const orchestrator = JobOrchestrator.fromConfig(getConfig());
  const spinner = options.json ? null : ora(`Probing ${getBasename(input)}...`).start();

  let handle: JobHandle;
  try {
    handle = await orchestrator.start({
      inputPath: input,
      mode: options.mode,
      outputPath: options.output,
    });
  } catch (error) {
    spinner?.fail('Could not start conversion');
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exitCode = 1;
    return;
  }

  orchestrator.on('state', (event: StateChangeEvent) => {
    if (spinner && event.to === 'RUNNING') {
      spinner.text = `Transcoding with ${handle.profile.key} profile...`;
    }
  });

  const onInterrupt = (): void => {
    if (spinner) spinner.text = 'Cancelling...';
    orchestrator.cancel(handle.id);
  };
  process.once('SIGINT', onInterrupt);

  let result: TerminalResult | null = null;
  try {
    for await (const event of orchestrator.subscribe(handle.id)) {
      if (event.type === 'progress') {
        if (spinner) spinner.text = formatProgressLine(event.snapshot);
      } else {
        result = event.result;
      }
    }
  } finally {
    process.off('SIGINT', onInterrupt);
  }

  if (!result) {
    spinner?.fail('Job ended without a result');
    process.exitCode = 1;
    return;
  }

  if (options.json) {
    printJson(result);
  } else {
    reportResult(spinner, handle, result);
  }

  process.exitCode = result.outcome === 'success' ? 0 : result.outcome === 'cancelled' ? 130 : 1;
}

function reportResult(
  spinner: Ora | null,
  handle: JobHandle,
  result: TerminalResult
): void {
  switch (result.outcome) {
    case 'success':
      spinner?.succeed('Conversion complete');
      break;
    case 'failure':
      spinner?.fail('Conversion failed');
      break;
    case 'cancelled':
      spinner?.warn('Conversion cancelled');
      break;
  }

  printHeader(`Job ${handle.id.slice(0, 8)}`);
  printKeyValue('Profile', `${handle.profile.key} (${handle.profile.description})`);
  printResult(result);
  console.log();

  if (result.outcome === 'success') {
    printSuccess(`Saved to ${chalk.cyan(result.outputPath)}`);
  } else if (result.outcome === 'cancelled') {
    printWarning('Partial output may remain at the destination');
  } else if (result.diagnostic.kind === 'spawn') {
    printInfo(`Set FFMPEG_PATH or place ffmpeg in ${getBinaryFolders().os}`);
  }
}
