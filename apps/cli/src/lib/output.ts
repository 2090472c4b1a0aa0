/**
 * Output Formatter
 *
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import type { ProgressSnapshot, TerminalResult } from '@transcoder/core';
import { formatBytes, formatClock, formatDuration } from '@transcoder/utils';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printTable(data: Record<string, unknown>[]): void {
  if (data.length === 0) {
    printInfo('No data to display');
    return;
  }
  console.table(data);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

export function renderProgressBar(fraction: number, width = 20): string {
  const clamped = Math.min(1, Math.max(0, fraction));
  const filled = Math.round(clamped * width);
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}

/**
 * One-line progress text for the spinner
 */
export function formatProgressLine(snapshot: ProgressSnapshot): string {
  const size = formatBytes(snapshot.sizeBytes);

  if (snapshot.durationMs === null) {
    return `Transcoding ${formatClock(snapshot.processedMs)} processed, ${size}`;
  }

  const percent = (snapshot.fraction * 100).toFixed(1).padStart(5);
  const eta = snapshot.etaMs === null ? '--:--' : formatClock(snapshot.etaMs);
  return `${renderProgressBar(snapshot.fraction)} ${percent}% ` +
    `${formatClock(snapshot.processedMs)} / ${formatClock(snapshot.durationMs)} ETA ${eta} ${size}`;
}

/**
 * Human-readable percentage of bytes saved; negative when the output grew
 */
export function formatCompression(ratio: number): string {
  const percent = (ratio * 100).toFixed(1);
  return ratio >= 0 ? `${percent}% smaller` : `${percent.slice(1)}% larger`;
}

export function printResult(result: TerminalResult): void {
  printKeyValue('Output', result.outputPath);
  printKeyValue('Input size', formatBytes(result.inputSizeBytes));

  switch (result.outcome) {
    case 'success':
      printKeyValue('Output size', formatBytes(result.outputSizeBytes));
      printKeyValue('Compression', formatCompression(result.compressionRatio));
      if (result.speedRatio !== null) {
        printKeyValue('Speed', `${result.speedRatio.toFixed(2)}x`);
      }
      break;
    case 'failure':
      printKeyValue('Reason', chalk.red(result.diagnostic.message));
      if (result.diagnostic.logExcerpt.length > 0) {
        console.log();
        console.log(chalk.gray('Last transcoder output:'));
        for (const line of result.diagnostic.logExcerpt) {
          console.log(chalk.gray(`  ${line}`));
        }
      }
      break;
    case 'cancelled':
      break;
  }

  printKeyValue('Elapsed', formatDuration(result.elapsedMs));
}
