#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Command-line interface for the transcoder. Jobs run in this process
 * through the orchestrator; there is no server.
 */

import './env.js';
import { Command } from 'commander';
import chalk from 'chalk';

// Commands
import { convertCommand } from './commands/convert.js';
import { probeCommand } from './commands/probe.js';
import { profilesCommand } from './commands/profiles.js';

const program = new Command();

program
  .name('transcoder')
  .description('Convert media files with ffmpeg')
  .version('1.0.0');

program
  .command('convert <input>')
  .description('Transcode a media file')
  .option('-m, --mode <mode>', 'Profile mode (fast, standard, compressed, hardware)', 'standard')
  .option('-o, --output <path>', 'Output file (defaults to <name>_converted.<ext>)')
  .option('--json', 'Print the result as JSON')
  .action(convertCommand);

program
  .command('probe <input>')
  .description('Read the duration of a media file')
  .option('--json', 'Print the result as JSON')
  .action(probeCommand);

program
  .command('profiles')
  .description('List transcode profiles and the ones this host uses')
  .option('--json', 'Print the profiles as JSON')
  .action(profilesCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('transcoder --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('✗'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
