#!/usr/bin/env -S node --import tsx
/**
 * CLI Entry Point
 *
 * Walks a video library and adds a 5.1 track (and, by policy, stereo) to
 * files whose only surround audio is 7.1. Existing streams are copied, never
 * re-encoded.
 */

import 'dotenv/config';
import { Command, Option } from 'commander';
import chalk from 'chalk';
import { SYNTHESIS_POLICIES, describeError } from '@tracksmith/core';
import { runCommand, EXIT_FATAL, type RunOptions } from './commands/run.js';
import { PROBE_FORMATS } from './config/index.js';

const program = new Command();

program
  .name('tracksmith')
  .description('Add missing 5.1 (and optionally stereo) audio tracks across a video library')
  .version('1.0.0')
  .option('-r, --root <dir>', 'Library root to scan (default: MEDIA_ROOT or /mnt/media/video)')
  .option('-c, --concurrency <n>', 'Number of files processed at once (default: 1)')
  .addOption(
    new Option('-p, --policy <policy>', 'Layouts every file should end up with').choices([...SYNTHESIS_POLICIES])
  )
  .addOption(
    new Option('--probe-format <format>', 'How ffprobe output is read').choices([...PROBE_FORMATS])
  )
  .option('--scratch <dir>', 'Parent directory for the per-run scratch directory')
  .option('--dry-run', 'Probe and classify only; change nothing')
  .option('--json', 'Print the final result as JSON')
  .action(async (options: RunOptions) => {
    process.exitCode = await runCommand(options);
  });

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('✗'), describeError(error));
  process.exit(EXIT_FATAL);
});
