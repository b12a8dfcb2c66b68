/**
 * Run Command
 *
 * Checks preconditions, wires the pipeline together and runs one batch over
 * the library. Resolves to the process exit code.
 */

import { executeCommand } from '@tracksmith/utils';
import {
  ConfigurationError,
  checkBinaries,
  describeError,
  getBinariesConfig,
  isFatalError,
  type BatchResult,
} from '@tracksmith/core';
import { FFProbe } from '@tracksmith/media';
import { DownmixSynthesizer, FFmpeg, FileProcessor, TrackMerger } from '@tracksmith/processing';
import { BatchDriver } from '@tracksmith/library';
import { loadConfig, type AppConfig } from '../config/index.js';
import { printError, printInfo, printJson, printWarning } from '../lib/output.js';
import { ConsoleReporter } from '../lib/reporter.js';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_INTERRUPTED = 130;

export interface RunOptions {
  root?: string;
  concurrency?: string;
  policy?: string;
  probeFormat?: string;
  scratch?: string;
  dryRun?: boolean;
  json?: boolean;
}

const PROBE_TIMEOUT_MS = 60000;

export function exitCodeFor(result: BatchResult): number {
  return result.interrupted ? EXIT_INTERRUPTED : EXIT_OK;
}

export async function runCommand(options: RunOptions): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig({
      root: options.root,
      concurrency: options.concurrency,
      policy: options.policy,
      probeFormat: options.probeFormat,
      scratch: options.scratch,
    });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      printError('Invalid configuration');
      const issues = error.details?.['issues'];
      for (const issue of Array.isArray(issues) ? issues : []) {
        printError(`  ${String(issue)}`);
      }
      return EXIT_FATAL;
    }
    throw error;
  }

  const binaries = getBinariesConfig({ ffmpeg: config.ffmpegPath, ffprobe: config.ffprobePath });
  const checks = await checkBinaries(binaries, executeCommand);
  const missing = checks.filter((check) => !check.available);
  if (missing.length > 0) {
    for (const check of missing) {
      printError(`${check.name} not found (tried ${check.path}); install it or set ${binaries[check.name].envVar}`);
    }
    return EXIT_FATAL;
  }

  const prober = new FFProbe(binaries.ffprobe.resolvedPath, {
    format: config.probeFormat,
    timeout: PROBE_TIMEOUT_MS,
  });
  const ffmpeg = new FFmpeg(binaries.ffmpeg.resolvedPath, { timeout: config.toolTimeoutMs });
  const driver = new BatchDriver(
    new FileProcessor({
      prober,
      synthesizer: new DownmixSynthesizer(ffmpeg),
      merger: new TrackMerger(prober, ffmpeg),
    })
  );

  const reporter = new ConsoleReporter({
    quiet: options.json ?? false,
    interactive: Boolean(process.stdout.isTTY),
  });
  reporter.attach(driver);

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) return;
    reporter.stopSpinner();
    printWarning(`Received ${signal}; stopping running tools and cleaning up`);
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  if (!options.json) {
    printInfo(
      `Policy ${config.policy}, concurrency ${config.concurrency}${options.dryRun ? ', dry run' : ''}`
    );
  }

  try {
    const result = await driver.run({
      root: config.root,
      scratchParent: config.scratchParent,
      concurrency: config.concurrency,
      policy: config.policy,
      dryRun: options.dryRun ?? false,
      signal: controller.signal,
    });

    if (options.json) {
      printJson(result);
    } else {
      reporter.summary(result);
    }
    return exitCodeFor(result);
  } catch (error) {
    reporter.stopSpinner();
    printError(describeError(error));
    if (isFatalError(error)) {
      return EXIT_FATAL;
    }
    throw error;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}
