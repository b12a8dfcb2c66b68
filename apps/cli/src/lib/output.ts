/**
 * Output Formatter
 *
 * Consistent CLI output formatting. Every status line starts with a local
 * [YYYY-MM-DD HH:mm:ss] stamp.
 */

import chalk from 'chalk';
import { formatTimestamp } from '@tracksmith/utils';

function stamp(): string {
  return chalk.gray(`[${formatTimestamp()}]`);
}

export function printSuccess(message: string): void {
  console.log(stamp(), chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(stamp(), chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(stamp(), chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(stamp(), chalk.blue('i'), message);
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
