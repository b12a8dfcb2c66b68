/**
 * Binary Configuration
 *
 * Centralized configuration for the external media tools.
 *
 * Priority order:
 * 1. Explicit path (CLI flag or environment variable, e.g. FFMPEG_PATH)
 * 2. System PATH
 *
 * An explicit path is used as given. When it does not exist, checkBinaries
 * reports it missing; the name on PATH is never substituted.
 */

import { executeCommand, type CommandRunner } from '@tracksmith/utils';

/**
 * Binary configuration interface
 */
export interface BinaryConfig {
  name: string;
  envVar: string;
  resolvedPath: string;
  source: 'explicit' | 'path';
}

export interface BinariesConfig {
  ffmpeg: BinaryConfig;
  ffprobe: BinaryConfig;
}

export type BinaryName = keyof BinariesConfig;

const BINARY_NAMES: readonly BinaryName[] = ['ffmpeg', 'ffprobe'];

export interface BinaryCheck {
  name: BinaryName;
  path: string;
  available: boolean;
  version?: string;
}

/**
 * Get executable extension for current OS
 */
function getExeExt(): string {
  return process.platform === 'win32' ? '.exe' : '';
}

/**
 * Resolve binary path: the explicit value when one is set, otherwise the bare name
 */
export function resolveBinaryPath(
  name: string,
  envVar: string,
  explicitPath?: string
): BinaryConfig {
  if (explicitPath) {
    return { name, envVar, resolvedPath: explicitPath, source: 'explicit' };
  }

  // Let the system PATH resolve the name; checkBinaries reports if it cannot
  return { name, envVar, resolvedPath: name + getExeExt(), source: 'path' };
}

export function getBinariesConfig(
  overrides: Partial<Record<BinaryName, string>> = {}
): BinariesConfig {
  return {
    ffmpeg: resolveBinaryPath('ffmpeg', 'FFMPEG_PATH', overrides.ffmpeg ?? process.env['FFMPEG_PATH']),
    ffprobe: resolveBinaryPath('ffprobe', 'FFPROBE_PATH', overrides.ffprobe ?? process.env['FFPROBE_PATH']),
  };
}

/**
 * Run `<tool> -version` for every configured binary
 */
export async function checkBinaries(
  config: BinariesConfig,
  runner: CommandRunner = executeCommand
): Promise<BinaryCheck[]> {
  return Promise.all(BINARY_NAMES.map(async (name): Promise<BinaryCheck> => {
    const path = config[name].resolvedPath;
    try {
      const result = await runner(path, ['-version'], { timeout: 5000 });
      const firstLine = result.stdout.split('\n')[0]?.trim();
      return {
        name,
        path,
        available: result.exitCode === 0,
        version: firstLine || undefined,
      };
    } catch {
      // spawn error means the binary is not there
      return { name, path, available: false };
    }
  }));
}
