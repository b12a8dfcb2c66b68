/**
 * CLI Configuration
 *
 * Environment (after dotenv) first, command-line flags on top. The merged
 * values are validated once; anything invalid is a ConfigurationError.
 * LOG_LEVEL and NODE_ENV are read by the logger itself.
 */

import { z } from 'zod';
import {
  ConfigurationError,
  DEFAULT_SYNTHESIS_POLICY,
  SYNTHESIS_POLICIES,
  type SynthesisPolicy,
} from '@tracksmith/core';
import type { ProbeFormat } from '@tracksmith/media';

export const PROBE_FORMATS = ['auto', 'json', 'plain'] as const;

export const DEFAULT_MEDIA_ROOT = '/mnt/media/video';
export const DEFAULT_TOOL_TIMEOUT_MS = 6 * 60 * 60 * 1000;

const positiveInt = (fallback: number, max?: number) => {
  const number = z.number().int().min(1);
  return z
    .string()
    .default(String(fallback))
    .transform(Number)
    .pipe(max === undefined ? number : number.max(max));
};

const configSchema = z.object({
  // Library
  MEDIA_ROOT: z.string().min(1).default(DEFAULT_MEDIA_ROOT),
  SCRATCH_DIR: z.string().min(1).optional(),

  // External tools
  FFMPEG_PATH: z.string().min(1).optional(),
  FFPROBE_PATH: z.string().min(1).optional(),
  TOOL_TIMEOUT_MS: positiveInt(DEFAULT_TOOL_TIMEOUT_MS),

  // Processing
  CONCURRENCY: positiveInt(1, 64),
  SYNTHESIS_POLICY: z.enum(SYNTHESIS_POLICIES).default(DEFAULT_SYNTHESIS_POLICY),
  PROBE_FORMAT: z.enum(PROBE_FORMATS).default('auto'),
});

const CONFIG_KEYS = Object.keys(configSchema.shape);

export interface AppConfig {
  root: string;
  scratchParent?: string;
  ffmpegPath?: string;
  ffprobePath?: string;
  toolTimeoutMs: number;
  concurrency: number;
  policy: SynthesisPolicy;
  probeFormat: ProbeFormat;
}

/**
 * Values given on the command line; each replaces its environment variable
 */
export interface ConfigOverrides {
  root?: string;
  scratch?: string;
  concurrency?: string;
  policy?: string;
  probeFormat?: string;
}

/**
 * Relevant environment entries, with empty strings treated as unset
 */
function readEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const key of CONFIG_KEYS) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      values[key] = value.trim();
    }
  }
  return values;
}

export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  const raw: Record<string, string | undefined> = {
    ...readEnv(env),
  };

  const flags: Array<[string, string | undefined]> = [
    ['MEDIA_ROOT', overrides.root],
    ['SCRATCH_DIR', overrides.scratch],
    ['CONCURRENCY', overrides.concurrency],
    ['SYNTHESIS_POLICY', overrides.policy],
    ['PROBE_FORMAT', overrides.probeFormat],
  ];
  for (const [key, value] of flags) {
    if (value !== undefined) {
      raw[key] = value;
    }
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const values = parsed.data;
  return {
    root: values.MEDIA_ROOT,
    scratchParent: values.SCRATCH_DIR,
    ffmpegPath: values.FFMPEG_PATH,
    ffprobePath: values.FFPROBE_PATH,
    toolTimeoutMs: values.TOOL_TIMEOUT_MS,
    concurrency: values.CONCURRENCY,
    policy: values.SYNTHESIS_POLICY,
    probeFormat: values.PROBE_FORMAT,
  };
}
