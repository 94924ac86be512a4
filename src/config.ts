/**
 * Configuration loader and validator
 *
 * Why validation: options come from flags and environment variables. Invalid
 * values would surface as confusing runtime failures. Validate upfront with
 * clear error messages and hand the core a single frozen value.
 */

import { z } from 'zod';
import { DEFAULTS } from './constants.js';
import { ReduceError, UsageError } from './errors.js';
import { OUTPUT_PROFILES, REDUCE_KEYS } from './types/config.js';
import type { RawOptions, RawWatchOptions, ReduceKey, RunMode, SnapshotConfig } from './types/config.js';

const optionsSchema = z.object({
  url: z.string().trim().min(1).optional(),
  out: z.string().min(1).optional(),
  outlineOut: z.string().min(1).optional(),
  reduce: z.string().optional(),
  profile: z.enum(['full', 'outline']).default('full'),
  minify: z.boolean().default(false),
  timeoutMs: z.coerce.number().int().positive().default(DEFAULTS.TIMEOUT_MS),
  header: z.array(z.string()).default([]),
  stdout: z.boolean().default(false),
});

const watchOptionsSchema = z.object({
  intervalMs: z.coerce.number().int().positive().default(DEFAULTS.INTERVAL_MS),
  outline: z.boolean().default(true),
});

export type Env = Record<string, string | undefined>;

/**
 * Environment fallbacks for the common options; flags win
 */
export function optionsFromEnv(env: Env): RawOptions {
  return {
    url: env.OPENAPI_SNAPSHOT_URL || undefined,
    out: env.OPENAPI_SNAPSHOT_OUT || undefined,
    timeoutMs: env.OPENAPI_SNAPSHOT_TIMEOUT_MS || undefined,
  };
}

function flagName(path: (string | number)[]): string {
  const key = String(path[0] ?? 'option');
  return `--${key.replace(/[A-Z]/g, letter => `-${letter.toLowerCase()}`)}`;
}

function toUsageError(error: z.ZodError): UsageError {
  const issues = error.issues.map(issue => `${flagName(issue.path)}: ${issue.message}`);
  return new UsageError(`invalid options: ${issues.join('; ')}`, { issues });
}

function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw toUsageError(result.error);
  }
  return result.data;
}

function isReduceKey(value: string): value is ReduceKey {
  return REDUCE_KEYS.some(key => key === value);
}

/**
 * Parse a comma separated reduce list (`paths,components`)
 *
 * Entries are trimmed, blanks skipped, duplicates collapsed; order is kept.
 */
export function parseReduceList(value: string): ReduceKey[] {
  const keys: ReduceKey[] = [];

  for (const raw of value.split(',')) {
    const entry = raw.trim();
    if (!entry) continue;

    if (entry.toLowerCase() !== entry) {
      throw new ReduceError(`reduce values must be lowercase: ${entry}`);
    }
    if (!isReduceKey(entry)) {
      throw new ReduceError(`unsupported reduce value: ${entry}`, { supported: REDUCE_KEYS });
    }
    if (!keys.includes(entry)) {
      keys.push(entry);
    }
  }

  if (keys.length === 0) {
    throw new ReduceError('reduce list cannot be empty');
  }
  return keys;
}

/**
 * Build the run configuration from CLI options
 *
 * `watch` is present when the watch subcommand was chosen. Watch mode with
 * the full profile defaults to reducing to paths and components, and to
 * writing an outline next to the snapshot unless `--no-outline` is given.
 */
export function resolveConfig(
  rawOptions: RawOptions,
  rawWatch?: RawWatchOptions,
  env: Env = process.env
): { config: SnapshotConfig; mode: RunMode } {
  const fromEnv = optionsFromEnv(env);
  const options = parseWith(optionsSchema, {
    ...rawOptions,
    url: rawOptions.url ?? fromEnv.url,
    out: rawOptions.out ?? fromEnv.out,
    timeoutMs: rawOptions.timeoutMs ?? fromEnv.timeoutMs,
  });

  const watch = rawWatch ? parseWith(watchOptionsSchema, rawWatch) : undefined;
  const mode: RunMode = watch ? { kind: 'watch', intervalMs: watch.intervalMs } : { kind: 'snapshot' };

  const watchFull = watch !== undefined && options.profile === 'full';
  const reduceValue = options.reduce ?? (watchFull ? DEFAULTS.WATCH_REDUCE : undefined);
  const outlineOut = options.outlineOut
    ?? (watchFull && watch.outline && !options.stdout ? DEFAULTS.OUTLINE_OUT : undefined);

  const config: SnapshotConfig = Object.freeze({
    url: options.url ?? DEFAULTS.URL,
    urlFromDefault: options.url === undefined,
    out: options.stdout ? options.out : options.out ?? DEFAULTS.OUT,
    outlineOut,
    profile: options.profile,
    reduce: reduceValue !== undefined ? parseReduceList(reduceValue) : [],
    minify: options.minify,
    timeoutMs: options.timeoutMs,
    headers: options.header,
    stdout: options.stdout,
  });

  return { config, mode };
}

/**
 * Validate flag combinations the schema cannot express
 */
export function validateConfig(config: SnapshotConfig): void {
  if (!OUTPUT_PROFILES.includes(config.profile)) {
    throw new UsageError(`unsupported profile: ${config.profile}`);
  }
  if (!config.stdout && !config.out) {
    throw new UsageError('--out is required unless --stdout is set.');
  }
  if (config.profile === 'outline' && config.reduce.length > 0) {
    throw new UsageError('--reduce is not supported with --profile outline.');
  }
  if (config.profile === 'outline' && config.outlineOut) {
    throw new UsageError('--outline-out is not supported with --profile outline.');
  }
}

/**
 * Copy of the configuration pointing at a user-supplied URL
 */
export function withUrl(config: SnapshotConfig, url: string): SnapshotConfig {
  return Object.freeze({ ...config, url, urlFromDefault: false });
}
