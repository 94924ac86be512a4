/**
 * Snapshot configuration types
 *
 * Built once per run by the configuration layer and frozen; the watch loop
 * replaces the whole value when the interactive prompt supplies a new URL.
 */

export type OutputProfile = 'full' | 'outline';

export const OUTPUT_PROFILES: readonly OutputProfile[] = ['full', 'outline'];

export type ReduceKey = 'paths' | 'components';

export const REDUCE_KEYS: readonly ReduceKey[] = ['paths', 'components'];

export interface SnapshotConfig {
  url: string;
  urlFromDefault: boolean;
  out?: string;
  outlineOut?: string;
  profile: OutputProfile;
  reduce: ReduceKey[];
  minify: boolean;
  timeoutMs: number;
  headers: string[];
  stdout: boolean;
}

export type RunMode =
  | { kind: 'snapshot' }
  | { kind: 'watch'; intervalMs: number };

/**
 * Options as they arrive from the command line, before defaults
 */
export interface RawOptions {
  url?: string;
  out?: string;
  outlineOut?: string;
  reduce?: string;
  profile?: string;
  minify?: boolean;
  timeoutMs?: string | number;
  header?: string[];
  stdout?: boolean;
}

export interface RawWatchOptions {
  intervalMs?: string | number;
  outline?: boolean; // commander sets false for --no-outline
}
