/**
 * Watch loop
 *
 * Rebuilds and rewrites the snapshot on an interval until the shutdown
 * signal fires. Failures never stop the loop: they are logged and stretch
 * the next delay with exponential backoff.
 *
 * When the very first URL-related failure happens against the built-in
 * default URL, an interactive terminal gets one chance to point the watcher
 * somewhere else (a port, host:port or full URL).
 */

import { createInterface } from 'readline/promises';
import { DEFAULT_DOCS_PATH, WATCH } from './constants.js';
import { withUrl } from './config.js';
import { IoError, isUrlRelated, toError } from './errors.js';
import { writeOutputs } from './atomic-writer.js';
import type { Logger } from './logger.js';
import type { OutputBuilder, OutputPayloads } from './output-builder.js';
import type { SnapshotConfig } from './types/config.js';

/**
 * Asks for a replacement URL; resolves undefined when the user declines
 */
export type UrlPrompt = (currentUrl: string) => Promise<string | undefined>;

export type PayloadWriter = (config: SnapshotConfig, payloads: OutputPayloads) => Promise<string[]>;

/**
 * Waits up to `ms`; resolves true when the signal fired
 */
export type ShutdownWait = (signal: AbortSignal, ms: number) => Promise<boolean>;

export interface WatchOptions {
  intervalMs: number;
  builder: Pick<OutputBuilder, 'build'>;
  logger: Logger;
  signal: AbortSignal;
  prompt?: UrlPrompt;
  write?: PayloadWriter;
  wait?: ShutdownWait;
}

export interface WatchState {
  consecutiveFailures: number;
  recoveryOffered: boolean;
}

const INVALID_INPUT_MESSAGE = 'Invalid input. Enter a port (e.g., 3000) or full URL.';

/**
 * Delay before the next cycle: the base interval after a success, doubled
 * per consecutive failure up to the backoff cap, never below the base
 */
export function computeWatchDelay(baseIntervalMs: number, consecutiveFailures: number): number {
  if (consecutiveFailures === 0) return baseIntervalMs;
  const backoff = Math.min(baseIntervalMs * 2 ** consecutiveFailures, WATCH.BACKOFF_MAX_MS);
  return Math.max(baseIntervalMs, backoff);
}

/**
 * Sleep in short slices so a shutdown request is noticed quickly
 */
export async function waitWithShutdown(
  signal: AbortSignal,
  ms: number,
  sliceMs: number = WATCH.SLEEP_SLICE_MS
): Promise<boolean> {
  let waited = 0;
  while (waited < ms) {
    if (signal.aborted) return true;
    const step = Math.min(ms - waited, sliceMs);
    await new Promise(resolve => setTimeout(resolve, step));
    waited += step;
  }
  return signal.aborted;
}

/**
 * Turn prompt input into a URL
 *
 * `3001` → `http://localhost:3001/api-docs/openapi.json`, `host:4000` →
 * `http://host:4000/api-docs/openapi.json`, http(s) URLs pass through.
 */
export function normalizeUserUrl(input: string): string | undefined {
  const trimmed = input.trim();
  if (!trimmed) return undefined;

  if (/^[0-9]+$/.test(trimmed)) {
    return `http://localhost:${trimmed}${DEFAULT_DOCS_PATH}`;
  }
  if (trimmed.startsWith('http://') || trimmed.startsWith('https://')) {
    return trimmed;
  }
  if (trimmed.includes(':')) {
    return `http://${trimmed}${DEFAULT_DOCS_PATH}`;
  }
  return undefined;
}

/**
 * Ask until the answer is blank (declined) or normalizes to a URL
 */
export async function promptForUrl(
  currentUrl: string,
  ask: (question: string) => Promise<string>,
  notify: (message: string) => void
): Promise<string | undefined> {
  for (;;) {
    const answer = (await ask(`OpenAPI URL (default: ${currentUrl}) - enter port or URL: `)).trim();
    if (!answer) return undefined;

    const url = normalizeUserUrl(answer);
    if (url) return url;
    notify(INVALID_INPUT_MESSAGE);
  }
}

/**
 * Readline-backed prompt on the terminal; undefined when stdin is not a TTY
 */
export function createTerminalPrompt(
  input: NodeJS.ReadableStream & { isTTY?: boolean } = process.stdin,
  output: NodeJS.WritableStream = process.stderr
): UrlPrompt | undefined {
  if (!input.isTTY) return undefined;

  return async (currentUrl: string) => {
    const rl = createInterface({ input, output });
    try {
      return await promptForUrl(
        currentUrl,
        question => rl.question(question),
        message => output.write(`${message}\n`)
      );
    } catch (error) {
      throw new IoError(`failed to read input: ${toError(error).message}`);
    } finally {
      rl.close();
    }
  };
}

export class WatchLoop {
  private config: SnapshotConfig;
  private state: WatchState = { consecutiveFailures: 0, recoveryOffered: false };
  private write: PayloadWriter;
  private wait: ShutdownWait;

  constructor(config: SnapshotConfig, private options: WatchOptions) {
    this.config = config;
    this.write = options.write ?? ((current, payloads) => writeOutputs(current, payloads));
    this.wait = options.wait ?? waitWithShutdown;
  }

  get currentConfig(): SnapshotConfig {
    return this.config;
  }

  get currentState(): Readonly<WatchState> {
    return this.state;
  }

  /**
   * Run cycles until the shutdown signal fires
   */
  async run(): Promise<void> {
    const { logger, signal } = this.options;
    const baseIntervalMs = Math.max(this.options.intervalMs, WATCH.MIN_INTERVAL_MS);

    logger.info('Watching OpenAPI document', { url: this.config.url, intervalMs: baseIntervalMs });

    while (!signal.aborted) {
      const retryNow = await this.cycle();
      if (retryNow) continue;

      const delay = computeWatchDelay(baseIntervalMs, this.state.consecutiveFailures);
      if (await this.wait(signal, delay)) break;
    }

    logger.info('Watch stopped');
  }

  /**
   * One build-and-write pass; true when the URL changed and the cycle should
   * be retried without waiting
   */
  private async cycle(): Promise<boolean> {
    const { builder, logger } = this.options;

    let payloads: OutputPayloads;
    try {
      payloads = await builder.build(this.config);
    } catch (error) {
      if (await this.offerNewUrl(error)) return true;
      this.state.consecutiveFailures++;
      logger.error('Snapshot failed', toError(error), {
        url: this.config.url,
        consecutiveFailures: this.state.consecutiveFailures,
      });
      return false;
    }

    try {
      const written = await this.write(this.config, payloads);
      this.state.consecutiveFailures = 0;
      logger.info('Snapshot written', { paths: written });
    } catch (error) {
      this.state.consecutiveFailures++;
      logger.error('Failed to write snapshot', toError(error), {
        consecutiveFailures: this.state.consecutiveFailures,
      });
    }
    return false;
  }

  private async offerNewUrl(error: unknown): Promise<boolean> {
    const { prompt, logger } = this.options;
    if (!prompt || this.state.recoveryOffered) return false;
    if (!this.config.urlFromDefault || !isUrlRelated(error)) return false;

    this.state.recoveryOffered = true;
    logger.warn('Default URL is not serving an OpenAPI document', {
      url: this.config.url,
      error: toError(error).message,
    });

    const url = await prompt(this.config.url);
    if (!url) return false;

    logger.info('Switching watch URL from default after prompt', { from: this.config.url, to: url });
    this.config = withUrl(this.config, url);
    return true;
  }
}
