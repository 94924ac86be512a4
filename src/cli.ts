/**
 * Command line interface
 *
 * `openapi-snapshot [options]` takes one snapshot; `openapi-snapshot watch`
 * keeps it fresh. Returns the process exit code instead of exiting so the
 * whole flow can be driven from tests.
 */

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { APP_NAME, APP_VERSION, DEFAULTS } from './constants.js';
import { resolveConfig, validateConfig } from './config.js';
import type { Env } from './config.js';
import { InterruptedError, exitCodeFor, getErrorDetails, toError } from './errors.js';
import { DocumentFetcher } from './fetcher.js';
import type { FetcherOptions } from './fetcher.js';
import type { Logger } from './logger.js';
import { OutputBuilder } from './output-builder.js';
import type { OutputPayloads } from './output-builder.js';
import { writeOutputs } from './atomic-writer.js';
import type { StdoutWriter } from './atomic-writer.js';
import { WatchLoop, createTerminalPrompt } from './watch.js';
import type { UrlPrompt } from './watch.js';
import { OUTPUT_PROFILES } from './types/config.js';
import type { RawOptions, RawWatchOptions, SnapshotConfig } from './types/config.js';

export interface CliDependencies {
  logger: Logger;
  signal: AbortSignal;
  env?: Env;
  stdout?: StdoutWriter;
  prompt?: UrlPrompt;
  fetcher?: FetcherOptions;
}

const EXAMPLES = `
Examples:
  ${APP_NAME}
  ${APP_NAME} watch
  ${APP_NAME} --out openapi/backend_openapi.json --outline-out openapi/backend_openapi.outline.json
  ${APP_NAME} --profile outline --out openapi/backend_openapi.outline.json
  ${APP_NAME} --url http://localhost:3000/api-docs/openapi.json --out openapi/backend_openapi.json
  ${APP_NAME} --minify true --out openapi/backend_openapi.min.json`;

const TRUE_VALUES = ['true', 'yes', 'on', '1', 'y'];
const FALSE_VALUES = ['false', 'no', 'off', '0', 'n'];

/**
 * Boolean flag value parser (`--minify`, `--minify false`)
 */
export function parseBoolish(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) return true;
  if (FALSE_VALUES.includes(normalized)) return false;
  throw new InvalidArgumentError(`expected a boolean, got '${value}'.`);
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function throwIfInterrupted(signal: AbortSignal, message: string): void {
  if (signal.aborted) {
    throw new InterruptedError(message);
  }
}

type RunHandler = (options: RawOptions, watch?: RawWatchOptions) => Promise<void>;

/**
 * Build the commander program; `run` receives the parsed option bags
 */
export function createProgram(run: RunHandler): Command {
  const program = new Command();

  program
    .name(APP_NAME)
    .description('Fetch and save an OpenAPI JSON snapshot.')
    .version(APP_VERSION)
    .exitOverride()
    .option('--url <url>', `OpenAPI document URL (default: ${DEFAULTS.URL})`)
    .option('--out <path>', `snapshot file (default: ${DEFAULTS.OUT})`)
    .option('--outline-out <path>', 'also write an outline of the document to this file')
    .option('--reduce <keys>', 'keep only these top-level keys (comma separated: paths,components)')
    .addOption(new Option('--profile <profile>', 'output profile (default: full)').choices(OUTPUT_PROFILES))
    .option('--minify [value]', 'write compact JSON', parseBoolish)
    .option('--timeout-ms <ms>', `request timeout in milliseconds (default: ${DEFAULTS.TIMEOUT_MS})`)
    .option('--header <header>', 'extra request header "Name: value" (repeatable)', collect, [])
    .option('--stdout', 'print the snapshot to stdout instead of writing files')
    .addHelpText('after', EXAMPLES)
    .action(async () => {
      const options: RawOptions = program.opts();
      await run(options);
    });

  program
    .command('watch')
    .description('Refresh the snapshot on an interval until interrupted')
    .option('--interval-ms <ms>', `delay between refreshes (default: ${DEFAULTS.INTERVAL_MS})`)
    .option('--no-outline', 'do not write the outline file in watch mode')
    .action(async (watchOptions: RawWatchOptions) => {
      const options: RawOptions = program.opts();
      await run(options, watchOptions);
    });

  return program;
}

/**
 * Parse `argv` (without the node and script entries) and run
 */
export async function runCli(argv: string[], deps: CliDependencies): Promise<number> {
  const { logger } = deps;

  const program = createProgram(async (rawOptions, rawWatch) => {
    const { config, mode } = resolveConfig(rawOptions, rawWatch, deps.env);
    if (config.stdout && config.out) {
      logger.warn('--out is ignored because --stdout is set.');
    }
    validateConfig(config);

    const fetcher = new DocumentFetcher({ logger, ...deps.fetcher });
    const builder = new OutputBuilder(fetcher, logger);
    const write = (current: SnapshotConfig, payloads: OutputPayloads) =>
      writeOutputs(current, payloads, deps.stdout);

    if (mode.kind === 'watch') {
      await new WatchLoop(config, {
        intervalMs: mode.intervalMs,
        builder,
        logger,
        signal: deps.signal,
        prompt: deps.prompt ?? createTerminalPrompt(),
        write,
      }).run();
      return;
    }

    throwIfInterrupted(deps.signal, 'interrupted before fetching');
    const payloads = await builder.build(config);
    throwIfInterrupted(deps.signal, 'interrupted before writing');

    const written = await write(config, payloads);
    if (written.length > 0) {
      logger.info('Snapshot written', { paths: written });
    }
  });

  try {
    await program.parseAsync(argv, { from: 'user' });
    return 0;
  } catch (error) {
    // Commander already printed its own message (or help/version output)
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    logger.error('Snapshot failed', toError(error), getErrorDetails(error));
    return exitCodeFor(error);
  }
}
