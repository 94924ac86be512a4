/**
 * Library exports for programmatic usage
 */
export { DocumentFetcher, parseHeader, parseHeaders } from './fetcher.js';
export { parseDocument } from './document-parser.js';
export { reduceDocument } from './reducer.js';
export { outlineDocument, projectSchema } from './outliner.js';
export { OutputBuilder, serializeDocument } from './output-builder.js';
export { writeAtomic, writeOutputs } from './atomic-writer.js';
export { WatchLoop, computeWatchDelay, normalizeUserUrl } from './watch.js';
export { parseReduceList, resolveConfig, validateConfig } from './config.js';
export { runCli } from './cli.js';
export { ConsoleLogger, JsonLogger, createLogger } from './logger.js';
export {
  SnapshotError,
  UsageError,
  NetworkError,
  ParseError,
  ReduceError,
  OutlineError,
  IoError,
  InterruptedError,
  exitCodeFor,
} from './errors.js';
export type { OutputPayloads } from './output-builder.js';
export type { Logger } from './logger.js';
export type { SnapshotConfig, OutputProfile, ReduceKey, RunMode } from './types/config.js';
export type { OutlineDocument, OperationOutline, SchemaShape } from './types/outline.js';
export type { JsonValue, JsonObject } from './types/json.js';
