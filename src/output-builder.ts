/**
 * Output builder
 *
 * Turns one configuration into the payloads to write: fetch once, parse
 * once, then reduce and/or outline the same parsed tree.
 */

import type { DocumentFetcher } from './fetcher.js';
import type { Logger } from './logger.js';
import { parseDocument } from './document-parser.js';
import { reduceDocument } from './reducer.js';
import { outlineDocument } from './outliner.js';
import type { SnapshotConfig } from './types/config.js';

export interface OutputPayloads {
  primary: string;
  outline?: string;
}

/**
 * Serialize a payload: two-space indentation, or compact when minified
 */
export function serializeDocument(value: unknown, minify: boolean): string {
  return minify ? JSON.stringify(value) : JSON.stringify(value, null, 2);
}

export class OutputBuilder {
  constructor(
    private fetcher: DocumentFetcher,
    private logger?: Logger
  ) {}

  async build(config: SnapshotConfig): Promise<OutputPayloads> {
    const bytes = await this.fetcher.fetch(config.url, config.headers, config.timeoutMs);
    const document = parseDocument(bytes);

    if (config.profile === 'outline') {
      this.logger?.debug('Building outline', { url: config.url });
      return { primary: serializeDocument(outlineDocument(document), config.minify) };
    }

    const primary = config.reduce.length > 0 ? reduceDocument(document, config.reduce) : document;
    const payloads: OutputPayloads = { primary: serializeDocument(primary, config.minify) };

    // The outline always comes from the unreduced document
    if (config.outlineOut) {
      payloads.outline = serializeDocument(outlineDocument(document), config.minify);
    }

    this.logger?.debug('Built payloads', {
      reduce: config.reduce,
      primaryBytes: payloads.primary.length,
      outline: payloads.outline !== undefined,
    });
    return payloads;
  }
}
