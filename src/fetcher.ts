/**
 * Retryable document fetcher
 *
 * One logical "get the document" operation: parse caller headers, build the
 * interceptor chain (default headers + retry), issue the GET and hand back
 * the raw body. Knows nothing about JSON.
 */

import { RETRY, USER_AGENT } from './constants.js';
import { UsageError } from './errors.js';
import { HttpClient, InterceptorChain, setHeader } from './interceptors.js';
import type { RetryPolicy, SleepFn } from './interceptors.js';
import type { Logger } from './logger.js';

export interface FetcherOptions {
  logger?: Logger;
  sleep?: SleepFn;
  retry?: RetryPolicy;
}

const HEADER_NAME = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const INVALID_HEADER_VALUE = /[\r\n\0]/;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: RETRY.MAX_ATTEMPTS,
  baseDelayMs: RETRY.BASE_DELAY_MS,
  maxDelayMs: RETRY.MAX_DELAY_MS,
};

/**
 * Parse a raw `Name: value` header string
 */
export function parseHeader(raw: string): [string, string] {
  const separator = raw.indexOf(':');
  if (separator === -1) {
    throw new UsageError(`invalid header format: ${raw}`, { header: raw });
  }

  const name = raw.slice(0, separator).trim();
  const value = raw.slice(separator + 1).trim();
  if (!name) {
    throw new UsageError(`invalid header format: ${raw}`, { header: raw });
  }
  if (!HEADER_NAME.test(name)) {
    throw new UsageError(`invalid header name: ${name}`);
  }
  if (INVALID_HEADER_VALUE.test(value)) {
    throw new UsageError(`invalid header value for: ${name}`);
  }

  return [name, value];
}

/**
 * Parse raw header strings; later entries win over earlier ones by name
 */
export function parseHeaders(rawHeaders: readonly string[]): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const raw of rawHeaders) {
    const [name, value] = parseHeader(raw);
    setHeader(headers, name, value);
  }
  return headers;
}

export function defaultRequestHeaders(): Record<string, string> {
  return {
    Accept: 'application/json',
    'User-Agent': USER_AGENT,
  };
}

export class DocumentFetcher {
  private retry: RetryPolicy;

  constructor(private options: FetcherOptions = {}) {
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
  }

  /**
   * Fetch the raw document bytes
   *
   * Throws UsageError for malformed headers and NetworkError once retries
   * are exhausted or on a terminal status.
   */
  async fetch(url: string, rawHeaders: readonly string[], timeoutMs: number): Promise<Uint8Array> {
    const headers = parseHeaders(rawHeaders);
    const chain = new InterceptorChain(
      { headers, retry: this.retry },
      { logger: this.options.logger, sleep: this.options.sleep }
    );
    const client = new HttpClient(chain, timeoutMs);

    this.options.logger?.debug('Fetching OpenAPI document', { url, headers, timeoutMs });
    const response = await client.get(url, defaultRequestHeaders());
    this.options.logger?.debug('Fetched OpenAPI document', {
      url,
      status: response.status,
      bytes: response.body.byteLength,
    });

    return response.body;
  }
}
