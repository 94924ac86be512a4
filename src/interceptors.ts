/**
 * HTTP interceptors for default headers and retry
 *
 * Why interceptor pattern: Separates cross-cutting concerns (headers, retry)
 * from the request itself. Each interceptor is independently testable.
 */

import { BODY_SNIPPET_LIMIT, HTTP_STATUS } from './constants.js';
import { NetworkError, toError } from './errors.js';
import type { Logger } from './logger.js';

export interface RequestContext {
  method: string;
  url: string;
  headers: Record<string, string>;
  attempt: number;
}

export interface ResponseContext {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: Uint8Array;
}

export type InterceptorFn = (
  ctx: RequestContext,
  next: () => Promise<ResponseContext>
) => Promise<ResponseContext>;

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface InterceptorConfig {
  headers?: Record<string, string>;
  retry?: RetryPolicy;
}

export type SleepFn = (ms: number) => Promise<void>;

export interface InterceptorOptions {
  logger?: Logger;
  sleep?: SleepFn;
}

export const defaultSleep: SleepFn = (ms) => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Delay before retry number `retry` (0-based): base doubled per retry, capped
 */
export function computeBackoff(retry: number, policy: RetryPolicy): number {
  return Math.min(policy.baseDelayMs * 2 ** retry, policy.maxDelayMs);
}

export function isRetryableStatus(status: number): boolean {
  return status === HTTP_STATUS.TOO_MANY_REQUESTS || status >= HTTP_STATUS.INTERNAL_SERVER_ERROR;
}

export function isRetryableError(error: unknown): boolean {
  return error instanceof NetworkError && error.retryable;
}

/**
 * Bounded body excerpt for error messages
 */
export function describeBody(body: string, limit: number = BODY_SNIPPET_LIMIT): string {
  const trimmed = body.trim();
  if (trimmed.length === 0) return '<empty body>';
  if (trimmed.length <= limit) return trimmed;
  return `${trimmed.slice(0, limit)}...`;
}

/**
 * Set header by name, replacing any existing header that differs only in case
 */
export function setHeader(headers: Record<string, string>, name: string, value: string): void {
  for (const key of Object.keys(headers)) {
    if (key.toLowerCase() === name.toLowerCase()) {
      delete headers[key];
    }
  }
  headers[name] = value;
}

export class InterceptorChain {
  private interceptors: InterceptorFn[] = [];
  private logger?: Logger;
  private sleep: SleepFn;

  constructor(public config: InterceptorConfig, options: InterceptorOptions = {}) {
    this.logger = options.logger;
    this.sleep = options.sleep ?? defaultSleep;
    this.buildChain();
  }

  private buildChain(): void {
    if (this.config.headers) {
      this.interceptors.push(this.createHeaderInterceptor(this.config.headers));
    }

    if (this.config.retry) {
      this.interceptors.push(this.createRetryInterceptor(this.config.retry));
    }
  }

  /**
   * Header interceptor: configured headers override request defaults by name
   */
  private createHeaderInterceptor(headers: Record<string, string>): InterceptorFn {
    return async (ctx, next) => {
      for (const [name, value] of Object.entries(headers)) {
        setHeader(ctx.headers, name, value);
      }
      return next();
    };
  }

  /**
   * Retry interceptor: exponential backoff on retryable failures only
   *
   * Terminal failures (4xx other than 429, bad input) propagate on the first
   * attempt. When attempts run out the last error is rethrown unchanged.
   */
  private createRetryInterceptor(policy: RetryPolicy): InterceptorFn {
    return async (ctx, next) => {
      let lastError: Error | undefined;

      for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
        ctx.attempt = attempt;
        try {
          return await next();
        } catch (error) {
          lastError = toError(error);

          if (!isRetryableError(error) || attempt >= policy.maxAttempts) {
            break;
          }

          const delayMs = computeBackoff(attempt - 1, policy);
          this.logger?.warn('Fetch attempt failed, retrying', {
            url: ctx.url,
            attempt,
            maxAttempts: policy.maxAttempts,
            delayMs,
            error: lastError.message,
          });
          await this.sleep(delayMs);
        }
      }

      throw lastError ?? new NetworkError('All retry attempts failed');
    };
  }

  async execute(ctx: RequestContext, finalHandler: () => Promise<ResponseContext>): Promise<ResponseContext> {
    const dispatch = (index: number): Promise<ResponseContext> => {
      const interceptor = this.interceptors[index];
      if (!interceptor) {
        return finalHandler();
      }
      return interceptor(ctx, () => dispatch(index + 1));
    };

    return dispatch(0);
  }
}

/**
 * HTTP client with interceptor support
 */
export class HttpClient {
  constructor(
    private interceptors: InterceptorChain,
    private timeoutMs: number
  ) {}

  async get(url: string, headers: Record<string, string> = {}): Promise<ResponseContext> {
    const ctx: RequestContext = {
      method: 'GET',
      url,
      headers: { ...headers },
      attempt: 1,
    };

    return this.interceptors.execute(ctx, () => this.send(ctx));
  }

  private async send(ctx: RequestContext): Promise<ResponseContext> {
    let response: Response;
    try {
      response = await fetch(ctx.url, {
        method: ctx.method,
        headers: ctx.headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const err = toError(error);
      if (err.name === 'TimeoutError' || err.name === 'AbortError') {
        throw new NetworkError(`request timed out after ${this.timeoutMs} ms`, undefined, true);
      }
      const cause = err.cause instanceof Error ? `: ${err.cause.message}` : '';
      throw new NetworkError(`request failed: ${err.message}${cause}`, undefined, true);
    }

    let body: Uint8Array;
    try {
      body = new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      throw new NetworkError(
        `failed to read response: ${toError(error).message}`,
        response.status,
        true
      );
    }

    // Why throw on non-2xx: the retry interceptor decides on the error's retryable flag
    if (response.status < HTTP_STATUS.OK || response.status >= HTTP_STATUS.MULTIPLE_CHOICES) {
      const snippet = describeBody(new TextDecoder().decode(body));
      const reason = response.statusText ? ` ${response.statusText}` : '';
      throw new NetworkError(
        `unexpected status: ${response.status}${reason}: ${snippet}`,
        response.status,
        isRetryableStatus(response.status)
      );
    }

    return {
      status: response.status,
      statusText: response.statusText,
      headers: Object.fromEntries(response.headers.entries()),
      body,
    };
  }
}
