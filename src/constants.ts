/**
 * Application constants
 *
 * Why: Centralized constants improve readability and maintainability.
 * Magic numbers scattered through code are harder to understand and change.
 */

export const APP_NAME = 'openapi-snapshot';
export const APP_VERSION = '0.3.0';
export const USER_AGENT = `${APP_NAME}/${APP_VERSION}`;

/**
 * Defaults applied by the configuration layer
 */
export const DEFAULTS = {
  URL: 'http://localhost:3000/api-docs/openapi.json',
  OUT: 'openapi/backend_openapi.json',
  OUTLINE_OUT: 'openapi/backend_openapi.outline.json',
  WATCH_REDUCE: 'paths,components',
  TIMEOUT_MS: 10_000,
  INTERVAL_MS: 2_000,
} as const;

/**
 * Path appended when the interactive prompt receives a bare port or host:port
 */
export const DEFAULT_DOCS_PATH = '/api-docs/openapi.json';

/**
 * Fetch retry policy
 */
export const RETRY = {
  MAX_ATTEMPTS: 3,
  BASE_DELAY_MS: 250,
  MAX_DELAY_MS: 2_000,
} as const;

/**
 * Watch loop timing
 *
 * Why a floor: a zero or tiny interval would hammer the backend in a busy loop.
 */
export const WATCH = {
  MIN_INTERVAL_MS: 250,
  BACKOFF_MAX_MS: 10_000,
  SLEEP_SLICE_MS: 50,
} as const;

/**
 * Maximum number of response body characters quoted in error messages
 */
export const BODY_SNIPPET_LIMIT = 200;

/**
 * HTTP status codes
 *
 * Why: Named constants more readable than numeric literals.
 * Makes intent clear (STATUS_TOO_MANY_REQUESTS vs 429).
 */
export const HTTP_STATUS = {
  OK: 200,
  MULTIPLE_CHOICES: 300,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_SERVER_ERROR: 500,
} as const;
