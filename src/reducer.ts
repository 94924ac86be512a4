/**
 * Reduce an OpenAPI document to a subset of its top-level sections
 */

import { ReduceError } from './errors.js';
import type { ReduceKey } from './types/config.js';
import { isJsonObject } from './types/json.js';
import type { JsonObject, JsonValue } from './types/json.js';

/**
 * Keep only the requested top-level keys, in request order
 *
 * Values are shared with the input, not copied; neither side is mutated.
 * Every missing key is reported in a single error.
 */
export function reduceDocument(document: JsonValue, keys: readonly ReduceKey[]): JsonObject {
  if (keys.length === 0) {
    throw new ReduceError('reduce list cannot be empty');
  }
  if (!isJsonObject(document)) {
    throw new ReduceError('OpenAPI document must be a JSON object');
  }

  const unique = [...new Set(keys)];
  const missing = unique.filter(key => !Object.prototype.hasOwnProperty.call(document, key));
  if (missing.length > 0) {
    throw new ReduceError(`missing top-level key(s): ${missing.join(', ')}`, { missing });
  }

  const reduced: JsonObject = {};
  for (const key of unique) {
    reduced[key] = document[key];
  }
  return reduced;
}
