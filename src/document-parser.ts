/**
 * Decode fetched bytes into a JSON tree. No schema validation happens here.
 */

import { ParseError, toError } from './errors.js';
import type { JsonValue } from './types/json.js';

export function parseDocument(bytes: Uint8Array | string): JsonValue {
  const text = typeof bytes === 'string' ? bytes : new TextDecoder('utf-8').decode(bytes);
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ParseError(`invalid JSON: ${toError(error).message}`);
  }
}
