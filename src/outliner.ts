/**
 * OpenAPI outline projection
 *
 * Walks `paths` and `components.schemas` and emits a minimal contract view:
 * per operation the query parameters, the request schema and one schema per
 * response status, plus a simplified schema catalogue. Descriptions,
 * examples and vendor extensions are dropped.
 *
 * Why strict: the outline feeds client generators and contract diffs. A
 * structurally broken document fails here with a message naming the spot,
 * instead of producing an outline that silently lost an operation.
 */

import type { OpenAPIV3 } from 'openapi-types';
import { OutlineError } from './errors.js';
import { isJsonArray, isJsonObject, jsonKind } from './types/json.js';
import type { JsonObject, JsonValue } from './types/json.js';
import type {
  CompositionKeyword,
  CompositionShape,
  ObjectShape,
  OperationOutline,
  OutlineDocument,
  QueryParameterOutline,
  SchemaDefinition,
  SchemaShape,
} from './types/outline.js';

type HttpMethod = `${OpenAPIV3.HttpMethods}`;

export const HTTP_METHODS: readonly HttpMethod[] = [
  'get', 'post', 'put', 'patch', 'delete', 'options', 'head', 'trace',
];

const COMPOSITION_KEYWORDS: readonly CompositionKeyword[] = ['oneOf', 'anyOf', 'allOf'];

function isHttpMethod(key: string): key is HttpMethod {
  return HTTP_METHODS.some(method => method === key);
}

function hasKey(object: JsonObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(object, key);
}

function fail(context: string, problem: string): never {
  throw new OutlineError(`${context}: ${problem}`);
}

/**
 * Outline a parsed OpenAPI document into `{ paths, schemas }`
 */
export function outlineDocument(document: JsonValue): OutlineDocument {
  if (!isJsonObject(document)) {
    throw new OutlineError('OpenAPI document must be a JSON object');
  }

  const paths = document.paths;
  if (!isJsonObject(paths)) {
    throw new OutlineError('OpenAPI document missing paths');
  }

  return {
    paths: outlinePaths(paths),
    schemas: outlineSchemas(document.components),
  };
}

// Maps keyed by document keys are built with Object.fromEntries so that keys
// such as `__proto__` stay own properties
function outlinePaths(paths: JsonObject): OutlineDocument['paths'] {
  return Object.fromEntries(Object.entries(paths).map(([path, item]): [string, Record<string, OperationOutline>] => {
    if (!isJsonObject(item)) {
      throw new OutlineError(`path item must be an object: ${path}`);
    }

    const methods: Record<string, OperationOutline> = {};
    for (const [key, operation] of Object.entries(item)) {
      // Non-method keys (parameters, summary, servers, x-*) are not operations
      if (!isHttpMethod(key)) continue;

      if (!isJsonObject(operation)) {
        throw new OutlineError(`operation must be an object: ${path} ${key}`);
      }
      methods[key] = outlineOperation(operation, `${key.toUpperCase()} ${path}`);
    }

    return [path, methods];
  }));
}

function outlineOperation(operation: JsonObject, context: string): OperationOutline {
  return {
    query: outlineQueryParameters(operation.parameters, context),
    request: outlineRequestBody(operation.requestBody, context),
    responses: outlineResponses(operation.responses, context),
  };
}

function outlineQueryParameters(parameters: JsonValue | undefined, context: string): QueryParameterOutline[] {
  if (parameters === undefined) return [];
  if (!isJsonArray(parameters)) {
    fail(context, `parameters must be an array, got ${jsonKind(parameters)}`);
  }

  return parameters.map(parameter => outlineQueryParameter(parameter, context));
}

function outlineQueryParameter(parameter: JsonValue, context: string): QueryParameterOutline {
  if (!isJsonObject(parameter)) {
    fail(context, `parameter must be an object, got ${jsonKind(parameter)}`);
  }

  if (hasKey(parameter, '$ref')) {
    const ref = parameter.$ref;
    if (typeof ref !== 'string') {
      fail(context, 'parameter $ref must be a string');
    }
    return { $ref: ref };
  }

  const name = typeof parameter.name === 'string' ? parameter.name : '';
  const location = parameter.in;
  if (location !== 'query') {
    const label = name || '<unnamed>';
    const where = typeof location === 'string' ? location : jsonKind(location);
    fail(context, `non-query parameter ${label} (in: ${where})`);
  }

  if (!name) {
    fail(context, 'query parameter missing name');
  }

  const required = parameter.required ?? false;
  if (typeof required !== 'boolean') {
    fail(context, `query parameter ${name} required must be a boolean`);
  }

  if (parameter.schema === undefined) {
    fail(context, `query parameter ${name} missing schema`);
  }

  return {
    name,
    required,
    schema: projectSchema(parameter.schema, `${context} query parameter ${name}`),
  };
}

function outlineRequestBody(requestBody: JsonValue | undefined, context: string): SchemaShape | null {
  if (requestBody === undefined) return null;

  const where = `${context} requestBody`;
  if (!isJsonObject(requestBody)) {
    fail(where, `must be an object, got ${jsonKind(requestBody)}`);
  }

  const ref = referenceString(requestBody, where);
  if (ref !== undefined) return ref;

  return resolveContentSchema(requestBody.content, where);
}

function outlineResponses(responses: JsonValue | undefined, context: string): Record<string, SchemaShape> {
  if (responses === undefined) {
    fail(context, 'missing responses');
  }
  if (!isJsonObject(responses)) {
    fail(context, `responses must be an object, got ${jsonKind(responses)}`);
  }

  return Object.fromEntries(Object.entries(responses).map(([code, response]): [string, SchemaShape] => {
    const where = `${context} response ${code}`;
    if (!isJsonObject(response)) {
      fail(where, `must be an object, got ${jsonKind(response)}`);
    }

    const ref = referenceString(response, where);
    return [code, ref ?? resolveContentSchema(response.content, where)];
  }));
}

/**
 * `$ref` of a request body or response object, passed through as a string
 */
function referenceString(object: JsonObject, context: string): string | undefined {
  if (!hasKey(object, '$ref')) return undefined;

  const ref = object.$ref;
  if (typeof ref !== 'string') {
    fail(context, '$ref must be a string');
  }
  return ref;
}

/**
 * Pick the schema from a `content` map: application/json first, else the
 * first media type that carries a schema
 */
function resolveContentSchema(content: JsonValue | undefined, context: string): SchemaShape {
  if (!isJsonObject(content)) {
    fail(context, content === undefined ? 'missing content' : 'content must be an object');
  }

  const json = content['application/json'];
  if (isJsonObject(json) && json.schema !== undefined) {
    return projectSchema(json.schema, `${context} application/json`);
  }

  for (const [mediaType, entry] of Object.entries(content)) {
    if (isJsonObject(entry) && entry.schema !== undefined) {
      return projectSchema(entry.schema, `${context} ${mediaType}`);
    }
  }

  fail(context, 'has no schema');
}

function compositionOf(schema: JsonObject): CompositionKeyword | undefined {
  return COMPOSITION_KEYWORDS.find(keyword => schema[keyword] !== undefined);
}

function projectComposition(
  schema: JsonObject,
  keyword: CompositionKeyword,
  context: string
): CompositionShape {
  const members = schema[keyword];
  if (!isJsonArray(members)) {
    fail(context, `${keyword} must be an array`);
  }
  const shape: CompositionShape = {};
  shape[keyword] = members.map((member, index) => projectSchema(member, `${context}.${keyword}[${index}]`));
  return shape;
}

function declaredType(schema: JsonObject, context: string): string | undefined {
  const type = schema.type;
  if (type === undefined) return undefined;
  if (typeof type !== 'string') {
    fail(context, `type must be a string, got ${jsonKind(type)}`);
  }
  return type;
}

function projectArrayItems(schema: JsonObject, context: string): SchemaShape {
  if (schema.items === undefined) {
    fail(context, 'array schema missing items');
  }
  return projectSchema(schema.items, `${context}.items`);
}

/**
 * Ref-or-type projection used for parameters, bodies, responses and
 * properties
 *
 * `$ref` collapses to its string, compositions to `{ keyword: [...] }`,
 * arrays to `{ type: 'array', items }`, objects (explicit or implicit) to a
 * simplified object, and any other type to its bare name.
 */
export function projectSchema(schema: JsonValue, context: string = 'schema'): SchemaShape {
  if (!isJsonObject(schema)) {
    fail(context, 'schema missing type');
  }

  const ref = referenceString(schema, context);
  if (ref !== undefined) return ref;

  const keyword = compositionOf(schema);
  if (keyword) {
    return projectComposition(schema, keyword, context);
  }

  const type = declaredType(schema, context);
  if (type === 'array') {
    return { type: 'array', items: projectArrayItems(schema, context) };
  }
  if (type === undefined || type === 'object') {
    return simplifyObject(schema, context);
  }
  return type;
}

/**
 * Full object simplification: `{ type: 'object', required?, properties? }`
 */
export function simplifyObject(schema: JsonObject, context: string): ObjectShape {
  const shape: ObjectShape = { type: 'object' };

  const required = schema.required;
  if (required !== undefined) {
    if (!isJsonArray(required)) {
      fail(context, 'required must be an array of strings');
    }
    const names: string[] = [];
    for (const name of required) {
      if (typeof name !== 'string') {
        fail(context, 'required must be an array of strings');
      }
      names.push(name);
    }
    shape.required = names;
  }

  const properties = schema.properties;
  if (properties !== undefined) {
    if (!isJsonObject(properties)) {
      fail(context, 'properties must be an object');
    }
    shape.properties = Object.fromEntries(Object.entries(properties).map(([name, property]): [string, SchemaShape] =>
      [name, projectSchema(property, `${context}.properties.${name}`)]
    ));
  }

  return shape;
}

/**
 * Catalogue projection for `components.schemas` entries
 *
 * Unlike projectSchema, a named schema keeps its shape: refs stay
 * `{ $ref }` and scalar types stay `{ type }`, so consumers can always
 * read a named schema as an object.
 */
export function projectSchemaDefinition(schema: JsonValue, context: string): SchemaDefinition {
  if (!isJsonObject(schema)) {
    fail(context, 'schema missing type');
  }

  const ref = referenceString(schema, context);
  if (ref !== undefined) return { $ref: ref };

  const keyword = compositionOf(schema);
  if (keyword) {
    return projectComposition(schema, keyword, context);
  }

  const type = declaredType(schema, context);
  if (type === 'array') {
    return { type: 'array', items: projectArrayItems(schema, context) };
  }
  if (type === undefined || type === 'object') {
    return simplifyObject(schema, context);
  }
  return { type };
}

function outlineSchemas(components: JsonValue | undefined): Record<string, SchemaDefinition> {
  if (components === undefined) return {};
  if (!isJsonObject(components)) {
    throw new OutlineError('components must be an object');
  }

  const schemas = components.schemas;
  if (schemas === undefined) return {};
  if (!isJsonObject(schemas)) {
    throw new OutlineError('components.schemas must be an object');
  }

  return Object.fromEntries(Object.entries(schemas).map(([name, schema]): [string, SchemaDefinition] =>
    [name, projectSchemaDefinition(schema, `schema ${name}`)]
  ));
}
