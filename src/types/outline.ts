/**
 * Outline output types
 *
 * The outline keeps only what a client generator or a contract diff needs:
 * query parameters, request/response schema references and a simplified
 * schema catalogue.
 */

export type CompositionKeyword = 'oneOf' | 'anyOf' | 'allOf';

/**
 * Result of the ref-or-type projection: a `$ref` string, a bare type name,
 * or a small object for arrays, compositions and inline objects
 */
export type SchemaShape =
  | string
  | ArrayShape
  | CompositionShape
  | ObjectShape;

export interface ArrayShape {
  type: 'array';
  items: SchemaShape;
}

export type CompositionShape = { [K in CompositionKeyword]?: SchemaShape[] };

export interface ObjectShape {
  type: 'object';
  required?: string[];
  properties?: Record<string, SchemaShape>;
}

/**
 * Entry of the top-level schema catalogue
 */
export type SchemaDefinition =
  | { $ref: string }
  | CompositionShape
  | ArrayShape
  | { type: string }
  | ObjectShape;

export type QueryParameterOutline =
  | { $ref: string }
  | { name: string; required: boolean; schema: SchemaShape };

export interface OperationOutline {
  query: QueryParameterOutline[];
  request: SchemaShape | null;
  responses: Record<string, SchemaShape>;
}

export interface OutlineDocument {
  paths: Record<string, Record<string, OperationOutline>>;
  schemas: Record<string, SchemaDefinition>;
}
