/**
 * OpenAPI documents shared by unit and integration tests
 */

import type { JsonObject } from '../types/json.js';

export const minimalDocument: JsonObject = {
  openapi: '3.0.3',
  paths: { '/health': {} },
  components: {},
};

export const petstoreDocument: JsonObject = {
  openapi: '3.0.3',
  info: { title: 'Petstore', version: '1.0.0' },
  servers: [{ url: 'https://petstore.example.com/v1' }],
  paths: {
    '/pets': {
      summary: 'Pets',
      get: {
        operationId: 'listPets',
        tags: ['pets'],
        parameters: [
          {
            name: 'limit',
            in: 'query',
            description: 'Page size',
            schema: { type: 'integer', format: 'int32', maximum: 100 },
          },
          { $ref: '#/components/parameters/Cursor' },
        ],
        responses: {
          '200': {
            description: 'A page of pets',
            content: {
              'application/json': {
                schema: { type: 'array', items: { $ref: '#/components/schemas/Pet' } },
              },
            },
          },
          default: { $ref: '#/components/responses/Error' },
        },
      },
      post: {
        operationId: 'createPet',
        requestBody: {
          required: true,
          content: {
            'application/json': { schema: { $ref: '#/components/schemas/NewPet' } },
          },
        },
        responses: {
          '201': {
            description: 'Created',
            content: {
              'application/json': { schema: { $ref: '#/components/schemas/Pet' } },
            },
          },
        },
      },
    },
    '/pets/{petId}': {
      parameters: [{ name: 'petId', in: 'path', required: true, schema: { type: 'integer' } }],
      delete: {
        operationId: 'deletePet',
        responses: {
          '204': {
            description: 'Deleted',
            content: { 'text/plain': { schema: { type: 'string' } } },
          },
        },
      },
    },
  },
  components: {
    parameters: {
      Cursor: { name: 'cursor', in: 'query', schema: { type: 'string' } },
    },
    responses: {
      Error: {
        description: 'Unexpected error',
        content: { 'application/json': { schema: { type: 'object' } } },
      },
    },
    schemas: {
      Pet: {
        allOf: [
          { $ref: '#/components/schemas/NewPet' },
          {
            type: 'object',
            required: ['id'],
            properties: { id: { type: 'integer', format: 'int64' } },
          },
        ],
      },
      NewPet: {
        type: 'object',
        required: ['name'],
        properties: {
          name: { type: 'string', example: 'Rex' },
          tags: { type: 'array', items: { type: 'string' } },
          owner: {
            oneOf: [{ $ref: '#/components/schemas/Person' }, { type: 'string' }],
          },
        },
      },
      PetList: { type: 'array', items: { $ref: '#/components/schemas/Pet' } },
      PetId: { type: 'integer', format: 'int64' },
      Alias: { $ref: '#/components/schemas/Pet' },
    },
  },
  'x-generated-by': 'hand-written fixture',
};

/**
 * Outline of petstoreDocument, as the outliner must produce it
 */
export const petstoreOutline = {
  paths: {
    '/pets': {
      get: {
        query: [
          { name: 'limit', required: false, schema: 'integer' },
          { $ref: '#/components/parameters/Cursor' },
        ],
        request: null,
        responses: {
          '200': { type: 'array', items: '#/components/schemas/Pet' },
          default: '#/components/responses/Error',
        },
      },
      post: {
        query: [],
        request: '#/components/schemas/NewPet',
        responses: { '201': '#/components/schemas/Pet' },
      },
    },
    '/pets/{petId}': {
      delete: {
        query: [],
        request: null,
        responses: { '204': 'string' },
      },
    },
  },
  schemas: {
    Pet: {
      allOf: [
        '#/components/schemas/NewPet',
        { type: 'object', required: ['id'], properties: { id: 'integer' } },
      ],
    },
    NewPet: {
      type: 'object',
      required: ['name'],
      properties: {
        name: 'string',
        tags: { type: 'array', items: 'string' },
        owner: { oneOf: ['#/components/schemas/Person', 'string'] },
      },
    },
    PetList: { type: 'array', items: '#/components/schemas/Pet' },
    PetId: { type: 'integer' },
    Alias: { $ref: '#/components/schemas/Pet' },
  },
};
