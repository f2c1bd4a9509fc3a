import { fileURLToPath } from 'node:url';
import swaggerJsdoc from 'swagger-jsdoc';
import { AUTH_ERROR_HTTP } from './middleware/errorHandler.js';

// Codes answered by middleware rather than by a domain error.
const REQUEST_ERROR_CODES = [
  'VALIDATION_ERROR',
  'INVALID_REQUEST',
  'PAYLOAD_TOO_LARGE',
  'UNAUTHORIZED',
  'TOO_MANY_REQUESTS',
];

export const ERROR_CODES: readonly string[] = [
  ...new Set([...Object.values(AUTH_ERROR_HTTP).map((mapping) => mapping.code), ...REQUEST_ERROR_CODES]),
];

export const ROUTE_TAGS = [
  { name: 'Auth', description: 'Registration and account confirmation' },
  { name: 'Users', description: 'Account lookup (internal)' },
  { name: 'Session', description: 'Signin, token refresh and signout' },
  { name: 'Password', description: 'Password reset and change' },
];

const ROUTE_SOURCES = `${fileURLToPath(new URL('./routes/', import.meta.url))}*.{ts,js}`;

export interface OpenApiOptions {
  port: number;
}

/**
 * OpenAPI document assembled from the @openapi blocks in routes/.
 */
export function buildOpenApiDocument({ port }: OpenApiOptions): object {
  return swaggerJsdoc({
    definition: {
      openapi: '3.0.0',
      info: {
        title: 'Identity Service API',
        version: '1.0.0',
        description: 'Account, session and password endpoints backed by a Cognito user pool',
      },
      servers: [{ url: `http://localhost:${port}`, description: 'Local server' }],
      components: {
        securitySchemes: {
          bearerAuth: {
            type: 'http',
            scheme: 'bearer',
            bearerFormat: 'JWT',
            description: 'Access token issued by /api/auth/signin; forwarded to the user pool unverified',
          },
        },
        schemas: {
          ErrorResponse: {
            type: 'object',
            required: ['code', 'message'],
            properties: {
              code: { type: 'string', enum: [...ERROR_CODES], example: 'INVALID_CREDENTIALS' },
              message: { type: 'string', example: 'Incorrect username or password.' },
              details: { type: 'object', additionalProperties: true },
            },
          },
        },
      },
      tags: ROUTE_TAGS,
    },
    apis: [ROUTE_SOURCES],
  });
}
