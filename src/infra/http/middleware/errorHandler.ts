import type { ErrorRequestHandler } from 'express';
import type { Logger } from 'pino';
import { ZodError } from 'zod';
import { AuthError, type AuthErrorKind } from '../../../domain/auth/errors.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

interface HttpMapping {
  status: number;
  code: string;
}

export const AUTH_ERROR_HTTP: Record<AuthErrorKind, HttpMapping> = {
  UserAlreadyExists: { status: 409, code: 'USER_ALREADY_EXISTS' },
  RequirementsNotMet: { status: 400, code: 'REQUIREMENTS_NOT_MET' },
  InvalidVerificationCode: { status: 400, code: 'INVALID_VERIFICATION_CODE' },
  ExpiredVerificationCode: { status: 400, code: 'EXPIRED_VERIFICATION_CODE' },
  UserNotFound: { status: 404, code: 'USER_NOT_FOUND' },
  UserNotConfirmed: { status: 403, code: 'USER_NOT_CONFIRMED' },
  Unauthorized: { status: 403, code: 'UNAUTHORIZED_OPERATION' },
  InvalidCredentials: { status: 401, code: 'INVALID_CREDENTIALS' },
  LimitExceeded: { status: 429, code: 'LIMIT_EXCEEDED' },
  TooManyRequests: { status: 429, code: 'TOO_MANY_REQUESTS' },
  InternalError: { status: 500, code: 'INTERNAL_ERROR' },
};

export function validationErrorResponse(err: ZodError): ErrorResponse {
  return {
    code: 'VALIDATION_ERROR',
    message: 'Validation failed',
    details: {
      issues: err.errors.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
      })),
    },
  };
}

/**
 * Failure raised by express.json() (body-parser) for a body it cannot read.
 */
interface RequestBodyError extends Error {
  status: number;
  type?: unknown;
}

const REQUEST_BODY_ERRORS: Record<string, HttpMapping & { message: string }> = {
  'entity.parse.failed': { status: 400, code: 'VALIDATION_ERROR', message: 'Malformed JSON body' },
  'entity.too.large': { status: 413, code: 'PAYLOAD_TOO_LARGE', message: 'Request body too large' },
};

export function isRequestBodyError(err: unknown): err is RequestBodyError {
  if (!(err instanceof Error) || !('status' in err)) return false;
  return typeof err.status === 'number' && err.status >= 400 && err.status < 500;
}

export function requestBodyErrorResponse(err: RequestBodyError): {
  status: number;
  body: ErrorResponse;
} {
  const known =
    typeof err.type === 'string' && Object.hasOwn(REQUEST_BODY_ERRORS, err.type)
      ? REQUEST_BODY_ERRORS[err.type]
      : undefined;
  if (known) {
    return { status: known.status, body: { code: known.code, message: known.message } };
  }
  return { status: err.status, body: { code: 'INVALID_REQUEST', message: 'Invalid request body' } };
}

/**
 * Last middleware in the chain. AuthErrors were already logged by the
 * adapter that raised them; only unexpected errors are logged here.
 */
export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, _req, res, _next) => {
    if (err instanceof ZodError) {
      res.status(400).json(validationErrorResponse(err));
      return;
    }

    if (err instanceof AuthError) {
      const mapping = AUTH_ERROR_HTTP[err.kind];
      const response: ErrorResponse = {
        code: mapping.code,
        message: err.message,
      };
      res.status(mapping.status).json(response);
      return;
    }

    if (isRequestBodyError(err)) {
      const { status, body } = requestBodyErrorResponse(err);
      res.status(status).json(body);
      return;
    }

    logger.error({ err }, 'Unhandled error');
    const response: ErrorResponse = {
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
    };
    res.status(500).json(response);
  };
}
