import { CognitoIdentityProviderServiceException } from '@aws-sdk/client-cognito-identity-provider';
import {
  AuthError,
  InternalError,
  createAuthError,
  type AuthErrorKind,
} from '../../domain/auth/errors.js';

export const AUTH_OPERATIONS = [
  'signup',
  'verifyAccount',
  'resendConfirmationCode',
  'getUser',
  'signin',
  'forgotPassword',
  'confirmForgotPassword',
  'changePassword',
  'refreshAccessToken',
  'logout',
] as const;

export type AuthOperation = (typeof AUTH_OPERATIONS)[number];

export interface ErrorTranslation {
  readonly kind: AuthErrorKind;
  readonly message: string;
}

type TranslationTable = Readonly<Partial<Record<string, ErrorTranslation>>>;

const USER_NOT_FOUND = { kind: 'UserNotFound', message: 'User not found.' } as const;
const ATTEMPT_LIMIT = {
  kind: 'LimitExceeded',
  message: 'Attempt limit exceeded, please try again later.',
} as const;

/**
 * Provider error code -> domain error, per operation.
 *
 * The same code means different things depending on the call:
 * NotAuthorizedException is a wrong password on signin, a bad token on
 * logout and a forbidden state transition on verifyAccount.
 */
export const PROVIDER_ERROR_TABLE = {
  signup: {
    UsernameExistsException: { kind: 'UserAlreadyExists', message: 'User already exists.' },
    InvalidPasswordException: {
      kind: 'RequirementsNotMet',
      message: 'Password requirements do not match.',
    },
  },
  verifyAccount: {
    CodeMismatchException: {
      kind: 'InvalidVerificationCode',
      message: 'The provided code does not match the expected value.',
    },
    ExpiredCodeException: {
      kind: 'ExpiredVerificationCode',
      message: 'The provided code has expired.',
    },
    UserNotFoundException: USER_NOT_FOUND,
    NotAuthorizedException: { kind: 'Unauthorized', message: 'Not authorized.' },
  },
  resendConfirmationCode: {
    UserNotFoundException: USER_NOT_FOUND,
    LimitExceededException: { kind: 'LimitExceeded', message: 'Limit exceeded.' },
  },
  getUser: {
    UserNotFoundException: USER_NOT_FOUND,
  },
  signin: {
    UserNotFoundException: USER_NOT_FOUND,
    UserNotConfirmedException: {
      kind: 'UserNotConfirmed',
      message: 'Please verify your account.',
    },
    NotAuthorizedException: {
      kind: 'InvalidCredentials',
      message: 'Incorrect username or password.',
    },
  },
  forgotPassword: {
    UserNotFoundException: USER_NOT_FOUND,
  },
  confirmForgotPassword: {
    ExpiredCodeException: { kind: 'ExpiredVerificationCode', message: 'Code expired.' },
    CodeMismatchException: { kind: 'InvalidVerificationCode', message: 'Code does not match.' },
  },
  changePassword: {
    NotAuthorizedException: {
      kind: 'InvalidCredentials',
      message: 'Incorrect username or password.',
    },
    LimitExceededException: ATTEMPT_LIMIT,
  },
  refreshAccessToken: {
    LimitExceededException: ATTEMPT_LIMIT,
  },
  logout: {
    NotAuthorizedException: {
      kind: 'InvalidCredentials',
      message: 'Invalid access token provided.',
    },
    TooManyRequestsException: { kind: 'TooManyRequests', message: 'Too many requests.' },
  },
} as const satisfies Record<AuthOperation, TranslationTable>;

/**
 * Raw failure payload as logged for operators.
 */
export interface ProviderErrorPayload {
  code: string;
  message: string;
  fault: string;
  httpStatusCode?: number;
  requestId?: string;
}

export function isProviderError(
  error: unknown
): error is CognitoIdentityProviderServiceException {
  return error instanceof CognitoIdentityProviderServiceException;
}

export function describeProviderError(
  error: CognitoIdentityProviderServiceException
): ProviderErrorPayload {
  return {
    code: error.name,
    message: error.message,
    fault: error.$fault,
    httpStatusCode: error.$metadata.httpStatusCode,
    requestId: error.$metadata.requestId,
  };
}

export function lookupTranslation(
  operation: AuthOperation,
  code: string
): ErrorTranslation | undefined {
  const table: TranslationTable = PROVIDER_ERROR_TABLE[operation];
  return Object.hasOwn(table, code) ? table[code] : undefined;
}

/**
 * Map any failure raised while serving `operation` to a domain error.
 * Only listed provider codes keep their meaning; everything else,
 * including network faults and malformed payloads, is an InternalError.
 */
export function translateProviderError(operation: AuthOperation, error: unknown): AuthError {
  if (!isProviderError(error)) {
    return new InternalError(undefined, error);
  }

  const translation = lookupTranslation(operation, error.name);
  if (!translation) {
    return new InternalError(undefined, error);
  }

  return createAuthError(translation.kind, translation.message, error);
}
