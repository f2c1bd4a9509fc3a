export const AUTH_ERROR_KINDS = [
  'UserAlreadyExists',
  'RequirementsNotMet',
  'InvalidVerificationCode',
  'ExpiredVerificationCode',
  'UserNotFound',
  'UserNotConfirmed',
  'Unauthorized',
  'InvalidCredentials',
  'LimitExceeded',
  'TooManyRequests',
  'InternalError',
] as const;

export type AuthErrorKind = (typeof AUTH_ERROR_KINDS)[number];

/**
 * Base class for every failure the identity adapter reports.
 * Callers branch on `kind`; `cause` keeps the provider failure for logs.
 */
export abstract class AuthError extends Error {
  abstract readonly kind: AuthErrorKind;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UserAlreadyExistsError extends AuthError {
  readonly kind = 'UserAlreadyExists';

  constructor(message = 'User already exists.', cause?: unknown) {
    super(message, cause);
  }
}

export class RequirementsNotMetError extends AuthError {
  readonly kind = 'RequirementsNotMet';

  constructor(message = 'Password requirements do not match.', cause?: unknown) {
    super(message, cause);
  }
}

export class InvalidVerificationCodeError extends AuthError {
  readonly kind = 'InvalidVerificationCode';

  constructor(message = 'Code does not match.', cause?: unknown) {
    super(message, cause);
  }
}

export class ExpiredVerificationCodeError extends AuthError {
  readonly kind = 'ExpiredVerificationCode';

  constructor(message = 'Code expired.', cause?: unknown) {
    super(message, cause);
  }
}

export class UserNotFoundError extends AuthError {
  readonly kind = 'UserNotFound';

  constructor(message = 'User not found.', cause?: unknown) {
    super(message, cause);
  }
}

export class UserNotConfirmedError extends AuthError {
  readonly kind = 'UserNotConfirmed';

  constructor(message = 'Please verify your account.', cause?: unknown) {
    super(message, cause);
  }
}

export class UnauthorizedError extends AuthError {
  readonly kind = 'Unauthorized';

  constructor(message = 'Not authorized.', cause?: unknown) {
    super(message, cause);
  }
}

export class InvalidCredentialsError extends AuthError {
  readonly kind = 'InvalidCredentials';

  constructor(message = 'Incorrect username or password.', cause?: unknown) {
    super(message, cause);
  }
}

export class LimitExceededError extends AuthError {
  readonly kind = 'LimitExceeded';

  constructor(message = 'Attempt limit exceeded, please try again later.', cause?: unknown) {
    super(message, cause);
  }
}

export class TooManyRequestsError extends AuthError {
  readonly kind = 'TooManyRequests';

  constructor(message = 'Too many requests.', cause?: unknown) {
    super(message, cause);
  }
}

export class InternalError extends AuthError {
  readonly kind = 'InternalError';

  constructor(message = 'Internal server error.', cause?: unknown) {
    super(message, cause);
  }
}

/**
 * Build the error class for a kind. The switch is exhaustive: adding a kind
 * without a class fails to compile.
 */
export function createAuthError(kind: AuthErrorKind, message?: string, cause?: unknown): AuthError {
  switch (kind) {
    case 'UserAlreadyExists':
      return new UserAlreadyExistsError(message, cause);
    case 'RequirementsNotMet':
      return new RequirementsNotMetError(message, cause);
    case 'InvalidVerificationCode':
      return new InvalidVerificationCodeError(message, cause);
    case 'ExpiredVerificationCode':
      return new ExpiredVerificationCodeError(message, cause);
    case 'UserNotFound':
      return new UserNotFoundError(message, cause);
    case 'UserNotConfirmed':
      return new UserNotConfirmedError(message, cause);
    case 'Unauthorized':
      return new UnauthorizedError(message, cause);
    case 'InvalidCredentials':
      return new InvalidCredentialsError(message, cause);
    case 'LimitExceeded':
      return new LimitExceededError(message, cause);
    case 'TooManyRequests':
      return new TooManyRequestsError(message, cause);
    case 'InternalError':
      return new InternalError(message, cause);
    default: {
      const unhandled: never = kind;
      throw new Error(`Unhandled auth error kind: ${String(unhandled)}`);
    }
  }
}
