import type { UserRecord, UserRole } from '../../domain/auth/user.js';

/**
 * Provider-independent contract for account and session operations.
 * Implementations throw `AuthError` subclasses and nothing else.
 */
export interface IdentityProvider {
  signup(request: SignupRequest): Promise<SignupResult>;
  verifyAccount(request: VerifyRequest): Promise<RawResult>;
  resendConfirmationCode(email: string): Promise<RawResult>;
  getUser(email: string): Promise<UserRecord>;
  signin(request: SigninRequest): Promise<AccessTokenResult>;
  forgotPassword(email: string): Promise<CodeDeliveryResult>;
  confirmForgotPassword(request: ConfirmPasswordResetRequest): Promise<RawResult>;
  changePassword(request: ChangePasswordRequest): Promise<RawResult>;
  refreshAccessToken(refreshToken: string): Promise<AccessTokenResult>;
  logout(accessToken: string): Promise<RawResult>;
}

export interface SignupRequest {
  email: string;
  password: string;
  fullName: string;
  role: UserRole;
  nationalId: string;
  professionalId?: string;
}

export interface SigninRequest {
  email: string;
  password: string;
}

export interface VerifyRequest {
  email: string;
  code: string;
}

export interface PasswordResetRequest {
  email: string;
}

export interface ConfirmPasswordResetRequest {
  email: string;
  code: string;
  newPassword: string;
}

export interface ChangePasswordRequest {
  oldPassword: string;
  newPassword: string;
  accessToken: string;
}

export interface SignupResult {
  userId: string;
  userConfirmed: boolean;
  /** Masked contact the code went to; null when the provider sent none. */
  codeDeliveryDestination: string | null;
  /** Delivery medium, e.g. EMAIL or SMS. */
  codeDeliveryChannel: string | null;
}

export interface AccessTokenResult {
  accessToken: string;
  tokenType: string;
  /** Lifetime in seconds */
  expiresIn: number;
  /** Issued on signin only; token refreshes never reissue it. */
  refreshToken: string | null;
  idToken: string;
}

export interface CodeDeliveryResult {
  destination: string | null;
  channel: string | null;
  attributeName: string | null;
}

/**
 * Provider payload for operations whose result the domain does not interpret.
 */
export type RawResult = Record<string, unknown>;
