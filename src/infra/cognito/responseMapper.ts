import { z } from 'zod';
import type {
  AccessTokenResult,
  CodeDeliveryResult,
  RawResult,
  SignupResult,
} from '../../application/auth/identityProvider.js';
import { USER_STATUSES, type UserRecord } from '../../domain/auth/user.js';

/**
 * Pure mapping from user pool responses to domain results.
 *
 * Payloads are validated on the way in: the SDK types mark almost every
 * field optional, and a response missing a field the domain needs is a
 * provider fault, not a success. A ZodError thrown here surfaces to
 * callers as InternalError.
 */

const codeDeliveryDetailsSchema = z.object({
  Destination: z.string().optional(),
  DeliveryMedium: z.string().optional(),
  AttributeName: z.string().optional(),
});

const signUpOutputSchema = z.object({
  UserSub: z.string().min(1),
  UserConfirmed: z.boolean(),
  CodeDeliveryDetails: codeDeliveryDetailsSchema.optional(),
});

const authenticationResultSchema = z.object({
  AccessToken: z.string().min(1),
  ExpiresIn: z.number().int(),
  TokenType: z.string().min(1),
  RefreshToken: z.string().min(1).optional(),
  IdToken: z.string().min(1),
});

const signinOutputSchema = z.object({
  AuthenticationResult: authenticationResultSchema.extend({
    RefreshToken: z.string().min(1),
  }),
});

const refreshOutputSchema = z.object({
  AuthenticationResult: authenticationResultSchema,
});

const forgotPasswordOutputSchema = z.object({
  CodeDeliveryDetails: codeDeliveryDetailsSchema.optional(),
});

// Date from the SDK, or an ISO-8601 string with offset. Numbers and null are malformed.
const timestampSchema = z
  .union([z.date(), z.string().datetime({ offset: true })])
  .transform((value) => (value instanceof Date ? value : new Date(value)).toISOString());

const adminGetUserOutputSchema = z.object({
  Username: z.string().min(1),
  UserAttributes: z
    .array(z.object({ Name: z.string(), Value: z.string().optional() }))
    .default([]),
  UserCreateDate: timestampSchema,
  UserLastModifiedDate: timestampSchema,
  UserStatus: z.enum(USER_STATUSES).catch('UNKNOWN'),
  Enabled: z.boolean(),
});

export function mapSignupResult(output: unknown): SignupResult {
  const parsed = signUpOutputSchema.parse(output);
  return {
    userId: parsed.UserSub,
    userConfirmed: parsed.UserConfirmed,
    codeDeliveryDestination: parsed.CodeDeliveryDetails?.Destination ?? null,
    codeDeliveryChannel: parsed.CodeDeliveryDetails?.DeliveryMedium ?? null,
  };
}

export function mapSigninResult(output: unknown): AccessTokenResult {
  const { AuthenticationResult: result } = signinOutputSchema.parse(output);
  return {
    accessToken: result.AccessToken,
    tokenType: result.TokenType,
    expiresIn: result.ExpiresIn,
    refreshToken: result.RefreshToken,
    idToken: result.IdToken,
  };
}

/**
 * Refresh responses never carry a new refresh token; the caller keeps
 * using the one it already has.
 */
export function mapRefreshResult(output: unknown): AccessTokenResult {
  const { AuthenticationResult: result } = refreshOutputSchema.parse(output);
  return {
    accessToken: result.AccessToken,
    tokenType: result.TokenType,
    expiresIn: result.ExpiresIn,
    refreshToken: null,
    idToken: result.IdToken,
  };
}

export function mapCodeDeliveryResult(output: unknown): CodeDeliveryResult {
  const parsed = forgotPasswordOutputSchema.parse(output);
  return {
    destination: parsed.CodeDeliveryDetails?.Destination ?? null,
    channel: parsed.CodeDeliveryDetails?.DeliveryMedium ?? null,
    attributeName: parsed.CodeDeliveryDetails?.AttributeName ?? null,
  };
}

export function mapUserRecord(output: unknown): UserRecord {
  const parsed = adminGetUserOutputSchema.parse(output);
  return {
    username: parsed.Username,
    attributes: parsed.UserAttributes.map((attribute) => ({
      name: attribute.Name,
      value: attribute.Value ?? '',
    })),
    createdAt: parsed.UserCreateDate,
    lastModifiedAt: parsed.UserLastModifiedDate,
    status: parsed.UserStatus,
    enabled: parsed.Enabled,
  };
}

/**
 * Provider payload without the SDK's transport metadata.
 */
export function toRawResult(output: object): RawResult {
  return Object.fromEntries(
    Object.entries(output).filter(([key]) => key !== '$metadata')
  );
}
