import { AuthFlowType, type AttributeType } from '@aws-sdk/client-cognito-identity-provider';
import type { Logger } from 'pino';
import type {
  AccessTokenResult,
  ChangePasswordRequest,
  CodeDeliveryResult,
  ConfirmPasswordResetRequest,
  IdentityProvider,
  RawResult,
  SigninRequest,
  SignupRequest,
  SignupResult,
  VerifyRequest,
} from '../../application/auth/identityProvider.js';
import type { UserRecord } from '../../domain/auth/user.js';
import type { CognitoApi } from './client.js';
import {
  describeProviderError,
  isProviderError,
  translateProviderError,
  type AuthOperation,
} from './errorTranslator.js';
import {
  mapCodeDeliveryResult,
  mapRefreshResult,
  mapSigninResult,
  mapSignupResult,
  mapUserRecord,
  toRawResult,
} from './responseMapper.js';

export interface CognitoAdapterConfig {
  userPoolId: string;
  clientId: string;
}

/** Stored in custom:crm when the user has no professional registration. */
export const MISSING_PROFESSIONAL_ID = '-';

export function buildSignupAttributes(request: SignupRequest): AttributeType[] {
  return [
    { Name: 'name', Value: request.fullName },
    { Name: 'email', Value: request.email },
    { Name: 'custom:role', Value: request.role },
    { Name: 'custom:cpf', Value: request.nationalId },
    { Name: 'custom:crm', Value: request.professionalId ?? MISSING_PROFESSIONAL_ID },
  ];
}

/**
 * IdentityProvider backed by a Cognito user pool.
 *
 * Holds no state besides its configuration. Each method is exactly one
 * remote call; failures are logged once here and rethrown as AuthError.
 */
export class CognitoAdapter implements IdentityProvider {
  private readonly config: Readonly<CognitoAdapterConfig>;
  private readonly logger: Logger;

  constructor(
    config: CognitoAdapterConfig,
    private readonly api: CognitoApi,
    logger: Logger
  ) {
    this.config = Object.freeze({ ...config });
    this.logger = logger.child({ component: 'CognitoAdapter' });
  }

  async signup(request: SignupRequest): Promise<SignupResult> {
    return this.dispatch('signup', async () => {
      const output = await this.api.signUp({
        ClientId: this.config.clientId,
        Username: request.email,
        Password: request.password,
        UserAttributes: buildSignupAttributes(request),
      });
      return mapSignupResult(output);
    });
  }

  async verifyAccount(request: VerifyRequest): Promise<RawResult> {
    return this.dispatch('verifyAccount', async () => {
      const output = await this.api.confirmSignUp({
        ClientId: this.config.clientId,
        Username: request.email,
        ConfirmationCode: request.code,
      });
      return toRawResult(output);
    });
  }

  async resendConfirmationCode(email: string): Promise<RawResult> {
    return this.dispatch('resendConfirmationCode', async () => {
      const output = await this.api.resendConfirmationCode({
        ClientId: this.config.clientId,
        Username: email,
      });
      return toRawResult(output);
    });
  }

  async getUser(email: string): Promise<UserRecord> {
    return this.dispatch('getUser', async () => {
      const output = await this.api.adminGetUser({
        UserPoolId: this.config.userPoolId,
        Username: email,
      });
      return mapUserRecord(output);
    });
  }

  async signin(request: SigninRequest): Promise<AccessTokenResult> {
    return this.dispatch('signin', async () => {
      const output = await this.api.initiateAuth({
        ClientId: this.config.clientId,
        AuthFlow: AuthFlowType.USER_PASSWORD_AUTH,
        AuthParameters: {
          USERNAME: request.email,
          PASSWORD: request.password,
        },
      });
      return mapSigninResult(output);
    });
  }

  async forgotPassword(email: string): Promise<CodeDeliveryResult> {
    return this.dispatch('forgotPassword', async () => {
      const output = await this.api.forgotPassword({
        ClientId: this.config.clientId,
        Username: email,
      });
      return mapCodeDeliveryResult(output);
    });
  }

  async confirmForgotPassword(request: ConfirmPasswordResetRequest): Promise<RawResult> {
    return this.dispatch('confirmForgotPassword', async () => {
      const output = await this.api.confirmForgotPassword({
        ClientId: this.config.clientId,
        Username: request.email,
        ConfirmationCode: request.code,
        Password: request.newPassword,
      });
      return toRawResult(output);
    });
  }

  async changePassword(request: ChangePasswordRequest): Promise<RawResult> {
    return this.dispatch('changePassword', async () => {
      const output = await this.api.changePassword({
        PreviousPassword: request.oldPassword,
        ProposedPassword: request.newPassword,
        AccessToken: request.accessToken,
      });
      return toRawResult(output);
    });
  }

  async refreshAccessToken(refreshToken: string): Promise<AccessTokenResult> {
    return this.dispatch('refreshAccessToken', async () => {
      const output = await this.api.initiateAuth({
        ClientId: this.config.clientId,
        AuthFlow: AuthFlowType.REFRESH_TOKEN_AUTH,
        AuthParameters: {
          REFRESH_TOKEN: refreshToken,
        },
      });
      return mapRefreshResult(output);
    });
  }

  async logout(accessToken: string): Promise<RawResult> {
    return this.dispatch('logout', async () => {
      const output = await this.api.globalSignOut({ AccessToken: accessToken });
      return toRawResult(output);
    });
  }

  /**
   * Run one remote call plus its mapping. Mapping runs inside the guard so
   * a malformed payload is reported like any other provider fault.
   */
  private async dispatch<T>(operation: AuthOperation, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (isProviderError(error)) {
        this.logger.error(
          { operation, providerError: describeProviderError(error) },
          'Identity provider call failed'
        );
      } else {
        this.logger.error({ operation, err: error }, 'Unexpected identity provider failure');
      }
      throw translateProviderError(operation, error);
    }
  }
}
