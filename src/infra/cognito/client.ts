import {
  CognitoIdentityProvider,
  type AdminGetUserCommandInput,
  type AdminGetUserCommandOutput,
  type ChangePasswordCommandInput,
  type ChangePasswordCommandOutput,
  type ConfirmForgotPasswordCommandInput,
  type ConfirmForgotPasswordCommandOutput,
  type ConfirmSignUpCommandInput,
  type ConfirmSignUpCommandOutput,
  type ForgotPasswordCommandInput,
  type ForgotPasswordCommandOutput,
  type GlobalSignOutCommandInput,
  type GlobalSignOutCommandOutput,
  type InitiateAuthCommandInput,
  type InitiateAuthCommandOutput,
  type ResendConfirmationCodeCommandInput,
  type ResendConfirmationCodeCommandOutput,
  type SignUpCommandInput,
  type SignUpCommandOutput,
} from '@aws-sdk/client-cognito-identity-provider';

/**
 * The user pool operations the adapter calls. The SDK's aggregated
 * client satisfies it; tests pass an in-process fake.
 */
export interface CognitoApi {
  signUp(input: SignUpCommandInput): Promise<SignUpCommandOutput>;
  confirmSignUp(input: ConfirmSignUpCommandInput): Promise<ConfirmSignUpCommandOutput>;
  resendConfirmationCode(
    input: ResendConfirmationCodeCommandInput
  ): Promise<ResendConfirmationCodeCommandOutput>;
  adminGetUser(input: AdminGetUserCommandInput): Promise<AdminGetUserCommandOutput>;
  initiateAuth(input: InitiateAuthCommandInput): Promise<InitiateAuthCommandOutput>;
  forgotPassword(input: ForgotPasswordCommandInput): Promise<ForgotPasswordCommandOutput>;
  confirmForgotPassword(
    input: ConfirmForgotPasswordCommandInput
  ): Promise<ConfirmForgotPasswordCommandOutput>;
  changePassword(input: ChangePasswordCommandInput): Promise<ChangePasswordCommandOutput>;
  globalSignOut(input: GlobalSignOutCommandInput): Promise<GlobalSignOutCommandOutput>;
}

// Credentials come from the SDK's default provider chain.
export function createCognitoApi(region: string): CognitoApi {
  return new CognitoIdentityProvider({ region });
}
