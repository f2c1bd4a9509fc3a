import type {
  ChangePasswordRequest,
  CodeDeliveryResult,
  ConfirmPasswordResetRequest,
  IdentityProvider,
  PasswordResetRequest,
  RawResult,
} from './identityProvider.js';

export class ForgotPasswordUseCase {
  constructor(private identityProvider: IdentityProvider) {}

  async execute(command: PasswordResetRequest): Promise<CodeDeliveryResult> {
    return await this.identityProvider.forgotPassword(command.email);
  }
}

export class ConfirmForgotPasswordUseCase {
  constructor(private identityProvider: IdentityProvider) {}

  async execute(command: ConfirmPasswordResetRequest): Promise<RawResult> {
    return await this.identityProvider.confirmForgotPassword(command);
  }
}

export class ChangePasswordUseCase {
  constructor(private identityProvider: IdentityProvider) {}

  async execute(command: ChangePasswordRequest): Promise<RawResult> {
    return await this.identityProvider.changePassword(command);
  }
}
