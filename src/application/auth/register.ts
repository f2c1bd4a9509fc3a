import type {
  IdentityProvider,
  RawResult,
  SignupRequest,
  SignupResult,
  VerifyRequest,
} from './identityProvider.js';

export type RegisterCommand = SignupRequest;

export class RegisterUseCase {
  constructor(private identityProvider: IdentityProvider) {}

  async execute(command: RegisterCommand): Promise<SignupResult> {
    return await this.identityProvider.signup(command);
  }
}

export class VerifyAccountUseCase {
  constructor(private identityProvider: IdentityProvider) {}

  async execute(command: VerifyRequest): Promise<RawResult> {
    return await this.identityProvider.verifyAccount(command);
  }
}

export interface ResendConfirmationCodeCommand {
  email: string;
}

/**
 * Stateless: every call dispatches a new delivery. Throttling is the
 * provider's call (LimitExceeded).
 */
export class ResendConfirmationCodeUseCase {
  constructor(private identityProvider: IdentityProvider) {}

  async execute(command: ResendConfirmationCodeCommand): Promise<RawResult> {
    return await this.identityProvider.resendConfirmationCode(command.email);
  }
}
