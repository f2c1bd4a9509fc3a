import type { AccessTokenResult, IdentityProvider, RawResult, SigninRequest } from './identityProvider.js';

export type LoginCommand = SigninRequest;

export class LoginUseCase {
  constructor(private identityProvider: IdentityProvider) {}

  async execute(command: LoginCommand): Promise<AccessTokenResult> {
    return await this.identityProvider.signin(command);
  }
}

export interface RefreshTokenCommand {
  refreshToken: string;
}

export class RefreshTokenUseCase {
  constructor(private identityProvider: IdentityProvider) {}

  async execute(command: RefreshTokenCommand): Promise<AccessTokenResult> {
    return await this.identityProvider.refreshAccessToken(command.refreshToken);
  }
}

export interface LogoutCommand {
  accessToken: string;
}

/**
 * Signs the user out of every device: the provider revokes all tokens
 * issued to the access token's owner.
 */
export class LogoutUseCase {
  constructor(private identityProvider: IdentityProvider) {}

  async execute(command: LogoutCommand): Promise<RawResult> {
    return await this.identityProvider.logout(command.accessToken);
  }
}
