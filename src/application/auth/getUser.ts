import type { UserRecord } from '../../domain/auth/user.js';
import type { IdentityProvider } from './identityProvider.js';

export interface GetUserQuery {
  email: string;
}

export class GetUserUseCase {
  constructor(private identityProvider: IdentityProvider) {}

  async execute(query: GetUserQuery): Promise<UserRecord> {
    return await this.identityProvider.getUser(query.email);
  }
}
