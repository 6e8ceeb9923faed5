import type { PasswordHasher } from '../../domain/auth/password.js';
import type { TokenCodec } from '../../domain/auth/token.js';
import type { UserSessions } from '../../domain/auth/user.js';
import { InvalidCredentialsError } from './errors.js';

export interface LoginCommand {
  email: string;
  password: string;
}

export interface LoginResult {
  access_token: string;
  token_type: 'bearer';
}

export class LoginUseCase {
  constructor(
    private sessions: UserSessions,
    private hasher: PasswordHasher,
    private tokens: TokenCodec
  ) {}

  async execute(command: LoginCommand): Promise<LoginResult> {
    const user = await this.sessions.withSession(async (users) => {
      const found = await users.findByEmail(command.email);
      if (!found) {
        throw new InvalidCredentialsError();
      }

      const isValid = await this.hasher.verify(command.password, found.passwordHash);
      if (!isValid) {
        throw new InvalidCredentialsError();
      }

      return found;
    });

    return {
      access_token: this.tokens.issue({ subject: user.email, userId: user.id }),
      token_type: 'bearer',
    };
  }
}
