import type { PasswordHasher } from '../../domain/auth/password.js';
import { toPublicUser, type PublicUser, type UserSessions } from '../../domain/auth/user.js';
import { DuplicateEmailError } from './errors.js';

export interface RegisterCommand {
  name: string;
  email: string;
  password: string;
}

export class RegisterUseCase {
  constructor(
    private sessions: UserSessions,
    private hasher: PasswordHasher
  ) {}

  async execute(command: RegisterCommand): Promise<PublicUser> {
    return this.sessions.withSession(async (users) => {
      // Early exit only; two concurrent registrations can both get past
      // this check, and the store's unique index rejects the loser.
      const existing = await users.findByEmail(command.email);
      if (existing) {
        throw new DuplicateEmailError();
      }

      const passwordHash = await this.hasher.hash(command.password);

      const user = await users.insert({
        name: command.name,
        email: command.email,
        passwordHash,
      });

      return toPublicUser(user);
    });
  }
}
