import {
  toPublicUser,
  type PublicUser,
  type User,
  type UserRepository,
  type UserSessions,
} from '../../domain/auth/user.js';
import { DuplicateEmailError, UserNotFoundError } from './errors.js';

export interface UpdateProfileCommand {
  userId: string;
  name?: string;
  email?: string;
}

async function loadUser(users: UserRepository, userId: string): Promise<User> {
  // The account may be gone even though its token is still valid.
  const user = await users.findById(userId);
  if (!user) {
    throw new UserNotFoundError();
  }
  return user;
}

export class GetProfileUseCase {
  constructor(private sessions: UserSessions) {}

  async execute(userId: string): Promise<PublicUser> {
    return this.sessions.withSession(async (users) =>
      toPublicUser(await loadUser(users, userId))
    );
  }
}

export class UpdateProfileUseCase {
  constructor(private sessions: UserSessions) {}

  async execute(command: UpdateProfileCommand): Promise<PublicUser> {
    return this.sessions.withSession(async (users) => {
      const user = await loadUser(users, command.userId);

      if (command.email !== undefined && command.email !== user.email) {
        const owner = await users.findByEmail(command.email);
        if (owner && owner.id !== user.id) {
          throw new DuplicateEmailError();
        }
      }

      const updated = await users.update({
        ...user,
        name: command.name ?? user.name,
        email: command.email ?? user.email,
      });

      return toPublicUser(updated);
    });
  }
}
