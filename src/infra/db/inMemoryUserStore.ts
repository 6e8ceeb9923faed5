import { randomUUID } from 'crypto';
import type {
  NewUser,
  User,
  UserRepository,
  UserSessions,
} from '../../domain/auth/user.js';
import { DuplicateEmailError } from '../../application/auth/errors.js';

/**
 * Process-local credential store with a unique email index, used by the
 * tests in place of PostgreSQL.
 */
export class InMemoryUserStore implements UserRepository, UserSessions {
  private byId = new Map<string, User>();
  private idByEmail = new Map<string, string>();
  private openSessions = 0;

  get activeSessions(): number {
    return this.openSessions;
  }

  async withSession<T>(work: (users: UserRepository) => Promise<T>): Promise<T> {
    this.openSessions++;
    try {
      return await work(this);
    } finally {
      this.openSessions--;
    }
  }

  async findByEmail(email: string): Promise<User | null> {
    const id = this.idByEmail.get(email);
    return id === undefined ? null : this.findById(id);
  }

  async findById(id: string): Promise<User | null> {
    return this.byId.get(id) ?? null;
  }

  async insert(user: NewUser): Promise<User> {
    if (this.idByEmail.has(user.email)) {
      throw new DuplicateEmailError();
    }

    const created: User = {
      id: randomUUID(),
      name: user.name,
      email: user.email,
      passwordHash: user.passwordHash,
      createdAt: new Date(),
    };
    this.byId.set(created.id, created);
    this.idByEmail.set(created.email, created.id);
    return created;
  }

  async update(user: User): Promise<User> {
    const current = this.byId.get(user.id);
    if (!current) {
      throw new Error(`User ${user.id} vanished during update`);
    }

    const ownerId = this.idByEmail.get(user.email);
    if (ownerId !== undefined && ownerId !== user.id) {
      throw new DuplicateEmailError();
    }

    const updated: User = { ...current, name: user.name, email: user.email };
    this.idByEmail.delete(current.email);
    this.idByEmail.set(updated.email, updated.id);
    this.byId.set(updated.id, updated);
    return updated;
  }

  /** Test hook: removes a user, as an account deletion outside this service would. */
  delete(id: string): void {
    const user = this.byId.get(id);
    if (user) {
      this.byId.delete(id);
      this.idByEmail.delete(user.email);
    }
  }
}
