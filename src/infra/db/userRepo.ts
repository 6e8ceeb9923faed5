import type { ClientBase, Pool } from 'pg';
import type {
  NewUser,
  User,
  UserRepository,
  UserSessions,
} from '../../domain/auth/user.js';
import { DuplicateEmailError } from '../../application/auth/errors.js';

const UNIQUE_VIOLATION = '23505';

type UserRow = {
  id: string;
  name: string;
  email: string;
  password_hash: string;
  created_at: Date;
};

const USER_COLUMNS = 'id, name, email, password_hash, created_at';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
  };
}

function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION
  );
}

export class UserRepo implements UserRepository {
  constructor(private client: ClientBase) {}

  async findByEmail(email: string): Promise<User | null> {
    const result = await this.client.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`,
      [email]
    );

    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async findById(id: string): Promise<User | null> {
    const result = await this.client.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id]
    );

    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async insert(user: NewUser): Promise<User> {
    try {
      const result = await this.client.query<UserRow>(
        `INSERT INTO users (name, email, password_hash)
         VALUES ($1, $2, $3)
         RETURNING ${USER_COLUMNS}`,
        [user.name, user.email, user.passwordHash]
      );
      return toUser(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateEmailError();
      }
      throw error;
    }
  }

  async update(user: User): Promise<User> {
    try {
      const result = await this.client.query<UserRow>(
        `UPDATE users SET name = $2, email = $3
         WHERE id = $1
         RETURNING ${USER_COLUMNS}`,
        [user.id, user.name, user.email]
      );
      if (result.rows.length === 0) {
        throw new Error(`User ${user.id} vanished during update`);
      }
      return toUser(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateEmailError();
      }
      throw error;
    }
  }
}

/**
 * One pooled client per unit of work, released on every exit path.
 */
export class PgUserSessions implements UserSessions {
  constructor(private pool: Pool) {}

  async withSession<T>(work: (users: UserRepository) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      return await work(new UserRepo(client));
    } finally {
      client.release();
    }
  }
}
