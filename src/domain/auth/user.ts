/**
 * A registered principal. `passwordHash` stays inside the service.
 */
export interface User {
  readonly id: string;
  readonly name: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly createdAt: Date;
}

export interface NewUser {
  name: string;
  email: string;
  passwordHash: string;
}

/**
 * The only user representation returned to clients.
 */
export interface PublicUser {
  id: string;
  name: string;
  email: string;
}

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    name: user.name,
    email: user.email,
  };
}

/**
 * Credential store contract.
 *
 * `insert` and `update` must reject a duplicate email with
 * `DuplicateEmailError`; the store's unique constraint is the enforcement
 * that holds under concurrent requests.
 */
export interface UserRepository {
  findByEmail(email: string): Promise<User | null>;
  findById(id: string): Promise<User | null>;
  insert(user: NewUser): Promise<User>;
  update(user: User): Promise<User>;
}

/**
 * Hands out a store session scoped to one unit of work and releases it
 * when `work` settles, whether it resolves or throws.
 */
export interface UserSessions {
  withSession<T>(work: (users: UserRepository) => Promise<T>): Promise<T>;
}
