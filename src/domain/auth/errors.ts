export class DomainError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The hashing backend failed, or a stored hash is not one it can read.
 * Never a client error.
 */
export class HashingError extends DomainError {
  constructor(message = 'Password hashing failed', options?: ErrorOptions) {
    super(message, options);
  }
}
