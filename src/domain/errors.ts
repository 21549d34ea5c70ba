/**
 * A required lookup capability was not wired up before it was used.
 * Programmer error; never retried.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Caller-supplied data violates an invariant. The rejected operation leaves state unchanged.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Session machinery used out of order (unknown id, second active session, no active session).
 */
export class SessionError extends Error {
  readonly notFound: boolean;

  constructor(message: string, options: { notFound?: boolean } = {}) {
    super(message);
    this.name = "SessionError";
    this.notFound = options.notFound ?? false;
  }
}

/**
 * Learning memory could not be read or written. Logged, never thrown.
 */
export class StorageWarning extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "StorageWarning";
  }
}
