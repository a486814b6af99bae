/**
 * Base error carrying the HTTP status code it maps to at the API boundary.
 * Every error the core raises on purpose extends this class.
 */
export class AppError extends Error {
  public readonly statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }

    // Keep instanceof working for subclasses
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Malformed input, e.g. an empty title or an invalid email address. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

/** Bad credentials at login. */
export class AuthenticationError extends AppError {
  constructor(message = 'Incorrect username or password') {
    super(message, 401);
  }
}

/** Missing, invalid or expired bearer token at a protected call. */
export class UnauthenticatedError extends AppError {
  constructor(message = 'Not authenticated') {
    super(message, 401);
  }
}

/** Token signature mismatch or malformed structure. */
export class InvalidTokenError extends AppError {
  constructor(message = 'Invalid token') {
    super(message, 401);
  }
}

export class ExpiredTokenError extends AppError {
  constructor(message = 'Token has expired') {
    super(message, 401);
  }
}

/**
 * Record absent or owned by somebody else. The two cases share one error so
 * callers cannot probe for other users' records.
 */
export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

/** Uniqueness violation on email or username. */
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

/**
 * Invalid startup configuration. Not an AppError: it never reaches a request,
 * the process refuses to start instead.
 */
export class ConfigError extends Error {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
