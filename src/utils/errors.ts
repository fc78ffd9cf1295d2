// src/utils/errors.ts

export type ErrorKind =
  | 'ValidationError'
  | 'Unauthenticated'
  | 'InvalidCredentials'
  | 'NotFound'
  | 'DuplicateEmail'
  | 'ContactInUse'
  | 'InvalidState'
  | 'UpstreamUnavailable'
  | 'ConfigurationError';

/**
 * Base class for every error the API reports to its caller.
 * The error handler renders `kind` and `message` with `statusCode`.
 */
export class AppError extends Error {
  public readonly kind: ErrorKind;
  public readonly statusCode: number;

  constructor(kind: ErrorKind, statusCode: number, message: string) {
    super(message);
    this.name = kind;
    this.kind = kind;
    this.statusCode = statusCode;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super('ValidationError', 400, message);
  }
}

export class Unauthenticated extends AppError {
  constructor(message = 'Authentication required.') {
    super('Unauthenticated', 401, message);
  }
}

export class InvalidCredentials extends AppError {
  constructor() {
    // Same text for unknown email and wrong password.
    super('InvalidCredentials', 401, 'Invalid email or password.');
  }
}

export class NotFound extends AppError {
  constructor(resource: string) {
    super('NotFound', 404, `${resource} not found.`);
  }
}

export class DuplicateEmail extends AppError {
  constructor() {
    super('DuplicateEmail', 409, 'A user with this email already exists.');
  }
}

export class ContactInUse extends AppError {
  constructor(transactionCount: number) {
    super('ContactInUse', 409, `Contact is referenced by ${transactionCount} transaction(s) and cannot be deleted.`);
  }
}

export class InvalidState extends AppError {
  constructor(message: string) {
    super('InvalidState', 409, message);
  }
}

export class UpstreamUnavailable extends AppError {
  constructor(message = 'The AI provider is unavailable.') {
    super('UpstreamUnavailable', 502, message);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super('ConfigurationError', 500, message);
  }
}
