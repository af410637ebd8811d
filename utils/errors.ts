// ./utils/errors.ts

/**
 * Base class for failures the HTTP layer knows how to translate.
 * `status` is the response code the error maps to.
 */
export class AppError extends Error {
  readonly status: number;

  constructor(message: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.status = status;
  }
}

// Referenced activity does not exist
export class NotFoundError extends AppError {
  constructor(message: string = 'Activity not found') {
    super(message, 404);
    this.name = 'NotFoundError';
  }
}

// State change would break a participant-list invariant
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 400);
    this.name = 'ConflictError';
  }
}

export interface RequestIssue {
  loc: (string | number)[];
  msg: string;
}

export class RequestValidationError extends AppError {
  readonly issues: RequestIssue[];

  constructor(issues: RequestIssue[]) {
    super('Request validation failed', 422);
    this.name = 'RequestValidationError';
    this.issues = issues;
  }
}

export class InfrastructureError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 500, { cause });
    this.name = 'InfrastructureError';
  }
}

/**
 * A record that fails schema validation at the store boundary.
 * Only seed data or a programming error can produce one.
 */
export class ValidationError extends AppError {
  readonly issues: unknown[];

  constructor(message: string, issues: unknown[] = []) {
    super(message, 500);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/** True for errors that describe a client mistake rather than a server fault. */
export function isDomainError(err: unknown): err is NotFoundError | ConflictError | RequestValidationError {
  return err instanceof NotFoundError || err instanceof ConflictError || err instanceof RequestValidationError;
}
