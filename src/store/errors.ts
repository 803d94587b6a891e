export class OpsError extends Error {
  readonly status: number;

  constructor(message: string, status = 500) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

export class ValidationError extends OpsError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class ParseError extends OpsError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class AuthenticationError extends OpsError {
  constructor(message = 'Unauthorized') {
    super(message, 401);
  }
}

export class AuthorizationError extends OpsError {
  constructor(message = 'Access denied') {
    super(message, 403);
  }
}

export class PersistenceError extends OpsError {
  constructor(message: string, cause?: unknown) {
    super(message, 500);
    if (cause !== undefined) this.cause = cause;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
