export class AppError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad input. Surfaced to the caller unchanged, never retried. */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }
}

/**
 * Lost an optimistic-concurrency race: the stored status was not the expected one.
 */
export class ConflictError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 409, 'CONFLICT', details);
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string, status = 401) {
    super(message, status, 'AUTHENTICATION_ERROR');
  }
}

export class AuthorizationError extends AppError {
  constructor(message = 'Access denied') {
    super(message, 403, 'AUTHORIZATION_ERROR');
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, 'NOT_FOUND');
  }
}

/** The payment processor was unreachable, timed out or refused the request. */
export class GatewayError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 502, 'GATEWAY_ERROR', details);
  }
}

export const isAppError = (error: unknown): error is AppError => error instanceof AppError;
