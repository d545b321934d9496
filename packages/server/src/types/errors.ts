export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: number | string) {
    super(404, 'NOT_FOUND', `${resource} with id ${id} not found`);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

export class InvalidSectionError extends AppError {
  constructor(section: string) {
    super(400, 'INVALID_SECTION', `Invalid section "${section}"`);
  }
}

export class InvalidPositionError extends AppError {
  constructor(message = 'Position must be a non-negative integer') {
    super(400, 'INVALID_POSITION', message);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: unknown) {
    super(409, 'CONFLICT', message, details);
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string) {
    super(403, 'FORBIDDEN', message);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required') {
    super(401, 'UNAUTHORIZED', message);
  }
}

/**
 * A write failed inside a transaction. The transaction has been rolled back;
 * the cause is kept for logging and never sent to the client.
 */
export class PersistenceFailureError extends AppError {
  constructor(cause?: unknown) {
    super(500, 'PERSISTENCE_FAILURE', 'Database error');
    this.cause = cause;
  }
}
