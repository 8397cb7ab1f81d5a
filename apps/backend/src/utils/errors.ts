import { ErrorCodes } from '@dataset-lookup/shared';

export class AppError extends Error {
  constructor(
    public code: string,
    public statusCode: number,
    message: string,
    public field?: string,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export function notFound(message: string): AppError {
  return new AppError(ErrorCodes.NOT_FOUND, 404, message);
}

// Raised when a referenced username is not known to the admin store.
export function unauthorized(message: string): AppError {
  return new AppError(ErrorCodes.UNAUTHORIZED, 401, message);
}

export function forbidden(message: string): AppError {
  return new AppError(ErrorCodes.FORBIDDEN, 403, message);
}

export function conflict(message: string): AppError {
  return new AppError(ErrorCodes.CONFLICT, 409, message);
}

export function validationError(message: string, field?: string): AppError {
  return new AppError(ErrorCodes.VALIDATION_ERROR, 400, message, field);
}

export function internalError(message: string): AppError {
  return new AppError(ErrorCodes.INTERNAL_ERROR, 500, message);
}

// True for a unique-constraint violation raised by Postgres (SQLSTATE 23505).
export function isUniqueViolation(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === '23505';
}
