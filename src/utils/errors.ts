// ============================================
// src/utils/errors.ts
// ============================================

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: unknown;

  constructor(message: string, statusCode: number, code: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found') {
    super(message, 404, 'NOT_FOUND');
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Not authorized') {
    super(message, 401, 'UNAUTHORIZED');
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Access denied') {
    super(message, 403, 'FORBIDDEN');
  }
}

export class ConflictError extends AppError {
  constructor(message = 'Resource already exists', code = 'CONFLICT') {
    super(message, 409, code);
  }
}

export class PreconditionFailedError extends AppError {
  constructor(message: string) {
    super(message, 400, 'PRECONDITION_FAILED');
  }
}

export class ValidationError extends AppError {
  constructor(message = 'Validation failed', details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }
}

export class ExternalServiceError extends AppError {
  readonly service: string;

  constructor(service: string, message: string, details?: unknown) {
    super(message, 502, 'EXTERNAL_SERVICE_FAILURE', details);
    this.service = service;
  }
}

export class PaymentVerificationError extends AppError {
  constructor(message = 'Payment verification failed') {
    super(message, 400, 'PAYMENT_VERIFICATION_FAILED');
  }
}

/**
 * Raised by repositories when a unique index rejects a write.
 * `index` names the violated key so callers can tell which invariant fired.
 */
export class DuplicateKeyError extends Error {
  readonly index: string;

  constructor(index: string) {
    super(`Duplicate key on ${index}`);
    this.name = 'DuplicateKeyError';
    this.index = index;
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
