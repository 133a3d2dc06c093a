// Common types used throughout the application

export type FieldErrors = Record<string, string[]>;

// Key for errors that belong to the request as a whole
export const NON_FIELD_ERRORS = 'non_field_errors';

export interface ErrorResponse {
  success: false;
  error: string;
  errors?: FieldErrors;
  statusCode: number;
  timestamp: string;
}

export interface PaginatedResponse<T> {
  count: number;
  next: string | null;
  previous: string | null;
  results: T[];
}

// HTTP Status codes
export enum HttpStatus {
  OK = 200,
  CREATED = 201,
  NO_CONTENT = 204,
  FOUND = 302,
  BAD_REQUEST = 400,
  UNAUTHORIZED = 401,
  FORBIDDEN = 403,
  NOT_FOUND = 404,
  CONFLICT = 409,
  INTERNAL_SERVER_ERROR = 500
}

// Common error types
export class AppError extends Error {
  constructor(
    public statusCode: HttpStatus,
    message: string,
    public isOperational = true
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(public fields: FieldErrors, message = 'Validation failed') {
    super(HttpStatus.BAD_REQUEST, message, true);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }

  static forField(field: string, message: string): ValidationError {
    return new ValidationError({ [field]: [message] });
  }
}

export class AuthenticationError extends AppError {
  constructor(message = 'Authentication credentials were not provided.') {
    super(HttpStatus.UNAUTHORIZED, message, true);
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

export class AuthorizationError extends AppError {
  constructor(message = 'You do not have permission to perform this action.') {
    super(HttpStatus.FORBIDDEN, message, true);
    Object.setPrototypeOf(this, AuthorizationError.prototype);
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Not found.') {
    super(HttpStatus.NOT_FOUND, message, true);
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(HttpStatus.CONFLICT, message, true);
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}
