export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Resource not found') {
    super(404, 'NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(409, 'CONFLICT', message);
    this.name = 'ConflictError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, 'VALIDATION_FAILED', message);
    this.name = 'ValidationError';
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Authentication required') {
    super(401, 'UNAUTHORIZED', message);
    this.name = 'UnauthorizedError';
  }
}

/**
 * A multi-statement write failed after BEGIN. The scope was rolled back;
 * the driver error is kept as `cause`.
 */
export class TransactionError extends AppError {
  constructor(message: string, cause: unknown) {
    super(500, 'TRANSACTION_FAILED', message, { cause });
    this.name = 'TransactionError';
  }
}

export interface ErrorResponse {
  statusCode: number;
  body: {
    status: 'fail' | 'error';
    message: string;
  };
}

function sqlState(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isUniqueViolation(error: unknown): boolean {
  return sqlState(error) === '23505';
}

const TRANSIENT_NETWORK_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND']);

/**
 * Connection-level failures of the store: network errors, SQLSTATE class 08
 * (connection exception) and 57P (operator intervention, e.g. shutdown).
 */
export function isBackendUnavailable(error: unknown): boolean {
  const code = sqlState(error);
  if (code === undefined) {
    return error instanceof Error && /timeout exceeded when trying to connect/i.test(error.message);
  }
  return TRANSIENT_NETWORK_CODES.has(code) || code.startsWith('08') || code.startsWith('57P');
}

export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof AppError && error.statusCode < 500) {
    return {
      statusCode: error.statusCode,
      body: { status: 'fail', message: error.message }
    };
  }

  return {
    statusCode: 500,
    body: { status: 'error', message: 'Internal server error' }
  };
}
