// src/utils/errors.ts
// ═══════════════════════════════════════════════════════════════════════════
// Error taxonomy and Result helpers shared by the scanner core
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base application error with structured data
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      code?: string;
      isOperational?: boolean;
      context?: Record<string, unknown>;
      cause?: unknown;
    } = {}
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = options.code || 'INTERNAL_ERROR';
    this.isOperational = options.isOperational ?? true;
    this.context = options.context;

    if (options.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * How a marketplace call failed. Callers branch on this to skip, delay or abort.
 */
export type ApiErrorKind =
  | 'RateLimited'
  | 'Unavailable'
  | 'ClientError'
  | 'CircuitOpen'
  | 'InvalidResponse'
  | 'Cancelled';

export class ApiError extends AppError {
  public readonly kind: ApiErrorKind;
  public readonly status?: number;
  public readonly retryAfterMs?: number;

  constructor(
    kind: ApiErrorKind,
    message: string,
    options: {
      status?: number;
      retryAfterMs?: number;
      context?: Record<string, unknown>;
      cause?: unknown;
    } = {}
  ) {
    super(message, {
      code: `API_${kind.replace(/([a-z])([A-Z])/g, '$1_$2').toUpperCase()}`,
      isOperational: true,
      context: { kind, status: options.status, ...options.context },
      cause: options.cause,
    });
    this.kind = kind;
    this.status = options.status;
    this.retryAfterMs = options.retryAfterMs;
  }
}

/**
 * Raised by the circuit breaker when a call is rejected without reaching upstream.
 */
export class CircuitOpenError extends AppError {
  public readonly retryInMs: number;

  constructor(name: string, retryInMs: number) {
    super(`Circuit '${name}' is open`, {
      code: 'CIRCUIT_OPEN',
      isOperational: true,
      context: { breaker: name, retryInMs },
    });
    this.retryInMs = retryInMs;
  }
}

export class CheckpointError extends AppError {
  constructor(operation: string, scanId: string, cause?: unknown) {
    super(`Checkpoint ${operation} failed for scan ${scanId}: ${getErrorMessage(cause)}`, {
      code: 'CHECKPOINT_ERROR',
      isOperational: true,
      context: { operation, scanId },
      cause,
    });
  }
}

export class CacheError extends AppError {
  constructor(operation: string, key: string, cause?: unknown) {
    super(`Cache ${operation} failed for ${key}: ${getErrorMessage(cause)}`, {
      code: 'CACHE_ERROR',
      isOperational: true,
      context: { operation, key },
      cause,
    });
  }
}

/**
 * Configuration error
 */
export class ConfigurationError extends AppError {
  constructor(message: string, issues?: string[]) {
    super(message, {
      code: 'CONFIGURATION_ERROR',
      isOperational: false,
      context: { issues },
    });
  }
}

/**
 * Safely extracts error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error occurred';
}

/**
 * Creates a structured error object for logging
 */
export function toErrorObject(error: unknown): Record<string, unknown> {
  if (error instanceof AppError) {
    return {
      name: error.name,
      message: error.message,
      code: error.code,
      isOperational: error.isOperational,
      context: error.context,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: getErrorMessage(error),
    rawError: error,
  };
}

/**
 * Result type for operations that can fail
 */
export type Result<T, E = AppError> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Creates a success result
 */
export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

/**
 * Creates a failure result
 */
export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}
