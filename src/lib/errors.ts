// Error types and result helpers shared by the gateway, registry and team service

// ============================================================================
// Errors
// ============================================================================

export class GatewayError extends Error {
  constructor(
    message: string,
    public code: string = 'GATEWAY_ERROR',
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'GatewayError';
  }
}

/** Malformed input: bad version string, unknown enum value, duplicate key */
export class ValidationError extends GatewayError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends GatewayError {
  constructor(message: string) {
    super(message, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class AccessDeniedError extends GatewayError {
  constructor(message: string) {
    super(message, 'FORBIDDEN');
    this.name = 'AccessDeniedError';
  }
}

export class RegistrationError extends GatewayError {
  constructor(message: string) {
    super(message, 'REGISTRATION_FAILED');
    this.name = 'RegistrationError';
  }
}

/**
 * Connectivity or constraint failure reported by MongoDB.
 * The driver error is kept as `cause`.
 */
export class StoreError extends GatewayError {
  constructor(message: string, cause?: unknown) {
    super(message, 'STORE_ERROR', { cause });
    this.name = 'StoreError';
  }
}

// ============================================================================
// Results
// ============================================================================

export type Result<T, E extends GatewayError = GatewayError> =
  | { success: true; data: T }
  | { success: false; error: E };

export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

export function fail<E extends GatewayError>(error: E): { success: false; error: E } {
  return { success: false, error };
}

// ============================================================================
// Driver error inspection
// ============================================================================

function errorCode(error: unknown): unknown {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return error.code;
  }
  return undefined;
}

/** E11000: a unique index rejected the write */
export function isDuplicateKeyError(error: unknown): boolean {
  return errorCode(error) === 11000;
}

// 85 = IndexOptionsConflict, 86 = IndexKeySpecsConflict
export function isIndexConflictError(error: unknown): boolean {
  const code = errorCode(error);
  return code === 85 || code === 86;
}

/**
 * Wrap a driver failure in a StoreError, leaving gateway errors untouched.
 */
export function toStoreError(message: string, error: unknown): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new StoreError(`${message}: ${detail}`, error);
}
