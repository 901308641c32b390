/**
 * Application Errors
 *
 * Custom error classes for verification, installation and storage failures.
 * All errors include HTTP status codes for consistent API responses.
 */

// =============================================================================
// BASE ERROR
// =============================================================================

/**
 * Base class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    statusCode: number,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert error to JSON response format
   */
  toJSON(): Record<string, unknown> {
    return {
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
      },
    };
  }
}

// =============================================================================
// SESSION TOKEN VERIFICATION
// =============================================================================

/**
 * Base class for session token failures. Never retried; always answered
 * with a bare 401.
 */
export class SessionVerificationError extends AppError {
  constructor(code: string, message: string) {
    super(code, message, 401);
    this.name = 'SessionVerificationError';
  }
}

/**
 * Thrown when the token is not a well-formed HS256 JWT with the required claims
 */
export class MalformedTokenError extends SessionVerificationError {
  constructor(message = 'Session token is malformed') {
    super('MALFORMED_TOKEN', message);
    this.name = 'MalformedTokenError';
  }
}

export class InvalidSignatureError extends SessionVerificationError {
  constructor() {
    super('INVALID_SIGNATURE', 'Session token signature is invalid');
    this.name = 'InvalidSignatureError';
  }
}

/**
 * Thrown when exp has passed or nbf has not been reached
 */
export class ExpiredTokenError extends SessionVerificationError {
  constructor(message = 'Session token is expired or not yet valid') {
    super('EXPIRED_TOKEN', message);
    this.name = 'ExpiredTokenError';
  }
}

export class AudienceMismatchError extends SessionVerificationError {
  constructor() {
    super('AUDIENCE_MISMATCH', 'Session token audience does not match this app');
    this.name = 'AudienceMismatchError';
  }
}

/**
 * Thrown when a request carries neither a bearer token nor an accepted fallback
 */
export class MissingSessionError extends SessionVerificationError {
  constructor() {
    super('MISSING_SESSION', 'Session token is required');
    this.name = 'MissingSessionError';
  }
}

// =============================================================================
// WEBHOOK VERIFICATION
// =============================================================================

export class InvalidWebhookSignatureError extends AppError {
  constructor(reason: 'missing_body' | 'missing_signature' | 'mismatch') {
    super('INVALID_WEBHOOK_SIGNATURE', 'Webhook signature is invalid', 401, { reason });
    this.name = 'InvalidWebhookSignatureError';
  }
}

/**
 * Thrown when an admin launch URL carries a missing or wrong `hmac`
 */
export class InvalidLaunchSignatureError extends AppError {
  constructor() {
    super('INVALID_LAUNCH_SIGNATURE', 'Request signature is invalid', 401);
    this.name = 'InvalidLaunchSignatureError';
  }
}

// =============================================================================
// INSTALLATION FLOW
// =============================================================================

/**
 * Thrown when the OAuth callback nonce is unknown, expired, replayed or
 * bound to a different shop
 */
export class InvalidStateError extends AppError {
  constructor() {
    super('INVALID_STATE', 'OAuth state is invalid or has expired', 403);
    this.name = 'InvalidStateError';
  }
}

/**
 * Thrown when the authorization code could not be exchanged.
 * The upstream response is kept as `cause` for logging and never sent.
 */
export class TokenExchangeFailedError extends AppError {
  constructor(shop: string, cause?: unknown) {
    super(
      'TOKEN_EXCHANGE_FAILED',
      'Failed to complete installation',
      502,
      { shop },
      { cause }
    );
    this.name = 'TokenExchangeFailedError';
  }
}

export class InvalidShopDomainError extends AppError {
  constructor(input: string) {
    super('INVALID_SHOP_DOMAIN', 'Invalid shop domain', 400, { input });
    this.name = 'InvalidShopDomainError';
  }
}

// =============================================================================
// TENANT DATA
// =============================================================================

/**
 * Thrown when a tenant-scoped write targets a shop with no installation
 */
export class UnknownTenantError extends AppError {
  constructor(shop: string) {
    super('UNKNOWN_TENANT', `App is not installed for shop: ${shop}`, 404, { shop });
    this.name = 'UnknownTenantError';
  }
}

export class InvalidInputError extends AppError {
  constructor(issues: string[]) {
    super('INVALID_INPUT', `Invalid input: ${issues.join('; ')}`, 400, { issues });
    this.name = 'InvalidInputError';
  }
}

/**
 * Non-fatal: the widget loader could not be registered on the storefront
 */
export class ScriptTagInstallFailedError extends AppError {
  constructor(shop: string, attempts: number, cause?: unknown) {
    super(
      'SCRIPT_TAG_INSTALL_FAILED',
      `Widget registration failed after ${attempts} attempt(s)`,
      502,
      { shop, attempts },
      { cause }
    );
    this.name = 'ScriptTagInstallFailedError';
  }
}

/**
 * Thrown when an outbound admin API call fails, times out or returns an
 * unexpected body
 */
export class AdminApiError extends AppError {
  constructor(
    operation: string,
    reason: 'timeout' | 'network' | 'http_status' | 'invalid_response',
    status?: number,
    cause?: unknown
  ) {
    super(
      'ADMIN_API_ERROR',
      `Admin API ${operation} failed: ${reason}${status ? ` (${status})` : ''}`,
      502,
      { operation, reason, status },
      { cause }
    );
    this.name = 'AdminApiError';
  }
}

/**
 * Thrown when the backing store cannot be read or written. Fatal to the request.
 */
export class PersistenceError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('PERSISTENCE_ERROR', message, 500, undefined, { cause });
    this.name = 'PersistenceError';
  }
}

export class ConfigError extends AppError {
  constructor(issues: string[]) {
    super('CONFIG_ERROR', `Invalid configuration: ${issues.join('; ')}`, 500, { issues });
    this.name = 'ConfigError';
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

/**
 * Check if an error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Check if an error is a request authentication failure
 */
export function isVerificationError(
  error: unknown
): error is SessionVerificationError | InvalidWebhookSignatureError | InvalidLaunchSignatureError {
  return (
    error instanceof SessionVerificationError ||
    error instanceof InvalidWebhookSignatureError ||
    error instanceof InvalidLaunchSignatureError
  );
}
