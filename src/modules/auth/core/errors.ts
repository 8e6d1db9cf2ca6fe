/**
 * Authentication Module - Domain Errors
 *
 * Discriminated unions with a 'type' field, returned through neverthrow Results.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Error Interfaces
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Token is malformed, badly signed, or carries claims we do not accept.
 */
export interface InvalidTokenError {
  readonly type: 'InvalidTokenError';
  readonly message: string;
  readonly cause?: unknown;
}

export interface TokenExpiredError {
  readonly type: 'TokenExpiredError';
  readonly message: string;
}

/**
 * A protected route was called without a valid session.
 */
export interface AuthenticationRequiredError {
  readonly type: 'AuthenticationRequiredError';
  readonly message: string;
}

/**
 * The verifier itself failed (e.g. the configured key cannot be imported).
 */
export interface AuthProviderError {
  readonly type: 'AuthProviderError';
  readonly message: string;
  readonly cause?: unknown;
}

export type AuthError =
  | InvalidTokenError
  | TokenExpiredError
  | AuthenticationRequiredError
  | AuthProviderError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createInvalidTokenError = (message: string, cause?: unknown): InvalidTokenError => ({
  type: 'InvalidTokenError',
  message,
  cause,
});

export const createTokenExpiredError = (): TokenExpiredError => ({
  type: 'TokenExpiredError',
  message: 'Token has expired',
});

export const createAuthenticationRequiredError = (): AuthenticationRequiredError => ({
  type: 'AuthenticationRequiredError',
  message: 'Authentication required',
});

export const createAuthProviderError = (message: string, cause?: unknown): AuthProviderError => ({
  type: 'AuthProviderError',
  message,
  cause,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const AUTH_ERROR_HTTP_STATUS: Record<AuthError['type'], number> = {
  InvalidTokenError: 401,
  TokenExpiredError: 401,
  AuthenticationRequiredError: 401,
  AuthProviderError: 503,
};
