/**
 * Authentication Module - Domain Types
 *
 * Request identity as seen by route handlers. Tokens are verified by an
 * AuthProvider; handlers only ever see the resulting context.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Branded Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Learner identifier taken from the token's `sub` claim.
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- __brand is the standard pattern for branded types in TypeScript
export type UserId = string & { readonly __brand: unique symbol };

export const toUserId = (id: string): UserId => id as UserId;

// ─────────────────────────────────────────────────────────────────────────────
// Session Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Session of a request that carried a valid bearer token.
 */
export interface AuthSession {
  readonly userId: UserId;
  readonly expiresAt: Date;
}

/**
 * Session of a request without a bearer token.
 */
export interface AnonymousSession {
  readonly userId: null;
  readonly isAnonymous: true;
}

export type AuthContext = AuthSession | AnonymousSession;

export const isAuthenticated = (ctx: AuthContext): ctx is AuthSession => {
  return ctx.userId !== null;
};

export const ANONYMOUS_SESSION: AnonymousSession = {
  userId: null,
  isAnonymous: true,
} as const;

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Authorization header name (lowercase for HTTP headers) */
export const AUTH_HEADER = 'authorization' as const;

export const BEARER_PREFIX = 'Bearer ' as const;
