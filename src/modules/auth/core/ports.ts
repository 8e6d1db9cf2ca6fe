/**
 * Authentication Module - Ports
 */

import type { AuthError } from './errors.js';
import type { AuthSession } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Verifies bearer tokens.
 *
 * Implementations never throw: a bad token is an InvalidTokenError or
 * TokenExpiredError, a broken verifier an AuthProviderError.
 */
export interface AuthProvider {
  verifyToken(token: string): Promise<Result<AuthSession, AuthError>>;
}
