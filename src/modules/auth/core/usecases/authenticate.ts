/**
 * Authentication Use Cases
 *
 * `authenticate` turns an optional bearer token into a request context;
 * `requireAuth` narrows a context to a signed-in user.
 */

import { ok, err, type Result } from 'neverthrow';

import { createAuthenticationRequiredError, type AuthError } from '../errors.js';
import { ANONYMOUS_SESSION, isAuthenticated, type AuthContext, type UserId } from '../types.js';

import type { AuthProvider } from '../ports.js';

export interface AuthenticateDeps {
  authProvider: AuthProvider;
}

export interface AuthenticateInput {
  /** Bearer token without its prefix; null when the request carried none */
  token: string | null;
}

/**
 * A missing token yields the anonymous session; a present but invalid token is an error.
 */
export async function authenticate(
  deps: AuthenticateDeps,
  input: AuthenticateInput
): Promise<Result<AuthContext, AuthError>> {
  if (input.token === null || input.token === '') {
    return ok(ANONYMOUS_SESSION);
  }

  const sessionResult = await deps.authProvider.verifyToken(input.token);
  if (sessionResult.isErr()) {
    return err(sessionResult.error);
  }

  return ok(sessionResult.value);
}

export function requireAuth(context: AuthContext): Result<UserId, AuthError> {
  if (!isAuthenticated(context)) {
    return err(createAuthenticationRequiredError());
  }
  return ok(context.userId);
}
