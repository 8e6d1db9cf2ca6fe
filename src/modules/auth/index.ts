/**
 * Authentication Module Public API
 */

export type { AuthSession, AnonymousSession, AuthContext, UserId } from './core/types.js';
export type { AuthError } from './core/errors.js';
export type { AuthProvider } from './core/ports.js';

export {
  ANONYMOUS_SESSION,
  AUTH_HEADER,
  BEARER_PREFIX,
  toUserId,
  isAuthenticated,
} from './core/types.js';

export {
  createInvalidTokenError,
  createTokenExpiredError,
  createAuthenticationRequiredError,
  createAuthProviderError,
  AUTH_ERROR_HTTP_STATUS,
} from './core/errors.js';

export {
  authenticate,
  requireAuth,
  type AuthenticateDeps,
  type AuthenticateInput,
} from './core/usecases/authenticate.js';

export { makeJWTAdapter, getTokenParties, type MakeJWTAdapterOptions } from './shell/adapters/jwt-adapter.js';

export {
  makeInMemoryAuthProvider,
  createTestToken,
  type MakeInMemoryAuthProviderOptions,
} from './shell/adapters/in-memory-adapter.js';

export {
  makeAuthMiddleware,
  requireAuthHandler,
  extractBearerToken,
} from './shell/middleware/fastify-auth.js';
