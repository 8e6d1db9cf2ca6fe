/**
 * Fastify Authentication Middleware
 *
 * A global preHandler resolves `request.auth` for every request; protected
 * routes add `requireAuthHandler` on top.
 */

import { AUTH_ERROR_HTTP_STATUS } from '../../core/errors.js';
import { authenticate, requireAuth, type AuthenticateDeps } from '../../core/usecases/authenticate.js';
import { AUTH_HEADER, BEARER_PREFIX, type AuthContext } from '../../core/types.js';

import type { FastifyReply, FastifyRequest, preHandlerHookHandler } from 'fastify';

declare module 'fastify' {
  interface FastifyRequest {
    /** Authentication context (set by auth middleware) */
    auth: AuthContext;
  }
}

/**
 * Bearer token from the Authorization header, or null when absent or empty.
 */
export const extractBearerToken = (request: FastifyRequest): string | null => {
  const header = request.headers[AUTH_HEADER];
  if (typeof header !== 'string' || !header.startsWith(BEARER_PREFIX)) {
    return null;
  }

  const token = header.slice(BEARER_PREFIX.length).trim();
  return token !== '' ? token : null;
};

/**
 * Resolves the request's auth context. Requests without a token continue
 * anonymously; requests with an invalid token are rejected here.
 */
export function makeAuthMiddleware(deps: AuthenticateDeps): preHandlerHookHandler {
  const handler = async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    const result = await authenticate(deps, { token: extractBearerToken(request) });

    if (result.isErr()) {
      const error = result.error;
      if (error.type === 'AuthProviderError') {
        request.log.error({ err: error.cause }, error.message);
      }

      await reply.status(AUTH_ERROR_HTTP_STATUS[error.type]).send({
        ok: false,
        error: error.type,
        message: error.message,
      });
      return;
    }

    request.auth = result.value;
  };

  // Type assertion needed for async preHandler hooks with strictFunctionTypes
  return handler as preHandlerHookHandler;
}

const requireAuthHandlerImpl = async (
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> => {
  const result = requireAuth(request.auth);

  if (result.isErr()) {
    await reply.status(401).send({
      ok: false,
      error: result.error.type,
      message: result.error.message,
    });
  }
};

/**
 * Route guard: 401 unless the global middleware resolved a signed-in user.
 */
export const requireAuthHandler = requireAuthHandlerImpl as preHandlerHookHandler;
