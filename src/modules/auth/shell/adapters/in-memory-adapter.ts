/**
 * In-Memory Authentication Adapter
 *
 * Fixed token table for tests and for local runs without a signing key.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createInvalidTokenError,
  createTokenExpiredError,
  type AuthError,
} from '../../core/errors.js';
import { toUserId, type AuthSession } from '../../core/types.js';

import type { AuthProvider } from '../../core/ports.js';

export interface MakeInMemoryAuthProviderOptions {
  /** token -> user id */
  tokens?: Readonly<Record<string, string>>;
  /** Tokens that are known but rejected as expired */
  expiredTokens?: readonly string[];
  /** @default 1 hour */
  tokenTTLMs?: number;
  now?: () => Date;
}

const DEFAULT_TOKEN_TTL_MS = 60 * 60 * 1000;

export const makeInMemoryAuthProvider = (
  options: MakeInMemoryAuthProviderOptions = {}
): AuthProvider => {
  const tokens = new Map(Object.entries(options.tokens ?? {}));
  const expired = new Set(options.expiredTokens ?? []);
  const ttl = options.tokenTTLMs ?? DEFAULT_TOKEN_TTL_MS;
  const now = options.now ?? (() => new Date());

  return {
    verifyToken(token: string): Promise<Result<AuthSession, AuthError>> {
      if (expired.has(token)) {
        return Promise.resolve(err(createTokenExpiredError()));
      }

      const userId = tokens.get(token);
      if (userId === undefined) {
        return Promise.resolve(err(createInvalidTokenError('Invalid or unknown token')));
      }

      return Promise.resolve(
        ok({ userId: toUserId(userId), expiresAt: new Date(now().getTime() + ttl) })
      );
    },
  };
};

/**
 * Token used for a learner in tests and local runs.
 */
export const createTestToken = (userId: string): string => `test-token-${userId}`;
