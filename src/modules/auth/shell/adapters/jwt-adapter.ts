/**
 * JWT Authentication Adapter
 *
 * Verifies bearer tokens signed by the identity provider against a PEM public key,
 * using `jose`. The learner id is the `sub` claim.
 */

import { errors, importSPKI, jwtVerify, type JWTPayload, type JWTVerifyOptions } from 'jose';
import { ok, err, type Result } from 'neverthrow';

import {
  createAuthProviderError,
  createInvalidTokenError,
  createTokenExpiredError,
  type AuthError,
} from '../../core/errors.js';
import { toUserId, type AuthSession } from '../../core/types.js';

import type { AuthProvider } from '../../core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

type VerificationKey = Awaited<ReturnType<typeof importSPKI>>;

export interface MakeJWTAdapterOptions {
  /** SPKI public key, "-----BEGIN PUBLIC KEY-----..." */
  publicKeyPEM: string;
  /** @default 'RS256' */
  algorithm?: string;
  /** Rejects tokens from any other issuer when set */
  issuer?: string | undefined;
  /**
   * Rejects tokens whose `azp` or `aud` matches none of these.
   * Trailing slashes are ignored on both sides.
   */
  authorizedParties?: readonly string[] | undefined;
  /** @default 5 */
  clockToleranceSeconds?: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const normalizeParty = (value: string): string => value.trim().replace(/\/$/, '');

/**
 * Parties a token was issued for: its `azp` claim plus every `aud` entry.
 */
export const getTokenParties = (payload: JWTPayload): string[] => {
  const parties: string[] = [];

  const azp = payload['azp'];
  if (typeof azp === 'string') {
    parties.push(azp);
  }

  if (typeof payload.aud === 'string') {
    parties.push(payload.aud);
  } else if (Array.isArray(payload.aud)) {
    parties.push(...payload.aud);
  }

  return [...new Set(parties.map(normalizeParty))].filter((party) => party !== '');
};

const mapVerifyError = (error: unknown): AuthError => {
  if (error instanceof errors.JWTExpired) {
    return createTokenExpiredError();
  }
  if (error instanceof errors.JOSEError) {
    return createInvalidTokenError(error.message, error);
  }
  return createAuthProviderError('Token verification failed', error);
};

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

export const makeJWTAdapter = (options: MakeJWTAdapterOptions): AuthProvider => {
  const { publicKeyPEM, algorithm = 'RS256', issuer, clockToleranceSeconds = 5 } = options;
  const allowedParties = new Set(
    (options.authorizedParties ?? []).map(normalizeParty).filter((party) => party !== '')
  );

  // Imported once, on first use
  let keyPromise: Promise<VerificationKey> | undefined;

  const getKey = async (): Promise<Result<VerificationKey, AuthError>> => {
    keyPromise ??= importSPKI(publicKeyPEM, algorithm);
    try {
      return ok(await keyPromise);
    } catch (error) {
      keyPromise = undefined;
      return err(createAuthProviderError('Cannot import the token verification key', error));
    }
  };

  return {
    async verifyToken(token: string): Promise<Result<AuthSession, AuthError>> {
      const keyResult = await getKey();
      if (keyResult.isErr()) {
        return err(keyResult.error);
      }

      const verifyOptions: JWTVerifyOptions = {
        algorithms: [algorithm],
        clockTolerance: clockToleranceSeconds,
        ...(issuer !== undefined && { issuer }),
      };

      let payload: JWTPayload;
      try {
        ({ payload } = await jwtVerify(token, keyResult.value, verifyOptions));
      } catch (error) {
        return err(mapVerifyError(error));
      }

      if (allowedParties.size > 0) {
        const tokenParties = getTokenParties(payload);
        if (!tokenParties.some((party) => allowedParties.has(party))) {
          return err(createInvalidTokenError('Token was not issued for this application'));
        }
      }

      if (typeof payload.sub !== 'string' || payload.sub === '') {
        return err(createInvalidTokenError('Token missing subject (sub) claim'));
      }

      if (typeof payload.exp !== 'number') {
        return err(createInvalidTokenError('Token missing expiration (exp) claim'));
      }

      return ok({
        userId: toUserId(payload.sub),
        expiresAt: new Date(payload.exp * 1000),
      });
    },
  };
};
