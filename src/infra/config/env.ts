/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  DATABASE_URL: Type.String({ minLength: 1 }),

  // CORS
  ALLOWED_ORIGINS: Type.Optional(Type.String()),
  CLIENT_BASE_URL: Type.Optional(Type.String()),

  // Auth (JWT)
  AUTH_JWT_KEY: Type.Optional(Type.String()),
  AUTH_JWT_ISSUER: Type.Optional(Type.String()),
  AUTH_AUTHORIZED_PARTIES: Type.Optional(Type.String()),

  // Gamification
  ACTIVITY_TIMEZONE: Type.String({ default: 'UTC', minLength: 1 }),
  MAX_CONFLICT_RETRIES: Type.Integer({ default: 3, minimum: 1, maximum: 10 }),
});

export type Env = Static<typeof EnvSchema>;

/**
 * Checks that a timezone name is known to the runtime's Intl database.
 */
const isKnownTimeZone = (timeZone: string): boolean => {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
};

const parseInteger = (value: string | undefined, fallback: number): number =>
  value != null && value !== '' ? Number.parseInt(value, 10) : fallback;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: parseInteger(env['PORT'], 3000),
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    DATABASE_URL: env['DATABASE_URL'],
    ALLOWED_ORIGINS: env['ALLOWED_ORIGINS'],
    CLIENT_BASE_URL: env['CLIENT_BASE_URL'],
    AUTH_JWT_KEY: env['AUTH_JWT_KEY'],
    AUTH_JWT_ISSUER: env['AUTH_JWT_ISSUER'],
    AUTH_AUTHORIZED_PARTIES: env['AUTH_AUTHORIZED_PARTIES'],
    ACTIVITY_TIMEZONE: env['ACTIVITY_TIMEZONE'] ?? 'UTC',
    MAX_CONFLICT_RETRIES: parseInteger(env['MAX_CONFLICT_RETRIES'], 3),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  if (!isKnownTimeZone(rawEnv.ACTIVITY_TIMEZONE)) {
    throw new Error(
      `Invalid environment configuration: /ACTIVITY_TIMEZONE: unknown time zone '${rawEnv.ACTIVITY_TIMEZONE}'`
    );
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  database: {
    url: env.DATABASE_URL,
  },
  cors: {
    allowedOrigins: env.ALLOWED_ORIGINS,
    clientBaseUrl: env.CLIENT_BASE_URL,
  },
  auth: {
    /** PEM public key (SPKI) used to verify bearer tokens */
    jwtKey: env.AUTH_JWT_KEY,
    jwtIssuer: env.AUTH_JWT_ISSUER,
    /** Comma-separated list of authorized parties (azp / aud claim) */
    authorizedParties: env.AUTH_AUTHORIZED_PARTIES?.split(',').filter(Boolean),
  },
  gamification: {
    /** IANA zone in which activity timestamps become calendar days for streaks */
    activityTimeZone: env.ACTIVITY_TIMEZONE,
    maxConflictRetries: env.MAX_CONFLICT_RETRIES,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
