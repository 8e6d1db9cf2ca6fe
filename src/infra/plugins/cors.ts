/**
 * CORS for the progress API
 *
 * Browsers call the API from the course player. The allow-list is built from
 * ALLOWED_ORIGINS and CLIENT_BASE_URL; development also admits any localhost port
 * so a local player can run against a local server.
 */

import cors from '@fastify/cors';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

/** Methods the progress and gamification routes answer to, plus preflight. */
export const CORS_METHODS = ['GET', 'PUT', 'POST', 'OPTIONS'] as const;

const LOCAL_HOSTNAMES = new Set(['localhost', '127.0.0.1', '[::1]']);

const splitOrigins = (raw: string | undefined): string[] =>
  (raw ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin !== '');

/**
 * Origins admitted in every environment.
 */
export function getAllowedOriginsSet(config: AppConfig): Set<string> {
  return new Set([
    ...splitOrigins(config.cors.allowedOrigins),
    ...splitOrigins(config.cors.clientBaseUrl),
  ]);
}

export function isLocalhostOrigin(origin: string): boolean {
  let url: URL;
  try {
    url = new URL(origin);
  } catch {
    return false;
  }
  return (url.protocol === 'http:' || url.protocol === 'https:') && LOCAL_HOSTNAMES.has(url.hostname);
}

/**
 * Builds the origin check used by the plugin. Requests without an Origin header
 * (server-to-server, curl) always pass.
 */
export function makeOriginPolicy(config: AppConfig): (origin: string | undefined) => boolean {
  const allowed = getAllowedOriginsSet(config);
  const allowLocalhost = config.server.isDevelopment;

  return (origin) => {
    if (origin === undefined || origin === '') {
      return true;
    }
    return allowed.has(origin) || (allowLocalhost && isLocalhostOrigin(origin));
  };
}

export async function registerCors(fastify: FastifyInstance, config: AppConfig): Promise<void> {
  const isAllowed = makeOriginPolicy(config);

  await fastify.register(cors, {
    origin: (origin, cb) => {
      if (isAllowed(origin)) {
        cb(null, true);
        return;
      }
      cb(new Error('CORS origin not allowed'), false);
    },
    methods: [...CORS_METHODS],
    allowedHeaders: ['content-type', 'authorization', 'accept'],
    exposedHeaders: ['content-length'],
    credentials: true,
  });
}
