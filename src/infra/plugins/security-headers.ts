/**
 * Security Headers Plugin
 *
 * HTTP security headers via @fastify/helmet. The server only answers JSON,
 * so the content security policy denies every resource type.
 */

import helmet from '@fastify/helmet';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

const API_CSP_DIRECTIVES = {
  defaultSrc: ["'none'"],
  frameAncestors: ["'none'"],
  formAction: ["'none'"],
};

const HSTS_CONFIG = {
  maxAge: 31536000, // 1 year
  includeSubDomains: true,
  preload: false,
};

// ─────────────────────────────────────────────────────────────────────────────
// Plugin
// ─────────────────────────────────────────────────────────────────────────────

export async function registerSecurityHeaders(
  fastify: FastifyInstance,
  config: AppConfig
): Promise<void> {
  const { isProduction, isTest } = config.server;

  if (isTest) {
    fastify.log.debug('Security headers disabled in test environment');
    return;
  }

  await fastify.register(helmet, {
    contentSecurityPolicy: { directives: API_CSP_DIRECTIVES },
    dnsPrefetchControl: { allow: false },
    frameguard: { action: 'deny' },
    hsts: isProduction ? HSTS_CONFIG : false,
    permittedCrossDomainPolicies: { permittedPolicies: 'none' },
    referrerPolicy: { policy: 'no-referrer' },
    // Superseded by CSP in current browsers
    xssFilter: false,
    hidePoweredBy: true,
    crossOriginEmbedderPolicy: false,
    crossOriginOpenerPolicy: false,
    // Called from the learner-facing web client on another origin
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  });

  fastify.log.info({ production: isProduction }, 'Security headers plugin registered');
}
