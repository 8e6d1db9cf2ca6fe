/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { registerCors, registerSecurityHeaders } from '../infra/plugins/index.js';
import { createLogger } from '../infra/logger/index.js';
import { ANONYMOUS_SESSION, type AuthProvider } from '../modules/auth/index.js';
import { makeAuthMiddleware } from '../modules/auth/shell/middleware/fastify-auth.js';
import {
  makeCourseCatalog,
  makeGamificationRoutes,
  makeGamificationStore,
  systemClock,
  type Clock,
  type CourseCatalog,
  type EnrollmentChecker,
  type GamificationStore,
} from '../modules/gamification/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { DbClient } from '../infra/database/client.js';
import type { Logger } from 'pino';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  config: AppConfig;
  /** Used to build the store and catalog when they are not injected */
  db?: DbClient;
  store?: GamificationStore;
  catalog?: CourseCatalog;
  enrollments?: EnrollmentChecker;
  clock?: Clock;
  /** Logger handed to repositories and use cases */
  logger?: Logger;
  /**
   * Verifies bearer tokens. Without one every request is anonymous,
   * so all gamification endpoints answer 401.
   */
  authProvider?: AuthProvider;
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps: AppDeps;
}

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps } = options;
  const { config } = deps;

  const clock = deps.clock ?? systemClock;
  const logger =
    deps.logger ??
    createLogger({ level: config.logger.level, pretty: config.logger.pretty });

  // ─────────────────────────────────────────────────────────────────────────────
  // Resolve Data Access
  // ─────────────────────────────────────────────────────────────────────────────
  let store = deps.store;
  let catalog = deps.catalog;
  let enrollments = deps.enrollments;

  if (deps.db !== undefined) {
    const courseCatalog = makeCourseCatalog({ db: deps.db, logger, clock });
    store ??= makeGamificationStore({ db: deps.db, logger });
    catalog ??= courseCatalog;
    enrollments ??= courseCatalog;
  }

  if (store === undefined || catalog === undefined || enrollments === undefined) {
    throw new Error('Missing required dependencies: db, or store, catalog and enrollments');
  }

  // Create Fastify instance
  const app = fastifyLib({
    ...fastifyOptions,
  });

  await registerCors(app, config);
  await registerSecurityHeaders(app, config);

  // ─────────────────────────────────────────────────────────────────────────────
  // Setup Authentication
  // ─────────────────────────────────────────────────────────────────────────────
  if (deps.authProvider !== undefined) {
    app.addHook('preHandler', makeAuthMiddleware({ authProvider: deps.authProvider }));
  } else {
    // Routes still register; protected endpoints answer 401
    app.addHook('preHandler', (request, _reply, done) => {
      request.auth = ANONYMOUS_SESSION;
      done();
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Setup Gamification Module (REST API)
  // ─────────────────────────────────────────────────────────────────────────────
  await app.register(
    makeGamificationRoutes({
      store,
      catalog,
      enrollments,
      clock,
      logger,
      activityTimeZone: config.gamification.activityTimeZone,
      maxConflictRetries: config.gamification.maxConflictRetries,
    })
  );

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Handle validation errors
    if (error.validation != null) {
      request.log.debug({ validation: error.validation }, 'Request validation failed');
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: error.message,
      });
    }

    request.log.error({ err: error }, 'Request error');

    // Handle known HTTP errors
    if (error.statusCode != null && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    // Handle unexpected errors
    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  // Not found handler
  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
