/**
 * API server entry point
 * Starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig, type AppConfig } from './infra/config/index.js';
import { initDatabase } from './infra/database/client.js';
import { createLogger, PRETTY_TRANSPORT } from './infra/logger/index.js';
import { makeJWTAdapter, type AuthProvider } from './modules/auth/index.js';

import type { Logger } from 'pino';

/**
 * Creates an auth provider if JWT configuration is available.
 * Returns undefined if auth is not configured.
 */
const createAuthProvider = (config: AppConfig, logger: Logger): AuthProvider | undefined => {
  if (config.auth.jwtKey === undefined || config.auth.jwtKey === '') {
    logger.warn('AUTH_JWT_KEY not configured - every request is anonymous');
    return undefined;
  }

  logger.info('Creating JWT auth provider');

  return makeJWTAdapter({
    publicKeyPEM: config.auth.jwtKey,
    algorithm: 'RS256',
    issuer: config.auth.jwtIssuer,
    authorizedParties: config.auth.authorizedParties,
  });
};

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    name: 'course-progress-server',
    pretty: config.logger.pretty,
  });

  logger.info(
    { config: { server: config.server, gamification: config.gamification } },
    'Starting API server'
  );

  const db = initDatabase(config);
  const authProvider = createAuthProvider(config, logger);

  const app = await buildApp({
    fastifyOptions: {
      logger: {
        level: config.logger.level,
        ...(config.logger.pretty && { transport: PRETTY_TRANSPORT }),
      },
      disableRequestLogging: false,
    },
    deps: {
      config,
      db,
      logger,
      ...(authProvider !== undefined && { authProvider }),
    },
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      await db.destroy();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

// Start the server (top-level await)
await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
