import Fastify, { FastifyInstance, FastifyError } from 'fastify';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import type { Config } from '../config/index.js';
import type { DuoStatusService } from '../duo/index.js';
import type { Logger } from 'pino';
import { MAX_USERNAME_LENGTH } from './routes/accounts.js';

export interface GateServerDeps {
  config: Config;
  statusService: DuoStatusService;
  logger: Logger;
}

export async function createGateServer(deps: GateServerDeps): Promise<FastifyInstance> {
  const { config, statusService, logger } = deps;

  const app = Fastify({
    logger: false, // We use our own logger
    bodyLimit: 65536,
    // Long usernames must reach the route to be rejected with a 400
    maxParamLength: MAX_USERNAME_LENGTH * 2,
  });

  // Security headers
  await app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
      },
    },
    // Enable HSTS only in production to avoid issues on non-HTTPS environments
    hsts:
      process.env.NODE_ENV === 'production'
        ? { maxAge: 60 * 60 * 24 * 180, includeSubDomains: true, preload: false }
        : false,
    referrerPolicy: { policy: 'no-referrer' },
  });

  // Every account lookup can reach the provider, so /api/* is rate limited
  await app.register(rateLimit, {
    max: config.server.rate_limit_max,
    timeWindow: config.server.rate_limit_window_ms,
    allowList: (request) => !request.url.startsWith('/api/'),
  });

  // Decorate with dependencies
  app.decorate('config', config);
  app.decorate('statusService', statusService);
  app.decorate('gateLogger', logger);

  // Request logging
  app.addHook('onRequest', async (request) => {
    logger.debug(
      {
        method: request.method,
        url: request.url,
      },
      'Incoming request'
    );
  });

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    logger.error(
      {
        err: error,
        method: request.method,
        url: request.url,
      },
      'Request error'
    );

    // Don't expose internal errors to clients
    reply.code(error.statusCode || 500).send({
      error: error.statusCode ? error.message : 'Internal Server Error',
    });
  });

  // Health check endpoint, includes a provider ping
  app.get('/health', async () => {
    const reachable = await statusService.ping();
    return {
      status: 'ok',
      provider: reachable ? 'reachable' : 'unreachable',
      timestamp: new Date().toISOString(),
    };
  });

  await app.register(import('./routes/accounts.js'));

  return app;
}

// Extend Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    config: Config;
    statusService: DuoStatusService;
    gateLogger: Logger;
  }
}
