import pino from 'pino';
import { loadConfig, loadConfigFromEnv, resolveConfig } from './config/index.js';
import { DuoStatusService } from './duo/index.js';
import { createGateServer } from './server/server.js';

const CONFIG_PATH = process.env.CONFIG_PATH || './config/config.yaml';

async function main() {
  // Load configuration from file, then override with environment variables
  const config = resolveConfig(loadConfig(CONFIG_PATH), loadConfigFromEnv());

  // Initialize logger
  const usePrettyLogs = config.logging.format === 'pretty' && process.env.NODE_ENV !== 'production';
  const logger = pino({
    level: config.logging.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: () => `,"time":"${new Date().toISOString()}"`,
    transport: usePrettyLogs ? { target: 'pino-pretty' } : undefined,
  });

  if (config.logging.format === 'pretty' && process.env.NODE_ENV === 'production') {
    logger.warn('Pretty logging is not available in production, using JSON format instead');
  }

  logger.info('Starting duo-status-gate...');
  logger.info({ configPath: CONFIG_PATH }, 'Configuration loaded');

  const statusService = new DuoStatusService(
    {
      apiHost: config.duo.api_host,
      integrationKey: config.duo.integration_key,
      secretKey: config.duo.secret_key,
      timeoutMs: config.duo.timeout_ms,
    },
    {
      ttlSeconds: config.cache.ttl_seconds,
      maxEntries: config.cache.max_entries,
    },
    logger.child({ component: 'duo' })
  );
  logger.info(
    { apiHost: config.duo.api_host, cacheTtlSeconds: config.cache.ttl_seconds },
    'Status service initialized'
  );

  if (!(await statusService.ping())) {
    logger.warn({ apiHost: config.duo.api_host }, 'Provider did not answer the startup ping');
  }

  const server = await createGateServer({ config, statusService, logger });

  // Sweep expired cache entries so idle usernames do not linger until evicted
  const cleanupTimer = setInterval(() => {
    statusService.cleanupExpired();
  }, config.cache.cleanup_interval_seconds * 1000);

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down...');

    clearInterval(cleanupTimer);
    await server.close();
    logger.info('HTTP server closed');

    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  // Start server
  const port = config.server.listen_port;
  await server.listen({ port, host: config.server.host });

  logger.info({ port, apiHost: config.duo.api_host }, 'Status server started');
}

// Handle uncaught errors
process.on('uncaughtException', (err) => {
  console.error('Uncaught exception:', err);
  process.exit(1);
});

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled rejection at:', promise, 'reason:', reason);
  // Don't exit - let the app continue
});

main().catch((err) => {
  console.error('Failed to start:', err);
  process.exit(1);
});
