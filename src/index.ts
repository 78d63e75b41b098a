import 'dotenv/config';
import type { Server } from 'http';
import { createApp } from './app';
import { getEnv } from './config/env';
import { collectProcessMetrics } from './infrastructure/processMetrics';
import { MetricsRegistry } from './infrastructure/metrics';
import { createLogger, errorFields } from './utils/logger';

const logger = createLogger('server');

function start(): Server {
  const env = getEnv();
  const registry = new MetricsRegistry();
  if (env.METRICS_ENABLED) {
    collectProcessMetrics(registry, env.METRICS_PREFIX);
  }
  const { app } = createApp({ config: env, registry });

  const server = app.listen(env.PORT, env.HOST, () => {
    logger.info(
      {
        host: env.HOST,
        port: env.PORT,
        metrics: env.METRICS_ENABLED ? env.METRICS_PATH : 'disabled',
      },
      `${env.SERVICE_NAME} listening`,
    );
  });
  server.on('error', (error) => {
    logger.error(errorFields(error), 'HTTP server error');
    process.exit(1);
  });
  return server;
}

function shutdown(server: Server, signal: string): void {
  logger.info({ signal }, 'Shutting down...');
  server.close((error) => {
    if (error) {
      logger.error(errorFields(error), 'Error while closing HTTP server');
      process.exit(1);
    }
    process.exit(0);
  });
  server.closeIdleConnections();
}

try {
  const server = start();
  process.on('SIGTERM', () => shutdown(server, 'SIGTERM'));
  process.on('SIGINT', () => shutdown(server, 'SIGINT'));
} catch (error) {
  // Invalid configuration and DuplicateMetricError land here.
  logger.error(errorFields(error), 'Failed to start server');
  process.exit(1);
}
