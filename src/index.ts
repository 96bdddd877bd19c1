import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import { ALLOWED_REQUEST_HEADERS, DEFAULT_ROUTES, loadConfig } from './config/index.js';
import { RouteTable } from './utils/route-table.js';
import { HeaderAllowlist } from './utils/headers.js';
import { Forwarder } from './utils/forwarder.js';
import { createLogger } from './utils/logger.js';

const config = loadConfig();
const logger = createLogger(config);

const routes = new RouteTable(DEFAULT_ROUTES);
const allowedHeaders = new HeaderAllowlist(ALLOWED_REQUEST_HEADERS);
const forwarder = new Forwarder(config.forwarder);

const app = createApp({
  logger,
  maxBodySizeBytes: config.maxBodySizeBytes,
  routes,
  allowedHeaders,
  forwarder,
});

logger.info(
  {
    maxBodySizeBytes: config.maxBodySizeBytes,
    ...config.forwarder,
  },
  'Starting API proxy'
);
for (const entry of routes.entries) {
  logger.info(`   ${entry.prefix} -> ${entry.targetBase}`);
}

const server = serve({ fetch: app.fetch, hostname: config.host, port: config.port }, (info) => {
  logger.info(`Server running at http://${config.host}:${info.port}`);
});

function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down`);
  server.close((error) => {
    if (error) {
      logger.error({ err: error }, 'Error while closing server');
    }
    void forwarder
      .close()
      .catch((closeError: unknown) => logger.error({ err: closeError }, 'Error while closing upstream pool'))
      .finally(() => {
        logger.flush();
        process.exit(error ? 1 : 0);
      });
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
