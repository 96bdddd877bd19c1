import { Hono } from 'hono';
import type { AppEnv, AppOptions } from './types/index.js';
import { healthCheck } from './routes/health.js';
import { robots } from './routes/robots.js';
import { createHomeHandler } from './routes/home.js';
import { proxyMiddleware } from './middleware/proxy.js';
import { bodyLimitMiddleware } from './middleware/body-limit.js';
import { errorResponse } from './utils/errors.js';
import { getLogger } from './utils/logger.js';

export function createApp(options: AppOptions): Hono<AppEnv> {
  const { logger, maxBodySizeBytes, routes, allowedHeaders, forwarder } = options;
  const proxy = Object.freeze({ routes, allowedHeaders, forwarder });

  const app = new Hono<AppEnv>();

  // Shared tables and logger for every request
  app.use('*', (c, next) => {
    c.set('logger', logger);
    c.set('proxy', proxy);
    return next();
  });

  app.use('*', bodyLimitMiddleware(maxBodySizeBytes));

  const home = createHomeHandler(routes.entries);
  app.get('/', home);
  app.get('/index.html', home);
  app.get('/robots.txt', robots);
  app.get('/health', healthCheck);

  // Everything else goes through the routing table
  app.all('*', proxyMiddleware);

  app.onError((error, c) => {
    getLogger(c).error({ err: error }, `[ERROR] ${c.req.method} ${c.req.path}`);
    return errorResponse('UpstreamOther');
  });

  return app;
}
