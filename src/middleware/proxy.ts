import type { Context } from 'hono';
import type { AllowedMethod, AppEnv } from '../types/index.js';
import { ALLOWED_METHODS } from '../config/proxy.js';
import { ProxyError, errorResponse } from '../utils/errors.js';
import { buildTargetUrl } from '../utils/url.js';
import { translateResponse } from '../utils/response.js';
import { getLogger } from '../utils/logger.js';

const allowedMethods: ReadonlySet<string> = new Set(ALLOWED_METHODS);

export function isAllowedMethod(method: string): method is AllowedMethod {
  return allowedMethods.has(method);
}

/**
 * Main proxy middleware function
 */
export async function proxyMiddleware(c: Context<AppEnv>): Promise<Response> {
  const logger = getLogger(c);
  const { routes, allowedHeaders, forwarder } = c.get('proxy');
  const { pathname, search } = new URL(c.req.url);
  const method = c.req.method;
  const startTime = Date.now();

  try {
    const match = routes.resolve(pathname);
    if (!match) {
      throw new ProxyError('NoRouteMatch');
    }

    const targetUrl = buildTargetUrl(match.targetBase, `${match.remainder}${search}`);

    if (!isAllowedMethod(method)) {
      throw new ProxyError('MethodNotAllowed');
    }

    const headers = allowedHeaders.filter(c.req.raw.headers);
    const body = new Uint8Array(await c.req.arrayBuffer());

    const upstream = await forwarder.send({ method, url: targetUrl, headers, body });

    logger.info(`[PROXY] ${method} ${pathname} -> ${upstream.status} (${Date.now() - startTime}ms)`);

    return translateResponse(upstream, method);
  } catch (error) {
    if (!(error instanceof ProxyError)) {
      throw error;
    }

    if (error.statusCode >= 500) {
      logger.error(
        { err: error.originalError, kind: error.kind },
        `[PROXY ERROR] ${method} ${pathname} -> ${error.statusCode} (${Date.now() - startTime}ms)`
      );
    } else {
      logger.warn(`[PROXY] ${method} ${pathname} -> ${error.statusCode} ${error.kind}`);
    }

    return errorResponse(error.kind);
  }
}
