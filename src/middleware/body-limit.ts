import { bodyLimit } from 'hono/body-limit';
import type { MiddlewareHandler } from 'hono';
import type { AppEnv } from '../types/index.js';
import { errorResponse } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Reject inbound bodies over the configured size before the proxy buffers them
 */
export function bodyLimitMiddleware(maxSizeBytes: number): MiddlewareHandler<AppEnv> {
  return bodyLimit({
    maxSize: maxSizeBytes,
    onError: (c) => {
      getLogger(c).warn(`[BODY LIMIT] ${c.req.method} ${c.req.path} exceeds ${maxSizeBytes} bytes`);
      return errorResponse('PayloadTooLarge');
    },
  });
}
