import type { Context } from 'hono';
import type { HealthCheckResponse } from '../types/index.js';
import { SERVICE_NAME } from '../config/proxy.js';

/**
 * Health check route handler
 */
export function healthCheck(c: Context): Response {
  const response: HealthCheckResponse = {
    status: 'healthy',
    service: SERVICE_NAME,
  };

  return c.json(response, 200);
}
