/**
 * Proxy middleware configuration constants
 */

/**
 * Methods the proxy forwards; anything else is answered with 405
 */
export const ALLOWED_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS', 'HEAD'] as const;

/**
 * Headers that may be forwarded to the target service
 */
export const ALLOWED_REQUEST_HEADERS = [
  'accept',
  'content-type',
  'authorization',
  'x-goog-api-key',
  'x-api-key',
  'user-agent',
  'cache-control',
] as const;

/**
 * Headers that should not be forwarded from the target service response
 */
export const SKIP_RESPONSE_HEADERS = new Set([
  'transfer-encoding',
  'connection',
  'keep-alive',
  'upgrade',
  'proxy-authenticate',
  'proxy-authorization',
  'te',
  'trailer',
]);

/**
 * Statuses whose responses must not carry a body
 */
export const NULL_BODY_STATUSES = new Set([204, 205, 304]);

export const SERVICE_NAME = 'api-proxy';
