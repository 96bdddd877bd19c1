import type { UpstreamResponse } from '../types/index.js';
import { NULL_BODY_STATUSES, SKIP_RESPONSE_HEADERS } from '../config/proxy.js';
import { SECURITY_HEADERS } from '../config/security.js';
import { isValidHeaderName, isValidHeaderValue } from './headers.js';

/**
 * Statuses a Response can carry; anything else is relayed as 500
 */
export function normalizeStatus(status: number): number {
  return Number.isInteger(status) && status >= 200 && status <= 599 ? status : 500;
}

/**
 * Copy upstream headers that can be re-encoded, skipping hop-by-hop ones
 */
export function prepareResponseHeaders(upstream: UpstreamResponse): Headers {
  const headers = new Headers();

  for (const [name, value] of upstream.headers) {
    if (SKIP_RESPONSE_HEADERS.has(name.toLowerCase())) {
      continue;
    }
    if (!isValidHeaderName(name) || !isValidHeaderValue(value)) {
      continue;
    }
    headers.append(name, value);
  }

  applySecurityHeaders(headers);

  return headers;
}

/**
 * Overwrite the fixed security headers; applied after everything else
 */
export function applySecurityHeaders(headers: Headers): void {
  Object.entries(SECURITY_HEADERS).forEach(([key, value]) => {
    headers.set(key, value);
  });
}

/**
 * Turn a buffered upstream response into the response sent to the caller.
 * The body bytes are passed through untouched.
 */
export function translateResponse(upstream: UpstreamResponse, method: string): Response {
  const status = normalizeStatus(upstream.status);
  const withoutBody = method === 'HEAD' || NULL_BODY_STATUSES.has(status);

  return new Response(withoutBody ? null : upstream.body, {
    status,
    headers: prepareResponseHeaders(upstream),
  });
}
