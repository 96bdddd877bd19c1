import type { ErrorResponseBody } from '../types/index.js';

/**
 * Every failure the proxy can report to a caller
 */
export type ErrorKind =
  | 'NoRouteMatch'
  | 'InvalidURL'
  | 'MethodNotAllowed'
  | 'PayloadTooLarge'
  | 'UpstreamConnect'
  | 'UpstreamTimeout'
  | 'UpstreamOther'
  | 'BodyReadFailure';

/**
 * Status and public message for each error kind. The only place statuses are assigned.
 */
export const ERROR_TABLE = {
  NoRouteMatch: { status: 404, message: 'No route matches the request path' },
  InvalidURL: { status: 400, message: 'Invalid target URL' },
  MethodNotAllowed: { status: 405, message: 'Method not allowed' },
  PayloadTooLarge: { status: 413, message: 'Request body too large' },
  UpstreamConnect: { status: 502, message: 'Failed to connect to upstream' },
  UpstreamTimeout: { status: 504, message: 'Upstream request timed out' },
  UpstreamOther: { status: 500, message: 'Failed to process upstream request' },
  BodyReadFailure: { status: 500, message: 'Failed to read upstream response body' },
} as const satisfies Record<ErrorKind, { status: number; message: string }>;

/**
 * Custom error class for proxy-related errors
 */
export class ProxyError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    public readonly originalError?: unknown
  ) {
    super(ERROR_TABLE[kind].message);
    this.name = 'ProxyError';
  }

  get statusCode(): number {
    return ERROR_TABLE[this.kind].status;
  }
}

/**
 * Custom error class for configuration errors
 */
export class ConfigurationError extends Error {
  constructor(message: string, public readonly variable: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function createErrorBody(kind: ErrorKind): ErrorResponseBody {
  const { status, message } = ERROR_TABLE[kind];
  return { error: message, code: status };
}

/**
 * Build the JSON response for an error kind. Causes are never serialized.
 */
export function errorResponse(kind: ErrorKind): Response {
  const body = createErrorBody(kind);

  return new Response(JSON.stringify(body), {
    status: body.code,
    headers: { 'Content-Type': 'application/json' },
  });
}
