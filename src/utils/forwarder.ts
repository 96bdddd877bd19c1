import { Agent, type Dispatcher } from 'undici';
import type { ForwardRequest, ForwarderOptions, HeaderPair, UpstreamResponse } from '../types/index.js';
import { ProxyError, type ErrorKind } from './errors.js';

/**
 * Error codes raised while the connection to the upstream is being set up
 */
const CONNECT_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EADDRNOTAVAIL',
  'UND_ERR_CONNECT_TIMEOUT',
]);

const TIMEOUT_ERROR_CODES = new Set([
  'ETIMEDOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

function errorCodes(error: unknown): string[] {
  const codes: string[] = [];
  let current: unknown = error;

  // Walk the cause chain; happy-eyeballs failures arrive as an AggregateError
  for (let depth = 0; depth < 5 && typeof current === 'object' && current !== null; depth++) {
    if ('code' in current && typeof current.code === 'string') {
      codes.push(current.code);
    }
    if (current instanceof AggregateError) {
      codes.push(...current.errors.flatMap(errorCodes));
    }
    current = 'cause' in current ? current.cause : undefined;
  }

  return codes;
}

/**
 * Classify a failure that happened before the upstream status line arrived
 */
export function classifyTransportError(error: unknown, deadlineExceeded: boolean): ErrorKind {
  if (deadlineExceeded) {
    return 'UpstreamTimeout';
  }

  const codes = errorCodes(error);
  if (codes.some(code => CONNECT_ERROR_CODES.has(code))) {
    return 'UpstreamConnect';
  }
  if (codes.some(code => TIMEOUT_ERROR_CODES.has(code))) {
    return 'UpstreamTimeout';
  }
  return 'UpstreamOther';
}

/**
 * Classify a failure while reading a body whose status was already received
 */
export function classifyBodyError(error: unknown, deadlineExceeded: boolean): ErrorKind {
  if (deadlineExceeded || errorCodes(error).some(code => TIMEOUT_ERROR_CODES.has(code))) {
    return 'UpstreamTimeout';
  }
  return 'BodyReadFailure';
}

function toHeaderPairs(headers: Dispatcher.ResponseData['headers']): HeaderPair[] {
  const pairs: HeaderPair[] = [];

  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue;
    }
    for (const item of Array.isArray(value) ? value : [value]) {
      pairs.push([name, item]);
    }
  }

  return pairs;
}

/**
 * Owns the pooled outbound client. One instance serves every request.
 */
export class Forwarder {
  private readonly agent: Agent;

  constructor(private readonly options: ForwarderOptions) {
    this.agent = new Agent({
      connect: { timeout: options.connectTimeoutMs },
      keepAliveTimeout: options.keepAliveTimeoutMs,
      keepAliveMaxTimeout: options.keepAliveTimeoutMs,
      connections: options.maxConnectionsPerHost,
      headersTimeout: options.requestTimeoutMs,
      bodyTimeout: options.requestTimeoutMs,
    });
  }

  /**
   * Issue one outbound request and buffer the upstream body as raw bytes
   */
  async send(request: ForwardRequest): Promise<UpstreamResponse> {
    const deadline = new AbortController();
    const timer = setTimeout(() => deadline.abort(), this.options.requestTimeoutMs);

    try {
      let response: Dispatcher.ResponseData;
      try {
        response = await this.agent.request({
          origin: request.url.origin,
          path: `${request.url.pathname}${request.url.search}`,
          method: request.method,
          headers: Object.fromEntries(request.headers),
          body: request.body.byteLength > 0 ? request.body : undefined,
          signal: deadline.signal,
        });
      } catch (error) {
        throw new ProxyError(classifyTransportError(error, deadline.signal.aborted), error);
      }

      let body: ArrayBuffer;
      try {
        body = await response.body.arrayBuffer();
      } catch (error) {
        throw new ProxyError(classifyBodyError(error, deadline.signal.aborted), error);
      }

      return {
        status: response.statusCode,
        headers: toHeaderPairs(response.headers),
        body: new Uint8Array(body),
      };
    } finally {
      clearTimeout(timer);
    }
  }

  async close(): Promise<void> {
    await this.agent.close();
  }
}
