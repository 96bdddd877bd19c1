import type { Logger, LevelWithSilent } from 'pino';
import type { ALLOWED_METHODS } from '../config/proxy.js';
import type { RouteTable } from '../utils/route-table.js';
import type { HeaderAllowlist } from '../utils/headers.js';
import type { Forwarder } from '../utils/forwarder.js';

/**
 * A single prefix → upstream mapping
 */
export interface RouteEntry {
  prefix: string;
  targetBase: string;
}

/**
 * Result of resolving an inbound path against the route table
 */
export interface RouteMatch extends RouteEntry {
  remainder: string;
}

export type HeaderPair = [name: string, value: string];

export type AllowedMethod = (typeof ALLOWED_METHODS)[number];

/**
 * Outbound request handed to the forwarder
 */
export interface ForwardRequest {
  method: AllowedMethod;
  url: URL;
  headers: HeaderPair[];
  body: Uint8Array;
}

/**
 * Fully buffered upstream response
 */
export interface UpstreamResponse {
  status: number;
  headers: HeaderPair[];
  body: Uint8Array;
}

/**
 * Outbound client settings, all durations in milliseconds
 */
export interface ForwarderOptions {
  connectTimeoutMs: number;
  requestTimeoutMs: number;
  keepAliveTimeoutMs: number;
  maxConnectionsPerHost: number;
}

/**
 * Logtail (Better Stack) shipping settings
 */
export interface LogtailConfig {
  sourceToken: string;
  endpoint?: string;
}

/**
 * Process configuration resolved from the environment
 */
export interface AppConfig {
  host: string;
  port: number;
  maxBodySizeBytes: number;
  forwarder: ForwarderOptions;
  logLevel: LevelWithSilent;
  logtail?: LogtailConfig;
}

/**
 * Tables and clients built once at startup and shared by every request
 */
export interface ProxyContext {
  routes: RouteTable;
  allowedHeaders: HeaderAllowlist;
  forwarder: Forwarder;
}

export interface AppOptions extends ProxyContext {
  logger: Logger;
  maxBodySizeBytes: number;
}

export type AppEnv = {
  Variables: {
    logger: Logger;
    proxy: ProxyContext;
  };
};

/**
 * Body of every error the proxy itself produces
 */
export interface ErrorResponseBody {
  error: string;
  code: number;
}

/**
 * Health check response interface
 */
export interface HealthCheckResponse {
  status: string;
  service: string;
}
