import { z } from 'zod';
import type { AppConfig } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';

const seconds = (fallback: number) => z.coerce.number().positive().default(fallback);

const envSchema = z.object({
  PROXY_HOST: z.string().default('0.0.0.0'),
  PROXY_PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  MAX_BODY_SIZE_MB: z.coerce.number().positive().default(10),
  REQUEST_TIMEOUT: seconds(3600),
  CONNECT_TIMEOUT: seconds(10),
  KEEP_ALIVE_TIMEOUT: seconds(60),
  MAX_CONNECTIONS_PER_HOST: z.coerce.number().int().positive().default(20),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LOGTAIL_SOURCE_TOKEN: z.string().optional(),
  LOGTAIL_ENDPOINT: z.string().url().optional(),
});

/**
 * Resolve the process configuration from environment variables.
 * Blank variables count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const variable = issue ? issue.path.join('.') : 'environment';
    throw new ConfigurationError(`${variable}: ${issue?.message ?? 'invalid value'}`, variable);
  }

  const vars = parsed.data;

  return {
    host: vars.PROXY_HOST,
    port: vars.PROXY_PORT,
    maxBodySizeBytes: Math.floor(vars.MAX_BODY_SIZE_MB * 1024 * 1024),
    forwarder: {
      connectTimeoutMs: vars.CONNECT_TIMEOUT * 1000,
      requestTimeoutMs: vars.REQUEST_TIMEOUT * 1000,
      keepAliveTimeoutMs: vars.KEEP_ALIVE_TIMEOUT * 1000,
      maxConnectionsPerHost: vars.MAX_CONNECTIONS_PER_HOST,
    },
    logLevel: vars.LOG_LEVEL,
    logtail: vars.LOGTAIL_SOURCE_TOKEN
      ? { sourceToken: vars.LOGTAIL_SOURCE_TOKEN, endpoint: vars.LOGTAIL_ENDPOINT }
      : undefined,
  };
}
