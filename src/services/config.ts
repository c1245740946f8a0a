/**
 * Gateway Configuration Service
 *
 * Parses and validates environment configuration on startup. Any problem is
 * a ConfigError: the gateway refuses to bind rather than run misconfigured.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';
import { isLogLevel, type LogLevel } from './logger.js';
import { formatIssuePath } from './wireFormat.js';

export const PROVIDER_KINDS = ['passthrough', 'field_remapping'] as const;
export type ProviderKind = (typeof PROVIDER_KINDS)[number];

export interface BackendConfig {
  /** Full backend URL receiving one POST per chat request */
  endpoint: string;
  provider: ProviderKind;
  timeoutMs: number;
  auth: {
    certFile: string;
    keyFile: string;
  };
  proxies: {
    http?: string;
    https?: string;
  };
}

export interface GatewayConfig {
  backend: BackendConfig;
  server: {
    host: string;
    port: number;
  };
  cors: {
    allowedOrigins: string[];
  };
  rateLimit: {
    /** Sustained admissions per second */
    ratePerSecond: number;
    /** Bucket capacity */
    burst: number;
    redisUrl?: string;
  };
  streaming: {
    chunkDelayMs: number;
  };
  model: {
    id: string;
    ownedBy: string;
    created: number;
  };
  fieldRemapping: {
    forwardContext: boolean;
  };
  logging: {
    level: LogLevel;
    dir?: string;
  };
}

/** Creation timestamp reported for the static model entry */
export const STATIC_MODEL_CREATED = 1234567890;

const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), 'must be an http or https URL');

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .optional()
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

// Timers take at most a signed 32-bit millisecond delay
const MAX_TIMEOUT_SECONDS = 2147483;
const MIN_TIMEOUT_SECONDS = 0.001;

const EnvSchema = z.object({
  BACKEND_ENDPOINT: httpUrl,
  BACKEND_PROVIDER: z.enum(PROVIDER_KINDS).default('field_remapping'),
  BACKEND_CERT_FILE: z.string().min(1),
  BACKEND_KEY_FILE: z.string().min(1),
  BACKEND_TIMEOUT_SECONDS: z.coerce.number().min(MIN_TIMEOUT_SECONDS).max(MAX_TIMEOUT_SECONDS).default(30),
  BACKEND_HTTP_PROXY: optionalString.pipe(httpUrl.optional()),
  BACKEND_HTTPS_PROXY: optionalString.pipe(httpUrl.optional()),
  HOST: z.string().min(1).default('127.0.0.1'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  CORS_ALLOWED_ORIGINS: z.string().default(''),
  RATE_LIMIT_RPS: z.coerce.number().positive().finite().default(10),
  RATE_LIMIT_BURST: z.coerce.number().int().positive().default(20),
  REDIS_URL: optionalString,
  STREAM_CHUNK_DELAY_MS: z.coerce.number().int().nonnegative().default(20),
  MODEL_ID: z.string().min(1).default('default-model'),
  MODEL_OWNER: z.string().min(1).default('assistant-bridge'),
  FORWARD_CONVERSATION_CONTEXT: booleanFlag,
  LOG_LEVEL: z.string().optional().refine((value) => value === undefined || isLogLevel(value), 'must be one of debug, info, warn, error'),
  LOG_DIR: optionalString,
});

/**
 * Split a comma-separated origin list, dropping blanks
 */
export function parseOriginList(value: string): string[] {
  return value
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

/**
 * Build the gateway configuration from environment variables
 *
 * @throws ConfigError when a variable is missing or invalid, or when no CORS
 * origin is allowed
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${formatIssuePath(issue.path)}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const vars = parsed.data;
  const allowedOrigins = parseOriginList(vars.CORS_ALLOWED_ORIGINS);
  if (allowedOrigins.length === 0) {
    throw new ConfigError('CORS_ALLOWED_ORIGINS must list at least one origin');
  }

  const logLevel = vars.LOG_LEVEL;

  return {
    backend: {
      endpoint: vars.BACKEND_ENDPOINT,
      provider: vars.BACKEND_PROVIDER,
      timeoutMs: Math.round(vars.BACKEND_TIMEOUT_SECONDS * 1000),
      auth: {
        certFile: vars.BACKEND_CERT_FILE,
        keyFile: vars.BACKEND_KEY_FILE,
      },
      proxies: {
        ...(vars.BACKEND_HTTP_PROXY && { http: vars.BACKEND_HTTP_PROXY }),
        ...(vars.BACKEND_HTTPS_PROXY && { https: vars.BACKEND_HTTPS_PROXY }),
      },
    },
    server: {
      host: vars.HOST,
      port: vars.PORT,
    },
    cors: {
      allowedOrigins,
    },
    rateLimit: {
      ratePerSecond: vars.RATE_LIMIT_RPS,
      burst: vars.RATE_LIMIT_BURST,
      ...(vars.REDIS_URL && { redisUrl: vars.REDIS_URL }),
    },
    streaming: {
      chunkDelayMs: vars.STREAM_CHUNK_DELAY_MS,
    },
    model: {
      id: vars.MODEL_ID,
      ownedBy: vars.MODEL_OWNER,
      created: STATIC_MODEL_CREATED,
    },
    fieldRemapping: {
      forwardContext: vars.FORWARD_CONVERSATION_CONTEXT,
    },
    logging: {
      level: isLogLevel(logLevel) ? logLevel : 'info',
      ...(vars.LOG_DIR && { dir: vars.LOG_DIR }),
    },
  };
}
