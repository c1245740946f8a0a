/**
 * Rate Limiter Service
 *
 * Token bucket admission control shared by every inbound request. The bucket
 * lives in process memory, or in Redis when several gateway processes must
 * share one budget.
 */

import { Redis } from 'ioredis';
import { ConfigError } from './errors.js';
import { defaultLogger, type Logger } from './logger.js';

const RATE_LIMIT_KEY = 'rate_limit:gateway';

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  /** Seconds until a token is available, set when rejected */
  retryAfter?: number;
}

export interface RateLimitConfig {
  /** Sustained admissions per second */
  ratePerSecond: number;
  /** Bucket capacity */
  burst: number;
}

export interface RateLimiter {
  consume(): Promise<RateLimitResult>;
  close(): Promise<void>;
}

/**
 * Reject non-positive or non-finite bucket parameters
 */
export function validateRateLimitConfig(config: RateLimitConfig): void {
  if (!Number.isFinite(config.ratePerSecond) || config.ratePerSecond <= 0) {
    throw new ConfigError(`Rate limit rate must be a positive number, got ${config.ratePerSecond}`);
  }
  if (!Number.isInteger(config.burst) || config.burst < 1) {
    throw new ConfigError(`Rate limit burst must be a positive integer, got ${config.burst}`);
  }
}

function retryAfterSeconds(tokens: number, ratePerSecond: number): number {
  return Math.max(1, Math.ceil((1 - tokens) / ratePerSecond));
}

/**
 * In-memory token bucket. Refill and take happen in one synchronous step, so
 * concurrent admissions on the event loop are linearizable.
 */
export class TokenBucketRateLimiter implements RateLimiter {
  private tokens: number;
  private lastRefill: number;

  constructor(
    private readonly config: RateLimitConfig,
    private readonly now: () => number = Date.now
  ) {
    validateRateLimitConfig(config);
    this.tokens = config.burst;
    this.lastRefill = now();
  }

  async consume(): Promise<RateLimitResult> {
    return this.tryConsume();
  }

  tryConsume(): RateLimitResult {
    this.refill();

    if (this.tokens >= 1) {
      this.tokens -= 1;
      return { allowed: true, remaining: Math.floor(this.tokens) };
    }

    return {
      allowed: false,
      remaining: 0,
      retryAfter: retryAfterSeconds(this.tokens, this.config.ratePerSecond),
    };
  }

  async close(): Promise<void> {}

  private refill(): void {
    const now = this.now();
    const elapsedSeconds = Math.max(0, now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.config.burst, this.tokens + elapsedSeconds * this.config.ratePerSecond);
    this.lastRefill = now;
  }
}

/**
 * Refill-and-take executed atomically inside Redis. Time comes from the Redis
 * server so every gateway process sees the same clock.
 */
export const TOKEN_BUCKET_SCRIPT = `
local key = KEYS[1]
local rate = tonumber(ARGV[1])
local burst = tonumber(ARGV[2])
local time = redis.call('TIME')
local now = tonumber(time[1]) * 1000 + math.floor(tonumber(time[2]) / 1000)
local state = redis.call('HMGET', key, 'tokens', 'ts')
local tokens = tonumber(state[1])
local ts = tonumber(state[2])
if tokens == nil or ts == nil then
  tokens = burst
  ts = now
end
tokens = math.min(burst, tokens + math.max(0, now - ts) / 1000 * rate)
local allowed = 0
if tokens >= 1 then
  tokens = tokens - 1
  allowed = 1
end
redis.call('HSET', key, 'tokens', tostring(tokens), 'ts', tostring(now))
redis.call('PEXPIRE', key, math.ceil(burst / rate * 1000) + 1000)
return { allowed, tostring(tokens) }
`;

/**
 * The slice of the Redis client the shared bucket needs
 */
export interface RedisScriptClient {
  eval(script: string, numKeys: number, ...args: Array<string | number>): Promise<unknown>;
  quit(): Promise<unknown>;
}

/**
 * Token bucket stored in Redis
 */
export class RedisTokenBucketRateLimiter implements RateLimiter {
  constructor(
    private readonly client: RedisScriptClient,
    private readonly config: RateLimitConfig,
    private readonly logger: Logger = defaultLogger,
    private readonly key: string = RATE_LIMIT_KEY
  ) {
    validateRateLimitConfig(config);
  }

  async consume(): Promise<RateLimitResult> {
    let reply: unknown;
    try {
      reply = await this.client.eval(
        TOKEN_BUCKET_SCRIPT,
        1,
        this.key,
        this.config.ratePerSecond,
        this.config.burst
      );
    } catch (error) {
      // Fail-safe: reject requests when Redis is unavailable
      this.logger.error('Rate limit store unavailable, rejecting request', {
        error: error instanceof Error ? error.message : String(error),
      });
      return { allowed: false, remaining: 0, retryAfter: 1 };
    }

    if (!Array.isArray(reply) || reply.length < 2) {
      this.logger.error('Unexpected rate limit script reply', { reply });
      return { allowed: false, remaining: 0, retryAfter: 1 };
    }

    const allowed = Number(reply[0]) === 1;
    const tokens = Number(reply[1]);

    if (allowed) {
      return { allowed: true, remaining: Math.floor(tokens) };
    }
    return {
      allowed: false,
      remaining: 0,
      retryAfter: retryAfterSeconds(tokens, this.config.ratePerSecond),
    };
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}

/**
 * Build the limiter for the configured store
 */
export function createRateLimiter(
  config: RateLimitConfig & { redisUrl?: string },
  logger: Logger = defaultLogger
): RateLimiter {
  validateRateLimitConfig(config);

  if (!config.redisUrl) {
    return new TokenBucketRateLimiter(config);
  }

  const redis = new Redis(config.redisUrl, {
    maxRetriesPerRequest: 3,
    lazyConnect: true,
  });

  redis.on('error', (err: Error) => {
    logger.error('Redis connection error', { error: err.message });
  });

  const client: RedisScriptClient = {
    eval: (script, numKeys, ...args) => redis.eval(script, numKeys, ...args),
    quit: () => redis.quit(),
  };

  logger.info('Using Redis-backed rate limiter');
  return new RedisTokenBucketRateLimiter(client, config, logger);
}
