/**
 * Agent configuration loading
 * @module config
 */

import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from '../observability/index.js';
import {
  agentConfigSchema,
  parseConfig,
  type AgentConfig,
  type AgentConfigInput,
  type CacheConfigInput,
  type CircuitBreakerConfigInput,
  type ProviderConfigInput,
  type RateLimiterConfigInput,
  type RetryPolicyInput,
} from './schema.js';

const flag = z
  .string()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off']))
  .transform((value) => value === 'true' || value === '1' || value === 'yes' || value === 'on');

const envSchema = z.object({
  OLLAMA_HOST: z.string().url().optional(),
  OLLAMA_MODEL: z.string().min(1).optional(),
  OLLAMA_TIMEOUT_MS: z.coerce.number().positive().optional(),
  CACHE_ENABLED: flag.optional(),
  CACHE_MAX_SIZE: z.coerce.number().int().min(1).optional(),
  CACHE_TTL_SECONDS: z.coerce.number().min(0).optional(),
  RATE_LIMIT_ENABLED: flag.optional(),
  RATE_LIMIT_RPM: z.coerce.number().positive().optional(),
  RATE_LIMIT_BURST: z.coerce.number().min(1).optional(),
  RATE_LIMIT_TIMEOUT_SECONDS: z.coerce.number().positive().optional(),
  RETRY_MAX_RETRIES: z.coerce.number().int().min(0).optional(),
  RETRY_INITIAL_DELAY_MS: z.coerce.number().positive().optional(),
  RETRY_MAX_DELAY_MS: z.coerce.number().positive().optional(),
  CIRCUIT_BREAKER_THRESHOLD: z.coerce.number().int().min(1).optional(),
  CIRCUIT_BREAKER_RESET_SECONDS: z.coerce.number().positive().optional(),
  LOG_LEVEL: z.string().toLowerCase().pipe(z.enum(LOG_LEVELS)).optional(),
  LOG_FORMAT: z.string().toLowerCase().pipe(z.enum(['json', 'pretty'])).optional(),
});

export type Environment = Record<string, string | undefined>;

function withoutEmpty(env: Environment): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value.trim();
    }
  }
  return result;
}

function seconds(value: number | undefined): number | undefined {
  return value === undefined ? undefined : value * 1000;
}

/**
 * Read configuration overrides from environment variables.
 * Unset or empty variables fall back to the schema defaults.
 */
export function configFromEnv(env: Environment = process.env): AgentConfigInput {
  const vars = parseConfig(envSchema, withoutEmpty(env), 'environment');

  return {
    retry: {
      maxRetries: vars.RETRY_MAX_RETRIES,
      initialDelayMs: vars.RETRY_INITIAL_DELAY_MS,
      maxDelayMs: vars.RETRY_MAX_DELAY_MS,
    },
    circuitBreaker: {
      threshold: vars.CIRCUIT_BREAKER_THRESHOLD,
      resetTimeoutMs: seconds(vars.CIRCUIT_BREAKER_RESET_SECONDS),
    },
    rateLimiter: {
      enabled: vars.RATE_LIMIT_ENABLED ?? false,
      requestsPerMinute: vars.RATE_LIMIT_RPM,
      burstCapacity: vars.RATE_LIMIT_BURST,
    },
    cache: {
      enabled: vars.CACHE_ENABLED,
      maxEntries: vars.CACHE_MAX_SIZE,
      ttlMs: seconds(vars.CACHE_TTL_SECONDS),
    },
    provider: {
      baseUrl: vars.OLLAMA_HOST,
      model: vars.OLLAMA_MODEL,
      timeoutMs: vars.OLLAMA_TIMEOUT_MS,
    },
    logging: {
      level: vars.LOG_LEVEL,
      format: vars.LOG_FORMAT,
    },
    acquireTimeoutMs: seconds(vars.RATE_LIMIT_TIMEOUT_SECONDS),
  };
}

/**
 * Load and validate the full agent configuration from the environment
 */
export function loadConfig(env: Environment = process.env): AgentConfig {
  return parseConfig(agentConfigSchema, configFromEnv(env), 'agent');
}

/**
 * Fluent builder for AgentConfig
 */
export class AgentConfigBuilder {
  private config: AgentConfigInput = {};

  withRetry(retry: RetryPolicyInput): this {
    this.config.retry = { ...this.config.retry, ...retry };
    return this;
  }

  withCircuitBreaker(circuitBreaker: CircuitBreakerConfigInput): this {
    this.config.circuitBreaker = { ...this.config.circuitBreaker, ...circuitBreaker };
    return this;
  }

  withRateLimiter(rateLimiter: RateLimiterConfigInput): this {
    this.config.rateLimiter = { ...this.config.rateLimiter, ...rateLimiter };
    return this;
  }

  withCache(cache: CacheConfigInput): this {
    this.config.cache = { ...this.config.cache, ...cache };
    return this;
  }

  withProvider(provider: ProviderConfigInput): this {
    this.config.provider = { ...this.config.provider, ...provider };
    return this;
  }

  withLogLevel(level: LogLevel): this {
    this.config.logging = { ...this.config.logging, level };
    return this;
  }

  withAcquireTimeout(timeoutMs: number): this {
    this.config.acquireTimeoutMs = timeoutMs;
    return this;
  }

  /**
   * Builds and validates the configuration
   * @throws ConfigurationError when any value is out of range
   */
  build(): AgentConfig {
    return parseConfig(agentConfigSchema, this.config, 'agent');
  }

  /**
   * Creates a builder seeded from environment variables
   */
  static fromEnv(env: Environment = process.env): AgentConfigBuilder {
    const builder = new AgentConfigBuilder();
    builder.config = configFromEnv(env);
    return builder;
  }
}
