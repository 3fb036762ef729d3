/**
 * Configuration schemas and defaults
 * @module config/schema
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { LOG_LEVELS } from '../observability/index.js';

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_INITIAL_DELAY_MS = 1000;
export const DEFAULT_MAX_DELAY_MS = 30000;
export const DEFAULT_MULTIPLIER = 2;
export const DEFAULT_JITTER_FRACTION = 0.1;

export const DEFAULT_FAILURE_THRESHOLD = 5;
export const DEFAULT_RESET_TIMEOUT_MS = 60000;
export const DEFAULT_HALF_OPEN_MAX_CALLS = 1;

export const DEFAULT_REQUESTS_PER_MINUTE = 60;

export const DEFAULT_CACHE_MAX_ENTRIES = 100;
export const DEFAULT_CACHE_TTL_MS = 3600 * 1000;

export const DEFAULT_BASE_URL = 'http://localhost:11434';
export const DEFAULT_MODEL = 'llama3.2';
export const DEFAULT_TIMEOUT_MS = 120000;

export const retryPolicySchema = z
  .object({
    maxRetries: z.number().int().min(0).default(DEFAULT_MAX_RETRIES),
    initialDelayMs: z.number().positive().default(DEFAULT_INITIAL_DELAY_MS),
    maxDelayMs: z.number().positive().default(DEFAULT_MAX_DELAY_MS),
    multiplier: z.number().min(1).default(DEFAULT_MULTIPLIER),
    jitterFraction: z.number().min(0).max(1).default(DEFAULT_JITTER_FRACTION),
  })
  .refine((policy) => policy.maxDelayMs >= policy.initialDelayMs, {
    message: 'maxDelayMs must be >= initialDelayMs',
    path: ['maxDelayMs'],
  });

export const circuitBreakerConfigSchema = z.object({
  threshold: z.number().int().min(1).default(DEFAULT_FAILURE_THRESHOLD),
  resetTimeoutMs: z.number().positive().default(DEFAULT_RESET_TIMEOUT_MS),
  halfOpenMaxCalls: z.number().int().min(1).default(DEFAULT_HALF_OPEN_MAX_CALLS),
});

export const rateLimiterConfigSchema = z.object({
  requestsPerMinute: z.number().positive().default(DEFAULT_REQUESTS_PER_MINUTE),
  burstCapacity: z.number().min(1).optional(),
  enabled: z.boolean().default(true),
});

export const cacheConfigSchema = z.object({
  maxEntries: z.number().int().min(1).default(DEFAULT_CACHE_MAX_ENTRIES),
  ttlMs: z.number().min(0).default(DEFAULT_CACHE_TTL_MS),
  enabled: z.boolean().default(true),
});

export const providerConfigSchema = z.object({
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  model: z.string().min(1).default(DEFAULT_MODEL),
  timeoutMs: z.number().positive().default(DEFAULT_TIMEOUT_MS),
});

export const loggingConfigSchema = z.object({
  level: z.enum(LOG_LEVELS).default('info'),
  format: z.enum(['json', 'pretty']).default('json'),
});

export const agentConfigSchema = z.object({
  retry: retryPolicySchema.default({}),
  circuitBreaker: circuitBreakerConfigSchema.default({}),
  rateLimiter: rateLimiterConfigSchema.default({ enabled: false }),
  cache: cacheConfigSchema.default({}),
  provider: providerConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
  /** Deadline for the rate limiter; unset means wait as long as needed. */
  acquireTimeoutMs: z.number().positive().optional(),
});

export type RetryPolicy = Readonly<z.output<typeof retryPolicySchema>>;
export type RetryPolicyInput = z.input<typeof retryPolicySchema>;
export type CircuitBreakerConfig = Readonly<z.output<typeof circuitBreakerConfigSchema>>;
export type CircuitBreakerConfigInput = z.input<typeof circuitBreakerConfigSchema>;
export type RateLimiterConfig = Readonly<z.output<typeof rateLimiterConfigSchema>>;
export type RateLimiterConfigInput = z.input<typeof rateLimiterConfigSchema>;
export type CacheConfig = Readonly<z.output<typeof cacheConfigSchema>>;
export type CacheConfigInput = z.input<typeof cacheConfigSchema>;
export type ProviderConfig = Readonly<z.output<typeof providerConfigSchema>>;
export type ProviderConfigInput = z.input<typeof providerConfigSchema>;
export type AgentConfig = z.output<typeof agentConfigSchema>;
export type AgentConfigInput = z.input<typeof agentConfigSchema>;

/**
 * Validate a value against a schema, throwing ConfigurationError on failure
 */
export function parseConfig<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  name: string
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const summary = issues
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ConfigurationError(`Invalid ${name} configuration: ${summary}`, { issues });
  }
  return result.data;
}
