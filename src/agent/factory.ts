/**
 * Wiring from configuration to a ready agent
 */

import { ResponseCache } from '../cache/index.js';
import type { AgentConfig } from '../config/index.js';
import { createLogger, type Logger } from '../observability/index.js';
import {
  CircuitBreaker,
  ResiliencePipeline,
  RetryExecutor,
  TokenBucketLimiter,
} from '../resilience/index.js';
import { ChatAgent } from './chat-agent.js';
import { OllamaProvider, type FetchFn } from './ollama-provider.js';
import type { CompletionResult, InferenceProvider } from './types.js';

export interface AgentFactoryOptions {
  /** Replaces the Ollama provider built from `config.provider` */
  provider?: InferenceProvider;
  fetch?: FetchFn;
  logger?: Logger;
  systemPrompt?: string;
}

/**
 * Build a pipeline from validated configuration.
 * Every component is a fresh instance owned by the returned pipeline.
 */
export function createPipeline(
  config: AgentConfig,
  logger: Logger,
  breakerName: string = 'inference'
): ResiliencePipeline<CompletionResult> {
  const breaker = new CircuitBreaker(config.circuitBreaker, { name: breakerName, logger });
  const retry = new RetryExecutor({
    policy: config.retry,
    breaker,
    logger: logger.child({ component: 'retry' }),
  });

  return new ResiliencePipeline<CompletionResult>({
    retry,
    cache: new ResponseCache<CompletionResult>(config.cache, logger.child({ component: 'cache' })),
    limiter: new TokenBucketLimiter(config.rateLimiter, logger.child({ component: 'rate_limiter' })),
    acquireTimeoutMs: config.acquireTimeoutMs,
    logger,
  });
}

export function createAgentFromConfig(config: AgentConfig, options: AgentFactoryOptions = {}): ChatAgent {
  const logger = options.logger ?? createLogger(config.logging);
  const provider =
    options.provider ?? new OllamaProvider(config.provider, { fetch: options.fetch, logger });

  return new ChatAgent({
    provider,
    pipeline: createPipeline(config, logger, provider.name),
    systemPrompt: options.systemPrompt,
    logger,
  });
}
