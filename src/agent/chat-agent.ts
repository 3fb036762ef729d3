/**
 * Chat agent
 *
 * Sends user messages to an inference provider through the resilience
 * pipeline and keeps the conversation history.
 */

import type { CacheStats } from '../cache/index.js';
import {
  CircuitOpenError,
  RateLimitTimeoutError,
  RetryExhaustedError,
  ServiceUnavailableError,
} from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import type {
  PipelineResult,
  RateLimitStats,
  ResilienceDiagnostics,
  ResiliencePipeline,
} from '../resilience/index.js';
import { Conversation } from './conversation.js';
import type { CompletionResult, ConversationTurn, InferenceProvider, ResponseStats } from './types.js';

export const STREAM_CHUNK_SIZE = 20;

export interface ChatAgentOptions {
  provider: InferenceProvider;
  pipeline: ResiliencePipeline<CompletionResult>;
  systemPrompt?: string;
  logger?: Logger;
}

export interface ChatOptions {
  useCache?: boolean;
}

/**
 * Replace resilience-layer failures with the user-facing unavailable error
 */
export function translateError(error: unknown): unknown {
  if (
    error instanceof CircuitOpenError ||
    error instanceof RetryExhaustedError ||
    error instanceof RateLimitTimeoutError
  ) {
    return new ServiceUnavailableError(error);
  }
  return error;
}

/**
 * Split text into consecutive chunks of at most `size` characters
 */
export function chunkText(text: string, size: number = STREAM_CHUNK_SIZE): string[] {
  const chunks: string[] = [];
  for (let i = 0; i < text.length; i += size) {
    chunks.push(text.slice(i, i + size));
  }
  return chunks;
}

export class ChatAgent {
  private readonly provider: InferenceProvider;
  private readonly pipeline: ResiliencePipeline<CompletionResult>;
  private readonly conversation: Conversation;
  private readonly logger: Logger;
  private lastResponseStats?: ResponseStats;

  constructor(options: ChatAgentOptions) {
    this.provider = options.provider;
    this.pipeline = options.pipeline;
    this.conversation = new Conversation(options.systemPrompt);
    this.logger = (options.logger ?? new NoopLogger()).child({ model: this.provider.model });

    this.pipeline.getCircuitBreaker()?.addHook({
      onStateChange: (from, to) => {
        const context = { provider: this.provider.name, from, to };
        if (to === 'open') {
          this.logger.warn('agent_circuit_state_changed', context);
        } else {
          this.logger.info('agent_circuit_state_changed', context);
        }
      },
    });
  }

  /**
   * Send a message and return the assistant's reply
   * @throws ServiceUnavailableError when the backend is unreachable, rate limited or rejected by the breaker
   * @throws PermanentFailureError and any other error unchanged
   */
  async chat(message: string, options: ChatOptions = {}): Promise<string> {
    const messages = this.conversation.toMessages(message);

    let outcome: PipelineResult<CompletionResult>;
    try {
      outcome = await this.pipeline.run(message, () => this.provider.complete(messages), {
        useCache: options.useCache ?? true,
      });
    } catch (error) {
      this.logger.error('agent_chat_failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      throw translateError(error);
    }

    this.recordTurn(message, outcome.value, outcome.durationMs, outcome.cached);
    return outcome.value.content;
  }

  /**
   * Send a message and yield the reply in fixed-size chunks. Never served from the cache.
   */
  async *chatStream(message: string): AsyncGenerator<string, void, undefined> {
    const messages = this.conversation.toMessages(message);

    let outcome: PipelineResult<CompletionResult>;
    try {
      outcome = await this.pipeline.run(message, () => this.provider.complete(messages), {
        useCache: false,
      });
    } catch (error) {
      this.logger.error('agent_stream_failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      throw translateError(error);
    }

    for (const chunk of chunkText(outcome.value.content)) {
      yield chunk;
    }

    this.recordTurn(message, outcome.value, outcome.durationMs, false);
  }

  get cacheEnabled(): boolean {
    return this.pipeline.getCache()?.enabled ?? false;
  }

  set cacheEnabled(value: boolean) {
    const cache = this.pipeline.getCache();
    if (cache) {
      cache.enabled = value;
    }
  }

  getCacheStats(): CacheStats | undefined {
    return this.pipeline.getCache()?.getStats();
  }

  /**
   * @returns The number of cached responses removed
   */
  clearCache(): number {
    return this.pipeline.getCache()?.clear() ?? 0;
  }

  invalidateCache(message: string): boolean {
    return this.pipeline.getCache()?.invalidate(message) ?? false;
  }

  get rateLimitEnabled(): boolean {
    return this.pipeline.getRateLimiter()?.enabled ?? false;
  }

  set rateLimitEnabled(value: boolean) {
    const limiter = this.pipeline.getRateLimiter();
    if (limiter) {
      limiter.enabled = value;
    }
  }

  getRateLimitStats(): RateLimitStats | undefined {
    return this.pipeline.getRateLimiter()?.getStats();
  }

  resetRateLimitStats(): void {
    this.pipeline.getRateLimiter()?.resetStats();
  }

  getLastResponseStats(): ResponseStats | undefined {
    return this.lastResponseStats;
  }

  getConversation(): readonly ConversationTurn[] {
    return this.conversation.getTurns();
  }

  clearConversation(): void {
    this.conversation.clear();
  }

  getDiagnostics(): ResilienceDiagnostics {
    return this.pipeline.getDiagnostics();
  }

  private recordTurn(message: string, result: CompletionResult, durationMs: number, cached: boolean): void {
    this.conversation.record({
      user: message,
      assistant: result.content,
      timestamp: Date.now(),
      durationMs,
      cached,
    });
    this.lastResponseStats = { model: result.model, durationMs, cached, usage: result.usage };

    this.logger.info('agent_response', {
      durationMs,
      cached,
      totalTokens: result.usage?.totalTokens,
    });
  }
}
