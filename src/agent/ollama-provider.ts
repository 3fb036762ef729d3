/**
 * Ollama chat provider
 *
 * Non-streaming client for `POST /api/chat` that maps every failure onto the
 * transient/permanent taxonomy the retry executor understands.
 */

import { z } from 'zod';
import { parseConfig, providerConfigSchema, type ProviderConfig, type ProviderConfigInput } from '../config/schema.js';
import {
  PermanentFailureError,
  RETRIABLE_STATUS_CODES,
  ResilienceError,
  TransientFailureError,
} from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import type { ChatMessage, CompletionResult, InferenceProvider } from './types.js';

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface OllamaProviderOptions {
  fetch?: FetchFn;
  logger?: Logger;
}

const chatResponseSchema = z.object({
  model: z.string(),
  message: z.object({
    role: z.string(),
    content: z.string(),
  }),
  done: z.boolean().optional(),
  prompt_eval_count: z.number().int().nonnegative().optional(),
  eval_count: z.number().int().nonnegative().optional(),
});

const errorBodySchema = z.object({ error: z.string() });

export class OllamaProvider implements InferenceProvider {
  readonly name = 'ollama';
  private readonly config: ProviderConfig;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(config: ProviderConfigInput = {}, options: OllamaProviderOptions = {}) {
    this.config = parseConfig(providerConfigSchema, config, 'provider');
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = (options.logger ?? new NoopLogger()).child({ provider: this.name });
  }

  get model(): string {
    return this.config.model;
  }

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  /**
   * Send a conversation and return the assistant's reply
   * @throws TransientFailureError for network failures, timeouts and 429/502/503/504
   * @throws PermanentFailureError for any other HTTP error or an unreadable body
   */
  async complete(messages: readonly ChatMessage[]): Promise<CompletionResult> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/api/chat`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const response = await this.fetchFn(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: this.config.model, messages, stream: false }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw await this.errorFromResponse(response);
      }

      return this.parseBody(await this.readJson(response));
    } catch (error) {
      if (error instanceof ResilienceError) {
        throw error;
      }
      throw this.mapFetchError(error, controller.signal);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Only a body that arrived whole but fails to parse is permanent; a read cut
   * short by the timeout or the connection propagates to mapFetchError
   */
  private async readJson(response: Response): Promise<unknown> {
    try {
      return await response.json();
    } catch (error) {
      if (!(error instanceof SyntaxError)) {
        throw error;
      }
      throw new PermanentFailureError('Ollama returned a response that is not valid JSON', {
        status: response.status,
        cause: error,
      });
    }
  }

  private parseBody(body: unknown): CompletionResult {
    const parsed = chatResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new PermanentFailureError('Ollama returned an unexpected response body', {
        details: { issues: parsed.error.issues.map((issue) => issue.message) },
      });
    }

    const { model, message, prompt_eval_count, eval_count } = parsed.data;
    const result: CompletionResult = { content: message.content, model };
    if (prompt_eval_count !== undefined || eval_count !== undefined) {
      const promptTokens = prompt_eval_count ?? 0;
      const completionTokens = eval_count ?? 0;
      result.usage = { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens };
    }
    return result;
  }

  private async errorFromResponse(response: Response): Promise<ResilienceError> {
    const status = response.status;
    let message = `HTTP ${status} error`;

    const text = await response.text().catch(() => '');
    if (text) {
      try {
        const body = errorBodySchema.safeParse(JSON.parse(text));
        message = body.success ? body.data.error : text;
      } catch {
        message = text;
      }
    }

    this.logger.warn('provider_http_error', { status, error: message });

    return RETRIABLE_STATUS_CODES.has(status)
      ? new TransientFailureError(message, { status })
      : new PermanentFailureError(message, { status });
  }

  private mapFetchError(error: unknown, signal: AbortSignal): ResilienceError {
    if (signal.aborted || (error instanceof Error && error.name === 'AbortError')) {
      return new TransientFailureError(`Request timed out after ${this.config.timeoutMs}ms`, {
        cause: error,
      });
    }

    const reason = error instanceof Error ? error.message : String(error);
    this.logger.warn('provider_connection_error', { baseUrl: this.config.baseUrl, error: reason });
    return new TransientFailureError(`Cannot connect to Ollama at ${this.config.baseUrl}: ${reason}`, {
      cause: error,
    });
  }
}
