import { vi, type Mock } from 'vitest';
import type { FetchFn } from '../agent/ollama-provider.js';
import type { ChatMessage, CompletionResult, InferenceProvider } from '../agent/types.js';

export interface MockInferenceProvider extends InferenceProvider {
  complete: Mock<(messages: readonly ChatMessage[]) => Promise<CompletionResult>>;
}

export function createMockProvider(model: string = 'test-model'): MockInferenceProvider {
  return {
    name: 'mock',
    model,
    complete: vi.fn<(messages: readonly ChatMessage[]) => Promise<CompletionResult>>(),
  };
}

export function completion(content: string, model: string = 'test-model'): CompletionResult {
  return {
    content,
    model,
    usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
  };
}

export function mockFetch(): Mock<FetchFn> {
  return vi.fn<FetchFn>();
}

export function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function chatResponseBody(content: string, model: string = 'llama3.2'): Record<string, unknown> {
  return {
    model,
    created_at: '2024-01-01T00:00:00Z',
    message: { role: 'assistant', content },
    done: true,
    prompt_eval_count: 12,
    eval_count: 8,
  };
}
