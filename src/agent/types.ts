/**
 * Agent types
 */

export type MessageRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Result of one inference call. Stored in the response cache, so it must be
 * structured-cloneable.
 */
export interface CompletionResult {
  content: string;
  model: string;
  usage?: TokenUsage;
}

/**
 * Backend capable of completing a conversation
 */
export interface InferenceProvider {
  readonly name: string;
  readonly model: string;
  complete(messages: readonly ChatMessage[]): Promise<CompletionResult>;
}

export interface ConversationTurn {
  readonly user: string;
  readonly assistant: string;
  readonly timestamp: number;
  readonly durationMs: number;
  readonly cached: boolean;
}

export interface ResponseStats {
  readonly model: string;
  readonly durationMs: number;
  readonly cached: boolean;
  readonly usage?: TokenUsage;
}
