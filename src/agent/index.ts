export { ChatAgent, translateError, chunkText, STREAM_CHUNK_SIZE, type ChatAgentOptions, type ChatOptions } from './chat-agent.js';
export { Conversation } from './conversation.js';
export { OllamaProvider, type FetchFn, type OllamaProviderOptions } from './ollama-provider.js';
export { createAgentFromConfig, createPipeline, type AgentFactoryOptions } from './factory.js';
export type {
  MessageRole,
  ChatMessage,
  TokenUsage,
  CompletionResult,
  InferenceProvider,
  ConversationTurn,
  ResponseStats,
} from './types.js';
