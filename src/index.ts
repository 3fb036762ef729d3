/**
 * Resilience layer for a local-LLM chat agent
 *
 * @example
 * ```typescript
 * import { createAgentFromConfig, loadConfig } from 'agent-resilience';
 *
 * const agent = createAgentFromConfig(loadConfig());
 * const reply = await agent.chat('Hello');
 * ```
 */

export * from './errors/index.js';
export * from './config/index.js';
export * from './observability/index.js';
export * from './cache/index.js';
export * from './resilience/index.js';
export * from './agent/index.js';
