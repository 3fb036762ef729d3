export * from './schema.js';
export { configFromEnv, loadConfig, AgentConfigBuilder, type Environment } from './config.js';
