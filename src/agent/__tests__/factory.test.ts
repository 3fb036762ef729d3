import { describe, it, expect } from 'vitest';
import { createAgentFromConfig, createPipeline } from '../factory.js';
import { AgentConfigBuilder, loadConfig } from '../../config/index.js';
import { InMemoryLogger } from '../../observability/index.js';
import { chatResponseBody, completion, createMockProvider, jsonResponse, mockFetch } from '../../__mocks__/index.js';

describe('createAgentFromConfig', () => {
  it('should wire an Ollama-backed agent from configuration', async () => {
    const fetch = mockFetch().mockResolvedValueOnce(jsonResponse(chatResponseBody('Hi there')));
    const logger = new InMemoryLogger();
    const config = loadConfig({ OLLAMA_HOST: 'http://gpu-box:11434', CACHE_MAX_SIZE: '5' });

    const agent = createAgentFromConfig(config, { fetch, logger });

    await expect(agent.chat('Hello')).resolves.toBe('Hi there');
    await expect(agent.chat('Hello')).resolves.toBe('Hi there');

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(fetch.mock.calls[0]?.[0]).toBe('http://gpu-box:11434/api/chat');
    expect(agent.getCacheStats()).toMatchObject({ maxEntries: 5, hits: 1 });
    expect(agent.rateLimitEnabled).toBe(false);
  });

  it('should name the breaker after the provider', () => {
    const agent = createAgentFromConfig(loadConfig({}), {
      provider: createMockProvider(),
      logger: new InMemoryLogger(),
    });

    expect(agent.getDiagnostics().circuitBreaker?.name).toBe('mock');
  });

  it('should use an injected provider', async () => {
    const provider = createMockProvider();
    provider.complete.mockResolvedValueOnce(completion('from mock'));
    const agent = createAgentFromConfig(new AgentConfigBuilder().withCache({ enabled: false }).build(), {
      provider,
      logger: new InMemoryLogger(),
    });

    await expect(agent.chat('Hello')).resolves.toBe('from mock');
    expect(agent.cacheEnabled).toBe(false);
  });
});

describe('createPipeline', () => {
  it('should build fresh components for every call', () => {
    const config = new AgentConfigBuilder()
      .withCircuitBreaker({ threshold: 2 })
      .withRateLimiter({ enabled: true, requestsPerMinute: 30 })
      .build();
    const logger = new InMemoryLogger();

    const first = createPipeline(config, logger);
    const second = createPipeline(config, logger);

    expect(first.getCircuitBreaker()).not.toBe(second.getCircuitBreaker());
    expect(first.getCircuitBreaker()?.getConfig().threshold).toBe(2);
    expect(first.getRateLimiter()?.capacity).toBe(5);
    expect(first.getRateLimiter()?.enabled).toBe(true);
  });
});
