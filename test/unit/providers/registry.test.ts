import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createProvider } from '../../../src/providers/registry.js';
import { AgentLayerConfigSchema } from '../../../src/core/types.js';

function providerConfig(overrides: Record<string, unknown> = {}) {
  return AgentLayerConfigSchema.parse({ provider: overrides }).provider;
}

describe('createProvider', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('should build the Together provider by default', () => {
    const provider = createProvider(providerConfig());
    expect(provider.name).toBe('together');
    expect(provider.defaultModel).toBe('deepseek-ai/DeepSeek-R1-Distill-Llama-70B-free');
  });

  it('should build the named provider', () => {
    const provider = createProvider(providerConfig({ name: 'groq' }));
    expect(provider.name).toBe('groq');
    expect(provider.defaultModel).toBe('llama-3.3-70b-versatile');
  });

  it('should apply a configured model', () => {
    const provider = createProvider(providerConfig({ name: 'openai', model: 'gpt-4o' }));
    expect(provider.defaultModel).toBe('gpt-4o');
  });

  it('should fail on first use when no key is configured', async () => {
    delete process.env.MISTRAL_API_KEY;
    const provider = createProvider(providerConfig({ name: 'mistral', maxRetries: 0 }));

    await expect(provider.complete({ messages: [{ role: 'user', content: 'hi' }] })).rejects.toThrow(
      'No API key for mistral: set MISTRAL_API_KEY or provider.apiKey',
    );
  });
});
