import { describe, it, expect } from 'vitest';
import { LLMTextGenerator, samplingFromConfig } from '../../../src/providers/generator.js';
import { AgentLayerConfigSchema } from '../../../src/core/types.js';
import { ProviderError } from '../../../src/core/errors.js';
import { MockProvider, createMockResponse } from '../../helpers/mock-provider.js';

describe('LLMTextGenerator', () => {
  it('should send the prompt as a single user message with default sampling', async () => {
    const provider = new MockProvider();
    const generator = new LLMTextGenerator(provider);

    const result = await generator.generate({ prompt: 'Write a haiku' });

    expect(result).toEqual({ text: 'Mock response', model: 'mock-model' });
    expect(provider.calls).toEqual([
      {
        messages: [{ role: 'user', content: 'Write a haiku' }],
        model: undefined,
        maxTokens: 512,
        temperature: 0.7,
        topP: 0.9,
      },
    ]);
  });

  it('should pass the requested model through and report the served model', async () => {
    const provider = new MockProvider([createMockResponse('Done', 'served-model')]);
    const generator = new LLMTextGenerator(provider, { temperature: 0.2 });

    const result = await generator.generate({ prompt: 'Go', model: 'asked-model' });

    expect(result.model).toBe('served-model');
    expect(provider.calls[0]).toMatchObject({ model: 'asked-model', temperature: 0.2, maxTokens: 512 });
  });

  it('should reject a blank prompt without calling the provider', async () => {
    const provider = new MockProvider();
    const generator = new LLMTextGenerator(provider);

    await expect(generator.generate({ prompt: '   ' })).rejects.toBeInstanceOf(ProviderError);
    expect(provider.calls).toHaveLength(0);
  });
});

describe('samplingFromConfig', () => {
  it('should read sampling from the provider section', () => {
    const config = AgentLayerConfigSchema.parse({ provider: { maxTokens: 256, topP: 0.5 } });
    expect(samplingFromConfig(config.provider)).toEqual({ maxTokens: 256, temperature: 0.7, topP: 0.5 });
  });
});
