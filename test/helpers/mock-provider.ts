/**
 * Mock LLM Provider for Testing
 */

import type { LLMProvider, LLMRequest, LLMResponse } from '../../src/providers/types.js';

export class MockProvider implements LLMProvider {
  name = 'mock';
  defaultModel = 'mock-model';
  responses: LLMResponse[] = [];
  calls: LLMRequest[] = [];
  private responseIndex = 0;

  constructor(responses?: LLMResponse[]) {
    this.responses = responses ?? [createMockResponse('Mock response')];
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    this.calls.push(request);
    const response = this.responses[this.responseIndex % this.responses.length];
    this.responseIndex++;
    if (!response) {
      throw new Error('MockProvider has no responses');
    }
    return response;
  }
}

export function createMockResponse(content: string, model: string = 'mock-model'): LLMResponse {
  return {
    content,
    model,
    usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 },
    finishReason: 'stop',
  };
}
