/**
 * Text Generation — the pipeline's view of a language model.
 */

import type { AgentLayerConfig } from '../core/types.js';
import type { Logger } from '../core/logger.js';
import { getLogger } from '../core/logger.js';
import { ProviderError } from '../core/errors.js';
import type { LLMProvider } from './types.js';

export interface GenerationRequest {
  prompt: string;
  /** Falls back to the provider's configured model */
  model?: string;
}

export interface GenerationResult {
  text: string;
  /** Model that actually served the request */
  model: string;
}

export interface TextGenerator {
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

export interface SamplingOptions {
  maxTokens: number;
  temperature: number;
  topP: number;
}

export const DEFAULT_SAMPLING: SamplingOptions = {
  maxTokens: 512,
  temperature: 0.7,
  topP: 0.9,
};

/** Single-turn generation: the prompt is sent as one user message */
export class LLMTextGenerator implements TextGenerator {
  private readonly provider: LLMProvider;
  private readonly sampling: SamplingOptions;
  private readonly logger: Logger;

  constructor(provider: LLMProvider, sampling: Partial<SamplingOptions> = {}, logger?: Logger) {
    this.provider = provider;
    this.sampling = { ...DEFAULT_SAMPLING, ...sampling };
    this.logger = logger ?? getLogger();
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    if (request.prompt.trim() === '') {
      throw new ProviderError('Prompt must not be empty', this.provider.name);
    }

    const start = Date.now();
    const response = await this.provider.complete({
      messages: [{ role: 'user', content: request.prompt }],
      model: request.model,
      maxTokens: this.sampling.maxTokens,
      temperature: this.sampling.temperature,
      topP: this.sampling.topP,
    });

    this.logger.debug(
      {
        provider: this.provider.name,
        model: response.model,
        outputTokens: response.usage.outputTokens,
        durationMs: Date.now() - start,
      },
      'Generation complete',
    );

    return { text: response.content, model: response.model };
  }
}

export function samplingFromConfig(config: AgentLayerConfig['provider']): SamplingOptions {
  return {
    maxTokens: config.maxTokens,
    temperature: config.temperature,
    topP: config.topP,
  };
}
