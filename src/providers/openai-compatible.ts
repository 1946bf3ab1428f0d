/**
 * OpenAI-Compatible Provider — one class for every OpenAI-compatible chat API.
 *
 * Together, OpenAI, Groq, DeepSeek, Mistral and Fireworks all expose the same
 * `/chat/completions` endpoint; instances differ only by base URL, key
 * variable and default model.
 */

import OpenAI from 'openai';
import { BaseLLMProvider } from './base.js';
import { ProviderError, toError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { LLMMessage, LLMRequest, LLMResponse, ProviderConfig } from './types.js';

export interface OpenAICompatibleConfig {
  /** Provider name (e.g. 'together', 'groq') */
  name: string;
  /** Base URL for the OpenAI-compatible API */
  baseUrl: string;
  /** Environment variable name for the API key */
  apiKeyEnvVar: string;
  defaultModel: string;
}

export class OpenAICompatibleProvider extends BaseLLMProvider {
  readonly name: string;
  readonly defaultModel: string;

  private providerConfig: OpenAICompatibleConfig;
  private client: OpenAI | null = null;

  constructor(providerConfig: OpenAICompatibleConfig, config: ProviderConfig = {}, logger?: Logger) {
    super(config, logger);
    this.name = providerConfig.name;
    this.defaultModel = config.defaultModel || providerConfig.defaultModel;
    this.providerConfig = providerConfig;
  }

  private resolveApiKey(): string | undefined {
    return this.config.apiKey || process.env[this.providerConfig.apiKeyEnvVar] || undefined;
  }

  private getClient(): OpenAI {
    if (!this.client) {
      const apiKey = this.resolveApiKey();
      if (!apiKey) {
        throw new ProviderError(
          `No API key for ${this.name}: set ${this.providerConfig.apiKeyEnvVar} or provider.apiKey`,
          this.name,
        );
      }
      this.client = new OpenAI({
        apiKey,
        baseURL: this.config.baseUrl || this.providerConfig.baseUrl,
        timeout: this.config.timeout,
        // Retries are handled by BaseLLMProvider
        maxRetries: 0,
      });
    }
    return this.client;
  }

  protected async _complete(request: LLMRequest): Promise<LLMResponse> {
    const client = this.getClient();
    const model = request.model || this.defaultModel;

    let response: OpenAI.ChatCompletion;
    try {
      response = await client.chat.completions.create({
        model,
        messages: request.messages.map(toChatMessage),
        max_tokens: request.maxTokens ?? 512,
        ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
        ...(request.topP !== undefined ? { top_p: request.topP } : {}),
      });
    } catch (err) {
      if (err instanceof OpenAI.APIError) {
        const status = err.status ?? 'no status';
        throw new ProviderError(`${this.name} request failed (${status}): ${err.message}`, this.name, err);
      }
      throw new ProviderError(`${this.name} request failed: ${toError(err).message}`, this.name, toError(err));
    }

    const choice = response.choices[0];
    if (!choice) {
      throw new ProviderError(`${this.name} returned no choices for model ${model}`, this.name);
    }

    return {
      content: choice.message.content ?? '',
      model: response.model || model,
      usage: {
        inputTokens: response.usage?.prompt_tokens || 0,
        outputTokens: response.usage?.completion_tokens || 0,
        totalTokens: response.usage?.total_tokens || 0,
      },
      finishReason: choice.finish_reason === 'length' ? 'length' : 'stop',
    };
  }
}

function toChatMessage(message: LLMMessage): OpenAI.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}
