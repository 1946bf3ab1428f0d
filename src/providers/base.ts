import type { LLMProvider, LLMRequest, LLMResponse, ProviderConfig } from './types.js';
import type { Logger } from '../core/logger.js';
import { getLogger } from '../core/logger.js';
import { ProviderError, toError } from '../core/errors.js';
import { retry } from '../utils/retry.js';

/** Substrings of error messages worth another attempt */
export const RETRYABLE_ERRORS = ['rate_limit', 'overloaded', 'timed out', 'timeout', '429', '500', '502', '503', '529'];

export abstract class BaseLLMProvider implements LLMProvider {
  abstract readonly name: string;
  abstract readonly defaultModel: string;

  protected logger: Logger;
  protected config: ProviderConfig;

  constructor(config: ProviderConfig = {}, logger?: Logger) {
    this.config = {
      maxRetries: 2,
      timeout: 60_000,
      ...config,
    };
    this.logger = logger ?? getLogger();
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    const model = request.model || this.config.defaultModel || this.defaultModel;
    this.logger.debug({ provider: this.name, model }, 'LLM request');

    try {
      return await retry(
        () => this._complete({ ...request, model }),
        {
          maxRetries: this.config.maxRetries ?? 2,
          baseDelay: 1000,
          retryableErrors: RETRYABLE_ERRORS,
          onRetry: (attempt, error) => {
            this.logger.warn({ provider: this.name, attempt, error: error.message }, 'Retrying LLM call');
          },
        },
      );
    } catch (err) {
      if (err instanceof ProviderError) throw err;
      throw new ProviderError(`Unexpected error during ${this.name} generation: ${toError(err).message}`, this.name, toError(err));
    }
  }

  protected abstract _complete(request: LLMRequest): Promise<LLMResponse>;
}
