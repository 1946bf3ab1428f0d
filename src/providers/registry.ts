import type { AgentLayerConfig } from '../core/types.js';
import type { Logger } from '../core/logger.js';
import { getLogger } from '../core/logger.js';
import { OpenAICompatibleProvider } from './openai-compatible.js';
import { PROVIDER_CONFIGS } from './provider-configs.js';
import type { LLMProvider } from './types.js';

/**
 * Build the provider named in `config.provider`.
 * Construction never touches the network; a missing key surfaces on first use.
 */
export function createProvider(config: AgentLayerConfig['provider'], logger: Logger = getLogger()): LLMProvider {
  const endpoint = PROVIDER_CONFIGS[config.name];
  logger.debug({ provider: config.name, baseUrl: config.baseUrl ?? endpoint.baseUrl }, 'Provider created');
  return new OpenAICompatibleProvider(
    endpoint,
    {
      apiKey: config.apiKey,
      baseUrl: config.baseUrl,
      defaultModel: config.model,
      maxRetries: config.maxRetries,
      timeout: config.timeoutMs,
    },
    logger,
  );
}
