/**
 * AgentLayer — constitution checks for LLM agent runs
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { ConfigManager, createRuntime, getLogger, runPipeline } from 'agentlayer';
 *
 * const config = new ConfigManager().load();
 * const runtime = createRuntime(config, getLogger());
 * const { record } = await runPipeline({ input: 'Summarize the release notes' }, runtime);
 * console.log(record.score, record.violations);
 * ```
 */

// Core
export { ConfigManager, PROJECT_CONFIG_FILE, PROVIDER_KEY_ENV, type ConfigManagerOptions } from './core/config.js';
export { createLogger, getLogger, setLogger, type Logger, type LoggerOptions } from './core/logger.js';
export {
  AgentLayerError,
  ConfigError,
  MalformedRuleSetError,
  ProviderError,
  HistoryStoreError,
  InvalidRequestError,
} from './core/errors.js';
export { AsyncMutex } from './core/mutex.js';
export { AgentLayerConfigSchema, PROVIDER_NAMES, type AgentLayerConfig, type ConfigOverrides, type ProviderName } from './core/types.js';

// Constitution
export * from './constitution/index.js';

// History
export * from './history/index.js';

// Providers
export { OpenAICompatibleProvider, type OpenAICompatibleConfig } from './providers/openai-compatible.js';
export { PROVIDER_CONFIGS } from './providers/provider-configs.js';
export { createProvider } from './providers/registry.js';
export {
  LLMTextGenerator,
  DEFAULT_SAMPLING,
  type TextGenerator,
  type GenerationRequest,
  type GenerationResult,
  type SamplingOptions,
} from './providers/generator.js';
export type { LLMProvider, LLMRequest, LLMResponse, LLMMessage, ProviderConfig } from './providers/types.js';

// Pipeline
export * from './pipeline/index.js';

// Version
export { VERSION, NAME } from './version.js';
