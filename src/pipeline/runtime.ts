import type { AgentLayerConfig } from '../core/types.js';
import type { Logger } from '../core/logger.js';
import { RuleStore } from '../constitution/rule-store.js';
import { JsonHistoryStore } from '../history/json-store.js';
import type { HistoryStore } from '../history/types.js';
import { createProvider } from '../providers/registry.js';
import { LLMTextGenerator, samplingFromConfig } from '../providers/generator.js';
import type { PipelineContext } from './types.js';

export interface Runtime extends PipelineContext {
  config: AgentLayerConfig;
  rules: RuleStore;
  history: HistoryStore;
}

/**
 * Build every collaborator once, from loaded configuration.
 * Nothing here performs I/O; files and the network are touched on first use.
 */
export function createRuntime(config: AgentLayerConfig, logger: Logger): Runtime {
  const provider = createProvider(config.provider, logger);

  return {
    config,
    logger,
    generator: new LLMTextGenerator(provider, samplingFromConfig(config.provider), logger),
    rules: new RuleStore(config.constitution.path, { reload: config.constitution.reload, logger }),
    history: new JsonHistoryStore(config.history.path, { logger }),
    defaultRole: config.defaults.role,
    defaultModel: config.provider.model,
  };
}
