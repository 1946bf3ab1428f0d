import { join, resolve } from 'path';
import { ConfigManager } from '../core/config.js';
import { createLogger, setLogger, type Logger } from '../core/logger.js';
import type { AgentLayerConfig, ConfigOverrides } from '../core/types.js';

/** Options registered on the root program, seen by every command */
export type GlobalOptions = {
  dir: string;
  verbose?: boolean;
}

export interface CommandContext {
  projectDir: string;
  configManager: ConfigManager;
  config: AgentLayerConfig;
  logger: Logger;
}

export interface CommandDeps {
  /** Replaces the file or pretty logger built from configuration */
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  /** Overrides `~/.agentlayer` */
  globalDir?: string;
}

export function loadCommandContext(
  globals: GlobalOptions,
  overrides: ConfigOverrides = {},
  deps: CommandDeps = {},
): CommandContext {
  const projectDir = resolve(globals.dir);
  const configManager = new ConfigManager({ projectDir, env: deps.env, globalDir: deps.globalDir });
  const config = configManager.load(overrides);

  const logger = deps.logger ?? createLogger('agentlayer', {
    level: config.logging.level,
    verbose: globals.verbose || config.logging.verbose,
    logDir: join(projectDir, '.agentlayer', 'logs'),
  });
  setLogger(logger);

  return { projectDir, configManager, config, logger };
}
