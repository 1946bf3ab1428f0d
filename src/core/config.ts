import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'fs';
import { join, isAbsolute, resolve } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { AgentLayerConfigSchema, type AgentLayerConfig, type ConfigOverrides, type ProviderName } from './types.js';
import { ConfigError, toError } from './errors.js';

export const PROJECT_CONFIG_FILE = '.agentlayer.yaml';

/** Environment variable holding the API key of each provider */
export const PROVIDER_KEY_ENV: Record<ProviderName, string> = {
  together: 'TOGETHER_API_KEY',
  openai: 'OPENAI_API_KEY',
  groq: 'GROQ_API_KEY',
  deepseek: 'DEEPSEEK_API_KEY',
  mistral: 'MISTRAL_API_KEY',
  fireworks: 'FIREWORKS_API_KEY',
};

export interface ConfigManagerOptions {
  projectDir?: string;
  /** Overrides `~/.agentlayer`; tests point this at a temp dir */
  globalDir?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private config: AgentLayerConfig | null = null;
  private globalDir: string;
  private projectDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(options: ConfigManagerOptions = {}) {
    this.globalDir = options.globalDir ?? join(homedir(), '.agentlayer');
    this.projectDir = resolve(options.projectDir ?? process.cwd());
    this.env = options.env ?? process.env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   *
   * File paths in the result are absolute, resolved against the project directory.
   */
  load(overrides?: ConfigOverrides): AgentLayerConfig {
    let raw: Record<string, unknown> = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, PROJECT_CONFIG_FILE), 'project'));
    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, stripUndefined(overrides));
    }

    const parsed = AgentLayerConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${issues}`, parsed.error);
    }

    const config = parsed.data;
    config.constitution.path = this.resolvePath(config.constitution.path);
    config.history.path = this.resolvePath(config.history.path);

    this.config = config;
    return config;
  }

  get(): AgentLayerConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  /**
   * Write a starter `.agentlayer.yaml` into the project directory.
   * Returns false when one already exists.
   */
  createDefaultConfig(): boolean {
    const configPath = join(this.projectDir, PROJECT_CONFIG_FILE);
    if (existsSync(configPath)) {
      return false;
    }
    mkdirSync(this.projectDir, { recursive: true });
    const defaultConfig = `# AgentLayer project configuration
# API keys are read from the environment (TOGETHER_API_KEY, OPENAI_API_KEY, ...)
constitution:
  path: agentlayer/constitution.json
  reload: always

history:
  path: agentlayer/log.json

provider:
  name: together
  model: deepseek-ai/DeepSeek-R1-Distill-Llama-70B-free
  maxTokens: 512
  temperature: 0.7

defaults:
  role: developer

report:
  passThreshold: 70
`;
    writeFileSync(configPath, defaultConfig, 'utf-8');
    return true;
  }

  private readYaml(path: string, label: string): Record<string, unknown> {
    if (!existsSync(path)) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${path}`, toError(err));
    }
    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Expected a mapping at the top of ${label} config ${path}`);
    }
    return parsed;
  }

  private applyEnvVars(raw: Record<string, unknown>): Record<string, unknown> {
    const env = this.env;
    const provider = isRecord(raw.provider) ? { ...raw.provider } : {};
    const constitution = isRecord(raw.constitution) ? { ...raw.constitution } : {};
    const history = isRecord(raw.history) ? { ...raw.history } : {};
    const logging = isRecord(raw.logging) ? { ...raw.logging } : {};

    if (env.AGENTLAYER_PROVIDER) {
      provider.name = env.AGENTLAYER_PROVIDER;
    }
    if (env.AGENTLAYER_MODEL) {
      provider.model = env.AGENTLAYER_MODEL;
    }
    const providerName = typeof provider.name === 'string' ? provider.name : 'together';
    const keyVar = isProviderName(providerName) ? PROVIDER_KEY_ENV[providerName] : undefined;
    if (keyVar && env[keyVar] && provider.apiKey === undefined) {
      provider.apiKey = env[keyVar];
    }

    if (env.AGENTLAYER_CONSTITUTION) {
      constitution.path = env.AGENTLAYER_CONSTITUTION;
    }
    if (env.AGENTLAYER_HISTORY) {
      history.path = env.AGENTLAYER_HISTORY;
    }
    if (env.AGENTLAYER_LOG_LEVEL) {
      logging.level = env.AGENTLAYER_LOG_LEVEL;
    }

    return { ...raw, provider, constitution, history, logging };
  }

  private resolvePath(path: string): string {
    return isAbsolute(path) ? path : resolve(this.projectDir, path);
  }

  private deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const incoming = source[key];
      const existing = target[key];
      if (isRecord(incoming) && isRecord(existing)) {
        result[key] = this.deepMerge(existing, incoming);
      } else {
        result[key] = incoming;
      }
    }
    return result;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isProviderName(value: string): value is ProviderName {
  return Object.prototype.hasOwnProperty.call(PROVIDER_KEY_ENV, value);
}

function stripUndefined(overrides: ConfigOverrides): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [section, values] of Object.entries(overrides)) {
    if (!isRecord(values)) continue;
    const kept: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) kept[key] = value;
    }
    result[section] = kept;
  }
  return result;
}
