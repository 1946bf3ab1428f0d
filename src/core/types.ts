import { z } from 'zod';

export const PROVIDER_NAMES = ['together', 'openai', 'groq', 'deepseek', 'mistral', 'fireworks'] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export const AgentLayerConfigSchema = z.object({
  constitution: z.object({
    path: z.string().default('agentlayer/constitution.json'),
    reload: z.enum(['always', 'on-change']).default('always'),
  }).default({}),
  history: z.object({
    path: z.string().default('agentlayer/log.json'),
  }).default({}),
  provider: z.object({
    name: z.enum(PROVIDER_NAMES).default('together'),
    apiKey: z.string().optional(),
    baseUrl: z.string().url().optional(),
    model: z.string().optional(),
    maxTokens: z.number().int().min(1).default(512),
    temperature: z.number().min(0).max(2).default(0.7),
    topP: z.number().min(0).max(1).default(0.9),
    timeoutMs: z.number().int().min(1000).default(60_000),
    maxRetries: z.number().int().min(0).max(10).default(2),
  }).default({}),
  defaults: z.object({
    role: z.string().min(1).default('developer'),
  }).default({}),
  report: z.object({
    passThreshold: z.number().min(0).max(100).default(70),
  }).default({}),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    verbose: z.boolean().default(false),
  }).default({}),
});

export type AgentLayerConfig = z.infer<typeof AgentLayerConfigSchema>;

/** Partial overrides accepted by `ConfigManager.load` */
export type ConfigOverrides = {
  [K in keyof AgentLayerConfig]?: Partial<AgentLayerConfig[K]>;
};
