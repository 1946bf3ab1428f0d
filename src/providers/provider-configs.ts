/**
 * Provider Configurations — static endpoints for the supported chat APIs.
 */

import type { ProviderName } from '../core/types.js';
import type { OpenAICompatibleConfig } from './openai-compatible.js';

export const TOGETHER_CONFIG: OpenAICompatibleConfig = {
  name: 'together',
  baseUrl: 'https://api.together.xyz/v1',
  apiKeyEnvVar: 'TOGETHER_API_KEY',
  defaultModel: 'deepseek-ai/DeepSeek-R1-Distill-Llama-70B-free',
};

export const OPENAI_CONFIG: OpenAICompatibleConfig = {
  name: 'openai',
  baseUrl: 'https://api.openai.com/v1',
  apiKeyEnvVar: 'OPENAI_API_KEY',
  defaultModel: 'gpt-4o-mini',
};

export const GROQ_CONFIG: OpenAICompatibleConfig = {
  name: 'groq',
  baseUrl: 'https://api.groq.com/openai/v1',
  apiKeyEnvVar: 'GROQ_API_KEY',
  defaultModel: 'llama-3.3-70b-versatile',
};

export const DEEPSEEK_CONFIG: OpenAICompatibleConfig = {
  name: 'deepseek',
  baseUrl: 'https://api.deepseek.com/v1',
  apiKeyEnvVar: 'DEEPSEEK_API_KEY',
  defaultModel: 'deepseek-chat',
};

export const MISTRAL_CONFIG: OpenAICompatibleConfig = {
  name: 'mistral',
  baseUrl: 'https://api.mistral.ai/v1',
  apiKeyEnvVar: 'MISTRAL_API_KEY',
  defaultModel: 'mistral-small-latest',
};

export const FIREWORKS_CONFIG: OpenAICompatibleConfig = {
  name: 'fireworks',
  baseUrl: 'https://api.fireworks.ai/inference/v1',
  apiKeyEnvVar: 'FIREWORKS_API_KEY',
  defaultModel: 'accounts/fireworks/models/llama-v3p1-70b-instruct',
};

export const PROVIDER_CONFIGS: Record<ProviderName, OpenAICompatibleConfig> = {
  together: TOGETHER_CONFIG,
  openai: OPENAI_CONFIG,
  groq: GROQ_CONFIG,
  deepseek: DEEPSEEK_CONFIG,
  mistral: MISTRAL_CONFIG,
  fireworks: FIREWORKS_CONFIG,
};
