/**
 * Model Configuration
 *
 * Defines LLM models, temperatures, and token budgets for each judgment
 * kind. Models can be overridden via environment variables.
 *
 * @module config/models
 */

import { z } from 'zod';

/**
 * Provider types
 */
export type ModelProvider = 'openai' | 'google';

/**
 * Model configuration for a specific judgment kind
 */
export interface ModelConfig {
  /** Model identifier */
  modelId: string;
  /** Provider (for routing API calls) */
  provider: ModelProvider;
  /** Temperature setting (0.0 - 1.0) */
  temperature: number;
  /** Maximum output tokens */
  maxOutputTokens: number;
  /** Environment variable for override */
  envOverride?: string;
}

/**
 * Judgment kinds that use LLM models
 */
export type JudgmentKind = 'intent' | 'reflection';


/**
 * Default model configurations per judgment kind
 */
const DEFAULT_MODELS: Record<JudgmentKind, ModelConfig> = {
  intent: {
    modelId: 'gemini-2.0-flash',
    provider: 'google',
    temperature: 0.1,
    maxOutputTokens: 512,
    envOverride: 'INTENT_MODEL',
  },
  reflection: {
    modelId: 'gemini-2.0-flash',
    provider: 'google',
    temperature: 0.2,
    maxOutputTokens: 768,
    envOverride: 'REFLECTION_MODEL',
  },
};

/**
 * Determine provider from model ID
 */
export function getProviderFromModelId(modelId: string): ModelProvider {
  if (modelId.startsWith('gpt-') || /^o\d/.test(modelId)) {
    return 'openai';
  }
  // Gemini and unknown models go to Google
  return 'google';
}

/**
 * Get model configuration for a judgment kind, applying any environment overrides
 */
export function getModelConfig(kind: JudgmentKind): ModelConfig {
  const defaultConfig = DEFAULT_MODELS[kind];

  if (defaultConfig.envOverride) {
    const override = process.env[defaultConfig.envOverride];
    if (override) {
      return {
        ...defaultConfig,
        modelId: override,
        provider: getProviderFromModelId(override),
      };
    }
  }

  return defaultConfig;
}

/**
 * Get all model configurations (with any overrides applied)
 */
export function getAllModelConfigs(): Record<JudgmentKind, ModelConfig> {
  return {
    intent: getModelConfig('intent'),
    reflection: getModelConfig('reflection'),
  };
}

/**
 * Model config schema for validation
 */
export const modelConfigSchema = z.object({
  modelId: z.string(),
  provider: z.enum(['openai', 'google']),
  temperature: z.number().min(0).max(2),
  maxOutputTokens: z.number().positive(),
  envOverride: z.string().optional(),
});

/**
 * Validate a model config object
 */
export function validateModelConfig(config: unknown): ModelConfig {
  return modelConfigSchema.parse(config);
}
