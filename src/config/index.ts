/**
 * Configuration Module
 *
 * Loads and validates environment variables for the classification
 * orchestrator. Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { homedir } from 'node:os';
import { join } from 'node:path';

const numberFromEnv = (schema: z.ZodNumber) =>
  z.preprocess((value) => (value === undefined || value === '' ? undefined : Number(value)), schema.optional());

// Environment schema with optional values and defaults
export const envSchema = z.object({
  // Judgment function providers (optional: the keyword judgment is used without them)
  GOOGLE_AI_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),

  // Data directory for request snapshots
  CLASSIFY_DATA_DIR: z.string().optional(),

  // Worker directory
  REGISTRY_MODE: z.enum(['static', 'dynamic']).default('static'),
  REGISTRY_URL: z.string().url().optional(),
  REGISTRY_FILE: z.string().optional(),

  // Orchestration overrides (defaults live in ./orchestration.ts)
  MIN_CONFIDENCE: numberFromEnv(z.number().min(0).max(1)),
  ROUTING_THRESHOLD: numberFromEnv(z.number().min(0).max(1)),
  MAX_REPLANS: numberFromEnv(z.number().int().positive()),
  WORKER_TIMEOUT_MS: numberFromEnv(z.number().int().positive()),
  JUDGMENT_TIMEOUT_MS: numberFromEnv(z.number().int().positive()),
  REGISTRY_TIMEOUT_MS: numberFromEnv(z.number().int().positive()),

  // Model overrides (defaults defined in ./models.ts)
  INTENT_MODEL: z.string().optional(),
  REFLECTION_MODEL: z.string().optional(),

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

type Env = z.infer<typeof envSchema>;

// Parse environment
const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment variables:');
  console.error(parseResult.error.format());
  process.exit(1);
}

const env: Env = parseResult.data;

if (env.REGISTRY_MODE === 'dynamic' && !env.REGISTRY_URL && env.NODE_ENV !== 'test') {
  console.warn('Warning: REGISTRY_MODE=dynamic requires REGISTRY_URL; worker lookups will fail.');
}

/**
 * Application configuration singleton
 */
export const config = {
  // Environment
  nodeEnv: env.NODE_ENV,
  isProduction: env.NODE_ENV === 'production',
  isDevelopment: env.NODE_ENV === 'development',
  isTest: env.NODE_ENV === 'test',

  // API Keys
  apiKeys: {
    googleAi: env.GOOGLE_AI_API_KEY,
    openai: env.OPENAI_API_KEY,
  },

  // Data directory
  dataDir: env.CLASSIFY_DATA_DIR ?? join(homedir(), '.classify'),

  registry: {
    mode: env.REGISTRY_MODE,
    url: env.REGISTRY_URL,
    file: env.REGISTRY_FILE,
  },

  orchestration: {
    minConfidence: env.MIN_CONFIDENCE,
    routingThreshold: env.ROUTING_THRESHOLD,
    maxReplans: env.MAX_REPLANS,
    workerTimeoutMs: env.WORKER_TIMEOUT_MS,
    judgmentTimeoutMs: env.JUDGMENT_TIMEOUT_MS,
    registryTimeoutMs: env.REGISTRY_TIMEOUT_MS,
  },

  // Model configuration overrides
  models: {
    intent: env.INTENT_MODEL,
    reflection: env.REFLECTION_MODEL,
  },
} as const;

/**
 * Check if a specific API is configured
 */
export function hasApiKey(api: keyof typeof config.apiKeys): boolean {
  return !!config.apiKeys[api];
}

/**
 * Get an API key or throw if not configured
 */
export function requireApiKey(api: keyof typeof config.apiKeys): string {
  const key = config.apiKeys[api];
  if (!key) {
    const envName = api === 'googleAi' ? 'GOOGLE_AI_API_KEY' : 'OPENAI_API_KEY';
    throw new Error(`Missing required API key: ${envName}. Please set it in your .env file.`);
  }
  return key;
}

// Re-export types
export type Config = typeof config;
export type ApiKeyName = keyof typeof config.apiKeys;

// Re-export orchestration defaults
export * from './orchestration.js';
