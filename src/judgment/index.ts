/**
 * Judgment Module
 *
 * @module judgment
 */

import { hasApiKey } from '../config/index.js';
import { getAllModelConfigs } from '../config/models.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { KeywordJudgment } from './keyword-judgment.js';
import { LlmJudgment, type LlmJudgmentOptions } from './llm-judgment.js';
import type { JudgmentFunction } from './types.js';

/**
 * Pick the LLM judgment when every configured model has its provider key,
 * otherwise the offline keyword judgment.
 */
export function createJudgment(options: LlmJudgmentOptions & { logger?: Logger } = {}): JudgmentFunction {
  const logger = options.logger ?? silentLogger;
  const providers = Object.values(getAllModelConfigs()).map((model) => model.provider);
  const missing = providers.filter((provider) => !hasApiKey(provider === 'google' ? 'googleAi' : 'openai'));

  if (missing.length > 0) {
    logger.debug(`No API key for ${[...new Set(missing)].join(', ')}; using keyword judgment`);
    return new KeywordJudgment();
  }

  return new LlmJudgment(options);
}

export { KeywordJudgment, classifyByKeywords, reflectByRules } from './keyword-judgment.js';
export { LlmJudgment, type LlmJudgmentOptions } from './llm-judgment.js';
export { MalformedJudgmentError, JudgmentApiError } from './errors.js';
export {
  callModel,
  callConfigWithinBudget,
  extractJson,
  isRetryableError,
  withRetry,
  type LLMCallConfig,
  type LLMCallResult,
  type ModelCaller,
} from './llm-client.js';
export { buildIntentPrompt, buildReflectionPrompt } from './prompts.js';
export {
  IntentJudgmentSchema,
  ReflectionJudgmentSchema,
  type IntentJudgment,
  type ReflectionJudgment,
} from './schemas.js';
export type {
  JudgmentFunction,
  JudgmentInput,
  JudgmentKind,
  IntentJudgmentInput,
  ReflectionJudgmentInput,
} from './types.js';
