/**
 * LLM Client
 *
 * Single entry point for the judgment function's model calls. Routes to
 * Google Generative AI or OpenAI according to the model config and
 * wraps both with timeout, exponential backoff retry and JSON extraction.
 *
 * @module judgment/llm-client
 */

import { GoogleGenerativeAI } from '@google/generative-ai';
import OpenAI from 'openai';
import { requireApiKey } from '../config/index.js';
import { getModelConfig, type JudgmentKind, type ModelConfig } from '../config/models.js';
import { withTimeout, sleep, TimeoutError } from '../utils/timeout.js';
import { JudgmentApiError } from './errors.js';

/**
 * Configuration for LLM calls
 */
export interface LLMCallConfig {
  /** Timeout per attempt in milliseconds (default: 15000) */
  timeoutMs?: number;
  /** Maximum retry attempts (default: 2) */
  maxRetries?: number;
  /** Base delay in milliseconds for exponential backoff (default: 1000) */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds for exponential backoff (default: 8000) */
  maxDelayMs?: number;
}

const DEFAULT_CONFIG: Required<LLMCallConfig> = {
  timeoutMs: 15000,
  maxRetries: 2,
  baseDelayMs: 1000,
  maxDelayMs: 8000,
};

/**
 * Result from an LLM call
 */
export interface LLMCallResult {
  /** Raw text response from the model */
  text: string;
  /** Model ID that was used */
  modelId: string;
}

/**
 * Signature shared by every provider call, so judgments can be tested
 * with a scripted caller.
 */
export type ModelCaller = (
  prompt: string,
  kind: JudgmentKind,
  config?: LLMCallConfig
) => Promise<LLMCallResult>;

// ============================================================================
// Retry Helpers
// ============================================================================

/**
 * Calculate exponential backoff delay with jitter
 *
 * @param attempt - Current attempt number (0-indexed)
 */
export function calculateDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponential = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt));
  const jitter = Math.random() * 0.3 * exponential;
  return exponential + jitter;
}

/** Below this, an attempt is too short to be worth retrying */
const MIN_ATTEMPT_MS = 250;

/**
 * Upper bound of calculateDelay for one attempt (30% jitter included).
 */
function maxDelayFor(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.ceil((Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt)) * 13) / 10);
}

/**
 * Call config whose attempts, timeouts and backoff delays together fit in
 * `budgetMs`, the bound the caller puts on the whole judgment call.
 * Falls back to a single attempt over the full budget when splitting it
 * would leave attempts shorter than MIN_ATTEMPT_MS.
 */
export function callConfigWithinBudget(budgetMs: number): Required<LLMCallConfig> {
  const maxRetries = DEFAULT_CONFIG.maxRetries;
  const baseDelayMs = Math.min(DEFAULT_CONFIG.baseDelayMs, Math.floor(budgetMs / 20));
  const maxDelayMs = DEFAULT_CONFIG.maxDelayMs;

  let delayBudget = 0;
  for (let attempt = 0; attempt < maxRetries; attempt++) {
    delayBudget += maxDelayFor(attempt, baseDelayMs, maxDelayMs);
  }
  const timeoutMs = Math.floor((budgetMs - delayBudget) / (maxRetries + 1));

  if (timeoutMs < MIN_ATTEMPT_MS) {
    return { timeoutMs: budgetMs, maxRetries: 0, baseDelayMs, maxDelayMs };
  }
  return { timeoutMs, maxRetries, baseDelayMs, maxDelayMs };
}

/**
 * Determine if an error is retryable
 *
 * Retryable errors include rate limits, timeouts, network errors and
 * server errors (5xx).
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof JudgmentApiError) {
    return error.isRetryable;
  }
  if (error instanceof TimeoutError) {
    return true;
  }
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('rate limit') ||
      message.includes('429') ||
      message.includes('timeout') ||
      message.includes('network') ||
      message.includes('econnreset') ||
      message.includes('503') ||
      message.includes('500') ||
      message.includes('502') ||
      message.includes('504')
    );
  }
  return false;
}

/**
 * Execute a function with retry logic
 *
 * @throws Last error if all retries exhausted
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: Pick<Required<LLMCallConfig>, 'maxRetries' | 'baseDelayMs' | 'maxDelayMs'>
): Promise<T> {
  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!isRetryableError(error) || attempt >= config.maxRetries) {
        break;
      }

      await sleep(calculateDelay(attempt, config.baseDelayMs, config.maxDelayMs));
    }
  }

  throw lastError ?? new Error('Unknown error during LLM call');
}

/**
 * Extract JSON from LLM response text
 *
 * Handles a raw JSON object, JSON wrapped in markdown code blocks
 * (```json ... ```), and JSON embedded in prose.
 *
 * @throws Error if JSON cannot be extracted or parsed
 */
export function extractJson(text: string): unknown {
  let cleanText = text.trim();

  const codeBlockMatch = cleanText.match(/```(?:json)?\s*\n?([\s\S]*?)\n?```/);
  if (codeBlockMatch) {
    cleanText = codeBlockMatch[1].trim();
  }

  if (!cleanText.startsWith('{') && !cleanText.startsWith('[')) {
    const jsonMatch = cleanText.match(/(\{[\s\S]*\}|\[[\s\S]*\])/);
    if (jsonMatch) {
      cleanText = jsonMatch[1];
    }
  }

  try {
    const parsed: unknown = JSON.parse(cleanText);
    return parsed;
  } catch {
    throw new Error(`Failed to parse JSON from LLM response: ${text.substring(0, 200)}`);
  }
}

// ============================================================================
// Providers
// ============================================================================

let googleClient: GoogleGenerativeAI | null = null;
let openaiClient: OpenAI | null = null;

function getGoogleClient(): GoogleGenerativeAI {
  if (!googleClient) {
    googleClient = new GoogleGenerativeAI(requireApiKey('googleAi'));
  }
  return googleClient;
}

function getOpenAIClient(): OpenAI {
  if (!openaiClient) {
    openaiClient = new OpenAI({ apiKey: requireApiKey('openai') });
  }
  return openaiClient;
}

/**
 * One Google Generative AI attempt. The SDK does not take an AbortSignal,
 * so the timeout is applied with Promise.race.
 */
async function generateWithGoogle(prompt: string, modelConfig: ModelConfig, timeoutMs: number): Promise<string> {
  const model = getGoogleClient().getGenerativeModel({ model: modelConfig.modelId });

  const response = await withTimeout(
    model.generateContent({
      contents: [{ role: 'user', parts: [{ text: prompt }] }],
      generationConfig: {
        temperature: modelConfig.temperature,
        maxOutputTokens: modelConfig.maxOutputTokens,
        responseMimeType: 'application/json',
      },
    }),
    timeoutMs,
    `LLM call (${modelConfig.modelId})`
  );

  const text = response.response.text();
  if (!text) {
    throw new JudgmentApiError('Empty response from LLM', 500, true);
  }
  return text;
}

/**
 * One OpenAI attempt with an AbortController timeout.
 */
async function generateWithOpenAI(prompt: string, modelConfig: ModelConfig, timeoutMs: number): Promise<string> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await getOpenAIClient().chat.completions.create(
      {
        model: modelConfig.modelId,
        messages: [{ role: 'user', content: prompt }],
        temperature: modelConfig.temperature,
        max_tokens: modelConfig.maxOutputTokens,
        response_format: { type: 'json_object' },
      },
      { signal: controller.signal }
    );

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new JudgmentApiError('Empty response from OpenAI', 500, true);
    }
    return content;
  } catch (error) {
    if (error instanceof JudgmentApiError) {
      throw error;
    }
    if (error instanceof OpenAI.APIUserAbortError || (error instanceof Error && error.name === 'AbortError')) {
      throw new TimeoutError(`LLM call (${modelConfig.modelId})`, timeoutMs);
    }
    if (error instanceof OpenAI.APIError) {
      const status = error.status ?? 500;
      throw new JudgmentApiError(error.message, status, status === 429 || status >= 500);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Call the model configured for a judgment kind.
 *
 * @example
 * ```typescript
 * const result = await callModel(buildIntentPrompt(input), 'intent');
 * const data = extractJson(result.text);
 * ```
 */
export const callModel: ModelCaller = async (prompt, kind, config = {}) => {
  const fullConfig: Required<LLMCallConfig> = { ...DEFAULT_CONFIG, ...config };
  const modelConfig = getModelConfig(kind);

  const text = await withRetry(
    () =>
      modelConfig.provider === 'openai'
        ? generateWithOpenAI(prompt, modelConfig, fullConfig.timeoutMs)
        : generateWithGoogle(prompt, modelConfig, fullConfig.timeoutMs),
    fullConfig
  );

  return { text, modelId: modelConfig.modelId };
};
