/**
 * LLM-backed judgment function
 *
 * @module judgment/llm-judgment
 */

import { getModelConfig } from '../config/models.js';
import { callModel, extractJson, type LLMCallConfig, type ModelCaller } from './llm-client.js';
import { buildIntentPrompt, buildReflectionPrompt } from './prompts.js';
import type { JudgmentFunction, JudgmentInput } from './types.js';

export interface LlmJudgmentOptions {
  /** Provider call; defaults to the configured model */
  call?: ModelCaller;
  callConfig?: LLMCallConfig;
}

export class LlmJudgment implements JudgmentFunction {
  readonly name: string;
  private readonly call: ModelCaller;
  private readonly callConfig: LLMCallConfig;

  constructor(options: LlmJudgmentOptions = {}) {
    this.call = options.call ?? callModel;
    this.callConfig = options.callConfig ?? {};
    this.name = `llm:${getModelConfig('intent').modelId}`;
  }

  /**
   * Render the prompt for the input's kind, call the model and return the
   * extracted JSON. Parse failures propagate to the caller.
   */
  async judge(input: JudgmentInput): Promise<unknown> {
    const prompt = input.kind === 'intent' ? buildIntentPrompt(input) : buildReflectionPrompt(input);
    const result = await this.call(prompt, input.kind, this.callConfig);
    return extractJson(result.text);
  }
}
