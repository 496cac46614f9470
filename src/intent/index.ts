export {
  IntentClassifier,
  FALLBACK_INTENT,
  rankScores,
  type IntentClassifierOptions,
} from './classifier.js';
export { SUGGESTED_PROMPTS, getSuggestedPrompts, type SuggestedPrompt } from './suggested-prompts.js';
