/**
 * Suggested Prompts
 *
 * Example prompts per domain, offered to callers choosing what to ask.
 * Each one is phrased so that the intent classifier ranks its domain first.
 *
 * @module intent/suggested-prompts
 */

import type { Domain } from '../schemas/common.js';

export interface SuggestedPrompt {
  id: string;
  prompt: string;
  description: string;
  domain: Domain;
}

export const SUGGESTED_PROMPTS: readonly SuggestedPrompt[] = [
  {
    id: 'medical-xray',
    prompt: 'Analyze this chest X-ray image and identify any abnormalities or signs of disease',
    description: 'Medical X-ray analysis',
    domain: 'medical',
  },
  {
    id: 'medical-diagnosis',
    prompt: 'Diagnose this medical image and provide potential findings',
    description: 'Medical diagnosis',
    domain: 'medical',
  },
  {
    id: 'satellite-landuse',
    prompt: 'Identify the land use categories in this satellite image (urban, forest, water, agriculture)',
    description: 'Satellite land use classification',
    domain: 'satellite',
  },
  {
    id: 'satellite-urban',
    prompt: 'Analyze this aerial image and identify urban development patterns',
    description: 'Urban planning analysis',
    domain: 'satellite',
  },
  {
    id: 'general-object',
    prompt: 'Classify this image and identify the main objects it contains',
    description: 'General object classification',
    domain: 'general',
  },
  {
    id: 'general-scene',
    prompt: 'Identify the scene type and describe what this image shows',
    description: 'Scene recognition',
    domain: 'general',
  },
  {
    id: 'general-animal',
    prompt: 'Identify the animal species in this image',
    description: 'Animal species identification',
    domain: 'general',
  },
];

/**
 * Suggested prompts, optionally for one domain.
 */
export function getSuggestedPrompts(domain?: Domain): SuggestedPrompt[] {
  return SUGGESTED_PROMPTS.filter((entry) => domain === undefined || entry.domain === domain);
}
