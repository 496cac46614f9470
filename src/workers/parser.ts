/**
 * Worker Response Parser
 *
 * Workers answer either with JSON (`{label, confidence, top_k}` or
 * `{error: {code, message}}`) or with plain text:
 *
 * ```
 * Label: pneumonia
 * Confidence: 0.89
 * ```
 *
 * @module workers/parser
 */

import type { TopKPrediction } from '../schemas/worker.js';
import { WorkerErrorResponseSchema, WorkerSuccessResponseSchema } from '../schemas/worker.js';
import { ConfidenceSchema } from '../schemas/common.js';

export type ParsedWorkerResponse =
  | { kind: 'success'; label: string; confidence: number; topK: TopKPrediction[] }
  | { kind: 'error'; code: string; message: string };

const LABEL_LINE = /^\s*label\s*:\s*(.+?)\s*$/im;
const CONFIDENCE_LINE = /^\s*confidence\s*:\s*([0-9]*\.?[0-9]+)\s*$/im;

/**
 * Sort predictions highest first and number them from 1. An empty list
 * falls back to the top-level label.
 */
export function normalizeTopK(
  label: string,
  confidence: number,
  predictions: ReadonlyArray<{ label: string; confidence: number }> = []
): TopKPrediction[] {
  const source = predictions.length > 0 ? predictions : [{ label, confidence }];
  return [...source]
    .sort((a, b) => b.confidence - a.confidence)
    .map((prediction, index) => ({
      label: prediction.label,
      confidence: prediction.confidence,
      rank: index + 1,
    }));
}

function parseJson(body: string): ParsedWorkerResponse | null {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    return null;
  }

  const error = WorkerErrorResponseSchema.safeParse(data);
  if (error.success) {
    return {
      kind: 'error',
      code: error.data.error.code,
      message: error.data.error.message ?? 'Worker reported an error',
    };
  }

  const success = WorkerSuccessResponseSchema.safeParse(data);
  if (success.success) {
    const { label, confidence, top_k } = success.data;
    return { kind: 'success', label, confidence, topK: normalizeTopK(label, confidence, top_k) };
  }

  return null;
}

function parseText(body: string): ParsedWorkerResponse | null {
  const label = LABEL_LINE.exec(body)?.[1];
  const rawConfidence = CONFIDENCE_LINE.exec(body)?.[1];
  if (!label || rawConfidence === undefined) {
    return null;
  }

  const confidence = ConfidenceSchema.safeParse(Number(rawConfidence));
  if (!confidence.success) {
    return null;
  }

  return {
    kind: 'success',
    label,
    confidence: confidence.data,
    topK: normalizeTopK(label, confidence.data),
  };
}

/**
 * Parse a worker reply body.
 *
 * @returns The parsed reply, or null when the body is neither form
 */
export function parseWorkerResponse(body: string): ParsedWorkerResponse | null {
  const trimmed = body.trim();
  if (trimmed.length === 0) {
    return null;
  }
  return trimmed.startsWith('{') ? parseJson(trimmed) : parseText(trimmed);
}
