/**
 * Classification Request Schema
 *
 * A request is created once by the ingress and never mutated afterwards.
 * The image itself lives in object storage; only its opaque reference
 * travels through the orchestrator.
 */

import { z } from 'zod';
import { ConfidenceSchema, DomainSchema, ISO8601TimestampSchema } from './common.js';

/**
 * Default acceptance threshold applied by the confidence gate.
 */
export const DEFAULT_MIN_CONFIDENCE = 0.7;

/**
 * Request ID format: req-YYYYMMDD-HHMMSS-<8 hex chars>
 */
export const REQUEST_ID_PATTERN = /^req-\d{8}-\d{6}-[0-9a-f]{8}$/;

export const RequestIdSchema = z
  .string()
  .regex(REQUEST_ID_PATTERN, 'Request ID must match req-YYYYMMDD-HHMMSS-xxxxxxxx');

export const ClassificationRequestSchema = z
  .object({
    /** Unique, caller-visible identifier */
    requestId: RequestIdSchema,

    /** Opaque handle to the stored image bytes (e.g., s3://bucket/key) */
    imageReference: z.string().min(1),

    /** Free-text classification instruction */
    prompt: z.string().min(1),

    /** Minimum confidence for acceptance */
    minConfidence: ConfidenceSchema.default(DEFAULT_MIN_CONFIDENCE),

    /** Per-worker timeout override in milliseconds */
    timeoutMs: z.number().int().positive().optional(),

    /** Domains the caller wants considered during discovery */
    preferredDomains: z.array(DomainSchema).optional(),

    createdAt: ISO8601TimestampSchema,
  })
  .readonly();

export type ClassificationRequest = z.infer<typeof ClassificationRequestSchema>;

/**
 * Input accepted by the ingress before an ID and timestamp are assigned.
 */
export const SubmitInputSchema = z.object({
  imageReference: z.string().min(1, 'Image reference is required'),
  prompt: z.string().trim().min(1, 'Prompt is required'),
  minConfidence: ConfidenceSchema.optional(),
  timeoutMs: z.number().int().positive().optional(),
  preferredDomains: z.array(DomainSchema).optional(),
});

export type SubmitInput = z.infer<typeof SubmitInputSchema>;
