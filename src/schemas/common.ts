/**
 * Common Zod Schemas - Shared types used across the orchestrator
 */

import { z } from 'zod';

// ============================================
// Domain Schema
// ============================================

/**
 * Classification specialties. Each domain maps 1:1 to a worker pool.
 */
export const KNOWN_DOMAINS = ['medical', 'satellite', 'general'] as const;

export const DomainSchema = z.enum(KNOWN_DOMAINS);

export type Domain = z.infer<typeof DomainSchema>;

/**
 * Type guard for values coming back from external directories and judgments.
 */
export function isKnownDomain(value: unknown): value is Domain {
  return DomainSchema.safeParse(value).success;
}

// ============================================
// Confidence Schema
// ============================================

/**
 * Probability-like score in [0, 1].
 */
export const ConfidenceSchema = z.number().min(0).max(1);

// ============================================
// ISO8601 Timestamp Schema
// ============================================

/**
 * ISO8601 timestamp string (e.g., "2026-01-15T10:30:00.000Z")
 */
export const ISO8601TimestampSchema = z.string().datetime({ message: 'Must be a valid ISO8601 timestamp' });

export type ISO8601Timestamp = z.infer<typeof ISO8601TimestampSchema>;
