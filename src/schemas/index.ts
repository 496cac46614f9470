/**
 * Zod Schemas for All Data Types
 *
 * Central export point for all schema definitions used by the orchestrator.
 */

// ============================================================================
// Common Types
// ============================================================================

export {
  KNOWN_DOMAINS,
  DomainSchema,
  ConfidenceSchema,
  ISO8601TimestampSchema,
  isKnownDomain,
  type Domain,
  type ISO8601Timestamp,
} from './common.js';

// ============================================================================
// Request Schema
// ============================================================================

export {
  ClassificationRequestSchema,
  SubmitInputSchema,
  RequestIdSchema,
  REQUEST_ID_PATTERN,
  DEFAULT_MIN_CONFIDENCE,
  type ClassificationRequest,
  type SubmitInput,
} from './request.js';

// ============================================================================
// Intent Schema
// ============================================================================

export {
  DomainScoreSchema,
  IntentResultSchema,
  IntentSourceSchema,
  type DomainScore,
  type IntentResult,
  type IntentSource,
} from './intent.js';

// ============================================================================
// Worker Schemas
// ============================================================================

export {
  WorkerTargetSchema,
  TopKPredictionSchema,
  WorkerSuccessResponseSchema,
  WorkerErrorResponseSchema,
  SuccessOutcomeSchema,
  ErrorOutcomeSchema,
  TimeoutOutcomeSchema,
  TaskOutcomeSchema,
  WORKER_ERROR_CODES,
  isSuccessOutcome,
  createErrorOutcome,
  createTimeoutOutcome,
  type WorkerTarget,
  type TopKPrediction,
  type WorkerTaskPayload,
  type WorkerSuccessResponse,
  type WorkerErrorResponse,
  type TaskOutcome,
  type SuccessOutcome,
  type ErrorOutcome,
  type TimeoutOutcome,
} from './worker.js';

// ============================================================================
// Routing Schemas
// ============================================================================

export {
  RoutingModeSchema,
  RoutingDecisionSchema,
  ReplanStrategySchema,
  INITIAL_STRATEGY,
  type RoutingMode,
  type RoutingDecision,
  type ReplanStrategy,
  type ReplanDecision,
} from './routing.js';

// ============================================================================
// Verification Schema
// ============================================================================

export {
  VerdictReasonSchema,
  VerificationVerdictSchema,
  isOverridableVerdict,
  type VerdictReason,
  type VerificationVerdict,
} from './verification.js';

// ============================================================================
// Request State Schemas
// ============================================================================

export {
  PhaseSchema,
  RequestStatusSchema,
  HistoryEntrySchema,
  FinalResultSchema,
  AcceptedResultSchema,
  FailedResultSchema,
  RequestStateSchema,
  PollResponseSchema,
  TERMINAL_PHASES,
  isTerminalStatus,
  type Phase,
  type RequestStatus,
  type HistoryEntry,
  type FinalResult,
  type AcceptedResult,
  type FailedResult,
  type RequestState,
  type PollResponse,
} from './state.js';
