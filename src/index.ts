/**
 * Classification Orchestrator
 *
 * Library entry point. Most callers need only createOrchestrator:
 *
 * ```typescript
 * const service = await createOrchestrator({ store: new FileRequestStore() });
 * const requestId = service.submit('s3://uploads/chest.png', 'Analyze this chest X-ray');
 * const response = await service.waitFor(requestId);
 * ```
 *
 * @module classification-orchestrator
 */

export * from './schemas/index.js';
export * from './orchestrator/index.js';
export { config, buildOrchestratorConfig, type OrchestratorConfig, type OrchestratorConfigInput } from './config/index.js';
export { createConsoleLogger, silentLogger, withScope, type Logger } from './logging/logger.js';
export { createJudgment, KeywordJudgment, LlmJudgment, MalformedJudgmentError } from './judgment/index.js';
export type { JudgmentFunction, JudgmentInput } from './judgment/types.js';
export {
  createWorkerRegistry,
  StaticWorkerRegistry,
  DirectoryWorkerRegistry,
  RegistryLookupFailedError,
  type WorkerRegistry,
} from './registry/index.js';
export { HttpWorkerTransport, type WorkerTransport } from './workers/transport.js';
export { WorkerClient } from './workers/client.js';
export { IntentClassifier } from './intent/classifier.js';
export { Router, selectTargets } from './routing/router.js';
export { ExecutionCoordinator } from './execution/coordinator.js';
export { verify } from './verification/verifier.js';
export { Reflector } from './reflection/reflector.js';
export { InMemoryRequestStore, FileRequestStore, type RequestStore } from './storage/requests.js';
export { getSuggestedPrompts, SUGGESTED_PROMPTS, type SuggestedPrompt } from './intent/suggested-prompts.js';
