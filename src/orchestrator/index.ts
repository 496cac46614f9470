/**
 * Orchestrator Module
 *
 * @module orchestrator
 */

export {
  RequestStateMachine,
  createInitialState,
  describeFailure,
  type StateMachineDependencies,
  type TransitionListener,
} from './state-machine.js';
export {
  OrchestratorService,
  RequestNotFoundError,
  toPollResponse,
  type OrchestratorServiceOptions,
  type SubmitOptions,
} from './service.js';
export {
  createOrchestrator,
  createStateMachine,
  type CreateOrchestratorOptions,
  type MachineComponents,
} from './factory.js';
export { generateRequestId, formatTimestamp } from './request-id.js';
