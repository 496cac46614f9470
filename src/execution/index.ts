export {
  ExecutionCoordinator,
  summarizeOutcomes,
  type Dispatcher,
  type OutcomeSummary,
} from './coordinator.js';
