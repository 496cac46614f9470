export { verify, verifyNoTargets, buildMismatchWarning } from './verifier.js';
export { applyConfidenceGate, type GateResult } from './confidence-gate.js';
export {
  applyEnsembleVote,
  countVotes,
  normalizeLabel,
  MIN_RESPONDING_WORKERS,
  type VoteResult,
} from './ensemble-vote.js';
