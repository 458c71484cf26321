/**
 * Prune module exports
 */

export {
  type PruneDeletion,
  type PruneOptions,
  type PruneResult,
  runPrune,
} from "./orchestrator";
export {
  findQuarantineTarget,
  type QuarantineOptions,
  type QuarantineOutcome,
  quarantineBackups,
} from "./quarantine";
export {
  type ChainEvaluation,
  evaluateRetention,
  findCurrentChain,
  type RetentionDecision,
  type RetentionPlan,
  type RetentionPolicy,
} from "./retention";
export { type ValidationResult, validateDeletionCandidate } from "./validator";
