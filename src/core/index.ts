/**
 * Core module exports
 */

// Backup
export { type BackupOptions, type BackupResult, planBackup, runBackup } from "./backup";

// Chains
export {
  BrokenChainError,
  buildChains,
  chainTip,
  groupChains,
  oldestIncremental,
  reconstructChain,
  scanBackupRoot,
  type VerifyReport,
  verifyBackupRoot,
} from "./chain";

// Metadata
export { MetadataError, readMetadata, writeMetadata } from "./metadata";

// Prune
export {
  type ChainEvaluation,
  evaluateRetention,
  findCurrentChain,
  type PruneResult,
  quarantineBackups,
  type RetentionDecision,
  type RetentionPlan,
  type RetentionPolicy,
  runPrune,
} from "./prune";

// Restore
export { RestoreError, type RestoreOptions, type RestoreResult, runRestore } from "./restore";

// Scheduler
export { getNextRun, matchesCron, parseCron, Scheduler } from "./scheduler";
