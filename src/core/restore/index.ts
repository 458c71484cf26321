/**
 * Restore module exports
 */

export {
  assertSafeRestoreDir,
  prepareRestoreDir,
  recoveryInstructions,
  RestoreError,
  type RestoreOptions,
  type RestoreResult,
  resolveRestoreTarget,
  runRestore,
} from "./orchestrator";
