/**
 * Backup module exports
 */

export { type BackupOptions, type BackupResult, runBackup } from "./orchestrator";
export { type BackupPlan, type PlanOptions, planBackup } from "./planner";
