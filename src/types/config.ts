/**
 * Configuration type definitions for pgchain
 */

export interface PostgresConfig {
  /** Directory holding pg_basebackup / pg_combinebackup; PATH lookup when unset */
  binDir?: string;
  /** pg_basebackup --checkpoint mode */
  checkpoint: "fast" | "spread";
  /** Extra arguments appended to every pg_basebackup invocation */
  extraArgs: string[];
}

export interface RetentionConfig {
  /** Days between full backups; governs the full-vs-incremental decision */
  fullBackupIntervalDays: number;
  /** A chain whose full backup is older than this is deleted whole */
  keepFullDays: number;
  /** A chain's incrementals are all deleted once the oldest is older than this */
  keepIncrementalDays: number;
}

export interface ScheduleConfig {
  cron: string;
  timezone?: string;
}

export interface SafetyConfig {
  dryRun: boolean;
}

export interface PgchainConfig {
  version: string;
  backupDir: string;
  restoreDir: string;
  postgres: PostgresConfig;
  retention: RetentionConfig;
  schedule: ScheduleConfig;
  safety: SafetyConfig;
}
