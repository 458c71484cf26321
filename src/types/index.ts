/**
 * Centralized type exports for pgchain
 */

// Backup types
export type {
  BackupKind,
  BackupRecord,
  Chain,
  CorruptEntry,
  IgnoredEntry,
  MetadataFile,
  MetadataReadResult,
  QuarantinedEntry,
  ScanEntry,
  ScanResult,
  SnapshotPlan,
} from "./backup";
// Config types
export type {
  PgchainConfig,
  PostgresConfig,
  RetentionConfig,
  SafetyConfig,
  ScheduleConfig,
} from "./config";
