/**
 * Utility exports
 */

// Formatting utilities
export { ageInDays, formatAgeDays, formatDuration, MS_PER_DAY } from "./format";
export type { LogLevel } from "./logger";
// Logger
export {
  debug,
  error,
  getLogLevel,
  info,
  logger,
  parseLogLevel,
  setLogLevel,
  warn,
} from "./logger";
export type { ParsedBackupId } from "./naming";
// Naming utilities
export {
  BACKUP_ID_PATTERN,
  buildBackupId,
  formatBackupTimestamp,
  hasBackupTimestampPrefix,
  isBackupId,
  isPlainName,
  isQuarantinedName,
  METADATA_FILENAME,
  parseBackupId,
  QUARANTINE_PREFIX,
  quarantineName,
} from "./naming";
// Path utilities
export { isDirectChild, isPathWithinDir } from "./path";
