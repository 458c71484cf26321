/**
 * Backup directory naming
 */

import type { BackupKind } from "../types";

// Re-export format utilities for convenience
export { formatAgeDays, formatDuration } from "./format";

/** Prefix marking a quarantined directory on disk */
export const QUARANTINE_PREFIX = "Invalid_";

/** Name of the per-backup metadata record */
export const METADATA_FILENAME = "metadata.json";

// Pattern: YYYY-MM-DD_HH-mm-ss_kind
export const BACKUP_ID_PATTERN = /^(\d{4}-\d{2}-\d{2})_(\d{2})-(\d{2})-(\d{2})_(full|incremental)$/;

// Anything that starts like a backup id, whatever follows the timestamp
export const BACKUP_TIMESTAMP_PREFIX_PATTERN = /^\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}_/;

export interface ParsedBackupId {
  /** Creation instant encoded in the name (UTC, second precision) */
  createdAt: Date;
  kind: BackupKind;
}

export function formatBackupTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10)}_${iso.slice(11, 19).replace(/:/g, "-")}`;
}

export function buildBackupId(kind: BackupKind, date: Date): string {
  return `${formatBackupTimestamp(date)}_${kind}`;
}

export function parseBackupId(name: string): ParsedBackupId | null {
  const match = name.match(BACKUP_ID_PATTERN);
  if (!match) return null;

  const [, day, hours, minutes, seconds, kind] = match;
  const createdAt = new Date(`${day}T${hours}:${minutes}:${seconds}Z`);
  if (Number.isNaN(createdAt.getTime())) return null;

  return { createdAt, kind: kind === "full" ? "full" : "incremental" };
}

export function isBackupId(name: string): boolean {
  return parseBackupId(name) !== null;
}

/**
 * Names that look like a backup directory, complete or not
 */
export function hasBackupTimestampPrefix(name: string): boolean {
  return BACKUP_TIMESTAMP_PREFIX_PATTERN.test(name);
}

export function isQuarantinedName(name: string): boolean {
  return name.startsWith(QUARANTINE_PREFIX);
}

export function quarantineName(name: string): string {
  return `${QUARANTINE_PREFIX}${name}`;
}

/**
 * A single directory name: no separators and no `.` or `..`.
 * Links between backups must stay inside the backup root.
 */
export function isPlainName(name: string): boolean {
  return name.length > 0 && name !== "." && name !== ".." && !/[\\/]/.test(name);
}
