/**
 * Backup chain type definitions
 */

export type BackupKind = "full" | "incremental";

/**
 * A single backup directory, as described by its metadata record.
 * `parent` and `chainStart` are backup ids (directory names), never paths.
 */
export interface BackupRecord {
  id: string;
  /** Absolute path of the backup directory */
  path: string;
  timestamp: Date;
  kind: BackupKind;
  parent: string | null;
  chainStart: string;
}

/**
 * On-disk shape of metadata.json
 */
export interface MetadataFile {
  timestamp: string;
  type: BackupKind;
  parent: string | null;
  chain_start: string;
}

export type MetadataReadResult =
  | { status: "ok"; record: BackupRecord }
  | { status: "absent" }
  | { status: "corrupt"; reason: string };

/**
 * Classification of one entry of the backup root
 */
export type ScanEntry =
  | { status: "valid"; record: BackupRecord }
  | { status: "corrupt"; path: string; name: string; reason: string }
  | { status: "quarantined"; path: string; name: string }
  | { status: "ignored"; path: string; name: string };

export type CorruptEntry = Extract<ScanEntry, { status: "corrupt" }>;
export type QuarantinedEntry = Extract<ScanEntry, { status: "quarantined" }>;
export type IgnoredEntry = Extract<ScanEntry, { status: "ignored" }>;

export interface ScanResult {
  root: string;
  valid: BackupRecord[];
  corrupt: CorruptEntry[];
  quarantined: QuarantinedEntry[];
  ignored: IgnoredEntry[];
}

export interface Chain {
  /** Id of the full backup that begins the chain (the shared chain_start) */
  chainStart: string;
  /** The resolved full backup, null when the chain is orphaned */
  full: BackupRecord | null;
  /** Non-full members, ordered by id */
  incrementals: BackupRecord[];
  /** Every member, ordered by id */
  members: BackupRecord[];
  orphaned: boolean;
  /** Broken parent links and other structural findings */
  problems: string[];
}

/**
 * Backups produced by the snapshot tool, before the record is written
 */
export interface SnapshotPlan {
  id: string;
  kind: BackupKind;
  timestamp: Date;
  parent: BackupRecord | null;
  chainStart: string;
  path: string;
}
