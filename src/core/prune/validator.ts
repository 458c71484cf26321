/**
 * Backup deletion validation
 */

import * as path from "node:path";
import type { BackupRecord } from "../../types";
import { isBackupId, isQuarantinedName } from "../../utils/naming";
import { isDirectChild } from "../../utils/path";
import { readMetadata } from "../metadata";

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Re-check a backup on disk right before it is removed. Any doubt about what
 * the directory is refuses the deletion.
 */
export async function validateDeletionCandidate(
  record: BackupRecord,
  backupRoot: string,
): Promise<ValidationResult> {
  const errors: string[] = [];
  const warnings: string[] = [];
  const name = path.basename(record.path);

  // CHECK 1: The directory must be a direct child of the backup root
  if (!isDirectChild(record.path, backupRoot)) {
    errors.push(`"${record.path}" is not directly inside "${backupRoot}" - REFUSING TO DELETE`);
    return { valid: false, errors, warnings };
  }

  // CHECK 2: The name must be a backup id and never a quarantined entry
  if (isQuarantinedName(name) || !isBackupId(name)) {
    errors.push(`"${name}" doesn't match the backup naming pattern - REFUSING TO DELETE`);
    return { valid: false, errors, warnings };
  }

  // CHECK 3: The metadata must still describe the same backup
  const metadata = await readMetadata(record.path);
  if (metadata.status === "absent") {
    warnings.push(`Backup not found or has no metadata (already deleted?): ${record.path}`);
    return { valid: false, errors, warnings };
  }
  if (metadata.status === "corrupt") {
    errors.push(`Metadata of "${name}" became unreadable (${metadata.reason}) - REFUSING TO DELETE`);
    return { valid: false, errors, warnings };
  }
  if (metadata.record.chainStart !== record.chainStart) {
    errors.push(
      `"${name}" now belongs to chain ${metadata.record.chainStart}, expected ${record.chainStart} - REFUSING TO DELETE`,
    );
    return { valid: false, errors, warnings };
  }

  return { valid: errors.length === 0, errors, warnings };
}
