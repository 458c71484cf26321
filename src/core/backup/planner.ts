/**
 * Full-vs-incremental decision for the next backup
 */

import * as path from "node:path";
import type { BackupRecord, PgchainConfig, ScanResult, SnapshotPlan } from "../../types";
import { ageInDays } from "../../utils/format";
import { logger } from "../../utils/logger";
import { buildBackupId } from "../../utils/naming";
import { hasManifest } from "../../postgres";

export interface BackupPlan {
  snapshot: SnapshotPlan;
  reason: string;
}

export interface PlanOptions {
  now: Date;
  /** Start a new chain regardless of the interval */
  forceFull?: boolean;
}

export async function planBackup(
  config: PgchainConfig,
  scan: ScanResult,
  options: PlanOptions,
): Promise<BackupPlan> {
  const { now } = options;
  const intervalDays = config.retention.fullBackupIntervalDays;
  const latest = scan.valid[scan.valid.length - 1];

  const full = (reason: string): BackupPlan => {
    const id = buildBackupId("full", now);
    return {
      snapshot: {
        id,
        kind: "full",
        timestamp: now,
        parent: null,
        chainStart: id,
        path: path.join(scan.root, id),
      },
      reason,
    };
  };

  if (options.forceFull) {
    return full("Full backup requested");
  }

  if (!latest) {
    return full("No previous backups found. Performing initial full backup.");
  }

  const chainStart = scan.valid.find((record) => record.id === latest.chainStart);
  if (!chainStart || chainStart.kind !== "full") {
    logger.warn(`Could not resolve chain start "${latest.chainStart}" of ${latest.id}`);
    return full("Latest chain has no readable full backup. Starting a new full backup.");
  }

  const fullAge = ageInDays(chainStart.timestamp, now);
  if (fullAge >= intervalDays) {
    return full(`Last full backup is older than ${intervalDays} days. Performing a new full backup.`);
  }

  if (!(await hasManifest(latest.path))) {
    logger.warn(`backup_manifest not found in ${latest.path}; an incremental cannot be based on it`);
    return full("Latest backup has no manifest. Starting a new full backup.");
  }

  return incremental(latest, chainStart, now, scan.root);
}

function incremental(
  parent: BackupRecord,
  chainStart: BackupRecord,
  now: Date,
  root: string,
): BackupPlan {
  const id = buildBackupId("incremental", now);
  return {
    snapshot: {
      id,
      kind: "incremental",
      timestamp: now,
      parent,
      chainStart: chainStart.id,
      path: path.join(root, id),
    },
    reason: `Last full backup ${chainStart.id} is recent. Performing an incremental backup on top of ${parent.id}.`,
  };
}
