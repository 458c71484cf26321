/**
 * Backup orchestration
 */

import * as fs from "node:fs/promises";
import type { BackupKind, BackupRecord, PgchainConfig } from "../../types";
import { formatDuration } from "../../utils/format";
import { logger } from "../../utils/logger";
import { manifestPath, PostgresTools, readManifestMode, SnapshotError } from "../../postgres";
import { scanBackupRoot } from "../chain";
import { writeMetadata } from "../metadata";
import { type PruneResult, runPrune } from "../prune";
import { planBackup } from "./planner";

export interface BackupOptions {
  dryRun?: boolean;
  /** Skip the prune that normally follows a successful backup */
  skipPrune?: boolean;
  /** Start a new chain regardless of the full backup interval */
  forceFull?: boolean;
  now?: Date;
  tools?: PostgresTools;
}

export interface BackupResult {
  backupId: string;
  kind: BackupKind;
  path: string;
  parent: string | null;
  chainStart: string;
  reason: string;
  durationMs: number;
  dryRun: boolean;
  prune: PruneResult | null;
}

export async function runBackup(
  config: PgchainConfig,
  options: BackupOptions = {},
): Promise<BackupResult> {
  const startTime = Date.now();
  const now = options.now ?? new Date();
  const dryRun = options.dryRun ?? config.safety.dryRun;
  const tools = options.tools ?? new PostgresTools(config.postgres);

  logger.info("Starting backup process...");
  await fs.mkdir(config.backupDir, { recursive: true });

  const scan = await scanBackupRoot(config.backupDir);
  const { snapshot, reason } = await planBackup(config, scan, { now, forceFull: options.forceFull });
  logger.info(reason);

  const result: BackupResult = {
    backupId: snapshot.id,
    kind: snapshot.kind,
    path: snapshot.path,
    parent: snapshot.parent?.id ?? null,
    chainStart: snapshot.chainStart,
    reason,
    durationMs: 0,
    dryRun,
    prune: null,
  };

  if (dryRun) {
    logger.info(`[DRY RUN] Would create ${snapshot.kind} backup ${snapshot.path}`);
  } else {
    // Fails if the directory already exists
    await fs.mkdir(snapshot.path);
    logger.info(`Created backup directory: ${snapshot.path}`);

    try {
      await tools.baseBackup({
        targetDir: snapshot.path,
        label: snapshot.id,
        incrementalManifest: snapshot.parent ? manifestPath(snapshot.parent.path) : undefined,
      });
      await assertManifestMode(snapshot.path, snapshot.kind);
    } catch (error) {
      logger.error(
        `Backup ${snapshot.id} failed; no metadata written, it will be quarantined by the next prune`,
      );
      throw error;
    }

    const record: BackupRecord = {
      id: snapshot.id,
      path: snapshot.path,
      timestamp: snapshot.timestamp,
      kind: snapshot.kind,
      parent: snapshot.parent?.id ?? null,
      chainStart: snapshot.chainStart,
    };
    await writeMetadata(snapshot.path, record);
    logger.info(`Backup metadata written to ${snapshot.path}`);
  }

  if (!options.skipPrune) {
    result.prune = await runPrune(config, { dryRun, now });
  }

  result.durationMs = Date.now() - startTime;
  logger.info(`Backup completed in ${formatDuration(result.durationMs)}: ${snapshot.id}`);

  return result;
}

async function assertManifestMode(backupDir: string, expected: BackupKind): Promise<void> {
  const mode = await readManifestMode(backupDir);
  if (mode === "unknown") {
    logger.warn(`Could not determine backup mode from the manifest in ${backupDir}`);
    return;
  }
  if (mode !== expected) {
    throw new SnapshotError(`backup_manifest reports mode "${mode}", expected "${expected}"`);
  }
}
