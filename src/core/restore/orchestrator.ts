/**
 * Restore orchestration
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { BackupRecord, PgchainConfig } from "../../types";
import { formatDuration } from "../../utils/format";
import { logger } from "../../utils/logger";
import { isPathWithinDir } from "../../utils/path";
import { PostgresTools } from "../../postgres";
import { reconstructChain, scanBackupRoot } from "../chain";

export class RestoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RestoreError";
  }
}

export interface RestoreOptions {
  /** Backup path, or a backup id inside the backup root */
  target?: string;
  /** Restore the newest backup taken at or before this instant */
  at?: Date;
  /** Clear a non-empty restore directory instead of refusing */
  force?: boolean;
  dryRun?: boolean;
  tools?: PostgresTools;
}

export interface RestoreResult {
  target: BackupRecord;
  /** Backups combined, oldest (full) first */
  chain: BackupRecord[];
  restoreDir: string;
  durationMs: number;
  dryRun: boolean;
  nextSteps: string[];
}

export async function runRestore(
  config: PgchainConfig,
  options: RestoreOptions,
): Promise<RestoreResult> {
  const startTime = Date.now();
  const dryRun = options.dryRun ?? config.safety.dryRun;
  const tools = options.tools ?? new PostgresTools(config.postgres);
  const restoreDir = path.resolve(config.restoreDir);

  const targetPath = await resolveRestoreTarget(config, options);
  logger.info(`Starting restore process for: ${targetPath}`);

  const chain = await reconstructChain(targetPath);
  const target = chain[chain.length - 1];
  if (!target) {
    throw new RestoreError(`No backups to restore for ${targetPath}`);
  }

  logger.info("Restore requires the following backup chain (oldest to newest):");
  for (const record of chain) {
    logger.info(`  - ${record.id}`);
  }

  assertSafeRestoreDir(restoreDir, config.backupDir);

  if (dryRun) {
    logger.info(`[DRY RUN] Would combine ${chain.length} backup(s) into ${restoreDir}`);
  } else {
    await prepareRestoreDir(restoreDir, options.force ?? false);
    await tools.combineBackup({
      outputDir: restoreDir,
      backupPaths: chain.map((record) => record.path),
    });
    logger.info(`Restore complete. Data is available in ${restoreDir}`);
  }

  const durationMs = Date.now() - startTime;
  logger.debug(`Restore finished in ${formatDuration(durationMs)}`);

  return {
    target,
    chain,
    restoreDir,
    durationMs,
    dryRun,
    nextSteps: recoveryInstructions(restoreDir, options.at),
  };
}

export async function resolveRestoreTarget(
  config: PgchainConfig,
  options: Pick<RestoreOptions, "target" | "at">,
): Promise<string> {
  if (options.target && options.at) {
    throw new RestoreError("Specify either a target backup or a point in time, not both");
  }

  if (options.target) {
    const looksLikePath = options.target.includes("/") || options.target.includes(path.sep);
    const targetPath = looksLikePath
      ? path.resolve(options.target)
      : path.resolve(config.backupDir, options.target);

    if (!(await isDirectory(targetPath))) {
      throw new RestoreError(`Target backup path does not exist: ${targetPath}`);
    }
    return targetPath;
  }

  if (options.at) {
    const at = options.at;
    const scan = await scanBackupRoot(config.backupDir);
    const candidates = scan.valid.filter((record) => record.timestamp.getTime() <= at.getTime());
    const newest = candidates.reduce<BackupRecord | null>(
      (best, record) =>
        !best || record.timestamp.getTime() > best.timestamp.getTime() ? record : best,
      null,
    );
    if (!newest) {
      throw new RestoreError(`No backup found on or before ${at.toISOString()}`);
    }
    logger.info(`Found target backup for ${at.toISOString()}: ${newest.id}`);
    return newest.path;
  }

  throw new RestoreError("Restore requires a target backup or a point in time");
}

/**
 * The restore directory must never overlap the backup root.
 */
export function assertSafeRestoreDir(restoreDir: string, backupDir: string): void {
  const restore = path.resolve(restoreDir);
  const backups = path.resolve(backupDir);

  if (
    restore === backups ||
    isPathWithinDir(restore, backups) ||
    isPathWithinDir(backups, restore)
  ) {
    throw new RestoreError(
      `Restore directory ${restore} overlaps the backup directory ${backups}`,
    );
  }
}

export async function prepareRestoreDir(restoreDir: string, force: boolean): Promise<void> {
  let entries: string[] = [];
  try {
    entries = await fs.readdir(restoreDir);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
      throw error;
    }
  }

  if (entries.length > 0) {
    if (!force) {
      throw new RestoreError(
        `Restore directory ${restoreDir} is not empty. Clear it or pass --force.`,
      );
    }
    logger.warn(`Clearing restore directory: ${restoreDir}`);
    await fs.rm(restoreDir, { recursive: true, force: true });
  }

  await fs.mkdir(restoreDir, { recursive: true });
  logger.info(`Prepared restore directory: ${restoreDir}`);
}

export function recoveryInstructions(restoreDir: string, at?: Date): string[] {
  const steps = [
    at
      ? `Set recovery_target_time = '${at.toISOString()}' and recovery_target_action = 'promote' in ${restoreDir}/postgresql.conf`
      : `Set a recovery target in ${restoreDir}/postgresql.conf if replaying WAL to a point in time`,
    `Create a recovery signal file: touch ${restoreDir}/recovery.signal`,
    `Ensure file permissions are correct: chown -R postgres:postgres ${restoreDir}`,
    "Provide the archived WAL files and start PostgreSQL on the new data directory",
  ];
  return steps;
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}
