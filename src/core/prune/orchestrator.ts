/**
 * Prune orchestration: scan, quarantine, evaluate retention, delete
 */

import * as fs from "node:fs/promises";
import type { BackupRecord, PgchainConfig } from "../../types";
import { formatAgeDays } from "../../utils/format";
import { logger } from "../../utils/logger";
import { buildChains } from "../chain";
import { type QuarantineOutcome, quarantineBackups } from "./quarantine";
import { type ChainEvaluation, evaluateRetention, type RetentionPlan } from "./retention";
import { validateDeletionCandidate } from "./validator";

export interface PruneOptions {
  dryRun?: boolean;
  /** Reference instant for age computations (defaults to now) */
  now?: Date;
}

export interface PruneDeletion {
  backupId: string;
  chainStart: string;
  reason: string;
  success: boolean;
  /** True when the backup was already gone or the chain was abandoned */
  skipped: boolean;
  error?: string;
}

export interface PruneResult {
  totalChecked: number;
  totalDeleted: number;
  totalFailed: number;
  quarantined: QuarantineOutcome[];
  plan: RetentionPlan;
  deletions: PruneDeletion[];
  dryRun: boolean;
}

export async function runPrune(config: PgchainConfig, options: PruneOptions = {}): Promise<PruneResult> {
  const now = options.now ?? new Date();
  const dryRun = options.dryRun ?? config.safety.dryRun;
  const { keepFullDays, keepIncrementalDays } = config.retention;

  logger.info("Starting pruning process with policy:");
  logger.info(`  - Full backups (and their chains) are kept for ${keepFullDays} days`);
  logger.info(
    `  - Incrementals of a retained chain are kept while the oldest is within ${keepIncrementalDays} days`,
  );

  const { scan, chains } = await buildChains(config.backupDir);

  // Step 1: quarantine corrupt entries; they never take part in chain grouping
  let quarantined: QuarantineOutcome[] = [];
  if (scan.corrupt.length > 0) {
    logger.warn(
      `Found ${scan.corrupt.length} backup(s) with missing or corrupt metadata. Quarantining them.`,
    );
    quarantined = await quarantineBackups(scan.corrupt, { dryRun });
  }

  const plan = evaluateRetention(chains, { keepFullDays, keepIncrementalDays }, now);

  const result: PruneResult = {
    totalChecked: scan.valid.length,
    totalDeleted: 0,
    totalFailed: 0,
    quarantined,
    plan,
    deletions: [],
    dryRun,
  };

  if (scan.valid.length === 0) {
    logger.info("No valid backups remain to be pruned");
    return result;
  }

  // Step 2: report, then act on each chain independently
  for (const evaluation of plan.evaluations) {
    logEvaluation(evaluation);
    if (evaluation.delete.length === 0) continue;

    await deleteChainMembers(evaluation, config.backupDir, dryRun, result);
  }

  if (result.deletions.length === 0) {
    logger.info("No valid backups met the pruning criteria");
  }
  logger.info(
    `Pruning complete: ${result.totalDeleted} deleted, ${result.totalFailed} failed, ${quarantined.length} quarantined`,
  );

  return result;
}

async function deleteChainMembers(
  evaluation: ChainEvaluation,
  backupRoot: string,
  dryRun: boolean,
  result: PruneResult,
): Promise<void> {
  const { chain, reason } = evaluation;

  for (const [index, record] of evaluation.delete.entries()) {
    const deletion = await deleteBackup(record, backupRoot, reason, dryRun);
    result.deletions.push(deletion);

    if (deletion.success && !deletion.skipped && !dryRun) {
      result.totalDeleted++;
    }

    if (!deletion.success) {
      result.totalFailed++;
      // Older members stay, so the chain is left as a restorable prefix
      const abandoned = evaluation.delete.slice(index + 1);
      if (abandoned.length > 0) {
        logger.error(
          `Stopping deletion of chain ${chain.chainStart}; ${abandoned.length} older backup(s) kept until the next run`,
        );
      }
      for (const remaining of abandoned) {
        result.deletions.push({
          backupId: remaining.id,
          chainStart: chain.chainStart,
          reason,
          success: false,
          skipped: true,
          error: `not attempted after failure on ${record.id}`,
        });
      }
      return;
    }
  }
}

async function deleteBackup(
  record: BackupRecord,
  backupRoot: string,
  reason: string,
  dryRun: boolean,
): Promise<PruneDeletion> {
  const base = { backupId: record.id, chainStart: record.chainStart, reason };

  try {
    const validation = await validateDeletionCandidate(record, backupRoot);

    if (!validation.valid) {
      if (validation.errors.length === 0) {
        logger.warn(validation.warnings.join(", "));
        return { ...base, success: true, skipped: true };
      }
      logger.error(`Validation failed for ${record.id}: ${validation.errors.join(", ")}`);
      return { ...base, success: false, skipped: false, error: validation.errors.join("; ") };
    }

    if (dryRun) {
      logger.info(`[DRY RUN] Would delete: ${record.path} (${reason})`);
      return { ...base, success: true, skipped: false };
    }

    logger.info(`Deleting ${record.path}`);
    await fs.rm(record.path, { recursive: true, force: true });
    return { ...base, success: true, skipped: false };
  } catch (error) {
    const message = (error as Error).message;
    logger.error(`Failed to delete ${record.path}: ${message}`);
    return { ...base, success: false, skipped: false, error: message };
  }
}

function logEvaluation(evaluation: ChainEvaluation): void {
  const { chain, decision, reason, fullAgeDays } = evaluation;
  const age = fullAgeDays !== null ? ` (${formatAgeDays(fullAgeDays)} old)` : "";

  for (const problem of chain.problems) {
    logger.warn(`Chain ${chain.chainStart}: ${problem}`);
  }

  switch (decision) {
    case "keep-orphaned":
      logger.error(
        `Orphaned chain ${chain.chainStart}: ${reason}; keeping ${chain.members.length} backup(s) for manual inspection`,
      );
      break;
    case "keep-malformed":
      logger.error(
        `Malformed chain ${chain.chainStart}: ${reason}; keeping ${chain.members.length} backup(s) for manual inspection`,
      );
      break;
    case "keep-whole":
      logger.info(`  - Keeping chain ${chain.chainStart}${age}: ${reason}`);
      break;
    case "keep-full-only":
      logger.info(
        `  - Keeping full backup ${chain.chainStart}${age}, pruning all ${evaluation.delete.length} incrementals: ${reason}`,
      );
      break;
    case "delete-whole":
      logger.info(`  - Pruning entire chain ${chain.chainStart}${age}: ${reason}`);
      break;
  }
}
