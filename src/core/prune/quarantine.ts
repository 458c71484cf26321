/**
 * Quarantine of malformed backup directories
 *
 * Corrupt or incomplete backups are renamed with the quarantine prefix so
 * they drop out of chain logic and are never deleted by pruning.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { CorruptEntry } from "../../types";
import { logger } from "../../utils/logger";
import { isQuarantinedName, quarantineName } from "../../utils/naming";

export interface QuarantineOptions {
  dryRun?: boolean;
  now?: () => Date;
}

export interface QuarantineOutcome {
  path: string;
  reason: string;
  /** Path after renaming; null when the rename was skipped or failed */
  quarantinedPath: string | null;
  success: boolean;
  error?: string;
}

export async function quarantineBackups(
  entries: CorruptEntry[],
  options: QuarantineOptions = {},
): Promise<QuarantineOutcome[]> {
  const outcomes: QuarantineOutcome[] = [];

  for (const entry of entries) {
    if (isQuarantinedName(entry.name)) {
      logger.debug(`Already quarantined: ${entry.path}`);
      continue;
    }

    try {
      const target = await findQuarantineTarget(entry.path, options.now ?? (() => new Date()));

      if (options.dryRun) {
        logger.info(`[DRY RUN] Would quarantine ${entry.path} (${entry.reason})`);
      } else {
        await fs.rename(entry.path, target);
        logger.warn(
          `Quarantined ${entry.name} as ${path.basename(target)} for manual inspection (${entry.reason})`,
        );
      }

      outcomes.push({ path: entry.path, reason: entry.reason, quarantinedPath: target, success: true });
    } catch (error) {
      const message = (error as Error).message;
      logger.error(`Failed to quarantine ${entry.path}: ${message}`);
      outcomes.push({
        path: entry.path,
        reason: entry.reason,
        quarantinedPath: null,
        success: false,
        error: message,
      });
    }
  }

  return outcomes;
}

/**
 * `Invalid_<name>`, then `Invalid_<name>_<unix seconds>`, then
 * `Invalid_<name>_<unix seconds>_<n>` until a free name is found.
 */
export async function findQuarantineTarget(entryPath: string, now: () => Date): Promise<string> {
  const dir = path.dirname(entryPath);
  const base = path.join(dir, quarantineName(path.basename(entryPath)));

  if (!(await pathExists(base))) {
    return base;
  }

  const stamped = `${base}_${Math.floor(now().getTime() / 1000)}`;
  let candidate = stamped;
  for (let n = 1; await pathExists(candidate); n++) {
    candidate = `${stamped}_${n}`;
  }
  return candidate;
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return false;
    }
    throw error;
  }
}
