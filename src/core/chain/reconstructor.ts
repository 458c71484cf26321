/**
 * Restore-time chain reconstruction
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { BackupRecord } from "../../types";
import { logger } from "../../utils/logger";
import { readMetadata } from "../metadata";

export class BrokenChainError extends Error {
  constructor(
    message: string,
    readonly backupPath: string,
  ) {
    super(message);
    this.name = "BrokenChainError";
  }
}

/**
 * Walk parent links back from the target to its full backup.
 *
 * Returns the chain oldest (full) first and the target last. Any missing or
 * corrupt ancestor fails the whole reconstruction; a partial chain is never
 * returned.
 */
export async function reconstructChain(targetPath: string): Promise<BackupRecord[]> {
  const target = path.resolve(targetPath);
  const root = path.dirname(target);

  const chain: BackupRecord[] = [];
  const visited = new Set<string>();
  let currentPath: string | null = target;

  while (currentPath) {
    const name = path.basename(currentPath);

    if (visited.has(name)) {
      throw new BrokenChainError(`Cycle detected: ${name} appears twice in the chain`, currentPath);
    }
    visited.add(name);

    if (!(await isDirectory(currentPath))) {
      throw new BrokenChainError(`Backup directory not found: ${currentPath}`, currentPath);
    }

    const metadata = await readMetadata(currentPath);
    if (metadata.status === "absent") {
      throw new BrokenChainError(`Missing metadata in ${currentPath}`, currentPath);
    }
    if (metadata.status === "corrupt") {
      throw new BrokenChainError(
        `Corrupt metadata in ${currentPath}: ${metadata.reason}`,
        currentPath,
      );
    }

    const record = metadata.record;
    chain.unshift(record);
    logger.debug(`Chain link: ${record.id} (${record.kind}) -> ${record.parent ?? "none"}`);

    if (record.parent) {
      const parentPath = path.join(root, record.parent);
      if (!(await isDirectory(parentPath))) {
        throw new BrokenChainError(
          `Parent backup ${record.parent} of ${record.id} not found in ${root}`,
          parentPath,
        );
      }
      currentPath = parentPath;
    } else {
      currentPath = null;
    }
  }

  assertWellFormed(chain, target);
  return chain;
}

function assertWellFormed(chain: BackupRecord[], target: string): void {
  const head = chain[0];
  if (!head) {
    throw new BrokenChainError("Empty chain", target);
  }

  if (head.kind !== "full") {
    throw new BrokenChainError(
      `Chain for ${path.basename(target)} starts at ${head.id}, which is not a full backup`,
      head.path,
    );
  }

  for (let i = 0; i < chain.length; i++) {
    const record = chain[i];
    if (!record) continue;

    if (record.chainStart !== head.id) {
      throw new BrokenChainError(
        `${record.id} claims chain start ${record.chainStart}, expected ${head.id}`,
        record.path,
      );
    }

    if (i > 0 && record.kind !== "incremental") {
      throw new BrokenChainError(
        `${record.id} is a full backup after the head of chain ${head.id}`,
        record.path,
      );
    }

    const previous = i > 0 ? chain[i - 1] : undefined;
    if (previous && record.timestamp.getTime() <= previous.timestamp.getTime()) {
      throw new BrokenChainError(
        `${record.id} is not newer than its parent ${previous.id}`,
        record.path,
      );
    }
  }
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}
