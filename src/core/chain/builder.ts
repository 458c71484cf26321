/**
 * Chain discovery
 *
 * Scans a backup root, classifies every entry and groups the valid records
 * into chains keyed by their originating full backup.
 */

import type { Dirent } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { BackupRecord, Chain, ScanEntry, ScanResult } from "../../types";
import { logger } from "../../utils/logger";
import { hasBackupTimestampPrefix, isQuarantinedName } from "../../utils/naming";
import { readMetadata } from "../metadata";

export async function scanBackupRoot(root: string): Promise<ScanResult> {
  const absoluteRoot = path.resolve(root);
  const result: ScanResult = {
    root: absoluteRoot,
    valid: [],
    corrupt: [],
    quarantined: [],
    ignored: [],
  };

  let entries: Dirent[];
  try {
    entries = await fs.readdir(absoluteRoot, { withFileTypes: true });
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      logger.debug(`Backup root does not exist yet: ${absoluteRoot}`);
      return result;
    }
    throw error;
  }

  const names = entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();

  for (const name of names) {
    const entry = await classifyEntry(absoluteRoot, name);
    switch (entry.status) {
      case "valid":
        result.valid.push(entry.record);
        break;
      case "corrupt":
        logger.debug(`Detected corrupt or incomplete backup ${name}: ${entry.reason}`);
        result.corrupt.push(entry);
        break;
      case "quarantined":
        result.quarantined.push(entry);
        break;
      case "ignored":
        logger.debug(`Ignoring non-backup directory: ${name}`);
        result.ignored.push(entry);
        break;
    }
  }

  return result;
}

async function classifyEntry(root: string, name: string): Promise<ScanEntry> {
  const entryPath = path.join(root, name);

  if (isQuarantinedName(name)) {
    return { status: "quarantined", path: entryPath, name };
  }
  if (name.startsWith(".")) {
    return { status: "ignored", path: entryPath, name };
  }

  const metadata = await readMetadata(entryPath);
  switch (metadata.status) {
    case "ok":
      return { status: "valid", record: metadata.record };
    case "corrupt":
      return { status: "corrupt", path: entryPath, name, reason: metadata.reason };
    case "absent":
      // A backup-named directory without a record never finished
      return hasBackupTimestampPrefix(name)
        ? { status: "corrupt", path: entryPath, name, reason: "missing metadata" }
        : { status: "ignored", path: entryPath, name };
  }
}

/**
 * Group records by chain_start. Chains come back ordered by their full
 * backup's timestamp, orphaned chains last.
 */
export function groupChains(records: BackupRecord[]): Chain[] {
  const byId = new Map<string, BackupRecord>();
  for (const record of records) {
    byId.set(record.id, record);
  }

  const groups = new Map<string, BackupRecord[]>();
  for (const record of records) {
    const group = groups.get(record.chainStart);
    if (group) {
      group.push(record);
    } else {
      groups.set(record.chainStart, [record]);
    }
  }

  const chains: Chain[] = [];

  for (const [chainStart, group] of groups) {
    const members = [...group].sort((a, b) => compareIds(a.id, b.id));
    const head = byId.get(chainStart);
    const problems: string[] = [];

    let full: BackupRecord | null = null;
    if (!head) {
      problems.push(`chain start ${chainStart} not found in backup root`);
    } else if (head.kind !== "full") {
      problems.push(`chain start ${chainStart} is not a full backup`);
    } else if (head.chainStart !== head.id) {
      problems.push(`chain start ${chainStart} belongs to chain ${head.chainStart}`);
    } else {
      full = head;
    }

    const memberIds = new Set(members.map((m) => m.id));
    const incrementals = members.filter((m) => m !== full);

    for (const member of incrementals) {
      if (member.kind === "full") {
        problems.push(`${member.id} is a full backup inside chain ${chainStart}`);
      } else if (!member.parent) {
        problems.push(`${member.id} has no parent`);
      } else if (!memberIds.has(member.parent)) {
        problems.push(`${member.id} references missing parent ${member.parent}`);
      }
    }

    chains.push({
      chainStart,
      full,
      incrementals,
      members,
      orphaned: full === null,
      problems,
    });
  }

  return chains.sort(compareChains);
}

export async function buildChains(root: string): Promise<{ scan: ScanResult; chains: Chain[] }> {
  const scan = await scanBackupRoot(root);
  return { scan, chains: groupChains(scan.valid) };
}

/**
 * Oldest timestamp among a chain's incrementals, or null when there are none
 */
export function oldestIncremental(chain: Chain): BackupRecord | null {
  let oldest: BackupRecord | null = null;
  for (const record of chain.incrementals) {
    if (!oldest || record.timestamp.getTime() < oldest.timestamp.getTime()) {
      oldest = record;
    }
  }
  return oldest;
}

/**
 * Newest member of a chain (the chain tip)
 */
export function chainTip(chain: Chain): BackupRecord | null {
  return chain.members[chain.members.length - 1] ?? null;
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareChains(a: Chain, b: Chain): number {
  if (a.full && b.full) {
    const diff = a.full.timestamp.getTime() - b.full.timestamp.getTime();
    return diff !== 0 ? diff : compareIds(a.chainStart, b.chainStart);
  }
  if (a.full) return -1;
  if (b.full) return 1;
  return compareIds(a.chainStart, b.chainStart);
}
