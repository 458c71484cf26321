/**
 * Per-backup metadata record (metadata.json)
 *
 * The record is the only persistent state the chain logic relies on.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { BackupKind, BackupRecord, MetadataFile, MetadataReadResult } from "../../types";
import { isPlainName, METADATA_FILENAME } from "../../utils/naming";

export class MetadataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MetadataError";
  }
}

export function metadataPath(backupDir: string): string {
  return path.join(backupDir, METADATA_FILENAME);
}

export function toMetadataFile(record: BackupRecord): MetadataFile {
  return {
    timestamp: record.timestamp.toISOString(),
    type: record.kind,
    parent: record.parent,
    chain_start: record.chainStart,
  };
}

/**
 * Persist a record via write-then-rename, so readers never see a partial file
 * and an existing record survives a crash mid-write.
 */
export async function writeMetadata(backupDir: string, record: BackupRecord): Promise<void> {
  const target = metadataPath(backupDir);
  const temp = `${target}.${process.pid}.tmp`;
  const content = `${JSON.stringify(toMetadataFile(record), null, 2)}\n`;

  try {
    await fs.writeFile(temp, content, { encoding: "utf8", flag: "w" });
    await fs.rename(temp, target);
  } catch (error) {
    await fs.rm(temp, { force: true });
    throw new MetadataError(
      `Failed to write metadata for ${record.id}: ${(error as Error).message}`,
    );
  }
}

/**
 * Read a backup's metadata record.
 *
 * Returns `absent` when there is no metadata file, `corrupt` when the file
 * exists but cannot be turned into a record.
 */
export async function readMetadata(backupDir: string): Promise<MetadataReadResult> {
  let content: string;
  try {
    content = await fs.readFile(metadataPath(backupDir), "utf8");
  } catch (error) {
    if (isNotFound(error)) {
      return { status: "absent" };
    }
    return { status: "corrupt", reason: `unreadable: ${(error as Error).message}` };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    return { status: "corrupt", reason: `invalid JSON: ${(error as Error).message}` };
  }

  return parseMetadata(parsed, backupDir);
}

export function parseMetadata(value: unknown, backupDir: string): MetadataReadResult {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return { status: "corrupt", reason: "metadata is not an object" };
  }

  const m = value as Record<string, unknown>;

  if (typeof m.chain_start !== "string" || m.chain_start.length === 0) {
    return { status: "corrupt", reason: "missing chain_start" };
  }
  if (typeof m.timestamp !== "string" || m.timestamp.length === 0) {
    return { status: "corrupt", reason: "missing timestamp" };
  }

  const timestamp = new Date(m.timestamp);
  if (Number.isNaN(timestamp.getTime())) {
    return { status: "corrupt", reason: `invalid timestamp "${m.timestamp}"` };
  }

  if (m.parent !== undefined && m.parent !== null && typeof m.parent !== "string") {
    return { status: "corrupt", reason: "parent must be a string or null" };
  }
  const parent = typeof m.parent === "string" && m.parent.length > 0 ? m.parent : null;

  if (!isPlainName(m.chain_start)) {
    return { status: "corrupt", reason: `chain_start "${m.chain_start}" is not a backup name` };
  }
  if (parent && !isPlainName(parent)) {
    return { status: "corrupt", reason: `parent "${parent}" is not a backup name` };
  }

  let kind: BackupKind;
  if (m.type === undefined || m.type === null) {
    kind = parent ? "incremental" : "full";
  } else if (m.type === "full" || m.type === "incremental") {
    kind = m.type;
  } else {
    return { status: "corrupt", reason: `unknown backup type "${String(m.type)}"` };
  }

  const resolved = path.resolve(backupDir);
  const id = path.basename(resolved);

  // A full backup always heads its own chain
  if (kind === "full" && parent) {
    return { status: "corrupt", reason: `full backup has parent ${parent}` };
  }
  if (kind === "full" && m.chain_start !== id) {
    return { status: "corrupt", reason: `full backup claims chain start ${m.chain_start}` };
  }

  return {
    status: "ok",
    record: {
      id,
      path: resolved,
      timestamp,
      kind,
      parent,
      chainStart: m.chain_start,
    },
  };
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}
