/**
 * backup_manifest inspection
 *
 * Only used to cross-check the backup kind; metadata.json stays the source of truth.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";

export const MANIFEST_FILENAME = "backup_manifest";

export type ManifestMode = "full" | "incremental" | "unknown";

export function manifestPath(backupDir: string): string {
  return path.join(backupDir, MANIFEST_FILENAME);
}

export async function hasManifest(backupDir: string): Promise<boolean> {
  try {
    return (await fs.stat(manifestPath(backupDir))).isFile();
  } catch {
    return false;
  }
}

/**
 * Determine the mode recorded by the snapshot tool. An explicit
 * "Backup-Mode" field wins; otherwise INCREMENTAL.* entries in the file
 * list mark an incremental backup.
 */
export function detectManifestMode(manifest: unknown): ManifestMode {
  if (!manifest || typeof manifest !== "object") {
    return "unknown";
  }

  const m = manifest as Record<string, unknown>;
  const mode = m["Backup-Mode"];
  if (mode === "full" || mode === "incremental") {
    return mode;
  }

  if (!Array.isArray(m.Files)) {
    return "unknown";
  }

  const incremental = m.Files.some((file: unknown) => {
    if (!file || typeof file !== "object") return false;
    const entryPath = (file as Record<string, unknown>).Path;
    return typeof entryPath === "string" && path.posix.basename(entryPath).startsWith("INCREMENTAL.");
  });

  return incremental ? "incremental" : "full";
}

export async function readManifestMode(backupDir: string): Promise<ManifestMode> {
  let content: string;
  try {
    content = await fs.readFile(manifestPath(backupDir), "utf8");
  } catch {
    return "unknown";
  }

  try {
    return detectManifestMode(JSON.parse(content));
  } catch {
    return "unknown";
  }
}
