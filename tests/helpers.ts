import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { type DeepPartial, deepMerge, defaultConfig } from "../src/config/defaults";
import type { CommandResult, CommandRunner } from "../src/postgres";
import type { BackupKind, BackupRecord, PgchainConfig } from "../src/types";
import { MS_PER_DAY } from "../src/utils/format";
import { buildBackupId } from "../src/utils/naming";

export const NOW = new Date("2025-06-01T12:00:00.000Z");

export function daysAgo(days: number, now: Date = NOW): Date {
  return new Date(now.getTime() - days * MS_PER_DAY);
}

export async function createTempDir(prefix = "pgchain-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function testConfig(
  backupDir: string,
  overrides: DeepPartial<PgchainConfig> = {},
): PgchainConfig {
  return deepMerge(defaultConfig(), {
    backupDir,
    restoreDir: path.join(path.dirname(backupDir), `${path.basename(backupDir)}-restore`),
    ...overrides,
  });
}

/**
 * In-memory record, for logic that never touches the disk
 */
export function makeRecord(
  kind: BackupKind,
  timestamp: Date,
  options: { parent?: BackupRecord | null; chainStart?: string; root?: string } = {},
): BackupRecord {
  const id = buildBackupId(kind, timestamp);
  const parent = options.parent ?? null;
  return {
    id,
    path: path.join(options.root ?? "/backups", id),
    timestamp,
    kind,
    parent: parent?.id ?? null,
    chainStart: options.chainStart ?? parent?.chainStart ?? id,
  };
}

export const FULL_MANIFEST = {
  "PostgreSQL-Backup-Manifest-Version": 2,
  Files: [{ Path: "base/1/1259", Size: 8192 }],
};

export const INCREMENTAL_MANIFEST = {
  "PostgreSQL-Backup-Manifest-Version": 2,
  Files: [{ Path: "base/1/INCREMENTAL.1259", Size: 120 }],
};

/**
 * Write a backup directory with metadata.json and a manifest matching its kind
 */
export async function writeBackup(
  root: string,
  record: BackupRecord,
  options: { manifest?: boolean } = {},
): Promise<string> {
  const dir = path.join(root, record.id);
  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(
    path.join(dir, "metadata.json"),
    JSON.stringify({
      timestamp: record.timestamp.toISOString(),
      type: record.kind,
      parent: record.parent,
      chain_start: record.chainStart,
    }),
  );
  if (options.manifest ?? true) {
    const manifest = record.kind === "full" ? FULL_MANIFEST : INCREMENTAL_MANIFEST;
    await fs.writeFile(path.join(dir, "backup_manifest"), JSON.stringify(manifest));
  }
  return dir;
}

/**
 * Build a record rooted at `root` and write it to disk
 */
export async function createBackup(
  root: string,
  kind: BackupKind,
  timestamp: Date,
  options: { parent?: BackupRecord | null; chainStart?: string; manifest?: boolean } = {},
): Promise<BackupRecord> {
  const record = makeRecord(kind, timestamp, { ...options, root });
  await writeBackup(root, record, { manifest: options.manifest });
  return record;
}

export async function exists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch {
    return false;
  }
}

export async function listDir(dir: string): Promise<string[]> {
  return (await fs.readdir(dir)).sort();
}

export interface RecordedCall {
  command: string;
  args: string[];
}

/**
 * Runner that records calls and fakes the PostgreSQL tools' output on disk
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];

  constructor(
    private readonly behavior: (call: RecordedCall) => Promise<CommandResult> = fakeToolOutput,
  ) {}

  async run(command: string, args: string[]): Promise<CommandResult> {
    const call = { command, args };
    this.calls.push(call);
    return this.behavior(call);
  }
}

/**
 * Writes what pg_basebackup or pg_combinebackup would leave behind
 */
export async function fakeToolOutput(call: RecordedCall): Promise<CommandResult> {
  if (path.basename(call.command) === "pg_basebackup") {
    const target = argValue(call.args, "--pgdata=");
    const manifest = argValue(call.args, "--incremental=") ? INCREMENTAL_MANIFEST : FULL_MANIFEST;
    if (target) {
      await fs.mkdir(target, { recursive: true });
      await fs.writeFile(path.join(target, "PG_VERSION"), "17\n");
      await fs.writeFile(path.join(target, "backup_manifest"), JSON.stringify(manifest));
    }
  } else if (path.basename(call.command) === "pg_combinebackup") {
    const outIndex = call.args.indexOf("-o");
    const outputDir = outIndex >= 0 ? call.args[outIndex + 1] : undefined;
    if (outputDir) {
      await fs.mkdir(outputDir, { recursive: true });
      await fs.writeFile(path.join(outputDir, "PG_VERSION"), "17\n");
    }
  }
  return { success: true, exitCode: 0, output: "" };
}

export function failingTool(exitCode = 1, output = "connection refused") {
  return async (): Promise<CommandResult> => ({ success: false, exitCode, output });
}

function argValue(args: string[], prefix: string): string | undefined {
  return args.find((arg) => arg.startsWith(prefix))?.slice(prefix.length);
}
