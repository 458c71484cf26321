import * as fs from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { BrokenChainError } from "../../src/core/chain";
import {
  assertSafeRestoreDir,
  recoveryInstructions,
  resolveRestoreTarget,
  RestoreError,
  runRestore,
} from "../../src/core/restore";
import { PostgresTools } from "../../src/postgres";
import type { PgchainConfig } from "../../src/types";
import {
  createBackup,
  createTempDir,
  daysAgo,
  FakeRunner,
  failingTool,
  listDir,
  NOW,
  removeDir,
  testConfig,
} from "../helpers";

describe("restore", () => {
  let tempDir: string;
  let backupDir: string;
  let restoreDir: string;
  let config: PgchainConfig;

  beforeEach(async () => {
    tempDir = await createTempDir();
    backupDir = path.join(tempDir, "backups");
    restoreDir = path.join(tempDir, "restore");
    await fs.mkdir(backupDir);
    config = testConfig(backupDir, { restoreDir });
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(tempDir);
  });

  describe("runRestore", () => {
    test("combines the chain oldest first into the restore directory", async () => {
      const full = await createBackup(backupDir, "full", daysAgo(3));
      const inc1 = await createBackup(backupDir, "incremental", daysAgo(2), { parent: full });
      const inc2 = await createBackup(backupDir, "incremental", daysAgo(1), { parent: inc1 });
      const runner = new FakeRunner();

      const result = await runRestore(config, {
        target: inc2.id,
        tools: new PostgresTools(config.postgres, runner),
      });

      expect(runner.calls).toEqual([
        {
          command: "pg_combinebackup",
          args: ["-o", restoreDir, full.path, inc1.path, inc2.path],
        },
      ]);
      expect(result.target.id).toBe(inc2.id);
      expect(result.chain.map((r) => r.id)).toEqual([full.id, inc1.id, inc2.id]);
      expect(result.nextSteps).toHaveLength(4);
      expect(await listDir(restoreDir)).toEqual(["PG_VERSION"]);
    });

    test("accepts a target path", async () => {
      const full = await createBackup(backupDir, "full", daysAgo(3));
      const runner = new FakeRunner();

      const result = await runRestore(config, {
        target: full.path,
        tools: new PostgresTools(config.postgres, runner),
      });

      expect(result.chain).toEqual([full]);
    });

    test("never runs the combination tool on a broken chain", async () => {
      const full = await createBackup(backupDir, "full", daysAgo(3));
      const inc = await createBackup(backupDir, "incremental", daysAgo(2), { parent: full });
      await fs.rm(full.path, { recursive: true });
      const runner = new FakeRunner();

      await expect(
        runRestore(config, { target: inc.id, tools: new PostgresTools(config.postgres, runner) }),
      ).rejects.toBeInstanceOf(BrokenChainError);
      expect(runner.calls).toEqual([]);
    });

    test("refuses a non-empty restore directory", async () => {
      const full = await createBackup(backupDir, "full", daysAgo(3));
      await fs.mkdir(restoreDir);
      await fs.writeFile(path.join(restoreDir, "leftover"), "data");
      const runner = new FakeRunner();

      await expect(
        runRestore(config, { target: full.id, tools: new PostgresTools(config.postgres, runner) }),
      ).rejects.toThrow(`Restore directory ${restoreDir} is not empty. Clear it or pass --force.`);
      expect(runner.calls).toEqual([]);
      expect(await listDir(restoreDir)).toEqual(["leftover"]);
    });

    test("clears a non-empty restore directory when forced", async () => {
      const full = await createBackup(backupDir, "full", daysAgo(3));
      await fs.mkdir(restoreDir);
      await fs.writeFile(path.join(restoreDir, "leftover"), "data");

      await runRestore(config, {
        target: full.id,
        force: true,
        tools: new PostgresTools(config.postgres, new FakeRunner()),
      });

      expect(await listDir(restoreDir)).toEqual(["PG_VERSION"]);
    });

    test("propagates combination tool failures", async () => {
      const full = await createBackup(backupDir, "full", daysAgo(3));
      const runner = new FakeRunner(failingTool(1, "invalid backup"));

      await expect(
        runRestore(config, { target: full.id, tools: new PostgresTools(config.postgres, runner) }),
      ).rejects.toThrow("pg_combinebackup failed with exit code 1");
    });

    test("dry run leaves the restore directory alone", async () => {
      const full = await createBackup(backupDir, "full", daysAgo(3));
      const runner = new FakeRunner();

      const result = await runRestore(config, {
        target: full.id,
        dryRun: true,
        tools: new PostgresTools(config.postgres, runner),
      });

      expect(result.dryRun).toBe(true);
      expect(runner.calls).toEqual([]);
      await expect(fs.stat(restoreDir)).rejects.toThrow();
    });
  });

  describe("resolveRestoreTarget", () => {
    test("picks the newest backup at or before the instant", async () => {
      const full = await createBackup(backupDir, "full", daysAgo(3));
      const inc1 = await createBackup(backupDir, "incremental", daysAgo(2), { parent: full });
      await createBackup(backupDir, "incremental", daysAgo(1), { parent: inc1 });

      expect(await resolveRestoreTarget(config, { at: daysAgo(2) })).toBe(inc1.path);
      expect(await resolveRestoreTarget(config, { at: daysAgo(1.5) })).toBe(inc1.path);
      expect(await resolveRestoreTarget(config, { at: daysAgo(2.5) })).toBe(full.path);
    });

    test("fails when nothing is old enough", async () => {
      await createBackup(backupDir, "full", daysAgo(3));

      await expect(resolveRestoreTarget(config, { at: daysAgo(4) })).rejects.toThrow(
        `No backup found on or before ${daysAgo(4).toISOString()}`,
      );
    });

    test("rejects a target and an instant together", async () => {
      await expect(
        resolveRestoreTarget(config, { target: "x", at: NOW }),
      ).rejects.toBeInstanceOf(RestoreError);
    });

    test("requires a target or an instant", async () => {
      await expect(resolveRestoreTarget(config, {})).rejects.toThrow(
        "Restore requires a target backup or a point in time",
      );
    });

    test("fails for an unknown id", async () => {
      await expect(
        resolveRestoreTarget(config, { target: "2025-01-01_00-00-00_full" }),
      ).rejects.toThrow(
        `Target backup path does not exist: ${path.join(backupDir, "2025-01-01_00-00-00_full")}`,
      );
    });
  });

  describe("assertSafeRestoreDir", () => {
    test("rejects overlapping directories", () => {
      expect(() => assertSafeRestoreDir("/data/backups", "/data/backups")).toThrow(RestoreError);
      expect(() => assertSafeRestoreDir("/data/backups/restore", "/data/backups")).toThrow(
        RestoreError,
      );
      expect(() => assertSafeRestoreDir("/data", "/data/backups")).toThrow(RestoreError);
    });

    test("accepts separate directories", () => {
      expect(() => assertSafeRestoreDir("/data/restore", "/data/backups")).not.toThrow();
    });
  });

  describe("recoveryInstructions", () => {
    test("includes the recovery target when restoring to a point in time", () => {
      const steps = recoveryInstructions("/restore", new Date("2025-05-30T08:00:00Z"));

      expect(steps[0]).toBe(
        "Set recovery_target_time = '2025-05-30T08:00:00.000Z' and recovery_target_action = 'promote' in /restore/postgresql.conf",
      );
      expect(steps[1]).toBe("Create a recovery signal file: touch /restore/recovery.signal");
    });
  });
});
