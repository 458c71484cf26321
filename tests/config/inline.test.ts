import { describe, expect, test } from "vitest";
import {
  buildInlineConfig,
  defaultConfig,
  extractEnvOptions,
  extractInlineOptions,
  hasInlineOptions,
  mergeInlineConfig,
} from "../../src/config";

describe("inline config", () => {
  describe("extractInlineOptions", () => {
    test("maps flag names and parses numbers", () => {
      expect(
        extractInlineOptions({
          "backup-dir": "/backups",
          "pg-bin-dir": "/opt/pg/bin",
          "keep-full-days": "45",
          "keep-incremental-days": "2.5",
          "dry-run": true,
        }),
      ).toEqual({
        backupDir: "/backups",
        restoreDir: undefined,
        pgBinDir: "/opt/pg/bin",
        fullBackupIntervalDays: undefined,
        keepFullDays: 45,
        keepIncrementalDays: 2.5,
        dryRun: true,
      });
    });

    test("leaves dry run unset when the flag is off", () => {
      expect(extractInlineOptions({ "dry-run": false }).dryRun).toBeUndefined();
    });

    test("rejects negative or non-numeric days", () => {
      expect(() => extractInlineOptions({ "keep-full-days": "-3" })).toThrow(
        '--keep-full-days must be a non-negative number of days, got "-3"',
      );
      expect(() => extractInlineOptions({ "full-interval-days": "weekly" })).toThrow(
        '--full-interval-days must be a non-negative number of days, got "weekly"',
      );
    });
  });

  describe("extractEnvOptions", () => {
    test("reads the documented variables", () => {
      expect(
        extractEnvOptions({
          BACKUP_DIR: "/data/backups",
          RESTORE_DIR: "/data/restore",
          PG_BIN_DIR: "/usr/lib/postgresql/17/bin",
          FULL_BACKUP_INTERVAL_DAYS: "7",
          KEEP_FULL_DAYS: "30",
          KEEP_INCREMENTAL_DAYS: "7",
          BACKUP_CRON: "0 3 * * *",
        }),
      ).toEqual({
        backupDir: "/data/backups",
        restoreDir: "/data/restore",
        pgBinDir: "/usr/lib/postgresql/17/bin",
        fullBackupIntervalDays: 7,
        keepFullDays: 30,
        keepIncrementalDays: 7,
        cron: "0 3 * * *",
      });
    });

    test("ignores empty variables", () => {
      const options = extractEnvOptions({ BACKUP_DIR: "", KEEP_FULL_DAYS: " " });

      expect(hasInlineOptions(options)).toBe(false);
    });
  });

  describe("buildInlineConfig", () => {
    test("returns an empty partial without options", () => {
      expect(buildInlineConfig({})).toEqual({});
    });

    test("only includes the retention values that were given", () => {
      expect(buildInlineConfig({ keepFullDays: 10 })).toEqual({ retention: { keepFullDays: 10 } });
    });
  });

  describe("mergeInlineConfig", () => {
    test("overrides nested values and keeps the rest", () => {
      const merged = mergeInlineConfig(defaultConfig(), {
        pgBinDir: "/opt/pg/bin",
        keepIncrementalDays: 1,
        cron: "0 4 * * *",
      });

      expect(merged.postgres).toEqual({ binDir: "/opt/pg/bin", checkpoint: "fast", extraArgs: [] });
      expect(merged.retention).toEqual({
        fullBackupIntervalDays: 14,
        keepFullDays: 30,
        keepIncrementalDays: 1,
      });
      expect(merged.schedule).toEqual({ cron: "0 4 * * *" });
    });
  });
});
