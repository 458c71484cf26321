/**
 * Configuration overrides from environment variables and CLI flags
 */

import type { PgchainConfig } from "../types";
import { type DeepPartial, deepMerge } from "./defaults";
import { ConfigError } from "./validator";

/**
 * Inline configuration options that can be passed via CLI flags
 */
export interface InlineConfigOptions {
  /** Root directory holding the backup chains */
  backupDir?: string;
  /** Directory pg_combinebackup writes restored data into */
  restoreDir?: string;
  /** Directory containing the PostgreSQL client binaries */
  pgBinDir?: string;
  fullBackupIntervalDays?: number;
  keepFullDays?: number;
  keepIncrementalDays?: number;
  dryRun?: boolean;
}

/**
 * CLI option definitions for inline config (for parseArgs)
 */
export const INLINE_CONFIG_OPTIONS = {
  "backup-dir": { type: "string" as const },
  "restore-dir": { type: "string" as const },
  "pg-bin-dir": { type: "string" as const },
  "full-interval-days": { type: "string" as const },
  "keep-full-days": { type: "string" as const },
  "keep-incremental-days": { type: "string" as const },
} as const;

export interface InlineFlagValues {
  "backup-dir"?: string;
  "restore-dir"?: string;
  "pg-bin-dir"?: string;
  "full-interval-days"?: string;
  "keep-full-days"?: string;
  "keep-incremental-days"?: string;
  "dry-run"?: boolean;
}

/**
 * Environment variables understood by pgchain
 */
export const CONFIG_ENV_VARS = {
  backupDir: "BACKUP_DIR",
  restoreDir: "RESTORE_DIR",
  pgBinDir: "PG_BIN_DIR",
  fullBackupIntervalDays: "FULL_BACKUP_INTERVAL_DAYS",
  keepFullDays: "KEEP_FULL_DAYS",
  keepIncrementalDays: "KEEP_INCREMENTAL_DAYS",
  cron: "BACKUP_CRON",
} as const;

export function parseDays(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;

  const days = Number(value);
  if (!Number.isFinite(days) || days < 0) {
    throw new ConfigError(`${name} must be a non-negative number of days, got "${value}"`);
  }
  return days;
}

/**
 * Extract inline config options from parsed CLI values
 */
export function extractInlineOptions(values: InlineFlagValues): InlineConfigOptions {
  return {
    backupDir: values["backup-dir"],
    restoreDir: values["restore-dir"],
    pgBinDir: values["pg-bin-dir"],
    fullBackupIntervalDays: parseDays("--full-interval-days", values["full-interval-days"]),
    keepFullDays: parseDays("--keep-full-days", values["keep-full-days"]),
    keepIncrementalDays: parseDays("--keep-incremental-days", values["keep-incremental-days"]),
    dryRun: values["dry-run"] ? true : undefined,
  };
}

/**
 * Read overrides from environment variables
 */
export function extractEnvOptions(env: NodeJS.ProcessEnv): InlineConfigOptions & { cron?: string } {
  return {
    backupDir: env[CONFIG_ENV_VARS.backupDir] || undefined,
    restoreDir: env[CONFIG_ENV_VARS.restoreDir] || undefined,
    pgBinDir: env[CONFIG_ENV_VARS.pgBinDir] || undefined,
    fullBackupIntervalDays: parseDays(
      CONFIG_ENV_VARS.fullBackupIntervalDays,
      env[CONFIG_ENV_VARS.fullBackupIntervalDays],
    ),
    keepFullDays: parseDays(CONFIG_ENV_VARS.keepFullDays, env[CONFIG_ENV_VARS.keepFullDays]),
    keepIncrementalDays: parseDays(
      CONFIG_ENV_VARS.keepIncrementalDays,
      env[CONFIG_ENV_VARS.keepIncrementalDays],
    ),
    cron: env[CONFIG_ENV_VARS.cron] || undefined,
  };
}

/**
 * Build a partial config from inline options
 */
export function buildInlineConfig(
  options: InlineConfigOptions & { cron?: string },
): DeepPartial<PgchainConfig> {
  const config: DeepPartial<PgchainConfig> = {};

  if (options.backupDir) {
    config.backupDir = options.backupDir;
  }
  if (options.restoreDir) {
    config.restoreDir = options.restoreDir;
  }
  if (options.pgBinDir) {
    config.postgres = { binDir: options.pgBinDir };
  }

  if (
    options.fullBackupIntervalDays !== undefined ||
    options.keepFullDays !== undefined ||
    options.keepIncrementalDays !== undefined
  ) {
    config.retention = {};
    if (options.fullBackupIntervalDays !== undefined) {
      config.retention.fullBackupIntervalDays = options.fullBackupIntervalDays;
    }
    if (options.keepFullDays !== undefined) {
      config.retention.keepFullDays = options.keepFullDays;
    }
    if (options.keepIncrementalDays !== undefined) {
      config.retention.keepIncrementalDays = options.keepIncrementalDays;
    }
  }

  if (options.cron) {
    config.schedule = { cron: options.cron };
  }

  if (options.dryRun !== undefined) {
    config.safety = { dryRun: options.dryRun };
  }

  return config;
}

/**
 * Merge inline config options into an existing config
 */
export function mergeInlineConfig(
  baseConfig: PgchainConfig,
  inlineOptions: InlineConfigOptions & { cron?: string },
): PgchainConfig {
  return deepMerge(baseConfig, buildInlineConfig(inlineOptions));
}

/**
 * Check if any inline config options were provided
 */
export function hasInlineOptions(options: InlineConfigOptions): boolean {
  return Object.values(options).some((value) => value !== undefined);
}
