/**
 * Options shared by every command
 */

import {
  extractInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineFlagValues,
  resolveConfig,
} from "../config";
import type { PgchainConfig } from "../types";
import { setLogLevel } from "../utils/logger";

export const COMMON_OPTIONS = {
  config: { type: "string" as const, short: "c" },
  verbose: { type: "boolean" as const, short: "v", default: false },
  help: { type: "boolean" as const, short: "h", default: false },
  ...INLINE_CONFIG_OPTIONS,
};

export const INLINE_OPTIONS_HELP = `      --backup-dir <path>            Backup root directory (env: BACKUP_DIR)
      --restore-dir <path>           Restore target directory (env: RESTORE_DIR)
      --pg-bin-dir <path>            PostgreSQL client binaries (env: PG_BIN_DIR)
      --full-interval-days <n>       Days between full backups (env: FULL_BACKUP_INTERVAL_DAYS)
      --keep-full-days <n>           Retention for full backups (env: KEEP_FULL_DAYS)
      --keep-incremental-days <n>    Retention for incrementals (env: KEEP_INCREMENTAL_DAYS)`;

export interface CommonFlagValues extends InlineFlagValues {
  config?: string;
  verbose?: boolean;
}

/**
 * Apply --verbose and build the effective configuration for a command
 */
export async function loadCommandConfig(values: CommonFlagValues): Promise<PgchainConfig> {
  if (values.verbose) {
    setLogLevel("debug");
  }

  return resolveConfig({
    configPath: values.config,
    inline: extractInlineOptions(values),
  });
}
