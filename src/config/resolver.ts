/**
 * Configuration path resolution
 */

import * as path from "node:path";
import type { PgchainConfig } from "../types";

/**
 * Resolve relative paths in config to absolute paths, relative to `baseDir`
 */
export function resolvePaths(config: PgchainConfig, baseDir: string): PgchainConfig {
  const resolve = (p: string) => (path.isAbsolute(p) ? p : path.resolve(baseDir, p));

  return {
    ...config,
    backupDir: resolve(config.backupDir),
    restoreDir: resolve(config.restoreDir),
    postgres: {
      ...config.postgres,
      ...(config.postgres.binDir ? { binDir: resolve(config.postgres.binDir) } : {}),
    },
  };
}
