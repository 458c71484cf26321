/**
 * Default configuration values
 */

import type { PgchainConfig } from "../types";

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends unknown[] ? T[K] : T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export const DEFAULT_CONFIG: PgchainConfig = {
  version: "1.0",
  backupDir: "/backups",
  restoreDir: "/restore",
  postgres: {
    checkpoint: "fast",
    extraArgs: [],
  },
  retention: {
    fullBackupIntervalDays: 14,
    keepFullDays: 30,
    keepIncrementalDays: 7,
  },
  schedule: {
    cron: "0 2 * * *",
  },
  safety: {
    dryRun: false,
  },
};

export function defaultConfig(): PgchainConfig {
  return structuredClone(DEFAULT_CONFIG);
}

/**
 * Deep merge two objects, with source overriding target
 */
export function deepMerge<T extends object>(target: T, source: DeepPartial<T>): T {
  const result = { ...target };

  for (const key in source) {
    const sourceValue: unknown = source[key];
    const targetValue: unknown = target[key];

    if (
      sourceValue !== undefined &&
      typeof sourceValue === "object" &&
      sourceValue !== null &&
      !Array.isArray(sourceValue) &&
      typeof targetValue === "object" &&
      targetValue !== null &&
      !Array.isArray(targetValue)
    ) {
      (result as Record<string, unknown>)[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      (result as Record<string, unknown>)[key] = sourceValue;
    }
  }

  return result;
}
