/**
 * Configuration validation
 */

import type { PgchainConfig } from "../types";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Validator = (config: Record<string, unknown>) => void;

function requireSection(c: Record<string, unknown>, name: string): Record<string, unknown> {
  const section = c[name];
  if (!section || typeof section !== "object" || Array.isArray(section)) {
    throw new ConfigError(`Config must have a '${name}' section`);
  }
  return section as Record<string, unknown>;
}

function requireDays(section: Record<string, unknown>, prefix: string, key: string): void {
  const value = section[key];
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${prefix}.${key} must be a non-negative number`);
  }
}

const validators: Record<string, Validator> = {
  version: (c) => {
    if (!c.version || typeof c.version !== "string") {
      throw new ConfigError("Config must have a 'version' field");
    }
  },

  directories: (c) => {
    for (const key of ["backupDir", "restoreDir"]) {
      if (!c[key] || typeof c[key] !== "string") {
        throw new ConfigError(`${key} must be a non-empty string`);
      }
    }
  },

  postgres: (c) => {
    const pg = requireSection(c, "postgres");
    if (pg.binDir !== undefined && (typeof pg.binDir !== "string" || pg.binDir.length === 0)) {
      throw new ConfigError("postgres.binDir must be a non-empty string");
    }
    if (pg.checkpoint !== "fast" && pg.checkpoint !== "spread") {
      throw new ConfigError("postgres.checkpoint must be 'fast' or 'spread'");
    }
    if (!Array.isArray(pg.extraArgs) || pg.extraArgs.some((arg) => typeof arg !== "string")) {
      throw new ConfigError("postgres.extraArgs must be an array of strings");
    }
  },

  retention: (c) => {
    const retention = requireSection(c, "retention");
    requireDays(retention, "retention", "fullBackupIntervalDays");
    requireDays(retention, "retention", "keepFullDays");
    requireDays(retention, "retention", "keepIncrementalDays");
  },

  schedule: (c) => {
    const schedule = requireSection(c, "schedule");
    if (!schedule.cron || typeof schedule.cron !== "string") {
      throw new ConfigError("schedule.cron must be a string");
    }
    const fields = schedule.cron.trim().split(/\s+/);
    if (fields.length !== 5) {
      throw new ConfigError(
        `schedule.cron must have 5 fields (minute hour day month weekday), got ${fields.length}`,
      );
    }
    if (schedule.timezone !== undefined && typeof schedule.timezone !== "string") {
      throw new ConfigError("schedule.timezone must be a string");
    }
  },

  safety: (c) => {
    const safety = requireSection(c, "safety");
    if (typeof safety.dryRun !== "boolean") {
      throw new ConfigError("safety.dryRun must be a boolean");
    }
  },
};

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): asserts config is PgchainConfig {
  if (!config || typeof config !== "object") {
    throw new ConfigError("Config must be an object");
  }

  const c = config as Record<string, unknown>;

  for (const validate of Object.values(validators)) {
    validate(c);
  }
}
