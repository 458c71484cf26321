/**
 * Configuration file loading
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { PgchainConfig } from "../types";
import { logger } from "../utils/logger";
import { deepMerge, defaultConfig } from "./defaults";
import {
  extractEnvOptions,
  hasInlineOptions,
  type InlineConfigOptions,
  mergeInlineConfig,
} from "./inline";
import { resolvePaths } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

export { ConfigError } from "./validator";

export const CONFIG_FILE_NAMES = [
  "pgchain.config.yaml",
  "pgchain.config.yml",
  "pgchain.config.json",
] as const;

/**
 * Load and parse a config file
 */
export async function loadConfig(configPath: string): Promise<PgchainConfig> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await fs.promises.readFile(absolutePath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      throw new ConfigError(`Config file not found: ${absolutePath}`);
    }
    throw error;
  }

  const parsed = parseConfigContent(content, path.extname(absolutePath).toLowerCase());
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigError(`Config file must contain an object: ${absolutePath}`);
  }

  // The version field is required in files, so it is checked before defaults fill it in
  if (!("version" in parsed) || typeof parsed.version !== "string") {
    throw new ConfigError("Config must have a 'version' field");
  }

  const merged: unknown = deepMerge<object>(defaultConfig(), parsed);
  validateConfig(merged);

  return resolvePaths(merged, path.dirname(absolutePath));
}

export function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${(e as Error).message}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${(e as Error).message}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}

/**
 * Check if running inside a Docker container
 */
function isRunningInDocker(): boolean {
  return fs.existsSync("/.dockerenv");
}

/**
 * Find a config file in the given directory or standard locations
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  const searchDirs = [startDir];

  // Only check /config when running in Docker
  if (isRunningInDocker()) {
    searchDirs.push("/config");
  }

  for (const dir of searchDirs) {
    for (const name of CONFIG_FILE_NAMES) {
      const configPath = path.join(dir, name);
      if (fs.existsSync(configPath) && fs.statSync(configPath).isFile()) {
        return configPath;
      }
    }
  }

  return null;
}

export interface ResolveConfigOptions {
  /** Explicit config file; must exist when given */
  configPath?: string;
  /** CLI flag overrides, applied last */
  inline?: InlineConfigOptions;
  env?: NodeJS.ProcessEnv;
  /** Directory searched for a config file and used to resolve relative overrides */
  cwd?: string;
}

/**
 * Build the effective configuration: file (or defaults), then environment
 * variables, then CLI flags.
 */
export async function resolveConfig(options: ResolveConfigOptions = {}): Promise<PgchainConfig> {
  const cwd = options.cwd ?? process.cwd();
  const configPath = options.configPath ?? findConfigFile(cwd);

  let config: PgchainConfig;
  if (configPath) {
    logger.debug(`Loading config from ${configPath}`);
    config = await loadConfig(configPath);
  } else {
    logger.debug("No config file found, using defaults and environment");
    config = defaultConfig();
  }

  const envOptions = extractEnvOptions(options.env ?? process.env);
  if (hasInlineOptions(envOptions)) {
    config = mergeInlineConfig(config, envOptions);
  }

  if (options.inline && hasInlineOptions(options.inline)) {
    config = mergeInlineConfig(config, options.inline);
  }

  validateConfig(config);
  return resolvePaths(config, cwd);
}
