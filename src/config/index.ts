/**
 * Configuration module exports
 */

// Defaults
export { DEFAULT_CONFIG, type DeepPartial, deepMerge, defaultConfig } from "./defaults";
// Inline and environment overrides
export {
  buildInlineConfig,
  CONFIG_ENV_VARS,
  extractEnvOptions,
  extractInlineOptions,
  hasInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineConfigOptions,
  type InlineFlagValues,
  mergeInlineConfig,
  parseDays,
} from "./inline";
// Loader
export { CONFIG_FILE_NAMES, findConfigFile, loadConfig, parseConfigContent, resolveConfig } from "./loader";
// Resolver
export { resolvePaths } from "./resolver";
// Validator
export { ConfigError, validateConfig } from "./validator";
