export {
  type BaseBackupOptions,
  type CombineBackupOptions,
  type CommandResult,
  type CommandRunner,
  execaRunner,
  PostgresTools,
  SnapshotError,
} from "./client";
export {
  detectManifestMode,
  hasManifest,
  MANIFEST_FILENAME,
  type ManifestMode,
  manifestPath,
  readManifestMode,
} from "./manifest";
