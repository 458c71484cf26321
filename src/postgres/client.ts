/**
 * PostgreSQL backup tool wrapper (pg_basebackup / pg_combinebackup)
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { execa } from "execa";
import type { PostgresConfig } from "../types";
import { logger } from "../utils/logger";

export interface CommandResult {
  success: boolean;
  exitCode: number;
  /** Interleaved stdout and stderr */
  output: string;
}

export interface CommandRunner {
  run(command: string, args: string[]): Promise<CommandResult>;
}

export class SnapshotError extends Error {
  constructor(
    message: string,
    readonly exitCode: number | null = null,
    readonly output: string = "",
  ) {
    super(message);
    this.name = "SnapshotError";
  }
}

/**
 * Runs commands with execa. Never throws on a non-zero exit; the caller
 * decides what a failure means.
 */
export const execaRunner: CommandRunner = {
  async run(command, args) {
    const result = await execa(command, args, { reject: false, all: true });
    const exitCode = typeof result.exitCode === "number" ? result.exitCode : 1;
    return {
      success: !result.failed && exitCode === 0,
      exitCode,
      output: (result.all ?? "").trim(),
    };
  },
};

export interface BaseBackupOptions {
  targetDir: string;
  label: string;
  /** Manifest of the parent backup; makes the backup incremental */
  incrementalManifest?: string;
}

export interface CombineBackupOptions {
  outputDir: string;
  /** Chain paths, oldest (full) first */
  backupPaths: string[];
}

export class PostgresTools {
  constructor(
    private readonly config: PostgresConfig,
    private readonly runner: CommandRunner = execaRunner,
  ) {}

  command(name: string): string {
    return this.config.binDir ? path.join(this.config.binDir, name) : name;
  }

  baseBackupArgs(options: BaseBackupOptions): string[] {
    const args = [
      `--pgdata=${options.targetDir}`,
      "--format=plain",
      `--checkpoint=${this.config.checkpoint}`,
      "--wal-method=stream",
      `--label=${options.label}`,
    ];
    if (options.incrementalManifest) {
      args.push(`--incremental=${options.incrementalManifest}`);
    }
    args.push(...this.config.extraArgs);
    return args;
  }

  /**
   * Take a snapshot. Success requires a zero exit status and a non-empty
   * target directory.
   */
  async baseBackup(options: BaseBackupOptions): Promise<void> {
    await this.execute("pg_basebackup", this.baseBackupArgs(options), options.targetDir);
  }

  /**
   * Combine a full backup and its incrementals into a data directory.
   */
  async combineBackup(options: CombineBackupOptions): Promise<void> {
    if (options.backupPaths.length === 0) {
      throw new SnapshotError("pg_combinebackup needs at least one backup");
    }
    await this.execute(
      "pg_combinebackup",
      ["-o", options.outputDir, ...options.backupPaths],
      options.outputDir,
    );
  }

  private async execute(name: string, args: string[], outputDir: string): Promise<void> {
    const command = this.command(name);
    logger.info(`Executing: ${command} ${args.join(" ")}`);

    const result = await this.runner.run(command, args);
    if (result.output) {
      logger.debug(`${name} output:\n${result.output}`);
    }

    if (!result.success) {
      logger.error(`${name} failed with exit code ${result.exitCode}`);
      if (result.output) {
        logger.error(`${name} output:\n${result.output}`);
      }
      throw new SnapshotError(
        `${name} failed with exit code ${result.exitCode}`,
        result.exitCode,
        result.output,
      );
    }

    if (await isEmptyDir(outputDir)) {
      throw new SnapshotError(
        `${name} exited successfully but produced nothing in ${outputDir}`,
        result.exitCode,
        result.output,
      );
    }

    logger.info(`${name} completed successfully`);
  }
}

async function isEmptyDir(dirPath: string): Promise<boolean> {
  try {
    return (await fs.readdir(dirPath)).length === 0;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return true;
    }
    throw error;
  }
}
