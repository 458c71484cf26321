/**
 * Scheduler daemon
 *
 * Runs one backup cycle (snapshot, then prune) each time the configured cron
 * expression fires. Cycles never overlap.
 */

import type { PgchainConfig } from "../../types";
import { logger } from "../../utils/logger";
import { type BackupOptions, type BackupResult, runBackup } from "../backup";
import { getNextRun, matchesCron, type ParsedCron, parseCron } from "./cron-parser";

export type BackupCycle = (config: PgchainConfig, options: BackupOptions) => Promise<BackupResult>;

export interface SchedulerStatus {
  cron: string;
  timezone?: string;
  lastRun: Date | null;
  nextRun: Date;
  running: boolean;
}

export class Scheduler {
  private readonly cron: ParsedCron;
  private lastRun: Date | null = null;
  private running = false;
  private cycleInProgress = false;
  private checkInterval: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly config: PgchainConfig,
    private readonly cycle: BackupCycle = runBackup,
  ) {
    this.cron = parseCron(config.schedule.cron, config.schedule.timezone);
    logger.debug(`Parsed schedule: ${config.schedule.cron}`);
  }

  start(): void {
    if (this.running) {
      logger.warn("Scheduler is already running");
      return;
    }

    this.running = true;
    logger.info("Scheduler started");

    this.checkInterval = setInterval(() => {
      this.tick(new Date()).catch((error: unknown) => {
        logger.error(`Scheduler tick failed: ${(error as Error).message}`);
      });
    }, 60 * 1000);
  }

  stop(): void {
    if (!this.running) {
      return;
    }

    this.running = false;

    if (this.checkInterval) {
      clearInterval(this.checkInterval);
      this.checkInterval = null;
    }

    logger.info("Scheduler stopped");
  }

  /**
   * Run a cycle if the schedule fires in the minute of `now`.
   * Returns whether a cycle ran.
   */
  async tick(now: Date): Promise<boolean> {
    const minute = new Date(now);
    minute.setSeconds(0, 0);

    if (!matchesCron(this.cron, minute)) {
      return false;
    }
    if (this.lastRun && this.lastRun.getTime() === minute.getTime()) {
      return false;
    }
    if (this.cycleInProgress) {
      logger.warn("Previous backup cycle still running, skipping this trigger");
      return false;
    }

    this.lastRun = minute;
    this.cycleInProgress = true;
    logger.info("Schedule triggered");

    try {
      const result = await this.cycle(this.config, {});
      logger.info(`Scheduled ${result.kind} backup completed: ${result.backupId}`);
      if (result.prune && result.prune.totalFailed > 0) {
        logger.warn(`Prune finished with ${result.prune.totalFailed} failure(s)`);
      }
    } catch (error) {
      logger.error(`Scheduled backup failed: ${(error as Error).message}`);
    } finally {
      this.cycleInProgress = false;
    }

    return true;
  }

  getStatus(now: Date = new Date()): SchedulerStatus {
    return {
      cron: this.cron.expression,
      timezone: this.cron.timezone,
      lastRun: this.lastRun,
      nextRun: getNextRun(this.cron, now),
      running: this.running,
    };
  }
}
