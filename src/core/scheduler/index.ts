export { type BackupCycle, Scheduler, type SchedulerStatus } from "./daemon";
export { getNextRun, matchesCron, type ParsedCron, parseCron } from "./cron-parser";
