/**
 * Cron expression handling using the cron-parser library
 *
 * Supports: minute hour day-of-month month day-of-week
 *
 * Examples:
 *   "0 2 * * *"      - Every day at 2:00 AM
 *   "0 0,12 * * *"   - Twice a day
 *   "30 1 * * 0"     - Every Sunday at 1:30 AM
 */

import { CronExpressionParser } from "cron-parser";

export interface ParsedCron {
  expression: string;
  timezone?: string;
}

export function parseCron(expression: string, timezone?: string): ParsedCron {
  const fields = expression.trim().split(/\s+/);
  if (fields.length !== 5) {
    throw new Error(
      `Invalid cron expression: "${expression}". Expected 5 fields, got ${fields.length}.`,
    );
  }

  // Throws on malformed fields
  CronExpressionParser.parse(expression, timezone ? { tz: timezone } : undefined);
  return { expression, timezone };
}

export function getNextRun(cron: ParsedCron, fromDate: Date = new Date()): Date {
  const interval = CronExpressionParser.parse(cron.expression, {
    currentDate: fromDate,
    ...(cron.timezone ? { tz: cron.timezone } : {}),
  });
  return interval.next().toDate();
}

/**
 * Whether the expression fires during the minute containing `date`
 */
export function matchesCron(cron: ParsedCron, date: Date): boolean {
  const minute = new Date(date);
  minute.setSeconds(0, 0);

  const next = getNextRun(cron, new Date(minute.getTime() - 60_000));
  next.setSeconds(0, 0);

  return next.getTime() === minute.getTime();
}
