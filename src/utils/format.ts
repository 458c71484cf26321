/**
 * Human-readable formatting helpers
 */

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function ageInDays(timestamp: Date, now: Date): number {
  return (now.getTime() - timestamp.getTime()) / MS_PER_DAY;
}

export function formatAgeDays(days: number): string {
  if (days < 1) {
    const hours = Math.max(0, Math.floor(days * 24));
    return `${hours}h`;
  }
  return `${Math.floor(days)}d`;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const minutes = Math.floor(seconds / 60);
  const remaining = Math.round(seconds % 60);
  return `${minutes}m ${remaining}s`;
}
