/**
 * Current time as ISO string, clamped so it never precedes `earlier`.
 * Keeps createdAt <= startedAt <= completedAt under clock adjustments.
 */
export function timestampNotBefore(earlier: string | null, now: Date = new Date()): string {
  if (earlier !== null) {
    const floor = new Date(earlier);
    if (!Number.isNaN(floor.getTime()) && floor.getTime() > now.getTime()) {
      return floor.toISOString();
    }
  }
  return now.toISOString();
}

/**
 * When the current process started, to the nearest millisecond.
 */
export function processStartedAt(): string {
  return new Date(Date.now() - process.uptime() * 1000).toISOString();
}
