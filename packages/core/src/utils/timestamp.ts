/**
 * Snapshot timestamps have minute granularity and are written as
 * `YYYY-MM-DD__HHMM` (UTC), which sorts lexicographically in time order.
 */

const SNAPSHOT_ID_PATTERN = /^(\d{4})-(\d{2})-(\d{2})__(\d{2})(\d{2})$/;

const MINUTE_MS = 60_000;

export function truncateToMinute(date: Date): Date {
  return new Date(Math.floor(date.getTime() / MINUTE_MS) * MINUTE_MS);
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

export function formatSnapshotId(date: Date): string {
  return (
    `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}` +
    `__${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}`
  );
}

/**
 * Parse a snapshot id back into a Date. Returns undefined for anything that
 * is not a well-formed id.
 */
export function parseSnapshotId(id: string): Date | undefined {
  const match = SNAPSHOT_ID_PATTERN.exec(id);
  if (!match) return undefined;

  const [, year, month, day, hour, minute] = match.map(Number);
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hour === undefined ||
    minute === undefined
  ) {
    return undefined;
  }

  const date = new Date(Date.UTC(year, month - 1, day, hour, minute));
  // Reject rollovers such as 2025-02-30
  return formatSnapshotId(date) === id ? date : undefined;
}

export function isValidDate(value: Date): boolean {
  return !Number.isNaN(value.getTime());
}
