// Date helpers for org timestamps, journal file names and backups.
// All values use local time; org timestamps carry no timezone.

const DAY_NAMES = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"] as const;

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** `2025-12-26` */
export function isoDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${
    pad(date.getDate())
  }`;
}

/** `20251226`, the journal file stem */
export function compactDate(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${
    pad(date.getDate())
  }`;
}

/** `HH:MM` */
export function clockTime(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

/**
 * Org timestamp: `<2025-12-26 Fri 01:45>` when active,
 * `[2025-12-26 Fri 01:45]` when inactive.
 */
export function formatOrgTimestamp(date: Date, active: boolean): string {
  const body = `${isoDate(date)} ${DAY_NAMES[date.getDay()]} ${
    clockTime(date)
  }`;
  return active ? `<${body}>` : `[${body}]`;
}

/** `20251226_014500`, used in backup file names */
export function backupStamp(date: Date): string {
  return `${compactDate(date)}_${pad(date.getHours())}${
    pad(date.getMinutes())
  }${pad(date.getSeconds())}`;
}

/** Parse `YYYYMMDD` or `YYYY-MM-DD` into a local date, or null */
export function parseDay(value: string): Date | null {
  const match = value.match(/^(\d{4})-?(\d{2})-?(\d{2})$/);
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]) - 1;
  const day = Number(match[3]);
  const date = new Date(year, month, day);
  if (
    date.getFullYear() !== year || date.getMonth() !== month ||
    date.getDate() !== day
  ) {
    return null;
  }
  return date;
}

/** Same local day shifted by `days` (negative goes back) */
export function addDays(date: Date, days: number): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days);
}

export const ACTIVE_TIMESTAMP_REGEX =
  /^<\d{4}-\d{2}-\d{2} [A-Z][a-z]{2} \d{2}:\d{2}>$/;
export const INACTIVE_TIMESTAMP_REGEX =
  /^\[\d{4}-\d{2}-\d{2} [A-Z][a-z]{2} \d{2}:\d{2}\]$/;
