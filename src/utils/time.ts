/**
 * Calendar helpers.
 *
 * Dates are carried as ISO `YYYY-MM-DD` strings ("date keys"). Upstream
 * sources publish in Korea Standard Time, which is a fixed UTC+9 offset with
 * no daylight saving, so local wall-clock values are derived by shifting the
 * instant and reading its UTC fields.
 */

const KST_OFFSET_MS = 9 * 60 * 60 * 1000;
const DAY_MS = 24 * 60 * 60 * 1000;

const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const COMPACT_DATE_PATTERN = /^(\d{4})(\d{2})(\d{2})$/;

export interface LocalDateTime {
  date: string;
  hour: number;
  minute: number;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

function formatUtcDate(instant: Date): string {
  return `${pad(instant.getUTCFullYear(), 4)}-${pad(instant.getUTCMonth() + 1)}-${pad(instant.getUTCDate())}`;
}

/**
 * Validate a `YYYY-MM-DD` string, rejecting impossible days such as
 * `2024-02-30`.
 */
export function isDateKey(value: string): boolean {
  const match = DATE_KEY_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(parsed.getTime()) && formatUtcDate(parsed) === value;
}

/**
 * `20240105` → `2024-01-05`, or `null` when the input is not a real date
 */
export function fromCompactDate(value: string): string | null {
  const match = COMPACT_DATE_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  const key = `${match[1] ?? ""}-${match[2] ?? ""}-${match[3] ?? ""}`;
  return isDateKey(key) ? key : null;
}

export function toCompactDate(dateKey: string): string {
  return dateKey.replaceAll("-", "");
}

export function addDays(dateKey: string, days: number): string {
  const start = new Date(`${dateKey}T00:00:00.000Z`);
  return formatUtcDate(new Date(start.getTime() + days * DAY_MS));
}

/** Midnight UTC of the given day, as an ISO timestamp */
export function dayStartUtc(dateKey: string): string {
  return new Date(`${dateKey}T00:00:00.000Z`).toISOString();
}

/**
 * Inclusive `[start, end]` days → half-open `[start 00:00Z, end+1 00:00Z)`
 */
export function dayRangeBounds(
  start: string,
  end: string
): { from: string; until: string } {
  return { from: dayStartUtc(start), until: dayStartUtc(addDays(end, 1)) };
}

export function toKst(instant: Date): LocalDateTime {
  const shifted = new Date(instant.getTime() + KST_OFFSET_MS);
  return {
    date: formatUtcDate(shifted),
    hour: shifted.getUTCHours(),
    minute: shifted.getUTCMinutes(),
  };
}

export function todayKst(now: Date = new Date()): string {
  return toKst(now).date;
}

/**
 * Korea-local wall-clock time → UTC instant
 */
export function kstToUtc(dateKey: string, hour: number, minute = 0): Date {
  const wallClock = Date.parse(
    `${dateKey}T${pad(hour)}:${pad(minute)}:00.000Z`
  );
  return new Date(wallClock - KST_OFFSET_MS);
}
