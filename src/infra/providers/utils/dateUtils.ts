/**
 * Shared date utilities for provider adapters.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Converts a Date to ISO date string (YYYY-MM-DD format).
 * Used for API query parameters that expect date-only strings.
 */
export const toIsoDate = (value: Date): string =>
  value.toISOString().slice(0, 10);

export const addDays = (value: Date, days: number): Date =>
  new Date(value.getTime() + days * DAY_MS);

const CALL_TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2}):(\d{2}))?$/;

/**
 * Parses transcript call dates (`YYYY-MM-DD HH:MM:SS`, or date only) as UTC.
 * Returns null for anything else, including impossible calendar dates.
 */
export const parseCallDate = (raw: string): Date | null => {
  const match = CALL_TIMESTAMP_PATTERN.exec(raw.trim());
  if (!match) {
    return null;
  }

  const [year, month, day, hour, minute, second] = match
    .slice(1)
    .map((part) => (part === undefined ? 0 : Number.parseInt(part, 10)));
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hour === undefined ||
    minute === undefined ||
    second === undefined
  ) {
    return null;
  }

  const parsed = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  if (
    parsed.getUTCMonth() !== month - 1 ||
    parsed.getUTCDate() !== day ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    return null;
  }

  return parsed;
};
