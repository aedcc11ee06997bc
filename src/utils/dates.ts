const MS_PER_DAY = 24 * 60 * 60 * 1000;
const API_DATE_PATTERN = /^(\d{4})(\d{2})(\d{2})$/;

/** Midnight UTC of the calendar day containing `date`. */
export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

export function formatApiDate(date: Date): string {
  const year = date.getUTCFullYear().toString().padStart(4, "0");
  const month = (date.getUTCMonth() + 1).toString().padStart(2, "0");
  const day = date.getUTCDate().toString().padStart(2, "0");
  return `${year}${month}${day}`;
}

/**
 * Parses a YYYYMMDD string into midnight UTC. Rejects strings that do not
 * name a real calendar day (20240230 is not silently rolled into March).
 */
export function parseApiDate(value: string): Date {
  const match = API_DATE_PATTERN.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid date "${value}", expected YYYYMMDD`);
  }
  const [, year, month, day] = match;
  const parsed = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (formatApiDate(parsed) !== value.trim()) {
    throw new Error(`Invalid date "${value}", not a calendar day`);
  }
  return parsed;
}

export function isApiDate(value: string): boolean {
  try {
    parseApiDate(value);
    return true;
  } catch {
    return false;
  }
}

export function nextUtcMidnight(now: Date): Date {
  return addDays(startOfUtcDay(now), 1);
}
