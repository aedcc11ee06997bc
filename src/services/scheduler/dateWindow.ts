import { addDays, formatApiDate, startOfUtcDay } from "../../utils/dates";

/** [startDate, endDate) in whole UTC days. */
export interface CrawlDateWindow {
  startDate: Date;
  endDate: Date;
}

export interface CrawlDateWindowParams {
  crawlSpan: number;
  crawlLag: number;
  startDate?: Date;
}

/**
 * A window `crawlSpan` days long. Without an explicit start it ends
 * `crawlLag` days before today.
 */
export function makeCrawlDateWindow(params: CrawlDateWindowParams, today: Date): CrawlDateWindow {
  const { crawlSpan, crawlLag } = params;
  if (!Number.isInteger(crawlSpan) || crawlSpan <= 0) {
    throw new RangeError(`crawlSpan must be a positive integer, got ${crawlSpan}`);
  }
  if (!Number.isInteger(crawlLag) || crawlLag < 0) {
    throw new RangeError(`crawlLag must be a non-negative integer, got ${crawlLag}`);
  }

  const startDate = startOfUtcDay(params.startDate ?? addDays(startOfUtcDay(today), -(crawlLag + crawlSpan)));
  return { startDate, endDate: addDays(startDate, crawlSpan) };
}

export function crawlDateWindowIsBehindToday(window: CrawlDateWindow, crawlLag: number, today: Date): boolean {
  const todayMinusLag = addDays(startOfUtcDay(today), -crawlLag);
  return startOfUtcDay(window.endDate).getTime() < todayMinusLag.getTime();
}

/** Splits [start, end) into consecutive pieces of at most `maxDays`; an empty range yields itself once. */
export function splitDateRange(startDate: Date, endDate: Date, maxDays: number): CrawlDateWindow[] {
  if (maxDays <= 0) {
    throw new RangeError(`maxDays must be positive, got ${maxDays}`);
  }
  const start = startOfUtcDay(startDate);
  const end = startOfUtcDay(endDate);
  if (end.getTime() < start.getTime()) {
    throw new RangeError(`End date ${formatApiDate(end)} is before start date ${formatApiDate(start)}`);
  }
  if (end.getTime() === start.getTime()) {
    return [{ startDate: start, endDate: end }];
  }

  const windows: CrawlDateWindow[] = [];
  for (let cursor = start; cursor.getTime() < end.getTime(); cursor = addDays(cursor, maxDays)) {
    const next = addDays(cursor, maxDays);
    windows.push({ startDate: cursor, endDate: next.getTime() < end.getTime() ? next : end });
  }
  return windows;
}
