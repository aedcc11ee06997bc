import { describe, it, expect } from "vitest";
import { formatApiDate, parseApiDate } from "../../../utils/dates";
import { crawlDateWindowIsBehindToday, makeCrawlDateWindow, splitDateRange, type CrawlDateWindow } from "../dateWindow";

const asApiDates = (windows: CrawlDateWindow[]) =>
  windows.map((window) => [formatApiDate(window.startDate), formatApiDate(window.endDate)]);

describe("makeCrawlDateWindow", () => {
  it("ends crawlLag days before today", () => {
    const window = makeCrawlDateWindow({ crawlSpan: 3, crawlLag: 2 }, new Date("2024-03-10T15:00:00Z"));

    expect(asApiDates([window])).toEqual([["20240305", "20240308"]]);
  });

  it("starts at an explicit date, truncated to the day", () => {
    const window = makeCrawlDateWindow(
      { crawlSpan: 3, crawlLag: 2, startDate: new Date("2024-03-01T13:00:00Z") },
      new Date("2024-03-10T15:00:00Z"),
    );

    expect(asApiDates([window])).toEqual([["20240301", "20240304"]]);
  });

  it("allows a zero lag", () => {
    const window = makeCrawlDateWindow({ crawlSpan: 1, crawlLag: 0 }, new Date("2024-03-10T15:00:00Z"));

    expect(asApiDates([window])).toEqual([["20240309", "20240310"]]);
  });

  it("rejects non-positive spans and negative lags", () => {
    const today = new Date("2024-03-10T00:00:00Z");
    expect(() => makeCrawlDateWindow({ crawlSpan: 0, crawlLag: 1 }, today)).toThrow(RangeError);
    expect(() => makeCrawlDateWindow({ crawlSpan: 1, crawlLag: -1 }, today)).toThrow(RangeError);
  });
});

describe("crawlDateWindowIsBehindToday", () => {
  const today = new Date("2024-03-10T08:00:00Z");

  it("is false once the window ends exactly at today minus lag", () => {
    const window = { startDate: parseApiDate("20240307"), endDate: parseApiDate("20240309") };

    expect(crawlDateWindowIsBehindToday(window, 1, today)).toBe(false);
  });

  it("is true while the window ends earlier", () => {
    const window = { startDate: parseApiDate("20240306"), endDate: parseApiDate("20240308") };

    expect(crawlDateWindowIsBehindToday(window, 1, today)).toBe(true);
  });
});

describe("splitDateRange", () => {
  it("cuts a range into pieces of at most maxDays", () => {
    expect(asApiDates(splitDateRange(parseApiDate("20240101"), parseApiDate("20240117"), 7))).toEqual([
      ["20240101", "20240108"],
      ["20240108", "20240115"],
      ["20240115", "20240117"],
    ]);
  });

  it("keeps a range that fits in one piece", () => {
    expect(asApiDates(splitDateRange(parseApiDate("20240101"), parseApiDate("20240108"), 7))).toEqual([
      ["20240101", "20240108"],
    ]);
  });

  it("returns an empty range once", () => {
    expect(asApiDates(splitDateRange(parseApiDate("20240101"), parseApiDate("20240101"), 7))).toEqual([
      ["20240101", "20240101"],
    ]);
  });

  it("rejects an end before the start", () => {
    expect(() => splitDateRange(parseApiDate("20240102"), parseApiDate("20240101"), 7)).toThrow(
      "End date 20240101 is before start date 20240102",
    );
  });
});
