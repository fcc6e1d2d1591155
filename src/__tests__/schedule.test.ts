import { describe, test, expect } from "vitest";
import { addDays, parseISO } from "date-fns";
import { CorpusIndex } from "../corpus/corpus-index";
import { ScheduleValidationError } from "../errors";
import { assertValidSchedule, generateDates, generateSchedule, validateSchedule } from "../plans/schedule";
import { isoDate } from "../render/day-note";
import { makeBook, tenEvenChapters } from "./fixtures";

const start = parseISO("2026-01-01");

describe("generateDates", () => {
  test("produces consecutive days across a leap day", () => {
    const dates = generateDates(parseISO("2024-02-27"), 4);
    expect(dates.map(isoDate)).toEqual(["2024-02-27", "2024-02-28", "2024-02-29", "2024-03-01"]);
  });

  test("crosses a year boundary", () => {
    expect(generateDates(parseISO("2025-12-31"), 2).map(isoDate)).toEqual(["2025-12-31", "2026-01-01"]);
  });
});

describe("generateSchedule", () => {
  const oldBook = makeBook("Elder", [40, 40, 40, 40]);
  const newBook = tenEvenChapters({ testament: "new", genre: "gospels", position: 2 });
  const corpus = new CorpusIndex([oldBook, newBook]);

  test("numbers and dates each day of the scoped plan", () => {
    const schedule = generateSchedule(corpus, { startDate: start, days: 5, scope: "new_testament" });
    expect(schedule.map((d) => d.dayNumber)).toEqual([1, 2, 3, 4, 5]);
    expect(schedule.map((d) => isoDate(d.date))).toEqual([
      "2026-01-01",
      "2026-01-02",
      "2026-01-03",
      "2026-01-04",
      "2026-01-05",
    ]);
    expect(schedule.every((d) => d.totalDays === 5)).toBe(true);
    expect(schedule.flatMap((d) => d.segments.map((s) => s.book.name))).not.toContain("Elder");
    expect(validateSchedule(schedule, corpus.scoped("new_testament"))).toEqual([]);
  });

  test("reports the produced day count, not the requested one", () => {
    const pair = new CorpusIndex([makeBook("Pair", [10, 10])]);
    const schedule = generateSchedule(pair, { startDate: start, days: 2, scope: "complete" });
    expect(schedule).toHaveLength(1);
    expect(schedule[0].totalDays).toBe(1);
  });
});

describe("validateSchedule", () => {
  const corpus = new CorpusIndex([tenEvenChapters()]);
  const schedule = generateSchedule(corpus, { startDate: start, days: 5, scope: "complete" });

  test("accepts a generated schedule", () => {
    expect(validateSchedule(schedule, corpus)).toEqual([]);
    expect(() => assertValidSchedule(schedule, corpus)).not.toThrow();
  });

  test("rejects an empty schedule", () => {
    expect(validateSchedule([])).toEqual(["Schedule has no days"]);
  });

  test("detects out-of-sequence day numbers", () => {
    const broken = schedule.map((d) => (d.dayNumber === 2 ? { ...d, dayNumber: 7 } : d));
    expect(validateSchedule(broken)).toEqual(["Day at position 2 is numbered 7"]);
  });

  test("detects a gap in the dates", () => {
    const broken = schedule.map((d) => (d.dayNumber >= 3 ? { ...d, date: addDays(d.date, 1) } : d));
    expect(validateSchedule(broken)).toEqual([
      "Day 3 is dated 2026-01-04, expected the day after 2026-01-02",
    ]);
  });

  test("detects a day with no readings", () => {
    const broken = schedule.map((d) => (d.dayNumber === 5 ? { ...d, segments: [] } : d));
    expect(validateSchedule(broken)).toEqual(["Day 5 has no readings"]);
  });

  test("detects repeated chapters", () => {
    const broken = schedule.map((d) => (d.dayNumber === 2 ? { ...d, segments: schedule[0].segments } : d));
    expect(validateSchedule(broken, corpus)).toEqual(["Day 2: expected Tenfold 3, found Tenfold 1-2"]);
  });

  test("detects missing chapters at the end", () => {
    const truncated = schedule.slice(0, 4).map((d) => ({ ...d, totalDays: 4 }));
    expect(validateSchedule(truncated, corpus)).toEqual(["Schedule ends before Tenfold 9"]);
  });

  test("assertValidSchedule throws with every problem listed", () => {
    const broken = schedule.map((d) => ({ ...d, totalDays: 6 }));
    expect(() => assertValidSchedule(broken)).toThrow(ScheduleValidationError);
    expect(() => assertValidSchedule(broken)).toThrow("Day 1 reports 6 total days, schedule has 5");
  });
});
