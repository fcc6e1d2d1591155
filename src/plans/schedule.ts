/**
 * Schedule builder
 *
 * Turns the distributor's day assignments into dated, numbered StudyDays and
 * checks the result before anything is rendered.
 */

import { addDays, differenceInCalendarDays, format, startOfDay } from "date-fns";
import type { CorpusIndex } from "../corpus/corpus-index";
import type { BibleScope } from "../corpus/types";
import { ScheduleValidationError } from "../errors";
import { distributeReadings } from "./distributor";
import { formatSegment } from "./segment";
import type { StudyDay } from "./study-day";

export interface ScheduleRequest {
  startDate: Date;
  days: number;
  scope: BibleScope;
}

/** `count` consecutive calendar days beginning at `startDate`. */
export function generateDates(startDate: Date, count: number): Date[] {
  const first = startOfDay(startDate);
  return Array.from({ length: count }, (_, i) => addDays(first, i));
}

/**
 * Distribute the scoped corpus over the requested days and attach dates.
 * Day count and `totalDays` come from the distributor's output.
 */
export function generateSchedule(corpus: CorpusIndex, request: ScheduleRequest): StudyDay[] {
  const scoped = corpus.scoped(request.scope);
  const assignments = distributeReadings(scoped, request.days);
  const dates = generateDates(request.startDate, assignments.length);

  return assignments.map((segments, i) => ({
    date: dates[i],
    dayNumber: i + 1,
    totalDays: assignments.length,
    segments,
  }));
}

/**
 * Check that the segments, read in order, cover every chapter of `corpus`
 * exactly once in canonical order. Returns the first problem found, if any.
 */
export function findCoverageProblem(schedule: readonly StudyDay[], corpus: CorpusIndex): string | null {
  const { books } = corpus;
  let bookIndex = 0;
  let chapter = 1;

  for (const day of schedule) {
    for (const segment of day.segments) {
      const expected = books[bookIndex];
      if (!expected) {
        return `Day ${day.dayNumber}: ${formatSegment(segment)} is past the end of the corpus`;
      }
      if (segment.book.name !== expected.name || segment.startChapter !== chapter) {
        return `Day ${day.dayNumber}: expected ${expected.name} ${chapter}, found ${formatSegment(segment)}`;
      }
      if (segment.endChapter < segment.startChapter || segment.endChapter > expected.chapters) {
        return `Day ${day.dayNumber}: invalid chapter range ${formatSegment(segment)}`;
      }
      if (segment.endChapter === expected.chapters) {
        bookIndex++;
        chapter = 1;
      } else {
        chapter = segment.endChapter + 1;
      }
    }
  }

  const missing = books[bookIndex];
  if (missing) {
    return `Schedule ends before ${missing.name} ${chapter}`;
  }
  return null;
}

/**
 * Post-generation checks. An empty list means the schedule is sound.
 * Pass the scoped corpus to also verify chapter coverage.
 */
export function validateSchedule(schedule: readonly StudyDay[], corpus?: CorpusIndex): string[] {
  if (schedule.length === 0) return ["Schedule has no days"];

  const problems: string[] = [];
  schedule.forEach((day, i) => {
    if (day.dayNumber !== i + 1) {
      problems.push(`Day at position ${i + 1} is numbered ${day.dayNumber}`);
    }
    if (day.totalDays !== schedule.length) {
      problems.push(`Day ${day.dayNumber} reports ${day.totalDays} total days, schedule has ${schedule.length}`);
    }
    if (day.segments.length === 0) {
      problems.push(`Day ${day.dayNumber} has no readings`);
    }
    const previous = schedule[i - 1];
    if (previous && differenceInCalendarDays(day.date, previous.date) !== 1) {
      problems.push(
        `Day ${day.dayNumber} is dated ${format(day.date, "yyyy-MM-dd")}, expected the day after ${format(previous.date, "yyyy-MM-dd")}`,
      );
    }
  });

  if (corpus) {
    const coverage = findCoverageProblem(schedule, corpus);
    if (coverage) problems.push(coverage);
  }

  return problems;
}

export function assertValidSchedule(schedule: readonly StudyDay[], corpus?: CorpusIndex): void {
  const problems = validateSchedule(schedule, corpus);
  if (problems.length > 0) throw new ScheduleValidationError(problems);
}
