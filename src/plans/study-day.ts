import type { Genre, Testament } from "../corpus/types";
import { chapterCount, type ReadingSegment } from "./segment";

/**
 * One dated day of a reading plan.
 * `totalDays` is the length of the generated plan, not the requested length.
 */
export interface StudyDay {
  date: Date;
  dayNumber: number;
  totalDays: number;
  segments: readonly ReadingSegment[];
}

export interface StudyDayTotals {
  verses: number;
  words: number;
  minutes: number;
  chapters: number;
}

export function dayTotals(day: StudyDay): StudyDayTotals {
  return day.segments.reduce<StudyDayTotals>(
    (totals, s) => ({
      verses: totals.verses + s.verseCount,
      words: totals.words + s.wordCount,
      minutes: totals.minutes + s.estimatedMinutes,
      chapters: totals.chapters + chapterCount(s),
    }),
    { verses: 0, words: 0, minutes: 0, chapters: 0 },
  );
}

/** Percent of the plan completed after this day, one decimal place. */
export function progressPercentage(day: StudyDay): number {
  return Math.round((day.dayNumber / day.totalDays) * 1000) / 10;
}

function firstSegment(day: StudyDay): ReadingSegment {
  const [first] = day.segments;
  if (!first) throw new Error(`Day ${day.dayNumber} has no readings`);
  return first;
}

export function primaryBook(day: StudyDay): string {
  return firstSegment(day).book.name;
}

export function primaryTestament(day: StudyDay): Testament {
  return firstSegment(day).book.testament;
}

export function primaryGenre(day: StudyDay): Genre {
  return firstSegment(day).book.genre;
}

export function slugifyTag(value: string): string {
  return value.toLowerCase().replace(/[\s_]+/g, "-");
}

/** Base tags followed by the day's primary testament and genre. */
export function dayTags(day: StudyDay, baseTags: readonly string[]): string[] {
  return [...baseTags, primaryTestament(day), slugifyTag(primaryGenre(day))];
}
