/**
 * Chapter distribution
 *
 * Walks the corpus front to back and cuts it into days. Each day aims for
 * (verses not yet in a finished day) / (days not yet finished), recomputed
 * for every segment, so the target drifts as the walk progresses.
 *
 * Segment growth, for a segment starting at the current chapter:
 *   - books of SHORT_BOOK_MAX_CHAPTERS or fewer, entered at chapter 1, are taken whole
 *   - otherwise add chapters one at a time; stop before a chapter that would push a
 *     non-empty day over target, or stop right after the chapter that brings the day
 *     to SEGMENT_STOP_RATIO of target
 *
 * A day closes once it holds DAY_CLOSE_RATIO of its target, except the last day,
 * which absorbs whatever remains. Finished days are never revisited.
 */

import type { CorpusIndex } from "../corpus/corpus-index";
import type { Book } from "../corpus/types";
import { EmptyCorpusError, InvalidDayCountError } from "../errors";
import { DAY_CLOSE_RATIO, SEGMENT_STOP_RATIO, SHORT_BOOK_MAX_CHAPTERS } from "./config";
import { createSegment, type ReadingSegment } from "./segment";

export type DayAssignment = ReadingSegment[];

/**
 * Last chapter of the segment that starts at `startChapter`.
 */
function findSegmentEnd(
  corpus: CorpusIndex,
  book: Book,
  startChapter: number,
  dayVerses: number,
  idealVersesToday: number,
): number {
  if (book.chapters <= SHORT_BOOK_MAX_CHAPTERS && startChapter === 1) {
    return book.chapters;
  }

  let endChapter = startChapter;
  while (endChapter < book.chapters) {
    const withNext = dayVerses + corpus.versesInRange(book, startChapter, endChapter + 1);

    if (withNext > idealVersesToday && dayVerses > 0) break;

    endChapter++;
    if (withNext >= idealVersesToday * SEGMENT_STOP_RATIO) break;
  }
  return endChapter;
}

/**
 * Split every chapter of `corpus` into at most `days` daily readings, in
 * canonical order. The result can be shorter than `days` when the content runs
 * out early; callers should treat its length as the plan length.
 */
export function distributeReadings(corpus: CorpusIndex, days: number): DayAssignment[] {
  if (!Number.isInteger(days) || days < 1) {
    throw new InvalidDayCountError(days);
  }
  if (corpus.isEmpty) {
    throw new EmptyCorpusError();
  }

  const { books } = corpus;
  const totalVerses = corpus.totalVerses;

  const assignments: DayAssignment[] = [];
  let currentDay: ReadingSegment[] = [];
  let dayVerses = 0;
  let finalizedVerses = 0;

  let bookIndex = 0;
  let chapter = 1;

  while (bookIndex < books.length) {
    const book = books[bookIndex];

    // Closing only happens while more than one day is left, so this stays >= 1
    const daysRemaining = days - assignments.length;
    const idealVersesToday = (totalVerses - finalizedVerses) / daysRemaining;

    const endChapter = findSegmentEnd(corpus, book, chapter, dayVerses, idealVersesToday);
    const segment = createSegment(corpus, book, chapter, endChapter);
    currentDay.push(segment);
    dayVerses += segment.verseCount;

    if (endChapter >= book.chapters) {
      bookIndex++;
      chapter = 1;
    } else {
      chapter = endChapter + 1;
    }

    if (daysRemaining > 1 && dayVerses >= idealVersesToday * DAY_CLOSE_RATIO) {
      assignments.push(currentDay);
      finalizedVerses += dayVerses;
      currentDay = [];
      dayVerses = 0;
    }
  }

  if (currentDay.length > 0) {
    assignments.push(currentDay);
  }

  return assignments;
}
