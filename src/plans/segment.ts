import type { CorpusIndex } from "../corpus/corpus-index";
import type { Book } from "../corpus/types";

/**
 * A contiguous chapter range within a single book.
 */
export interface ReadingSegment {
  readonly book: Book;
  readonly startChapter: number;
  readonly endChapter: number;
  readonly verseCount: number;
  readonly wordCount: number;
  readonly estimatedMinutes: number;
}

/**
 * Build a segment with its verse, word and reading-time figures.
 * Out-of-range chapters throw RangeError.
 */
export function createSegment(
  corpus: CorpusIndex,
  book: Book,
  startChapter: number,
  endChapter: number,
): ReadingSegment {
  return Object.freeze({
    book,
    startChapter,
    endChapter,
    verseCount: corpus.versesInRange(book, startChapter, endChapter),
    wordCount: corpus.wordsInRange(book, startChapter, endChapter),
    estimatedMinutes: corpus.readingMinutes(book, startChapter, endChapter),
  });
}

export function chapterCount(segment: ReadingSegment): number {
  return segment.endChapter - segment.startChapter + 1;
}

/** "3" for a single chapter, "1-3" for a range. */
export function formatChapterRange(segment: ReadingSegment): string {
  if (segment.startChapter === segment.endChapter) return String(segment.startChapter);
  return `${segment.startChapter}-${segment.endChapter}`;
}

export function formatSegment(segment: ReadingSegment): string {
  return `${segment.book.name} ${formatChapterRange(segment)}`;
}
