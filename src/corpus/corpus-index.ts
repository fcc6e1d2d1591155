/**
 * Corpus Index
 *
 * Ordered, read-only view over the books of one scope with chapter-range
 * queries. Verse sums come from per-book prefix sums; word counts are
 * estimated from each book's average words per verse.
 */

import { DEFAULT_WORDS_PER_MINUTE } from "../plans/config";
import { selectScope } from "./scope";
import type { BibleScope, Book, CorpusStatistics } from "./types";

function buildPrefixSums(book: Book): number[] {
  // prefix[i] = verses in chapters 1..i
  const prefix = new Array<number>(book.chapters + 1);
  prefix[0] = 0;
  for (let i = 1; i <= book.chapters; i++) {
    prefix[i] = prefix[i - 1] + book.chapterVerses[i - 1];
  }
  return prefix;
}

export class CorpusIndex {
  readonly books: readonly Book[];
  readonly wordsPerMinute: number;
  // Keyed by book object: names need not be unique
  private readonly prefixSums = new WeakMap<Book, number[]>();

  constructor(books: readonly Book[], wordsPerMinute: number = DEFAULT_WORDS_PER_MINUTE) {
    if (!Number.isFinite(wordsPerMinute) || wordsPerMinute <= 0) {
      throw new RangeError(`Reading speed must be a positive number of words per minute (got ${wordsPerMinute})`);
    }
    this.books = Object.freeze([...books]);
    this.wordsPerMinute = wordsPerMinute;
    for (const book of this.books) {
      this.prefixSums.set(book, buildPrefixSums(book));
    }
  }

  /** Index over the subset of these books that falls in `scope`. */
  scoped(scope: BibleScope): CorpusIndex {
    return new CorpusIndex(selectScope(this.books, scope), this.wordsPerMinute);
  }

  get isEmpty(): boolean {
    return this.books.length === 0;
  }

  get totalChapters(): number {
    return this.books.reduce((sum, b) => sum + b.chapters, 0);
  }

  get totalVerses(): number {
    return this.books.reduce((sum, b) => sum + b.totalVerses, 0);
  }

  get totalWords(): number {
    return this.books.reduce((sum, b) => sum + b.totalWords, 0);
  }

  private prefixFor(book: Book): number[] {
    let prefix = this.prefixSums.get(book);
    if (!prefix) {
      prefix = buildPrefixSums(book);
      this.prefixSums.set(book, prefix);
    }
    return prefix;
  }

  /**
   * Verses in chapters `startChapter..endChapter` (1-based, inclusive).
   */
  versesInRange(book: Book, startChapter: number, endChapter: number): number {
    if (startChapter < 1 || endChapter > book.chapters) {
      throw new RangeError(`Invalid chapter range for ${book.name}: ${startChapter}-${endChapter}`);
    }
    if (startChapter > endChapter) {
      throw new RangeError(
        `Start chapter (${startChapter}) cannot be greater than end chapter (${endChapter})`,
      );
    }
    const prefix = this.prefixFor(book);
    return prefix[endChapter] - prefix[startChapter - 1];
  }

  /**
   * Estimated words for a chapter range, assuming uniform words per verse
   * across the book. Truncated toward zero.
   */
  wordsInRange(book: Book, startChapter: number, endChapter: number): number {
    const verses = this.versesInRange(book, startChapter, endChapter);
    const wordsPerVerse = book.totalWords / book.totalVerses;
    return Math.trunc(verses * wordsPerVerse);
  }

  readingMinutes(
    book: Book,
    startChapter: number,
    endChapter: number,
    wordsPerMinute: number = this.wordsPerMinute,
  ): number {
    if (!Number.isFinite(wordsPerMinute) || wordsPerMinute <= 0) {
      throw new RangeError(`Reading speed must be a positive number of words per minute (got ${wordsPerMinute})`);
    }
    return Math.ceil(this.wordsInRange(book, startChapter, endChapter) / wordsPerMinute);
  }

  statistics(): CorpusStatistics {
    const chapters = this.totalChapters;
    const words = this.totalWords;
    return {
      books: this.books.length,
      chapters,
      verses: this.totalVerses,
      words,
      estimatedHours: Math.round((words / this.wordsPerMinute / 60) * 10) / 10,
      averageChaptersPerDay365: Math.round((chapters / 365) * 100) / 100,
    };
  }
}
