import type { Book } from "../corpus/types";

/**
 * Synthetic book for tests. Word count defaults to two words per verse.
 */
export function makeBook(name: string, chapterVerses: number[], overrides: Partial<Book> = {}): Book {
  const totalVerses = chapterVerses.reduce((sum, v) => sum + v, 0);
  return {
    name,
    abbreviation: name.slice(0, 3),
    position: 1,
    testament: "old",
    genre: "law",
    chapters: chapterVerses.length,
    chapterVerses,
    totalVerses,
    totalWords: totalVerses * 2,
    ...overrides,
  };
}

export function tenEvenChapters(overrides: Partial<Book> = {}): Book {
  return makeBook("Tenfold", new Array<number>(10).fill(100), overrides);
}
