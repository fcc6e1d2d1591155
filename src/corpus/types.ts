export type Testament = "old" | "new";

export type Genre =
  | "law"
  | "history"
  | "wisdom"
  | "major_prophets"
  | "minor_prophets"
  | "gospels"
  | "acts"
  | "epistles"
  | "apocalyptic";

/**
 * Which part of the canon a plan covers.
 */
export type BibleScope = "complete" | "old_testament" | "new_testament";

export interface Book {
  name: string;
  abbreviation: string;
  /** 1-based position in canonical order (Genesis = 1) */
  position: number;
  testament: Testament;
  genre: Genre;
  chapters: number;
  /** Verses per chapter, index 0 = chapter 1 */
  chapterVerses: readonly number[];
  totalVerses: number;
  totalWords: number;
  author?: string;
}

export interface CorpusStatistics {
  books: number;
  chapters: number;
  verses: number;
  words: number;
  estimatedHours: number;
  averageChaptersPerDay365: number;
}
