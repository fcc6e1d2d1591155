/**
 * Canon loader
 *
 * Reads the two bundled book files (Old Testament, then New Testament),
 * validates every record and assigns canonical positions in file order.
 *
 * Data directory: BIBLE_DATA_DIR, or the repository's data/ folder.
 */

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { fileURLToPath } from "url";
import { BookFileSchema, type BookRecord } from "../schemas/corpus";
import { CorpusDataError } from "../errors";
import type { Book, Testament } from "./types";

export const OLD_TESTAMENT_FILE = "old_testament_books.json";
export const NEW_TESTAMENT_FILE = "new_testament_books.json";

export function getBibleDataDir(): string {
  return process.env.BIBLE_DATA_DIR || fileURLToPath(new URL("../../data", import.meta.url));
}

function readBookFile(path: string): unknown {
  if (!existsSync(path)) {
    throw new CorpusDataError(`Bible data file not found: ${path}`);
  }
  try {
    return JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CorpusDataError(`Bible data file is not valid JSON: ${path} (${reason})`);
  }
}

function toBook(record: BookRecord, position: number): Book {
  return {
    name: record.name,
    abbreviation: record.abbreviation,
    position,
    testament: record.testament,
    genre: record.genre,
    chapters: record.chapters,
    chapterVerses: Object.freeze([...record.chapter_verses]),
    totalVerses: record.total_verses,
    totalWords: record.total_words,
    author: record.author,
  };
}

/**
 * Validate raw JSON from one book file and convert it to Books.
 * Positions start at `firstPosition` and follow array order.
 */
export function parseBookRecords(
  raw: unknown,
  source: string,
  options: { firstPosition?: number; testament?: Testament } = {},
): Book[] {
  const { firstPosition = 1, testament } = options;
  const result = BookFileSchema.safeParse(raw);
  if (!result.success) {
    throw new CorpusDataError(
      `Invalid Bible data in ${source}`,
      result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    );
  }

  if (testament) {
    const misplaced = result.data.filter((r) => r.testament !== testament);
    if (misplaced.length > 0) {
      throw new CorpusDataError(
        `Invalid Bible data in ${source}`,
        misplaced.map((r) => `${r.name}: expected testament "${testament}", found "${r.testament}"`),
      );
    }
  }

  return result.data.map((record, i) => toBook(record, firstPosition + i));
}

function assertUniqueNames(books: Book[]): void {
  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const book of books) {
    if (seen.has(book.name)) duplicates.push(`duplicate book name: ${book.name}`);
    seen.add(book.name);
  }
  if (duplicates.length > 0) {
    throw new CorpusDataError("Invalid Bible data", duplicates);
  }
}

/**
 * Load the full canon (Genesis → Revelation).
 * Any inconsistency in the data files throws CorpusDataError.
 */
export function loadCanon(dataDir: string = getBibleDataDir()): Book[] {
  const oldTestament = parseBookRecords(
    readBookFile(join(dataDir, OLD_TESTAMENT_FILE)),
    OLD_TESTAMENT_FILE,
    { testament: "old" },
  );
  const newTestament = parseBookRecords(
    readBookFile(join(dataDir, NEW_TESTAMENT_FILE)),
    NEW_TESTAMENT_FILE,
    { firstPosition: oldTestament.length + 1, testament: "new" },
  );

  const books = [...oldTestament, ...newTestament];
  assertUniqueNames(books);
  return books;
}
