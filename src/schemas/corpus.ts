import { z } from "zod";

export const TestamentSchema = z.enum(["old", "new"]);

export const GenreSchema = z.enum([
  "law",
  "history",
  "wisdom",
  "major_prophets",
  "minor_prophets",
  "gospels",
  "acts",
  "epistles",
  "apocalyptic",
]);

/**
 * One entry of old_testament_books.json / new_testament_books.json.
 * Chapter and verse totals must agree with the per-chapter list.
 */
export const BookRecordSchema = z
  .object({
    name: z.string().min(1),
    abbreviation: z.string().min(1),
    testament: TestamentSchema,
    genre: GenreSchema,
    chapters: z.number().int().positive(),
    chapter_verses: z.array(z.number().int().positive()).min(1),
    total_verses: z.number().int().positive(),
    total_words: z.number().int().positive(),
    author: z.string().optional(),
  })
  .superRefine((book, ctx) => {
    if (book.chapter_verses.length !== book.chapters) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["chapter_verses"],
        message: `${book.name}: chapter_verses length (${book.chapter_verses.length}) does not match chapters count (${book.chapters})`,
      });
    }
    const summed = book.chapter_verses.reduce((sum, v) => sum + v, 0);
    if (summed !== book.total_verses) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["total_verses"],
        message: `${book.name}: sum of chapter_verses (${summed}) does not match total_verses (${book.total_verses})`,
      });
    }
  });

export const BookFileSchema = z.array(BookRecordSchema);

export type BookRecord = z.infer<typeof BookRecordSchema>;
