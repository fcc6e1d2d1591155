import { describe, test, expect } from "vitest";
import { CorpusIndex } from "../corpus/corpus-index";
import { makeBook } from "./fixtures";

const ladder = makeBook("Ladder", [10, 20, 30, 40], { totalWords: 200 });

describe("versesInRange", () => {
  const corpus = new CorpusIndex([ladder]);

  test("sums a single chapter", () => {
    expect(corpus.versesInRange(ladder, 1, 1)).toBe(10);
  });

  test("sums an inner range inclusively", () => {
    expect(corpus.versesInRange(ladder, 2, 3)).toBe(50);
  });

  test("sums the whole book", () => {
    expect(corpus.versesInRange(ladder, 1, 4)).toBe(100);
  });

  test("matches a direct sum for every range", () => {
    for (let a = 1; a <= 4; a++) {
      for (let b = a; b <= 4; b++) {
        const expected = ladder.chapterVerses.slice(a - 1, b).reduce((s, v) => s + v, 0);
        expect(corpus.versesInRange(ladder, a, b)).toBe(expected);
      }
    }
  });

  test("rejects a start chapter below 1", () => {
    expect(() => corpus.versesInRange(ladder, 0, 2)).toThrow(RangeError);
  });

  test("rejects an end chapter past the book", () => {
    expect(() => corpus.versesInRange(ladder, 1, 5)).toThrow(RangeError);
  });

  test("rejects start after end", () => {
    expect(() => corpus.versesInRange(ladder, 3, 2)).toThrow(
      "Start chapter (3) cannot be greater than end chapter (2)",
    );
  });

  test("works for books the index was not built with", () => {
    const other = makeBook("Other", [7, 8]);
    expect(corpus.versesInRange(other, 1, 2)).toBe(15);
  });

  test("uses the given book's counts when another book has the same name", () => {
    const namesake = makeBook("Ladder", [1, 1]);
    expect(corpus.versesInRange(namesake, 1, 2)).toBe(2);
    expect(corpus.versesInRange(ladder, 1, 2)).toBe(30);
  });

  test("keeps separate sums for indexed books sharing a name", () => {
    const heavy = makeBook("Same", [100, 100, 100, 100]);
    const light = makeBook("Same", [1, 1, 1, 1]);
    const twins = new CorpusIndex([heavy, light]);
    expect(twins.versesInRange(heavy, 1, 4)).toBe(400);
    expect(twins.versesInRange(light, 1, 4)).toBe(4);
    expect(twins.totalVerses).toBe(404);
  });
});

describe("wordsInRange", () => {
  test("scales verses by the book's words per verse", () => {
    const corpus = new CorpusIndex([ladder]);
    // 50 verses * (200 / 100)
    expect(corpus.wordsInRange(ladder, 2, 3)).toBe(100);
  });

  test("truncates fractional estimates toward zero", () => {
    const uneven = makeBook("Uneven", [3, 4], { totalWords: 10 });
    const corpus = new CorpusIndex([uneven]);
    // 3 * 10/7 = 4.28..., 4 * 10/7 = 5.71...
    expect(corpus.wordsInRange(uneven, 1, 1)).toBe(4);
    expect(corpus.wordsInRange(uneven, 2, 2)).toBe(5);
  });
});

describe("readingMinutes", () => {
  const longBook = makeBook("Long", [100, 400], { totalWords: 1000 });
  const corpus = new CorpusIndex([longBook]);

  test("100 verses at 2 words per verse and 200 wpm is 1 minute", () => {
    expect(corpus.wordsInRange(longBook, 1, 1)).toBe(200);
    expect(corpus.readingMinutes(longBook, 1, 1, 200)).toBe(1);
  });

  test("rounds partial minutes up", () => {
    // 200 words at 150 wpm
    expect(corpus.readingMinutes(longBook, 1, 1, 150)).toBe(2);
  });

  test("defaults to the index's reading speed", () => {
    const slow = new CorpusIndex([longBook], 100);
    expect(slow.readingMinutes(longBook, 1, 1)).toBe(2);
    expect(corpus.readingMinutes(longBook, 1, 2)).toBe(5);
  });

  test("never decreases as the range widens", () => {
    const index = new CorpusIndex([ladder]);
    let previous = 0;
    for (let end = 1; end <= ladder.chapters; end++) {
      const minutes = index.readingMinutes(ladder, 1, end, 7);
      expect(minutes).toBeGreaterThanOrEqual(previous);
      previous = minutes;
    }
  });

  test("rejects a non-positive reading speed", () => {
    expect(() => corpus.readingMinutes(longBook, 1, 1, 0)).toThrow(RangeError);
    expect(() => new CorpusIndex([longBook], -5)).toThrow(RangeError);
  });
});

describe("CorpusIndex", () => {
  const genesis = makeBook("Genesis", [31, 25], { position: 1 });
  const exodus = makeBook("Exodus", [22, 25, 22, 31], { position: 2 });
  const matthew = makeBook("Matthew", [25, 23], { position: 40, testament: "new", genre: "gospels" });
  const corpus = new CorpusIndex([genesis, exodus, matthew]);

  test("aggregates chapters, verses and words", () => {
    expect(corpus.totalChapters).toBe(8);
    expect(corpus.totalVerses).toBe(204);
    expect(corpus.totalWords).toBe(408);
  });

  test("scopes to one testament in canonical order", () => {
    expect(corpus.scoped("old_testament").books.map((b) => b.name)).toEqual(["Genesis", "Exodus"]);
    expect(corpus.scoped("new_testament").books.map((b) => b.name)).toEqual(["Matthew"]);
    expect(corpus.scoped("complete").books.map((b) => b.name)).toEqual(["Genesis", "Exodus", "Matthew"]);
  });

  test("keeps the reading speed when scoping", () => {
    const fast = new CorpusIndex([genesis, matthew], 300);
    expect(fast.scoped("new_testament").wordsPerMinute).toBe(300);
  });

  test("reports an empty scope", () => {
    expect(new CorpusIndex([genesis]).scoped("new_testament").isEmpty).toBe(true);
  });
});
