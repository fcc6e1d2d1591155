import type { BibleScope, Book } from "./types";

export const SCOPE_LABELS: Record<BibleScope, string> = {
  complete: "Complete Bible",
  old_testament: "Old Testament",
  new_testament: "New Testament",
};

/**
 * Filter the canon to a scope. Canonical order is preserved.
 */
export function selectScope(books: readonly Book[], scope: BibleScope): Book[] {
  switch (scope) {
    case "old_testament":
      return books.filter((b) => b.testament === "old");
    case "new_testament":
      return books.filter((b) => b.testament === "new");
    case "complete":
      return [...books];
  }
}
