/**
 * Wikilinks from reading notes to per-chapter Scripture files in an
 * Obsidian vault. Chapter files are expected at:
 *
 *   {vaultFolder}/{NN} - {Book}/{Book} {chapter}.md
 *
 * where NN is the book's two-digit canonical position (01 = Genesis).
 */

import { formatChapterRange, type ReadingSegment } from "../plans/segment";

export const LINK_STYLES = ["expanded", "inline", "hybrid"] as const;

export type LinkStyle = (typeof LINK_STYLES)[number];

export interface ChapterLink {
  chapter: number;
  path: string;
  label: string;
}

export function wikilink(path: string, label: string): string {
  return `[[${path}|${label}]]`;
}

export class VaultLinker {
  readonly vaultFolder: string;

  constructor(vaultFolder: string, readonly style: LinkStyle = "expanded") {
    this.vaultFolder = vaultFolder.replace(/\\/g, "/").replace(/^\/+|\/+$/g, "");
  }

  chapterLinks(segment: ReadingSegment): ChapterLink[] {
    const { book } = segment;
    const folder = `${String(book.position).padStart(2, "0")} - ${book.name}`;
    const links: ChapterLink[] = [];
    for (let chapter = segment.startChapter; chapter <= segment.endChapter; chapter++) {
      links.push({
        chapter,
        path: `${this.vaultFolder}/${folder}/${book.name} ${chapter}`,
        label: `${book.name} ${chapter}`,
      });
    }
    return links;
  }

  /** Markdown for one segment in the configured style. */
  formatSegment(segment: ReadingSegment): string {
    const links = this.chapterLinks(segment);
    const heading = `**${segment.book.name} ${formatChapterRange(segment)}**`;
    const isRange = segment.endChapter > segment.startChapter;

    switch (this.style) {
      case "inline":
        if (!isRange) return `**${wikilink(links[0].path, links[0].label)}**`;
        return `${heading} (${links.map((l) => wikilink(l.path, String(l.chapter))).join(", ")})`;
      case "hybrid":
        return [heading, ...links.map((l) => `- ${wikilink(l.path, l.label)}`)].join("\n");
      case "expanded":
        return links.map((l) => `**${wikilink(l.path, l.label)}**`).join("\n");
    }
  }

  /** Link targets for frontmatter, without brackets. */
  frontmatterPaths(segments: readonly ReadingSegment[]): string[] {
    return segments.flatMap((s) => this.chapterLinks(s).map((l) => l.path));
  }
}
