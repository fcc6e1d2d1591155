import { format } from "date-fns";
import { BASE_TAGS } from "../plans/config";
import { formatChapterRange, formatSegment } from "../plans/segment";
import {
  dayTags,
  dayTotals,
  primaryBook,
  primaryGenre,
  primaryTestament,
  progressPercentage,
  type StudyDay,
} from "../plans/study-day";
import { renderFrontmatter } from "./frontmatter";
import type { VaultLinker } from "./vault-links";

export interface NoteOptions {
  planName: string;
  planId: string;
  linker?: VaultLinker;
}

export function isoDate(date: Date): string {
  return format(date, "yyyy-MM-dd");
}

export function longDate(date: Date): string {
  return format(date, "EEEE, MMMM dd, yyyy");
}

/** "major_prophets" → "Major Prophets" */
export function titleCase(value: string): string {
  return value
    .split(/[_\s]+/)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

export function dayNoteFileName(day: StudyDay): string {
  return `${isoDate(day.date)}-day-${String(day.dayNumber).padStart(3, "0")}`;
}

function readingLines(day: StudyDay, linker?: VaultLinker): string {
  return day.segments
    .map((s) => (linker ? linker.formatSegment(s) : `**${formatSegment(s)}**`))
    .join("\n\n");
}

export function renderDayNote(day: StudyDay, options: NoteOptions): string {
  const totals = dayTotals(day);
  const ranges = day.segments.map(formatChapterRange);
  const progress = progressPercentage(day);

  const frontmatter = renderFrontmatter([
    ["plan", options.planName],
    ["plan_id", options.planId],
    ["date", { raw: isoDate(day.date) }],
    ["day", day.dayNumber],
    ["total_days", day.totalDays],
    ["tags", dayTags(day, BASE_TAGS)],
    ["testament", { raw: primaryTestament(day) }],
    ["genre", { raw: primaryGenre(day) }],
    ["book", primaryBook(day)],
    ["chapters", ranges.length === 1 ? ranges[0] : ranges],
    ["estimated_minutes", totals.minutes],
    ["verse_count", totals.verses],
    ["word_count", totals.words],
    ["progress", progress],
    ["status", { raw: "pending" }],
    ["chapter_links", options.linker?.frontmatterPaths(day.segments)],
  ]);

  const body = [
    `# Day ${day.dayNumber}: ${longDate(day.date)}`,
    "",
    "## 📖 Today's Reading",
    "",
    readingLines(day, options.linker),
    "",
    `- 📊 ${totals.verses} verses`,
    `- 📝 ~${totals.words} words`,
    `- ⏱️ ${totals.minutes} minutes`,
    "",
    "---",
    "",
    "## 📝 Notes & Observations",
    "",
    "*What did you notice in today's reading?*",
    "",
    "---",
    "",
    "## 💭 Reflection",
    "",
    "### Key Themes",
    "",
    "### Questions",
    "",
    "### Personal Application",
    "",
    "---",
    "",
    "## 🙏 Prayer",
    "",
    "---",
    "",
    "## 📊 Metadata",
    "",
    `**Testament**: ${titleCase(primaryTestament(day))}  `,
    `**Genre**: ${titleCase(primaryGenre(day))}  `,
    `**Progress**: Day ${day.dayNumber} of ${day.totalDays} (${progress}%)`,
    "",
  ];

  return `${frontmatter}\n${body.join("\n")}`;
}
