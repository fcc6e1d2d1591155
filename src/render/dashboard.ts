import { SCOPE_LABELS } from "../corpus/scope";
import type { BibleScope } from "../corpus/types";
import { formatSegment } from "../plans/segment";
import { dayTotals, type StudyDay } from "../plans/study-day";
import { dayNoteFileName, isoDate, longDate } from "./day-note";
import { renderFrontmatter } from "./frontmatter";

export interface DashboardOptions {
  planName: string;
  planId: string;
  scope: BibleScope;
}

export interface PlanSummary {
  books: number;
  chapters: number;
  verses: number;
  words: number;
  minutes: number;
  averageMinutesPerDay: number;
}

export function summarizePlan(schedule: readonly StudyDay[]): PlanSummary {
  const books = new Set<string>();
  const summary = { books: 0, chapters: 0, verses: 0, words: 0, minutes: 0, averageMinutesPerDay: 0 };
  for (const day of schedule) {
    const totals = dayTotals(day);
    summary.chapters += totals.chapters;
    summary.verses += totals.verses;
    summary.words += totals.words;
    summary.minutes += totals.minutes;
    for (const segment of day.segments) books.add(segment.book.name);
  }
  summary.books = books.size;
  summary.averageMinutesPerDay = schedule.length > 0 ? Math.round(summary.minutes / schedule.length) : 0;
  return summary;
}

export function dashboardFileName(planId: string): string {
  return `${planId}-dashboard`;
}

/**
 * Plan overview note: statistics plus a table linking every day note.
 */
export function renderDashboard(schedule: readonly StudyDay[], options: DashboardOptions): string {
  const first = schedule[0];
  const last = schedule[schedule.length - 1];
  if (!first || !last) throw new Error("Cannot render a dashboard for an empty schedule");

  const summary = summarizePlan(schedule);
  const hours = Math.round((summary.minutes / 60) * 10) / 10;

  const frontmatter = renderFrontmatter([
    ["plan", options.planName],
    ["plan_id", options.planId],
    ["scope", { raw: options.scope }],
    ["start_date", { raw: isoDate(first.date) }],
    ["end_date", { raw: isoDate(last.date) }],
    ["total_days", schedule.length],
    ["tags", ["bible-study", "dashboard"]],
  ]);

  // Pipes inside wikilinks must be escaped in table cells
  const rows = schedule.map((day) => {
    const link = `[[${dayNoteFileName(day)}\\|${isoDate(day.date)}]]`;
    const reading = day.segments.map(formatSegment).join("; ");
    return `| ${day.dayNumber} | ${link} | ${reading} | ${dayTotals(day).minutes} |`;
  });

  const body = [
    `# ${options.planName}`,
    "",
    `**Scope**: ${SCOPE_LABELS[options.scope]}  `,
    `**Dates**: ${longDate(first.date)} → ${longDate(last.date)}  `,
    `**Days**: ${schedule.length}`,
    "",
    "## 📊 Plan Statistics",
    "",
    `- 📚 ${summary.books} books, ${summary.chapters} chapters`,
    `- 📊 ${summary.verses} verses`,
    `- 📝 ~${summary.words} words`,
    `- ⏱️ ~${hours} hours total, ~${summary.averageMinutesPerDay} minutes per day`,
    "",
    "## 📅 Schedule",
    "",
    "| Day | Date | Reading | Minutes |",
    "| --- | --- | --- | --- |",
    ...rows,
    "",
  ];

  return `${frontmatter}\n${body.join("\n")}`;
}
