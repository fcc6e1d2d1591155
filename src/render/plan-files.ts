import type { BibleScope } from "../corpus/types";
import type { StudyDay } from "../plans/study-day";
import { dashboardFileName, renderDashboard } from "./dashboard";
import { dayNoteFileName, renderDayNote } from "./day-note";
import type { VaultLinker } from "./vault-links";

export interface PlanFile {
  /** File name relative to the output directory */
  fileName: string;
  content: string;
}

export interface PlanFileOptions {
  planName: string;
  planId: string;
  scope: BibleScope;
  linker?: VaultLinker;
}

/**
 * Render every note of a plan in memory: one per day, then the dashboard.
 * Nothing is written here, so a failure leaves no partial output behind.
 */
export function buildPlanFiles(schedule: readonly StudyDay[], options: PlanFileOptions): PlanFile[] {
  const notes = schedule.map((day) => ({
    fileName: `${dayNoteFileName(day)}.md`,
    content: renderDayNote(day, options),
  }));
  return [
    ...notes,
    {
      fileName: `${dashboardFileName(options.planId)}.md`,
      content: renderDashboard(schedule, options),
    },
  ];
}
