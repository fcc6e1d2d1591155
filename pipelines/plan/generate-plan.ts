/**
 * Generate a Bible Reading Plan
 *
 * Splits the selected part of the Bible into daily readings and writes one
 * markdown note per day plus a plan dashboard. Every note is rendered and the
 * schedule validated before the first file is written.
 *
 * Usage:
 *   npm run generate -- --start=2026-01-01
 *   npm run generate -- --year=2026 --scope=nt --days=90
 *   npm run generate -- --start=2026-03-01 --end=2026-08-31 --output=./vault/Reading
 *   npm run generate -- --scope=ot --vault-folder=Bible/ESV --link-style=hybrid
 *   npm run generate -- --dry-run -v
 */

import "../env";
import { resolve } from "path";
import { CorpusIndex } from "../../src/corpus/corpus-index";
import { SCOPE_LABELS } from "../../src/corpus/scope";
import { getBibleDataDir, loadCanon } from "../../src/corpus/loader";
import { PlanOptionsError } from "../../src/errors";
import { parseArgs, resolvePlanOptions, USAGE, type PlanOptions } from "../../src/cli/options";
import { writePlanFiles } from "../../src/cli/write-plan";
import { PREVIEW_DAYS } from "../../src/plans/config";
import { assertValidSchedule, generateSchedule } from "../../src/plans/schedule";
import { formatSegment } from "../../src/plans/segment";
import { dayTotals } from "../../src/plans/study-day";
import { isoDate } from "../../src/render/day-note";
import { buildPlanFiles } from "../../src/render/plan-files";
import { VaultLinker } from "../../src/render/vault-links";

function readOptions(): PlanOptions | null {
  try {
    const args = parseArgs(process.argv.slice(2));
    if (args.help) {
      console.log(USAGE);
      return null;
    }
    return resolvePlanOptions(args, process.env);
  } catch (err) {
    if (err instanceof PlanOptionsError) {
      console.error(`Error: ${err.message}`);
      console.error();
      console.error(USAGE);
      process.exit(1);
    }
    throw err;
  }
}

async function main() {
  const options = readOptions();
  if (!options) return;

  console.log("📖 Bible Reading Planner");
  console.log(`   Plan:   ${options.planName} (${options.planId})`);
  console.log(`   Start:  ${isoDate(options.startDate)}`);
  console.log(`   Scope:  ${SCOPE_LABELS[options.scope]}`);
  console.log(`   Days:   ${options.days}`);
  console.log(`   Output: ${options.outputDir}`);
  console.log();

  if (options.verbose) console.log(`Loading Bible data from ${getBibleDataDir()}...`);
  const canon = new CorpusIndex(loadCanon(), options.wordsPerMinute);
  const corpus = canon.scoped(options.scope);

  const stats = corpus.statistics();
  console.log("📊 Scope Statistics:");
  console.log(`   Books: ${stats.books}`);
  console.log(`   Chapters: ${stats.chapters}`);
  console.log(`   Verses: ${stats.verses}`);
  console.log(`   Est. Hours: ${stats.estimatedHours}h`);
  console.log(`   Avg Chapters/Day: ${(stats.chapters / options.days).toFixed(2)}`);
  console.log();

  if (options.verbose) console.log("Generating reading plan...");
  const schedule = generateSchedule(canon, {
    startDate: options.startDate,
    days: options.days,
    scope: options.scope,
  });
  assertValidSchedule(schedule, corpus);

  console.log(`✅ Generated ${schedule.length} study days`);
  if (schedule.length < options.days) {
    console.warn(`   [WARN] Readings ran out after ${schedule.length} of ${options.days} requested days`);
  }
  console.log();

  if (options.dryRun) {
    console.log(`🔍 Dry Run - Preview of first ${Math.min(PREVIEW_DAYS, schedule.length)} days:`);
    console.log();
    for (const day of schedule.slice(0, PREVIEW_DAYS)) {
      const totals = dayTotals(day);
      console.log(`Day ${day.dayNumber} (${isoDate(day.date)}):`);
      for (const segment of day.segments) console.log(`  • ${formatSegment(segment)}`);
      console.log(`  📊 ${totals.chapters} chapters, ${totals.verses} verses, ~${totals.minutes} min`);
      console.log();
    }
    if (schedule.length > PREVIEW_DAYS) {
      console.log(`... and ${schedule.length - PREVIEW_DAYS} more days`);
      console.log();
    }
    console.log("✨ To generate files, remove the --dry-run flag");
    return;
  }

  const linker = options.vaultFolder ? new VaultLinker(options.vaultFolder, options.linkStyle) : undefined;
  const files = buildPlanFiles(schedule, {
    planName: options.planName,
    planId: options.planId,
    scope: options.scope,
    linker,
  });

  if (options.verbose) console.log(`Writing ${files.length} files to ${options.outputDir}...`);
  await writePlanFiles(options.outputDir, files);

  console.log(`✅ Created ${files.length - 1} daily notes and 1 dashboard`);
  console.log(`📁 Output directory: ${resolve(options.outputDir)}`);
  console.log();
  console.log("🎉 Bible reading plan generated successfully!");
}

main().catch((err) => {
  console.error("Fatal error:", err instanceof Error ? err.message : err);
  if (process.argv.includes("-v") || process.argv.includes("--verbose")) console.error(err);
  process.exit(1);
});
