/**
 * Command-line options for plan generation.
 *
 * Arguments use the `--name=value` form; flags take no value.
 * Raw values are validated with zod, then resolved into the start date,
 * day count and scope the schedule builder needs.
 */

import { addYears, differenceInCalendarDays, isValid, parseISO, startOfDay } from "date-fns";
import { z } from "zod";
import type { BibleScope } from "../corpus/types";
import { PlanOptionsError } from "../errors";
import {
  DEFAULT_DAYS_BY_SCOPE,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_WORDS_PER_MINUTE,
  EARLIEST_PLAN_DATE,
  MAX_PLAN_DAYS,
  MAX_YEARS_AHEAD,
  MIN_PLAN_DAYS,
} from "../plans/config";
import { LINK_STYLES, type LinkStyle } from "../render/vault-links";

export const USAGE = `Usage: npm run generate -- [options]

  --start=YYYY-MM-DD        First day of the plan (default: January 1 of this year)
  --year=YYYY               Legacy: start on January 1 of YYYY
  --end=YYYY-MM-DD          Last day of the plan (sets the day count)
  --days=N                  Number of days (default: 365 complete, 270 ot, 90 nt)
  --scope=complete|ot|nt    Part of the Bible to read (default: complete)
  --output=DIR              Output directory (default: $PLAN_OUTPUT_DIR or ${DEFAULT_OUTPUT_DIR})
  --name=TEXT               Plan name (default: "Bible Reading Plan <year>")
  --id=SLUG                 Plan id used in file names (default: derived from the name)
  --wpm=N                   Reading speed in words per minute (default: ${DEFAULT_WORDS_PER_MINUTE})
  --vault-folder=PATH       Link readings to chapter notes under PATH
  --link-style=STYLE        expanded | inline | hybrid (default: expanded)
  --dry-run                 Preview the plan without writing files
  -v, --verbose             Verbose output
  -h, --help                Show this help`;

const VALUE_OPTIONS = [
  "start",
  "year",
  "end",
  "days",
  "scope",
  "output",
  "name",
  "id",
  "wpm",
  "vault-folder",
  "link-style",
] as const;

type ValueOption = (typeof VALUE_OPTIONS)[number];

export interface ParsedArgs {
  values: Partial<Record<ValueOption, string>>;
  dryRun: boolean;
  verbose: boolean;
  help: boolean;
}

function isValueOption(name: string): name is ValueOption {
  return VALUE_OPTIONS.some((option) => option === name);
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = { values: {}, dryRun: false, verbose: false, help: false };

  for (const arg of argv) {
    if (arg === "--dry-run") {
      parsed.dryRun = true;
    } else if (arg === "-v" || arg === "--verbose") {
      parsed.verbose = true;
    } else if (arg === "-h" || arg === "--help") {
      parsed.help = true;
    } else if (arg.startsWith("--") && arg.includes("=")) {
      const eq = arg.indexOf("=");
      const name = arg.slice(2, eq);
      if (!isValueOption(name)) throw new PlanOptionsError(`Unknown option: --${name}`);
      parsed.values[name] = arg.slice(eq + 1);
    } else {
      throw new PlanOptionsError(`Unknown argument: ${arg}`);
    }
  }

  return parsed;
}

const DateString = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "must be a date in YYYY-MM-DD format")
  .refine((s) => isValid(parseISO(s)), "is not a valid calendar date");

const SCOPE_ALIASES = new Map<string, BibleScope>([
  ["complete", "complete"],
  ["ot", "old_testament"],
  ["nt", "new_testament"],
  ["old_testament", "old_testament"],
  ["new_testament", "new_testament"],
]);

const PlanArgsSchema = z.object({
  start: DateString.optional(),
  year: z.coerce.number().int().min(1900).max(9999).optional(),
  end: DateString.optional(),
  days: z.coerce.number().int().min(MIN_PLAN_DAYS).max(MAX_PLAN_DAYS).optional(),
  scope: z
    .string()
    .transform((s, ctx) => {
      const scope = SCOPE_ALIASES.get(s.toLowerCase());
      if (!scope) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be one of complete, ot, nt" });
        return z.NEVER;
      }
      return scope;
    })
    .optional(),
  output: z.string().min(1).optional(),
  name: z.string().trim().min(1).optional(),
  id: z
    .string()
    .regex(/^[a-z0-9][a-z0-9-]*$/, "must contain only lowercase letters, digits and hyphens")
    .optional(),
  wpm: z.coerce.number().int().positive().optional(),
  "vault-folder": z.string().min(1).optional(),
  "link-style": z.enum(LINK_STYLES).optional(),
});

export interface PlanOptions {
  startDate: Date;
  days: number;
  scope: BibleScope;
  outputDir: string;
  planName: string;
  planId: string;
  wordsPerMinute: number;
  vaultFolder?: string;
  linkStyle: LinkStyle;
  dryRun: boolean;
  verbose: boolean;
}

/** Environment variables that supply defaults. */
export interface PlanEnv {
  PLAN_OUTPUT_DIR?: string;
  READING_WORDS_PER_MINUTE?: string;
}

export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

function assertDateInBounds(label: string, date: Date, today: Date): void {
  const earliest = parseISO(EARLIEST_PLAN_DATE);
  const latest = addYears(startOfDay(today), MAX_YEARS_AHEAD);
  if (differenceInCalendarDays(date, earliest) < 0 || differenceInCalendarDays(date, latest) > 0) {
    throw new PlanOptionsError(
      `${label} must be between ${EARLIEST_PLAN_DATE} and ${MAX_YEARS_AHEAD} years from today`,
    );
  }
}

/**
 * Validate parsed arguments and fill in defaults.
 * `today` anchors the default start year and the latest accepted date.
 */
export function resolvePlanOptions(
  args: ParsedArgs,
  env: PlanEnv = {},
  today: Date = new Date(),
): PlanOptions {
  const result = PlanArgsSchema.safeParse(args.values);
  if (!result.success) {
    const details = result.error.issues.map((i) => `--${i.path.join(".")} ${i.message}`);
    throw new PlanOptionsError(`Invalid options: ${details.join("; ")}`);
  }
  const opts = result.data;

  if (opts.start && opts.year !== undefined) {
    throw new PlanOptionsError("Use either --start or --year, not both");
  }
  if (opts.end && opts.days !== undefined) {
    throw new PlanOptionsError("Use either --end or --days, not both");
  }

  let startDate: Date;
  if (opts.start) {
    startDate = parseISO(opts.start);
    assertDateInBounds("Start date", startDate, today);
  } else if (opts.year !== undefined) {
    startDate = new Date(opts.year, 0, 1);
    assertDateInBounds("Start date", startDate, today);
  } else {
    startDate = new Date(today.getFullYear(), 0, 1);
  }

  const scope = opts.scope ?? "complete";

  let days = opts.days ?? DEFAULT_DAYS_BY_SCOPE[scope];
  if (opts.end) {
    const endDate = parseISO(opts.end);
    assertDateInBounds("End date", endDate, today);
    const span = differenceInCalendarDays(endDate, startDate) + 1;
    if (span < 1) {
      throw new PlanOptionsError(`End date ${opts.end} is before the start date`);
    }
    if (span > MAX_PLAN_DAYS) {
      throw new PlanOptionsError(`Date range is ${span} days; the maximum is ${MAX_PLAN_DAYS}`);
    }
    days = span;
  }

  const planName = opts.name ?? `Bible Reading Plan ${startDate.getFullYear()}`;
  const planId = opts.id ?? (slugify(planName) || "reading-plan");

  const envWpm = parseInt(env.READING_WORDS_PER_MINUTE || "", 10);
  const wordsPerMinute = opts.wpm ?? (envWpm > 0 ? envWpm : DEFAULT_WORDS_PER_MINUTE);

  return {
    startDate,
    days,
    scope,
    outputDir: opts.output || env.PLAN_OUTPUT_DIR || DEFAULT_OUTPUT_DIR,
    planName,
    planId,
    wordsPerMinute,
    vaultFolder: opts["vault-folder"],
    linkStyle: opts["link-style"] ?? "expanded",
    dryRun: args.dryRun,
    verbose: args.verbose,
  };
}
