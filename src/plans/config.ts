import type { BibleScope } from "../corpus/types";

// Reading speed used for time estimates (words per minute)
export const DEFAULT_WORDS_PER_MINUTE = 200;

// Books with this many chapters or fewer are always read in one sitting
export const SHORT_BOOK_MAX_CHAPTERS = 3;

// A segment stops growing once the day reaches this share of its target
export const SEGMENT_STOP_RATIO = 0.8;

// A day closes once it reaches this share of its target (keep above SEGMENT_STOP_RATIO)
export const DAY_CLOSE_RATIO = 0.85;

// Plan length limits accepted from the command line
export const MIN_PLAN_DAYS = 1;
export const MAX_PLAN_DAYS = 3650;

// Earliest start/end date accepted; the latest is today + MAX_YEARS_AHEAD
export const EARLIEST_PLAN_DATE = "1900-01-01";
export const MAX_YEARS_AHEAD = 10;

export const DEFAULT_DAYS_BY_SCOPE: Record<BibleScope, number> = {
  complete: 365,
  old_testament: 270,
  new_testament: 90,
};

export const DEFAULT_OUTPUT_DIR = "./bible-study";

// Days shown by --dry-run
export const PREVIEW_DAYS = 5;

export const BASE_TAGS = ["bible-study", "daily"];
