/**
 * Error types for corpus loading, plan options, schedule generation and
 * writing notes. Every one of these leaves no notes behind.
 */

export class CorpusDataError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join("\n  - ")}` : message);
    this.name = "CorpusDataError";
  }
}

export class PlanOptionsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PlanOptionsError";
  }
}

export class InvalidDayCountError extends Error {
  constructor(readonly days: number) {
    super(`Day count must be a whole number of at least 1 (got ${days})`);
    this.name = "InvalidDayCountError";
  }
}

export class EmptyCorpusError extends Error {
  constructor() {
    super("Cannot build a reading plan from an empty corpus");
    this.name = "EmptyCorpusError";
  }
}

export class ScheduleValidationError extends Error {
  constructor(readonly problems: string[]) {
    super(`Generated schedule failed validation:\n  - ${problems.join("\n  - ")}`);
    this.name = "ScheduleValidationError";
  }
}

export class PlanWriteError extends Error {
  constructor(
    readonly fileName: string,
    readonly reason: unknown,
  ) {
    super(`Failed to write ${fileName}: ${reason instanceof Error ? reason.message : String(reason)}`);
    this.name = "PlanWriteError";
  }
}
