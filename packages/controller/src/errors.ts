/** A problem found in one lane reading. */
export interface ReadingIssue {
  /** Field path, e.g. `readings[2].normal` */
  field: string;
  message: string;
  value?: unknown;
}

/** Thrown by `decide` when the readings cannot be used. */
export class InvalidReadingError extends Error {
  readonly issues: ReadingIssue[];

  constructor(issues: ReadingIssue[]) {
    super(
      `Invalid lane readings: ${issues.map((i) => `${i.field} ${i.message}`).join("; ")}`,
    );
    this.name = "InvalidReadingError";
    this.issues = issues;
  }
}

/** Thrown when timing parameters are out of range. */
export class InvalidTimingParamsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidTimingParamsError";
  }
}

/** Thrown when a named timing profile does not exist. */
export class ProfileNotFoundError extends Error {
  readonly status = 404;

  constructor(readonly profileName: string) {
    super(`Timing profile not found: ${profileName}`);
    this.name = "ProfileNotFoundError";
  }
}
