// Fatal errors of the ingest/report pipeline. Per-row and per-cell problems are
// not exceptions: they degrade to null values and batch warnings.

export class CoachGolfError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class DateParseError extends CoachGolfError {
  constructor(
    readonly rawValue: string,
    readonly column: string,
    readonly file?: string
  ) {
    super(
      `Unrecognized date ${JSON.stringify(rawValue)} in column "${column}"` +
        (file ? ` of ${file}` : "")
    );
  }
}

export class MissingDateColumnError extends CoachGolfError {
  constructor(
    readonly file: string,
    readonly headers: string[]
  ) {
    super(`No date column in ${file} (columns: ${headers.join(", ") || "none"})`);
  }
}

export type FileSessionDate = { file: string; date: string };

// One entry per file in batch order; file names may repeat.
export class AmbiguousSessionBatchError extends CoachGolfError {
  constructor(readonly fileDates: FileSessionDate[]) {
    super(
      `Batch spans several session dates (${distinctDates(fileDates).join(", ")}): ` +
        fileDates.map(({ file, date }, i) => `#${i + 1} ${file}=${date}`).join("; ")
    );
  }

  get dates(): string[] {
    return distinctDates(this.fileDates);
  }
}

function distinctDates(fileDates: FileSessionDate[]): string[] {
  return Array.from(new Set(fileDates.map((f) => f.date))).sort();
}

export class RosterConfigError extends CoachGolfError {
  constructor(
    readonly path: string,
    detail: string
  ) {
    super(`Invalid roster file ${path}: ${detail}`);
  }
}

export class AccessDeniedError extends CoachGolfError {
  constructor(
    readonly username: string,
    readonly alias: string
  ) {
    super(`${username} may not view reports for ${alias}`);
  }
}

export class ReportRenderFailure extends CoachGolfError {
  constructor(
    readonly letter: string,
    readonly target: string,
    readonly reason: unknown
  ) {
    super(`Model ${letter} for ${target} failed: ${errorMessage(reason)}`);
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
