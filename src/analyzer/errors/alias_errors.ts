/**
 * Alias analysis error types and helpers
 */

export type AliasTrackerErrorCode = "UnknownValue";

/**
 * Raised when the tracker is used in a way its caller must never do, such
 * as querying a value that was never registered. These are logic errors in
 * the driver, not conditions to recover from.
 */
export class AliasTrackerError extends Error {
  readonly code: AliasTrackerErrorCode;
  readonly value: string;

  constructor(code: AliasTrackerErrorCode, message: string, value: string) {
    super(message);
    this.name = "AliasTrackerError";
    this.code = code;
    this.value = value;
  }

  static unknownValue(value: string, operation: string): AliasTrackerError {
    return new AliasTrackerError(
      "UnknownValue",
      `${operation}: value "${value}" is not tracked and is not a wildcard`,
      value,
    );
  }
}

export type ProgramLoadErrorCode =
  | "InvalidJson"
  | "InvalidOperand"
  | "InvalidInstruction"
  | "UnknownType";

export class ProgramLoadError extends Error {
  readonly code: ProgramLoadErrorCode;
  // JSON path of the offending node, e.g. "instructions[2].dest"
  readonly path: string;

  constructor(code: ProgramLoadErrorCode, message: string, path: string) {
    super(message);
    this.name = "ProgramLoadError";
    this.code = code;
    this.path = path;
  }
}

export class AggregateProgramLoadError extends Error {
  readonly errors: ProgramLoadError[];

  constructor(source: string, errors: ProgramLoadError[]) {
    super(AggregateProgramLoadError.formatMessage(source, errors));
    this.name = "AggregateProgramLoadError";
    this.errors = errors;
  }

  private static formatMessage(
    source: string,
    errors: ProgramLoadError[],
  ): string {
    const header = `Loading ${source} failed with ${errors.length} error(s):`;
    const lines = errors.map(
      (err) => `- [${err.code}] ${err.path}: ${err.message}`,
    );
    return [header, ...lines].join("\n");
  }
}
