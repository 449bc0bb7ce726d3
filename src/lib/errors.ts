export type ErrorLabel = "Error" | "Warning";

export class CommitterError extends Error {
  readonly exitCode: number;
  readonly label: ErrorLabel;
  /** Full git output behind the error, printed only in verbose mode */
  readonly output: string[];

  constructor(
    message: string,
    exitCode = 1,
    label: ErrorLabel = "Error",
    output: string[] = []
  ) {
    super(message);
    this.name = "CommitterError";
    this.exitCode = exitCode;
    this.label = label;
    this.output = output;
  }
}

export class UsageError extends CommitterError {
  constructor(detail: string) {
    super(detail, 2);
    this.name = "UsageError";
  }
}

export class ValidationError extends CommitterError {
  constructor(detail: string) {
    super(detail);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends CommitterError {
  readonly path: string;

  constructor(path: string) {
    super(`file not found: ${path}`);
    this.name = "NotFoundError";
    this.path = path;
  }
}

export class NoChangesError extends CommitterError {
  readonly files: readonly string[];

  constructor(files: readonly string[]) {
    super(`no staged changes detected for: ${files.join(" ")}`, 1, "Warning");
    this.name = "NoChangesError";
    this.files = files;
  }
}

export class CommitError extends CommitterError {
  constructor(output: string[], exitCode: number) {
    super(`git commit failed (exit ${exitCode}): ${summarizeOutput(output)}`, 1, "Error", output);
    this.name = "CommitError";
  }
}

export class FatalError extends CommitterError {
  constructor(detail: string, output: string[] = []) {
    super(detail, 1, "Error", output);
    this.name = "FatalError";
  }
}

export function splitLines(output: string): string[] {
  return output.split(/\r?\n/).filter((line) => line.length > 0);
}

/**
 * Pick the line of git output that best names the failure
 */
export function summarizeOutput(output: string[]): string {
  const lines = output.map((line) => line.trim()).filter(Boolean);
  const marked = lines.find((line) => /^(fatal|error):/i.test(line));
  return marked ?? lines[0] ?? "no output";
}
