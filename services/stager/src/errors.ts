/** `syntax`: the file is not JSON. `schema`: it is JSON of the wrong shape. */
export type ConfigSourceProblem = "syntax" | "schema";

export class ConfigSourceError extends Error {
  readonly cause: Error;

  constructor(
    readonly sourcePath: string,
    cause: Error,
    readonly problem: ConfigSourceProblem = "syntax",
  ) {
    super(
      problem === "syntax"
        ? `Invalid JSON present in ${sourcePath}. Parser said ${cause.message}`
        : `Unexpected values in ${sourcePath}: ${cause.message}`,
    );
    this.name = "ConfigSourceError";
    this.cause = cause;
  }
}

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}

export class CommandError extends Error {
  constructor(
    readonly command: string,
    readonly exitCode: number | null,
    readonly signal?: NodeJS.Signals | null,
  ) {
    super(
      signal
        ? `${command} was terminated by ${signal}`
        : `${command} exited with code ${exitCode ?? "unknown"}`,
    );
    this.name = "CommandError";
  }
}

/** A pipeline step failure, labelled with the step that failed. */
export class StageError extends Error {
  readonly cause: Error;

  constructor(
    readonly phase: string,
    cause: Error,
  ) {
    super(`${phase}: ${cause.message}`);
    this.name = "StageError";
    this.cause = cause;
  }
}
