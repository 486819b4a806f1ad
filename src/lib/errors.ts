/** The config file exists but is not valid JSON or not a valid config object. */
export class ConfigParseError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
  ) {
    super(`${filePath}: ${message}`);
    this.name = "ConfigParseError";
  }
}

/** A candidate could not be read. Recorded per file; never aborts a copy. */
export class FileReadError extends Error {
  public readonly relPath: string;
  public readonly originalError?: unknown;

  constructor(relPath: string, originalError?: unknown) {
    super(`Failed to read '${relPath}': ${describeError(originalError)}`);
    this.name = "FileReadError";
    this.relPath = relPath;
    this.originalError = originalError;
  }
}

export class ClipboardError extends Error {
  public readonly originalError?: unknown;

  constructor(originalError?: unknown) {
    super(`Clipboard copy failed: ${describeError(originalError)}`);
    this.name = "ClipboardError";
    this.originalError = originalError;
  }
}

/** Rejected at `add` time; the other entries of the same call are still processed. */
export class InvalidPatternError extends Error {
  constructor(
    public readonly pattern: string,
    public readonly reason: string,
  ) {
    super(`Invalid glob pattern '${pattern}': ${reason}`);
    this.name = "InvalidPatternError";
  }
}

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (e === undefined) return "unknown error";
  return String(e);
}
