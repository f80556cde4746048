/** Where in the input an error was detected. */
export interface ErrorPosition {
  /** 1-based line number */
  line?: number;
  /** 0-based byte offset from the start of the stream */
  offset?: number;
}

function formatPosition({ line, offset }: ErrorPosition): string {
  const parts: string[] = [];
  if (line !== undefined) parts.push(`line ${line}`);
  if (offset !== undefined) parts.push(`byte ${offset}`);
  return parts.length > 0 ? ` (${parts.join(", ")})` : "";
}

/** Base class of every error raised by this package. */
export class CSVError extends Error {
  readonly line?: number;
  readonly offset?: number;

  constructor(
    message: string,
    position: ErrorPosition = {},
    options?: { cause?: unknown },
  ) {
    super(message + formatPosition(position), options);
    this.name = "CSVError";
    this.line = position.line;
    this.offset = position.offset;
  }
}

/** Invalid dialect or construction parameters. Raised synchronously. */
export class ConfigError extends CSVError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Failure of the underlying byte source or sink. */
export class IOError extends CSVError {
  constructor(message: string, cause: unknown, position: ErrorPosition = {}) {
    super(
      `${message}: ${cause instanceof Error ? cause.message : String(cause)}`,
      position,
      { cause },
    );
    this.name = "IOError";
  }
}

export type FormatErrorKind = "Malformed" | "FieldCount";

/** The data does not follow the configured dialect. */
export class FormatError extends CSVError {
  readonly kind: FormatErrorKind;

  constructor(
    kind: FormatErrorKind,
    message: string,
    position: ErrorPosition = {},
  ) {
    super(message, position);
    this.name = "FormatError";
    this.kind = kind;
  }
}

export class MalformedRecordError extends FormatError {
  constructor(message: string, position: ErrorPosition = {}) {
    super("Malformed", message, position);
    this.name = "MalformedRecordError";
  }
}

export class FieldCountError extends FormatError {
  constructor(message: string, position: ErrorPosition = {}) {
    super("FieldCount", message, position);
    this.name = "FieldCountError";
  }
}

/** An operation was attempted on a closed reader or writer. */
export class ClosedResourceError extends CSVError {
  constructor(what: string) {
    super(`${what} is closed`);
    this.name = "ClosedResourceError";
  }
}

/** `writeRows` failed part way; `rowsWritten` rows reached the sink intact. */
export class WriteRowsError extends CSVError {
  readonly rowsWritten: number;

  constructor(rowsWritten: number, cause: unknown) {
    super(
      `writeRows failed after ${rowsWritten} row(s): ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      {},
      { cause },
    );
    this.name = "WriteRowsError";
    this.rowsWritten = rowsWritten;
  }
}
