import { ConfigError } from "./errors.ts";

/** Which fields the writer wraps in quotes. */
export enum Quoting {
  MINIMAL = 0,
  ALL = 1,
  NONNUMERIC = 2,
  NONE = 3,
  STRINGS = 4,
  NOTNULL = 5,
}

export type LineTerminator = "\n" | "\r" | "\r\n";

export interface DialectOptions {
  delimiter: string;
  quotechar: string;
  escapechar: string | null;
  quoting: Quoting;
  lineterminator: LineTerminator;
  skipinitialspace: boolean;
  strict: boolean;
  doublequote: boolean;
}

const defaultDialectOptions: Readonly<DialectOptions> = Object.freeze({
  delimiter: ",",
  quotechar: '"',
  escapechar: null,
  quoting: Quoting.MINIMAL,
  lineterminator: "\r\n",
  skipinitialspace: false,
  strict: false,
  doublequote: true,
});

const CR = 13;
const LF = 10;

const dialectKeys: ReadonlyArray<keyof DialectOptions> = [
  "delimiter",
  "quotechar",
  "escapechar",
  "quoting",
  "lineterminator",
  "skipinitialspace",
  "strict",
  "doublequote",
];

/** Keeps only the dialect keys that were actually given a value. */
function definedOptions(
  options: Partial<DialectOptions>,
): Partial<DialectOptions> {
  const result: Partial<DialectOptions> = {};
  for (const key of dialectKeys) {
    if (options[key] !== undefined) {
      Object.assign(result, { [key]: options[key] });
    }
  }
  return result;
}

function isQuoting(value: unknown): value is Quoting {
  return typeof value === "number" && Quoting[value] !== undefined;
}

function isLineTerminator(value: unknown): value is LineTerminator {
  return value === "\n" || value === "\r" || value === "\r\n";
}

function charByte(name: string, value: unknown): number {
  if (typeof value !== "string" || value.length !== 1) {
    throw new ConfigError(`"${name}" must be a 1-character string`);
  }
  const code = value.charCodeAt(0);
  // specials are matched byte-wise, so they must encode to a single byte
  if (code > 0x7f) {
    throw new ConfigError(`"${name}" must be an ASCII character`);
  }
  if (code === CR || code === LF) {
    throw new ConfigError(`"${name}" cannot be a line break`);
  }
  return code;
}

/**
 * Immutable, validated set of formatting options shared by the reader and
 * the writer. Invalid options throw `ConfigError` from the constructor.
 */
export class Dialect implements Readonly<DialectOptions> {
  readonly delimiter: string;
  readonly quotechar: string;
  readonly escapechar: string | null;
  readonly quoting: Quoting;
  readonly lineterminator: LineTerminator;
  readonly skipinitialspace: boolean;
  readonly strict: boolean;
  readonly doublequote: boolean;

  /** Byte values of the special characters; -1 when unset */
  readonly delimiterByte: number;
  readonly quoteByte: number;
  readonly escapeByte: number;

  constructor(options?: Partial<DialectOptions>) {
    const merged: DialectOptions = {
      ...defaultDialectOptions,
      ...definedOptions(options ?? {}),
    };

    this.delimiterByte = charByte("delimiter", merged.delimiter);
    this.quoteByte = charByte("quotechar", merged.quotechar);
    this.escapeByte = merged.escapechar === null
      ? -1
      : charByte("escapechar", merged.escapechar);

    if (this.delimiterByte === this.quoteByte) {
      throw new ConfigError('"delimiter" and "quotechar" must differ');
    }
    if (
      this.escapeByte === this.delimiterByte ||
      this.escapeByte === this.quoteByte
    ) {
      throw new ConfigError(
        '"escapechar" must differ from "delimiter" and "quotechar"',
      );
    }
    if (!isQuoting(merged.quoting)) {
      throw new ConfigError(`bad "quoting" value: ${String(merged.quoting)}`);
    }
    if (!isLineTerminator(merged.lineterminator)) {
      throw new ConfigError(
        '"lineterminator" must be one of "\\n", "\\r", "\\r\\n"',
      );
    }
    for (
      const key of ["skipinitialspace", "strict", "doublequote"] as const
    ) {
      if (typeof merged[key] !== "boolean") {
        throw new ConfigError(`"${key}" must be a boolean`);
      }
    }

    this.delimiter = merged.delimiter;
    this.quotechar = merged.quotechar;
    this.escapechar = merged.escapechar;
    this.quoting = merged.quoting;
    this.lineterminator = merged.lineterminator;
    this.skipinitialspace = merged.skipinitialspace;
    this.strict = merged.strict;
    this.doublequote = merged.doublequote;
    Object.freeze(this);
  }

  /** A copy of this dialect with some options replaced. */
  with(options: Partial<DialectOptions>): Dialect {
    return new Dialect({ ...this.toOptions(), ...options });
  }

  toOptions(): DialectOptions {
    return {
      delimiter: this.delimiter,
      quotechar: this.quotechar,
      escapechar: this.escapechar,
      quoting: this.quoting,
      lineterminator: this.lineterminator,
      skipinitialspace: this.skipinitialspace,
      strict: this.strict,
      doublequote: this.doublequote,
    };
  }
}

export const excel = new Dialect();
export const excelTab = new Dialect({ delimiter: "\t" });
export const unix = new Dialect({ lineterminator: "\n", quoting: Quoting.ALL });

/** Builds a dialect from a preset plus overrides, or reuses a given one. */
export function resolveDialect(
  options?: Partial<DialectOptions> & { dialect?: Dialect },
): Dialect {
  const { dialect = excel, ...rest } = options ?? {};
  const overrides = definedOptions(rest);
  return Object.keys(overrides).length === 0
    ? dialect
    : dialect.with(overrides);
}
