import { Quoting } from "./dialect.ts";
import type { Dialect } from "./dialect.ts";
import { MalformedRecordError } from "./errors.ts";

/** A value the writer accepts for one field. */
export type Cell = string | number | bigint | boolean | null | undefined;

const numericLiteral = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

function isNull(cell: Cell): cell is null | undefined {
  return cell === null || cell === undefined;
}

function isNumeric(cell: Cell): boolean {
  if (typeof cell === "number" || typeof cell === "bigint") return true;
  return typeof cell === "string" && numericLiteral.test(cell);
}

/**
 * Turns records into dialect-correct text. Stateless apart from the
 * dialect it was built with.
 */
export class Serializer {
  private dialect: Dialect;
  private specials: RegExp;

  constructor(dialect: Dialect) {
    this.dialect = dialect;
    const chars = [dialect.delimiter, dialect.quotechar, "\r", "\n"];
    if (dialect.escapechar !== null) chars.push(dialect.escapechar);
    this.specials = new RegExp(
      `[${chars.map((ch) => `\\u${ch.charCodeAt(0).toString(16).padStart(4, "0")}`).join("")}]`,
    );
  }

  /** Renders one record, terminator included. */
  serialize(cells: ReadonlyArray<Cell>): string {
    const { dialect } = this;

    if (cells.length === 1 && (cells[0] === "" || isNull(cells[0]))) {
      // an empty line would read back as no record at all
      if (dialect.quoting === Quoting.NONE) {
        throw new MalformedRecordError(
          "single empty field record must be quoted",
        );
      }
      return dialect.quotechar + dialect.quotechar + dialect.lineterminator;
    }

    const parts: string[] = [];
    for (const cell of cells) {
      parts.push(this.field(cell));
    }
    return parts.join(dialect.delimiter) + dialect.lineterminator;
  }

  private field(cell: Cell): string {
    const text = isNull(cell) ? "" : String(cell);
    switch (this.dialect.quoting) {
      case Quoting.ALL:
        return this.quoted(text);
      case Quoting.NONNUMERIC:
        return isNumeric(cell) ? this.minimal(text) : this.quoted(text);
      case Quoting.NONE:
        return this.escaped(text);
      case Quoting.NOTNULL:
        return isNull(cell) ? "" : this.quoted(text);
      case Quoting.STRINGS:
        if (isNull(cell)) return "";
        return typeof cell === "string" ? this.quoted(text) : this.minimal(text);
      case Quoting.MINIMAL:
        return this.minimal(text);
    }
  }

  private minimal(text: string): string {
    const { delimiter, quotechar } = this.dialect;
    const needsQuotes = text.includes(delimiter) ||
      text.includes(quotechar) ||
      text.includes("\r") ||
      text.includes("\n");
    return needsQuotes ? this.quoted(text) : this.escaped(text);
  }

  /** Wraps in quotes, doubling or escaping embedded quotes. */
  private quoted(text: string): string {
    const { quotechar, escapechar, doublequote } = this.dialect;
    let body = text;
    if (escapechar !== null) {
      body = body.split(escapechar).join(escapechar + escapechar);
    }
    if (body.includes(quotechar)) {
      if (doublequote) {
        body = body.split(quotechar).join(quotechar + quotechar);
      } else if (escapechar !== null) {
        body = body.split(quotechar).join(escapechar + quotechar);
      } else {
        throw new MalformedRecordError("need to escape, but no escapechar set");
      }
    }
    return quotechar + body + quotechar;
  }

  /** Leaves the field unquoted, escaping every special character. */
  private escaped(text: string): string {
    if (!this.specials.test(text)) return text;
    const { escapechar } = this.dialect;
    if (escapechar === null) {
      throw new MalformedRecordError("need to escape, but no escapechar set");
    }
    let out = "";
    for (const ch of text) {
      out += this.specials.test(ch) ? escapechar + ch : ch;
    }
    return out;
  }
}
