import type { BufferManager, BufferStats } from "./buffer.ts";
import { Quoting } from "./dialect.ts";
import type { Dialect } from "./dialect.ts";
import { MalformedRecordError } from "./errors.ts";
import { createDebug } from "./utils.ts";

export enum State {
  /** Between records; nothing of the next record consumed yet */
  RECORD_END = 0,
  FIELD_START = 1,
  /** A delimiter was just consumed */
  AFTER_FIELD = 2,
  IN_FIELD = 3,
  ESCAPED_CHAR = 4,
  IN_QUOTED_FIELD = 5,
  ESCAPE_IN_QUOTED_FIELD = 6,
  QUOTE_IN_QUOTED_FIELD = 7,
}

export interface TokenizerOptions {
  fieldSizeLimit: number;
  columnBufferMinStepSize: number;
  stats: BufferStats;
}

const LF = 10;
const CR = 13;
const SPACE = 32;

function describeByte(b: number): string {
  if (b === CR) return "\\r";
  if (b === LF) return "\\n";
  return String.fromCharCode(b);
}

/**
 * Quote-aware CSV state machine. Works byte by byte over whatever the
 * buffer manager holds and keeps its state (including a half-read field)
 * between calls, so a record may span any number of refills.
 *
 * CR, LF and CRLF all end a record. `lineNum` counts physical lines
 * consumed, including line breaks inside quoted fields.
 */
export class Tokenizer {
  state = State.RECORD_END;
  lineNum = 0;

  private fields: string[] = [];
  private column: Uint8Array;
  private columnIndex = 0;
  private columnStepSize: number;
  private fieldSizeLimit: number;
  private stats: BufferStats;
  /** A CR ended the last record; a following LF belongs to it */
  private skipLF = false;
  /** The last byte stored inside a quoted field was a CR */
  private lastWasCR = false;
  /** The current record failed; drop it at its terminator */
  private discarding = false;

  private delimiter: number;
  private quote: number;
  private escape: number;
  private strict: boolean;
  private doublequote: boolean;
  private skipinitialspace: boolean;
  private dialect: Dialect;
  private decoder = new TextDecoder("utf-8", { ignoreBOM: true });
  private debug: (msg: string) => void;

  constructor(dialect: Dialect, options: TokenizerOptions) {
    this.dialect = dialect;
    this.delimiter = dialect.delimiterByte;
    this.quote = dialect.quoting === Quoting.NONE ? -1 : dialect.quoteByte;
    this.escape = dialect.escapeByte;
    this.strict = dialect.strict;
    this.doublequote = dialect.doublequote;
    this.skipinitialspace = dialect.skipinitialspace;
    this.fieldSizeLimit = options.fieldSizeLimit;
    this.columnStepSize = Math.max(options.columnBufferMinStepSize, 1);
    this.stats = options.stats;
    this.column = new Uint8Array(this.columnStepSize);
    this.debug = createDebug();
  }

  /**
   * Consumes buffered bytes until one record is complete (and returns it) or
   * the buffer is drained (and returns null). The buffer cursor always ends
   * up after the last byte looked at, also when an error is thrown.
   */
  advance(buf: BufferManager): string[] | null {
    const bytes = buf.buffer;
    const end = buf.length;
    let i = buf.cursor;

    try {
      while (i < end) {
        const c = bytes[i];

        if (this.skipLF) {
          this.skipLF = false;
          if (c === LF) {
            i++;
            continue;
          }
        }

        switch (this.state) {
          case State.RECORD_END:
            if (c === CR || c === LF) {
              // blank line
              this.lineEnded(c);
              i++;
              continue;
            }
            this.state = State.FIELD_START;
            continue;

          case State.AFTER_FIELD:
            if (c === SPACE && this.skipinitialspace) {
              i++;
              continue;
            }
            this.state = State.FIELD_START;
            continue;

          case State.FIELD_START:
            if (c === CR || c === LF) {
              // only reachable after a delimiter: a trailing empty field
              i++;
              this.saveField();
              const record = this.endRecord(c);
              if (record !== null) return record;
              continue;
            } else if (c === this.quote) {
              this.debug("start quoted column");
              this.state = State.IN_QUOTED_FIELD;
              this.lastWasCR = false;
            } else if (c === this.escape) {
              this.state = State.ESCAPED_CHAR;
            } else if (c === this.delimiter) {
              this.saveField();
              this.state = State.AFTER_FIELD;
            } else {
              this.state = State.IN_FIELD;
              continue;
            }
            i++;
            continue;

          case State.IN_FIELD: {
            const from = i;
            i = this.findUnquotedEnd(bytes, i, end);
            if (i > from) {
              this.readChars(bytes, from, i, buf.shifted);
              continue;
            }
            i++;
            if (c === CR || c === LF) {
              this.saveField();
              const record = this.endRecord(c);
              if (record !== null) return record;
              continue;
            } else if (c === this.escape) {
              this.state = State.ESCAPED_CHAR;
            } else {
              this.saveField();
              this.state = State.AFTER_FIELD;
            }
            continue;
          }

          case State.ESCAPED_CHAR:
            this.countStoredByte(c);
            i++;
            this.state = State.IN_FIELD;
            this.readChars(bytes, i - 1, i, buf.shifted);
            continue;

          case State.IN_QUOTED_FIELD: {
            const from = i;
            i = this.findQuotedEnd(bytes, i, end);
            if (i > from) {
              this.readChars(bytes, from, i, buf.shifted);
              continue;
            }
            this.state = c === this.quote
              ? State.QUOTE_IN_QUOTED_FIELD
              : State.ESCAPE_IN_QUOTED_FIELD;
            i++;
            continue;
          }

          case State.ESCAPE_IN_QUOTED_FIELD:
            this.countStoredByte(c);
            i++;
            this.state = State.IN_QUOTED_FIELD;
            this.readChars(bytes, i - 1, i, buf.shifted);
            continue;

          case State.QUOTE_IN_QUOTED_FIELD:
            if (c === this.quote && this.doublequote) {
              this.debug("double quote");
              this.lastWasCR = false;
              i++;
              this.state = State.IN_QUOTED_FIELD;
              this.readChars(bytes, i - 1, i, buf.shifted);
              continue;
            }
            if (c === this.delimiter) {
              this.debug("end quoted column");
              this.saveField();
              this.state = State.AFTER_FIELD;
              i++;
              continue;
            }
            if (c === CR || c === LF) {
              this.debug("end quoted column");
              i++;
              this.saveField();
              const record = this.endRecord(c);
              if (record !== null) return record;
              continue;
            }
            if (this.strict) {
              const position = {
                line: this.lineNum + 1,
                offset: buf.shifted + i,
              };
              i++;
              // skip the rest of the record, quotes still respected
              this.state = State.IN_FIELD;
              this.startDiscarding();
              throw new MalformedRecordError(
                `'${this.dialect.delimiter}' expected after '${this.dialect.quotechar}', received '${
                  describeByte(c)
                }'`,
                position,
              );
            }
            // lenient: the stray byte continues the field, unquoted
            i++;
            this.state = State.IN_FIELD;
            this.readChars(bytes, i - 1, i, buf.shifted);
            continue;
        }
      }
      return null;
    } finally {
      buf.cursor = i;
    }
  }

  /**
   * Called once the source is exhausted and the buffer drained. Returns the
   * last, unterminated record if there is one.
   */
  finish(offset: number): string[] | null {
    if (this.discarding) {
      this.lineNum++;
      this.reset();
      return null;
    }
    switch (this.state) {
      case State.RECORD_END:
        return null;
      case State.IN_QUOTED_FIELD:
      case State.ESCAPE_IN_QUOTED_FIELD:
        if (this.strict) {
          const line = this.lineNum + 1;
          this.reset();
          throw new MalformedRecordError(
            `Expected ${this.dialect.quotechar}, received EOF`,
            { line, offset },
          );
        }
        break;
      case State.ESCAPED_CHAR:
        if (this.strict) {
          const line = this.lineNum + 1;
          this.reset();
          throw new MalformedRecordError(
            `Expected a character after ${this.dialect.escapechar}, received EOF`,
            { line, offset },
          );
        }
        break;
    }
    this.debug("eof");
    this.saveField();
    this.lineNum++;
    const record = this.fields;
    this.fields = [];
    this.state = State.RECORD_END;
    return record;
  }

  /** Drops any partially read record. */
  reset() {
    this.fields = [];
    this.columnIndex = 0;
    this.state = State.RECORD_END;
    this.lastWasCR = false;
    this.discarding = false;
  }

  /**
   * Drops what was read of the current record and keeps consuming it
   * without storing, so the next record starts at a real boundary.
   */
  private startDiscarding() {
    this.fields = [];
    this.columnIndex = 0;
    this.discarding = true;
  }

  /** Null when the record was being discarded. */
  private endRecord(terminator: number): string[] | null {
    this.lineEnded(terminator);
    if (this.discarding) {
      this.debug("skip malformed record");
      this.fields = [];
      this.discarding = false;
      this.state = State.RECORD_END;
      return null;
    }
    const record = this.fields;
    this.fields = [];
    this.state = State.RECORD_END;
    return record;
  }

  private lineEnded(terminator: number) {
    this.lineNum++;
    if (terminator === CR) {
      this.skipLF = true;
    }
  }

  /** Counts a line break stored as data; CRLF counts once */
  private countStoredByte(c: number) {
    if (c === LF) {
      if (!this.lastWasCR) this.lineNum++;
    } else if (c === CR) {
      this.lineNum++;
    }
    this.lastWasCR = c === CR;
  }

  private findUnquotedEnd(a: Uint8Array, from: number, to: number): number {
    const { delimiter, escape } = this;
    let i = from;
    while (i < to) {
      const b = a[i];
      if (b === delimiter || b === CR || b === LF || b === escape) break;
      i++;
    }
    return i;
  }

  private findQuotedEnd(a: Uint8Array, from: number, to: number): number {
    const { quote, escape } = this;
    let i = from;
    while (i < to) {
      const b = a[i];
      if (b === quote || b === escape) break;
      this.countStoredByte(b);
      i++;
    }
    return i;
  }

  private readChars(a: Uint8Array, from: number, to: number, shifted: number) {
    if (this.discarding) return;
    const n = to - from;
    if (this.columnIndex + n > this.fieldSizeLimit) {
      const position = { line: this.lineNum + 1, offset: shifted + from };
      this.startDiscarding();
      throw new MalformedRecordError(
        `field larger than field limit (${this.fieldSizeLimit})`,
        position,
      );
    }
    if (this.columnIndex + n > this.column.length) {
      this.expandColumnBuffer(this.columnIndex + n);
    }
    this.column.set(a.subarray(from, to), this.columnIndex);
    this.columnIndex += n;
  }

  private expandColumnBuffer(minLength: number) {
    this.stats.columnBufferExpands++;
    let length = this.column.length;
    while (length < minLength) {
      length += this.columnStepSize;
    }
    this.debug(
      `expand column buffer from ${this.column.length} to ${length}`,
    );
    const newColumn = new Uint8Array(length);
    newColumn.set(this.column.subarray(0, this.columnIndex));
    this.column = newColumn;
  }

  private saveField() {
    this.lastWasCR = false;
    if (!this.discarding) {
      this.fields.push(
        this.decoder.decode(this.column.subarray(0, this.columnIndex)),
      );
    }
    this.columnIndex = 0;
  }
}
