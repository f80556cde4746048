import { ConfigError, FieldCountError } from "./errors.ts";
import { CSVReader } from "./reader.ts";
import type { CSVReaderOptions, ReadOptions } from "./reader.ts";
import type { Cell } from "./serializer.ts";
import type { ByteSink, ByteSource } from "./source.ts";
import type { SyncAsyncIterable } from "./utils.ts";
import { makeAsyncIterable } from "./utils.ts";
import { CSVWriter } from "./writer.ts";
import type { CSVWriterOptions, WriteOptions } from "./writer.ts";

/** A record keyed by fieldname; overflow fields land under `restkey`. */
export type DictRow = { [key: string]: string | string[] };

export interface DictReaderOptions {
  /** Keys for the fields; taken from the first record when omitted */
  fieldnames: readonly string[];
  /** Key collecting fields beyond `fieldnames` */
  restkey: string;
  /** Value for keys the record has no field for */
  restval: string;
}

export interface DictWriterOptions {
  fieldnames: readonly string[];
  /** Written for fieldnames missing from a row */
  restval: Cell;
  /** What to do with keys that are not in `fieldnames` */
  extrasaction: "raise" | "ignore";
}

/** Validates and copies, so later changes to the caller's array don't leak in. */
function checkFieldnames(fieldnames: unknown): readonly string[] {
  if (
    !Array.isArray(fieldnames) ||
    !fieldnames.every((name) => typeof name === "string")
  ) {
    throw new ConfigError('"fieldnames" must be an array of strings');
  }
  return Object.freeze([...fieldnames]);
}

/**
 * Reads records as objects keyed by fieldname:
 *
 *       const reader = new CSVDictReader(new CSVReader(source));
 *       for await (const obj of reader) {
 *         console.log(obj);
 *       }
 *
 * All parsing is done by the wrapped `CSVReader`.
 */
export class CSVDictReader implements AsyncIterableIterator<DictRow> {
  readonly reader: CSVReader;
  readonly restkey?: string;
  readonly restval: string;

  private names: readonly string[] | null;
  private header?: Promise<readonly string[] | null>;

  constructor(reader: CSVReader, options?: Partial<DictReaderOptions>) {
    this.reader = reader;
    this.names = options?.fieldnames === undefined
      ? null
      : checkFieldnames(options.fieldnames);
    this.restkey = options?.restkey;
    this.restval = options?.restval ?? "";
  }

  /** Fieldnames, or null while the header has not been read yet */
  get fieldnames(): readonly string[] | null {
    return this.names;
  }

  get lineNum(): number {
    return this.reader.lineNum;
  }

  /** Reads the header record on first use. Null for empty input. */
  getFieldnames(options?: ReadOptions): Promise<readonly string[] | null> {
    if (this.names !== null) {
      return Promise.resolve(this.names);
    }
    if (!this.header) {
      this.header = this.reader.readRow(options).then((row) => {
        this.names = row.length === 0 ? null : Object.freeze(row);
        return this.names;
      }, (err: unknown) => {
        this.header = undefined;
        throw err;
      });
    }
    return this.header;
  }

  /** Next record as an object, or null at the end of the input. */
  async readRow(options?: ReadOptions): Promise<DictRow | null> {
    const fieldnames = await this.getFieldnames(options);
    if (fieldnames === null) {
      return null;
    }
    const row = await this.reader.readRow(options);
    if (row.length === 0) {
      return null;
    }
    return this.project(fieldnames, row);
  }

  async next(): Promise<IteratorResult<DictRow, undefined>> {
    const obj = await this.readRow();
    if (obj === null) {
      return { done: true, value: undefined };
    }
    return { done: false, value: obj };
  }

  [Symbol.asyncIterator]() {
    return this;
  }

  close(): Promise<void> {
    return this.reader.close();
  }

  private project(fieldnames: readonly string[], row: string[]): DictRow {
    const entries = fieldnames.map(
      (name, i): [string, string | string[]] => [
        name,
        i < row.length ? row[i] : this.restval,
      ],
    );

    if (row.length > fieldnames.length) {
      if (this.restkey === undefined) {
        throw new FieldCountError(
          `expected ${fieldnames.length} fields, got ${row.length}`,
          { line: this.reader.lineNum },
        );
      }
      entries.push([this.restkey, row.slice(fieldnames.length)]);
    }
    return Object.fromEntries(entries);
  }
}

/**
 * Writes objects as records in `fieldnames` order:
 *
 *       const writer = new CSVDictWriter(new CSVWriter(sink), {
 *         fieldnames: ["a", "b"],
 *       });
 *       await writer.writeHeader();
 *       await writer.writeRow({ a: "1", b: "2" });
 */
export class CSVDictWriter {
  readonly writer: CSVWriter;
  readonly fieldnames: readonly string[];
  readonly restval: Cell;
  readonly extrasaction: "raise" | "ignore";

  private fieldSet: Set<string>;

  constructor(
    writer: CSVWriter,
    options: Pick<DictWriterOptions, "fieldnames"> & Partial<DictWriterOptions>,
  ) {
    const { extrasaction = "raise", restval = "" } = options;
    if (extrasaction !== "raise" && extrasaction !== "ignore") {
      throw new ConfigError(
        `extrasaction (${String(extrasaction)}) must be 'raise' or 'ignore'`,
      );
    }
    this.writer = writer;
    this.fieldnames = checkFieldnames(options.fieldnames);
    this.fieldSet = new Set(this.fieldnames);
    this.restval = restval;
    this.extrasaction = extrasaction;
  }

  writeHeader(options?: WriteOptions): Promise<void> {
    return this.writer.writeRow(this.fieldnames, options);
  }

  async writeRow(
    obj: { [key: string]: Cell },
    options?: WriteOptions,
  ): Promise<void> {
    await this.writer.writeRow(this.toRow(obj), options);
  }

  writeRows(
    objs: SyncAsyncIterable<{ [key: string]: Cell }>,
    options?: WriteOptions,
  ): Promise<void> {
    const toRow = (obj: { [key: string]: Cell }) => this.toRow(obj);
    const rows = async function* () {
      for await (const obj of makeAsyncIterable(objs)) {
        yield toRow(obj);
      }
    };
    return this.writer.writeRows(rows(), options);
  }

  flush(options?: WriteOptions): Promise<void> {
    return this.writer.flush(options);
  }

  close(): Promise<void> {
    return this.writer.close();
  }

  private toRow(obj: { [key: string]: Cell }): Cell[] {
    if (this.extrasaction === "raise") {
      const extras = Object.keys(obj).filter((key) => !this.fieldSet.has(key));
      if (extras.length > 0) {
        throw new FieldCountError(
          `dict contains fields not in fieldnames: ${
            extras.map((key) => `'${key}'`).join(", ")
          }`,
        );
      }
    }
    return this.fieldnames.map((name) =>
      Object.hasOwn(obj, name) ? obj[name] : this.restval
    );
  }
}

/** Read CSV as stream of objects:
 *
 *       for await (const obj of readCSVObjects(source)) {
 *         console.log(obj);
 *       }
 */
export function readCSVObjects(
  source: ByteSource,
  options?: Partial<CSVReaderOptions & DictReaderOptions>,
): AsyncIterable<DictRow> {
  return new CSVDictReader(new CSVReader(source, options), options);
}

/** Write CSV with sync or async object iterators, header first:
 *
 *       await writeCSVObjects(sink, [{ a: "1" }, { a: "2" }], {
 *         fieldnames: ["a"],
 *       });
 */
export async function writeCSVObjects(
  sink: ByteSink,
  objs: SyncAsyncIterable<{ [key: string]: Cell }>,
  options:
    & Partial<CSVWriterOptions>
    & Pick<DictWriterOptions, "fieldnames">
    & Partial<DictWriterOptions>,
) {
  const csv = new CSVDictWriter(new CSVWriter(sink, options), options);
  await csv.writeHeader();
  await csv.writeRows(objs);
  await csv.close();
}
