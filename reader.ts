import { BufferManager } from "./buffer.ts";
import type { BufferStats } from "./buffer.ts";
import { resolveDialect } from "./dialect.ts";
import type { Dialect, DialectOptions } from "./dialect.ts";
import { ClosedResourceError, ConfigError, IOError } from "./errors.ts";
import { openFileSource } from "./source.ts";
import type { ByteSource, SourceOpener } from "./source.ts";
import { Tokenizer } from "./tokenizer.ts";
import {
  createDebug,
  definedOnly,
  hasPrefixFrom,
  noop,
  SerialQueue,
} from "./utils.ts";

/** Options for CSVReader class */
export interface CSVReaderOptions extends DialectOptions {
  /** Preset the other dialect options are applied on top of */
  dialect: Dialect;
  /** Most bytes requested from the source per fetch */
  readSize: number;
  /** Longest field accepted, in bytes */
  fieldSizeLimit: number;
  /** Close the source when the reader is closed */
  ownsHandle: boolean;
}

interface HiddenCSVReaderOptions extends CSVReaderOptions {
  _inputBufferIndexLimit: number;
  _columnBufferMinStepSize: number;
  _stats: BufferStats;
}

/** Per-call options of the reading methods */
export interface ReadOptions {
  signal?: AbortSignal;
}

const utfBom = new Uint8Array([0xef, 0xbb, 0xbf]);

const defaultCSVReaderOptions = {
  readSize: 64 * 1024,
  fieldSizeLimit: 128 * 1024,
  ownsHandle: false,
  _inputBufferIndexLimit: 1024,
  _columnBufferMinStepSize: 1024,
};

/**
 * Pulls records one at a time from a byte source:
 *
 *       const reader = new CSVReader(source, { delimiter: ";" });
 *       const header = await reader.readRow();
 *       for await (const row of reader) {
 *         console.log(row);
 *       }
 *       await reader.close();
 *
 * `readRow` resolves with `[]` once the input is exhausted. Calls on one
 * reader are queued and run one at a time in call order.
 */
export class CSVReader implements AsyncIterableIterator<string[]> {
  readonly dialect: Dialect;

  private source: ByteSource;
  private ownsHandle: boolean;
  private buffer: BufferManager;
  private tokenizer: Tokenizer;
  private queue = new SerialQueue();
  private bomChecked = false;
  /** Raised by the next call; a batch stopped on it after some records */
  private deferredError: { error: unknown } | null = null;
  private done = false;
  private isClosed = false;
  private debug: (msg: string) => void;

  constructor(
    source: ByteSource,
    options?: Partial<CSVReaderOptions>,
  ) {
    this.dialect = resolveDialect(options);
    const mergedOptions: Omit<
      HiddenCSVReaderOptions,
      keyof DialectOptions | "dialect"
    > = {
      ...defaultCSVReaderOptions,
      _stats: { reads: 0, inputBufferShrinks: 0, columnBufferExpands: 0 },
      ...definedOnly(options),
    };
    const { readSize, fieldSizeLimit } = mergedOptions;
    if (!Number.isInteger(readSize) || readSize < 1) {
      throw new ConfigError('"readSize" must be a positive integer');
    }
    if (!Number.isInteger(fieldSizeLimit) || fieldSizeLimit < 1) {
      throw new ConfigError('"fieldSizeLimit" must be a positive integer');
    }

    this.source = source;
    this.ownsHandle = mergedOptions.ownsHandle;
    this.buffer = new BufferManager(source, {
      readSize,
      indexLimit: mergedOptions._inputBufferIndexLimit,
      stats: mergedOptions._stats,
    });
    this.tokenizer = new Tokenizer(this.dialect, {
      fieldSizeLimit,
      columnBufferMinStepSize: mergedOptions._columnBufferMinStepSize,
      stats: mergedOptions._stats,
    });
    this.debug = createDebug();
  }

  /** Physical lines consumed so far */
  get lineNum(): number {
    return this.tokenizer.lineNum;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Next record, or `[]` at the end of the input. */
  readRow(options?: ReadOptions): Promise<string[]> {
    return this.queue.run(() => this.nextRecord(options?.signal));
  }

  /**
   * Up to `n` records; fewer when the input ends first. A failure after some
   * records were read resolves with those, and the next call raises it.
   */
  readRows(n: number, options?: ReadOptions): Promise<string[][]> {
    return this.queue.run(async () => {
      const rows: string[][] = [];
      await this.batch(n, options?.signal, (row) => rows.push(row));
      return rows;
    });
  }

  /** Reads and discards `n` records; resolves with how many were skipped. */
  skipRows(n: number, options?: ReadOptions): Promise<number> {
    return this.queue.run(() => this.batch(n, options?.signal, noop));
  }

  async next(): Promise<IteratorResult<string[], undefined>> {
    const row = await this.readRow();
    if (row.length === 0) {
      return { done: true, value: undefined };
    }
    return { done: false, value: row };
  }

  [Symbol.asyncIterator]() {
    return this;
  }

  /** Releases the source if the reader owns it. Safe to call repeatedly. */
  close(): Promise<void> {
    return this.queue.run(async () => {
      if (this.isClosed) return;
      this.isClosed = true;
      this.debug("close reader");
      if (this.ownsHandle) {
        try {
          await this.source.close();
        } catch (err) {
          throw new IOError("Failed to close source", err);
        }
      }
    });
  }

  private async batch(
    n: number,
    signal: AbortSignal | undefined,
    onRow: (row: string[]) => void,
  ): Promise<number> {
    let count = 0;
    while (count < n) {
      let row: string[];
      try {
        row = await this.nextRecord(signal);
      } catch (err) {
        if (count === 0) throw err;
        // an abort consumed nothing, so there is nothing to replay
        if (!signal?.aborted) {
          this.deferredError = { error: err };
        }
        break;
      }
      if (row.length === 0) break;
      onRow(row);
      count++;
    }
    return count;
  }

  private async nextRecord(signal?: AbortSignal): Promise<string[]> {
    if (this.isClosed) {
      throw new ClosedResourceError("CSVReader");
    }
    if (this.deferredError) {
      const { error } = this.deferredError;
      this.deferredError = null;
      throw error;
    }
    if (this.done) {
      return [];
    }

    const { buffer, tokenizer } = this;

    // skip UTF BOM
    if (!this.bomChecked) {
      await buffer.ensure(1, signal);
      if (buffer.unread > 0 && buffer.buffer[buffer.cursor] === utfBom[0]) {
        await buffer.ensure(utfBom.length, signal);
        if (
          buffer.unread >= utfBom.length &&
          hasPrefixFrom(buffer.buffer, utfBom, buffer.cursor)
        ) {
          buffer.cursor += utfBom.length;
        }
      }
      this.bomChecked = true;
    }

    while (true) {
      const record = tokenizer.advance(buffer);
      if (record !== null) {
        return record;
      }
      if (buffer.exhausted && buffer.unread === 0) {
        const last = tokenizer.finish(buffer.position);
        if (last === null) {
          this.done = true;
          return [];
        }
        return last;
      }
      await buffer.ensure(1, signal);
    }
  }
}

/**
 * Opens a reader over a path (through `opener`, by default the file
 * system) or over a caller-supplied source. A reader opened from a path owns
 * its handle.
 */
export async function openCSVReader(
  pathOrSource: string | ByteSource,
  options?: Partial<CSVReaderOptions> & { opener?: SourceOpener },
): Promise<CSVReader> {
  if (typeof pathOrSource !== "string") {
    return new CSVReader(pathOrSource, options);
  }
  // validate before touching the file system
  const dialect = resolveDialect(options);
  const source = await (options?.opener ?? openFileSource)(pathOrSource);
  try {
    return new CSVReader(source, { ...options, dialect, ownsHandle: true });
  } catch (err) {
    await source.close();
    throw err;
  }
}

/**
 * Runs `fn` with an open reader and closes it on every exit path:
 *
 *       const rows = await withCSVReader("data.csv", {}, (reader) =>
 *         reader.readRows(10)
 *       );
 */
export async function withCSVReader<T>(
  pathOrSource: string | ByteSource,
  options: Partial<CSVReaderOptions> & { opener?: SourceOpener },
  fn: (reader: CSVReader) => Promise<T>,
): Promise<T> {
  const reader = await openCSVReader(pathOrSource, options);
  try {
    return await fn(reader);
  } finally {
    await reader.close();
  }
}

/** Read CSV as stream of arrays of cells:
 *
 *       for await (const row of readCSVRows(source)) {
 *         console.log(`row: ${row.join(" ")}`);
 *       }
 */
export function readCSVRows(
  source: ByteSource,
  options?: Partial<CSVReaderOptions>,
): AsyncIterable<string[]> {
  return new CSVReader(source, options);
}
