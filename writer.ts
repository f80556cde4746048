import { resolveDialect } from "./dialect.ts";
import type { Dialect, DialectOptions } from "./dialect.ts";
import {
  ClosedResourceError,
  ConfigError,
  IOError,
  WriteRowsError,
} from "./errors.ts";
import { Serializer } from "./serializer.ts";
import type { Cell } from "./serializer.ts";
import { openFileSink } from "./source.ts";
import type { ByteSink, SinkOpener } from "./source.ts";
import type { SyncAsyncIterable } from "./utils.ts";
import {
  createDebug,
  definedOnly,
  makeAsyncIterable,
  SerialQueue,
} from "./utils.ts";

/** Options for CSV writer */
export interface CSVWriterOptions extends DialectOptions {
  /** Preset the other dialect options are applied on top of */
  dialect: Dialect;
  /** Pending bytes that trigger a flush to the sink */
  writeSize: number;
  /** Close the sink when the writer is closed */
  ownsHandle: boolean;
}

/** Per-call options of the writing methods */
export interface WriteOptions {
  signal?: AbortSignal;
}

const defaultCSVWriterOptions = {
  writeSize: 64 * 1024,
  ownsHandle: false,
};

/** Class for record-at-a-time CSV writing:
 *
 *       const writer = new CSVWriter(sink, { lineterminator: "\n" });
 *       await writer.writeRow(["a", "b"]);
 *       await writer.writeRows([["1", "2"], ["3", "4"]]);
 *       await writer.close();
 *
 * Rows are rendered into a pending buffer that is written to the sink once
 * it reaches `writeSize` bytes, and on `flush`/`close`. Overlapping calls
 * are queued and run in call order, so the bytes of two rows never mix.
 */
export class CSVWriter {
  readonly dialect: Dialect;

  private sink: ByteSink;
  private ownsHandle: boolean;
  private writeSize: number;
  private serializer: Serializer;
  private encoder = new TextEncoder();
  private queue = new SerialQueue();
  private pending: Uint8Array;
  private pendingLength = 0;
  /** Total bytes taken by the sink */
  private bytesAccepted = 0;
  /** Total bytes ever rendered; bytesQueued - bytesAccepted are pending */
  private bytesQueued = 0;
  private isClosed = false;
  private debug: (msg: string) => void;

  constructor(sink: ByteSink, options?: Partial<CSVWriterOptions>) {
    this.dialect = resolveDialect(options);
    const { writeSize, ownsHandle } = {
      ...defaultCSVWriterOptions,
      ...definedOnly(options),
    };
    if (!Number.isInteger(writeSize) || writeSize < 1) {
      throw new ConfigError('"writeSize" must be a positive integer');
    }
    this.sink = sink;
    this.ownsHandle = ownsHandle;
    this.writeSize = writeSize;
    this.serializer = new Serializer(this.dialect);
    this.pending = new Uint8Array(writeSize);
    this.debug = createDebug();
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Bytes the sink has accepted so far */
  get bytesWritten(): number {
    return this.bytesAccepted;
  }

  public writeRow(
    cells: ReadonlyArray<Cell>,
    options?: WriteOptions,
  ): Promise<void> {
    return this.queue.run(async () => {
      await this.appendRow(cells, options?.signal);
    });
  }

  /**
   * Writes rows from a sync or async iterable, flushing once at the end.
   * On failure rejects with `WriteRowsError`, whose `rowsWritten` counts the
   * rows the sink took in full.
   */
  public writeRows(
    rows: SyncAsyncIterable<ReadonlyArray<Cell>>,
    options?: WriteOptions,
  ): Promise<void> {
    return this.queue.run(async () => {
      this.assertOpen();
      const rowEnds: number[] = [];
      try {
        for await (const row of makeAsyncIterable(rows)) {
          rowEnds.push(await this.appendRow(row, options?.signal));
        }
        await this.drain(options?.signal);
      } catch (err) {
        const accepted = this.bytesAccepted;
        const rowsWritten = rowEnds.filter((end) => end <= accepted).length;
        throw new WriteRowsError(rowsWritten, err);
      }
    });
  }

  /** Writes out pending bytes without closing. */
  public flush(options?: WriteOptions): Promise<void> {
    return this.queue.run(() => this.drain(options?.signal));
  }

  /** Flushes, then releases the sink if owned. Safe to call repeatedly. */
  public close(): Promise<void> {
    return this.queue.run(async () => {
      if (this.isClosed) return;
      try {
        await this.drain();
      } finally {
        this.isClosed = true;
        this.debug("close writer");
        if (this.ownsHandle) {
          try {
            await this.sink.close();
          } catch (err) {
            throw new IOError("Failed to close sink", err);
          }
        }
      }
    });
  }

  private assertOpen() {
    if (this.isClosed) {
      throw new ClosedResourceError("CSVWriter");
    }
  }

  /** Renders a row into the pending buffer; resolves with its end offset. */
  private async appendRow(
    cells: ReadonlyArray<Cell>,
    signal?: AbortSignal,
  ): Promise<number> {
    this.assertOpen();
    const bytes = this.encoder.encode(this.serializer.serialize(cells));
    const rowStart = this.bytesQueued;
    this.append(bytes);

    if (this.pendingLength >= this.writeSize) {
      try {
        await this.drain(signal);
      } catch (err) {
        if (signal?.aborted) {
          this.dropPendingFrom(rowStart);
        }
        throw err;
      }
    }
    return this.bytesQueued;
  }

  private append(bytes: Uint8Array) {
    const needed = this.pendingLength + bytes.length;
    if (needed > this.pending.length) {
      const grown = new Uint8Array(Math.max(needed, this.pending.length * 2));
      grown.set(this.pending.subarray(0, this.pendingLength));
      this.pending = grown;
    }
    this.pending.set(bytes, this.pendingLength);
    this.pendingLength += bytes.length;
    this.bytesQueued += bytes.length;
  }

  /** Forgets whatever part of the stream from `offset` is still pending. */
  private dropPendingFrom(offset: number) {
    const keepUntil = Math.max(offset, this.bytesAccepted);
    this.debug(`drop ${this.bytesQueued - keepUntil} pending bytes`);
    this.pendingLength = keepUntil - this.bytesAccepted;
    this.bytesQueued = keepUntil;
  }

  private async drain(signal?: AbortSignal) {
    while (this.pendingLength > 0) {
      signal?.throwIfAborted();
      this.debug(`flush ${this.pendingLength} bytes`);
      let n: number;
      try {
        n = await this.sink.write(this.pending.slice(0, this.pendingLength));
      } catch (err) {
        throw new IOError("Failed to write", err, {
          offset: this.bytesAccepted,
        });
      }
      if (!Number.isInteger(n) || n <= 0 || n > this.pendingLength) {
        throw new IOError(
          "Failed to write",
          new Error(`sink reported ${n} bytes written`),
          { offset: this.bytesAccepted },
        );
      }
      this.pending.copyWithin(0, n, this.pendingLength);
      this.pendingLength -= n;
      this.bytesAccepted += n;
    }
  }
}

/**
 * Opens a writer over a path (through `opener`, by default the file
 * system; `append` keeps existing content) or over a caller-supplied sink.
 * A writer opened from a path owns its handle.
 */
export async function openCSVWriter(
  pathOrSink: string | ByteSink,
  options?: Partial<CSVWriterOptions> & {
    opener?: SinkOpener;
    append?: boolean;
  },
): Promise<CSVWriter> {
  if (typeof pathOrSink !== "string") {
    return new CSVWriter(pathOrSink, options);
  }
  const dialect = resolveDialect(options);
  const sink = await (options?.opener ?? openFileSink)(pathOrSink, {
    append: options?.append ?? false,
  });
  try {
    return new CSVWriter(sink, { ...options, dialect, ownsHandle: true });
  } catch (err) {
    await sink.close();
    throw err;
  }
}

/** Runs `fn` with an open writer; it is flushed and closed on every exit. */
export async function withCSVWriter<T>(
  pathOrSink: string | ByteSink,
  options: Partial<CSVWriterOptions> & {
    opener?: SinkOpener;
    append?: boolean;
  },
  fn: (writer: CSVWriter) => Promise<T>,
): Promise<T> {
  const writer = await openCSVWriter(pathOrSink, options);
  try {
    return await fn(writer);
  } finally {
    await writer.close();
  }
}

/** Write CSV with sync or async row iterators:
 *
 *       await writeCSV(sink, [["a", "b"], ["1", "2"]]);
 *
 *       const asyncRowGenerator = async function*() {
 *         yield ["a", "b"];
 *         yield ["1", "2"];
 *       }
 *       await writeCSV(sink, asyncRowGenerator());
 */
export async function writeCSV(
  sink: ByteSink,
  rows: SyncAsyncIterable<ReadonlyArray<Cell>>,
  options?: Partial<CSVWriterOptions>,
) {
  const csv = new CSVWriter(sink, options);
  await csv.writeRows(rows);
  await csv.close();
}
