import { IOError } from "./errors.ts";
import type { ByteSource } from "./source.ts";
import { createDebug } from "./utils.ts";

export interface BufferStats {
  reads: number;
  inputBufferShrinks: number;
  columnBufferExpands: number;
}

export interface BufferManagerOptions {
  readSize: number;
  indexLimit: number;
  stats: BufferStats;
}

/**
 * Owns the input bytes of one reader: a growable buffer and a cursor into
 * it. `ensure` is the only place that awaits the source.
 *
 * Invariant: 0 <= cursor <= length <= buffer.length
 */
export class BufferManager {
  buffer: Uint8Array;
  cursor = 0;
  length = 0;
  /** Bytes dropped from the front of `buffer` by compaction */
  shifted = 0;
  exhausted = false;

  private source: ByteSource;
  private readSize: number;
  private indexLimit: number;
  private stats: BufferStats;
  private debug: (msg: string) => void;

  constructor(source: ByteSource, options: BufferManagerOptions) {
    this.source = source;
    this.readSize = options.readSize;
    this.indexLimit = options.indexLimit;
    this.stats = options.stats;
    this.buffer = new Uint8Array(options.readSize);
    this.debug = createDebug();
  }

  get unread(): number {
    return this.length - this.cursor;
  }

  /** Absolute offset of the cursor from the start of the stream */
  get position(): number {
    return this.shifted + this.cursor;
  }

  /**
   * Reads from the source until at least `minBytes` unread bytes are
   * buffered or the source runs dry.
   */
  async ensure(minBytes = 1, signal?: AbortSignal): Promise<number> {
    while (this.unread < minBytes && !this.exhausted) {
      signal?.throwIfAborted();
      await this.fill();
    }
    return this.unread;
  }

  private async fill() {
    if (this.cursor >= this.indexLimit || this.cursor === this.length) {
      this.shrink();
    }

    this.stats.reads++;
    this.debug("read more data");
    let chunk: Uint8Array | null;
    try {
      chunk = await this.source.read(this.readSize);
    } catch (err) {
      throw new IOError("Failed to read", err, { offset: this.shifted + this.length });
    }

    if (chunk === null) {
      this.debug("eof");
      this.exhausted = true;
      return;
    }

    if (this.length + chunk.length > this.buffer.length) {
      this.grow(this.length + chunk.length);
    }
    this.buffer.set(chunk, this.length);
    this.length += chunk.length;
  }

  private shrink() {
    if (this.cursor === 0) return;
    this.stats.inputBufferShrinks++;
    this.debug(`shrink input buffer by ${this.cursor}`);
    this.buffer.copyWithin(0, this.cursor, this.length);
    this.shifted += this.cursor;
    this.length -= this.cursor;
    this.cursor = 0;
  }

  private grow(minCapacity: number) {
    const capacity = Math.max(minCapacity, this.buffer.length * 2);
    this.debug(`grow input buffer from ${this.buffer.length} to ${capacity}`);
    const next = new Uint8Array(capacity);
    next.set(this.buffer.subarray(0, this.length));
    this.buffer = next;
  }
}
