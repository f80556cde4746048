import { open } from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import type { Writable } from "node:stream";
import { ConfigError, IOError } from "./errors.ts";
import { getUint8Array } from "./utils.ts";

/** Anything that hands out bytes in chunks. `null` marks the end. */
export interface ByteSource {
  read(maxBytes: number): Promise<Uint8Array | null>;
  close(): Promise<void>;
}

/** Anything that accepts bytes; resolves with the number of bytes taken. */
export interface ByteSink {
  write(bytes: Uint8Array): Promise<number>;
  close(): Promise<void>;
}

/** Opens a path for reading; replaceable to plug in other storage. */
export type SourceOpener = (path: string) => Promise<ByteSource>;
export type SinkOpener = (
  path: string,
  options: { append: boolean },
) => Promise<ByteSink>;

export function validatePath(path: string) {
  if (path.length === 0) {
    throw new ConfigError("Path cannot be empty");
  }
  if (path.includes("\0")) {
    throw new ConfigError("Path cannot contain null bytes");
  }
}

/** Reads a file through `fs/promises`; the I/O runs on libuv's pool. */
export class FileSource implements ByteSource {
  constructor(private handle: FileHandle) {}

  async read(maxBytes: number): Promise<Uint8Array | null> {
    const buf = new Uint8Array(maxBytes);
    const { bytesRead } = await this.handle.read(buf, 0, maxBytes, null);
    return bytesRead === 0 ? null : buf.subarray(0, bytesRead);
  }

  close(): Promise<void> {
    return this.handle.close();
  }
}

export class FileSink implements ByteSink {
  constructor(private handle: FileHandle) {}

  async write(bytes: Uint8Array): Promise<number> {
    const { bytesWritten } = await this.handle.write(bytes);
    return bytesWritten;
  }

  close(): Promise<void> {
    return this.handle.close();
  }
}

export const openFileSource: SourceOpener = async (path) => {
  validatePath(path);
  try {
    return new FileSource(await open(path, "r"));
  } catch (err) {
    throw new IOError(`Failed to open file ${path}`, err);
  }
};

export const openFileSink: SinkOpener = async (path, { append }) => {
  validatePath(path);
  try {
    return new FileSink(await open(path, append ? "a" : "w"));
  } catch (err) {
    throw new IOError(`Failed to open file ${path}`, err);
  }
};

/**
 * In-memory source. `chunkSize` caps how much one `read` returns, which is
 * handy for exercising refill boundaries.
 */
export class MemorySource implements ByteSource {
  private buf: Uint8Array;
  private index = 0;
  private chunkSize: number;
  closed = false;

  constructor(content: string | Uint8Array, options?: { chunkSize?: number }) {
    this.buf = getUint8Array(content);
    this.chunkSize = options?.chunkSize ?? Infinity;
  }

  read(maxBytes: number): Promise<Uint8Array | null> {
    const unread = this.buf.length - this.index;
    if (unread <= 0) {
      return Promise.resolve(null);
    }
    const toRead = Math.min(maxBytes, this.chunkSize, unread);
    const chunk = this.buf.slice(this.index, this.index + toRead);
    this.index += toRead;
    return Promise.resolve(chunk);
  }

  close(): Promise<void> {
    this.closed = true;
    return Promise.resolve();
  }
}

/** In-memory sink collecting everything written to it. */
export class MemorySink implements ByteSink {
  private chunks: Uint8Array[] = [];
  writes = 0;
  closed = false;

  write(bytes: Uint8Array): Promise<number> {
    this.writes++;
    this.chunks.push(bytes.slice());
    return Promise.resolve(bytes.length);
  }

  close(): Promise<void> {
    this.closed = true;
    return Promise.resolve();
  }

  bytes(): Uint8Array {
    return Buffer.concat(this.chunks);
  }

  text(): string {
    return new TextDecoder().decode(this.bytes());
  }
}

/** Adapts a chunk iterable (a Node `Readable`, for one) to `ByteSource`. */
export function iterableSource(
  iterable: AsyncIterable<Uint8Array | string>,
): ByteSource {
  const iterator = iterable[Symbol.asyncIterator]();
  let pending: Uint8Array | null = null;

  return {
    async read(maxBytes) {
      if (!pending || pending.length === 0) {
        const { done, value } = await iterator.next();
        if (done) return null;
        pending = getUint8Array(value);
      }
      const chunk = pending.subarray(0, maxBytes);
      pending = pending.subarray(chunk.length);
      return chunk;
    },
    async close() {
      await iterator.return?.();
    },
  };
}

/** Adapts a Node `Writable` to `ByteSink`, honoring backpressure. */
export function writableSink(stream: Writable): ByteSink {
  return {
    write(bytes) {
      return new Promise((resolve, reject) => {
        stream.write(bytes, (err) => {
          if (err) reject(err);
          else resolve(bytes.length);
        });
      });
    },
    close() {
      return new Promise((resolve, reject) => {
        const onError = (err: Error) => {
          stream.off("finish", onFinish);
          reject(err);
        };
        const onFinish = () => {
          stream.off("error", onError);
          resolve();
        };
        stream.once("error", onError);
        stream.once("finish", onFinish);
        stream.end();
      });
    },
  };
}
