import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Readable, Writable } from "node:stream";
import { afterAll, beforeAll, expect, it, vi } from "./dev_deps.ts";
import { ConfigError, IOError } from "./errors.ts";
import { openCSVReader, withCSVReader } from "./reader.ts";
import {
  iterableSource,
  MemorySink,
  MemorySource,
  writableSink,
} from "./source.ts";
import type { ByteSink, ByteSource } from "./source.ts";
import { asyncArrayFrom } from "./utils.ts";
import { openCSVWriter, withCSVWriter, writeCSV } from "./writer.ts";

let dir: string;

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), "streaming-csv-"));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

it("openCSVWriter and openCSVReader work on files", async () => {
  const path = join(dir, "rows.csv");

  await withCSVWriter(path, {}, (writer) =>
    writer.writeRows([["a", "b"], ["1", "x\ny"]])
  );
  expect(await readFile(path, "utf-8")).toBe('a,b\r\n1,"x\ny"\r\n');

  const rows = await withCSVReader(path, {}, (reader) => reader.readRows(10));
  expect(rows).toEqual([["a", "b"], ["1", "x\ny"]]);
});

it("openCSVWriter truncates unless asked to append", async () => {
  const path = join(dir, "append.csv");
  await writeFile(path, "old\r\n");

  const appending = await openCSVWriter(path, { append: true });
  await appending.writeRow(["new"]);
  await appending.close();
  expect(await readFile(path, "utf-8")).toBe("old\r\nnew\r\n");

  const truncating = await openCSVWriter(path);
  await truncating.writeRow(["only"]);
  await truncating.close();
  expect(await readFile(path, "utf-8")).toBe("only\r\n");
});

it("openCSVReader closes the file it opened", async () => {
  const path = join(dir, "owned.csv");
  await writeFile(path, "a\n");

  const reader = await openCSVReader(path);
  expect(await reader.readRow()).toEqual(["a"]);
  await reader.close();

  expect(reader.closed).toBe(true);
});

it("openCSVReader rejects bad paths", async () => {
  await expect(openCSVReader("")).rejects.toThrow(
    new ConfigError("Path cannot be empty"),
  );
  await expect(openCSVWriter("a\0b")).rejects.toThrow(
    new ConfigError("Path cannot contain null bytes"),
  );
});

it("openCSVReader wraps a failed open", async () => {
  const path = join(dir, "missing.csv");

  const err = await openCSVReader(path).catch((e: unknown) => e);

  expect(err).toBeInstanceOf(IOError);
  expect(err).toHaveProperty("cause.code", "ENOENT");
});

it("openCSVReader goes through a custom opener and owns its source", async () => {
  const source = new MemorySource("a,b\n");
  const opener = vi.fn((_path: string) => Promise.resolve<ByteSource>(source));

  const rows = await withCSVReader("data.csv", { opener }, (reader) =>
    reader.readRows(1)
  );

  expect(rows).toEqual([["a", "b"]]);
  expect(opener).toHaveBeenCalledWith("data.csv");
  expect(source.closed).toBe(true);
});

it("openCSVReader validates the dialect before opening", async () => {
  const opener = vi.fn((_path: string) =>
    Promise.resolve<ByteSource>(new MemorySource(""))
  );

  await expect(
    openCSVReader("data.csv", { opener, delimiter: ",," }),
  ).rejects.toBeInstanceOf(ConfigError);
  expect(opener).not.toHaveBeenCalled();
});

it("openCSVWriter passes append to a custom opener", async () => {
  const sink = new MemorySink();
  const opener = vi.fn((_path: string, _options: { append: boolean }) =>
    Promise.resolve<ByteSink>(sink)
  );

  const writer = await openCSVWriter("out.csv", { opener, append: true });
  await writer.writeRow(["a"]);
  await writer.close();

  expect(opener).toHaveBeenCalledWith("out.csv", { append: true });
  expect(sink.text()).toBe("a\r\n");
  expect(sink.closed).toBe(true);
});

it("openCSVReader leaves a given source to the caller", async () => {
  const source = new MemorySource("a\n");

  const reader = await openCSVReader(source);
  await reader.close();

  expect(source.closed).toBe(false);
});

it("iterableSource reads a Node stream", async () => {
  const source = iterableSource(Readable.from(["a,b\n1,", "2\n"]));

  const rows = await withCSVReader(source, { readSize: 3 }, (reader) =>
    asyncArrayFrom(reader)
  );

  expect(rows).toEqual([["a", "b"], ["1", "2"]]);
});

it("iterableSource hands out at most maxBytes per read", async () => {
  const source = iterableSource(Readable.from([Buffer.from("abcde")]));

  const first = await source.read(2);
  const second = await source.read(10);
  const end = await source.read(10);

  const decoder = new TextDecoder();
  expect(decoder.decode(first ?? undefined)).toBe("ab");
  expect(decoder.decode(second ?? undefined)).toBe("cde");
  expect(end).toBe(null);
});

it("writableSink writes into a Node stream", async () => {
  const chunks: Buffer[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk);
      callback();
    },
  });

  await writeCSV(writableSink(stream), [["a", "b"], ["1", "2"]], {
    ownsHandle: true,
  });

  expect(Buffer.concat(chunks).toString()).toBe("a,b\r\n1,2\r\n");
  expect(stream.writableFinished).toBe(true);
  expect(stream.listenerCount("error")).toBe(0);
});

it("writableSink close rejects when the stream fails", async () => {
  const stream = new Writable({
    write(_chunk: Buffer, _encoding, callback) {
      callback();
    },
    final(callback) {
      callback(new Error("flush failed"));
    },
  });

  await expect(writableSink(stream).close()).rejects.toThrow("flush failed");
});
