import { expect, it } from "./dev_deps.ts";
import {
  CSVDictReader,
  CSVDictWriter,
  readCSVObjects,
  writeCSVObjects,
} from "./dict.ts";
import { FieldCountError } from "./errors.ts";
import { CSVReader } from "./reader.ts";
import { MemorySink, MemorySource } from "./source.ts";
import { asyncArrayFrom } from "./utils.ts";
import { CSVWriter } from "./writer.ts";

it("CSVDictReader keys records by the header", async () => {
  const objs = await asyncArrayFrom(
    readCSVObjects(new MemorySource("a,b\n1,2\n3\n")),
  );

  expect(objs).toEqual([
    { a: "1", b: "2" },
    { a: "3", b: "" },
  ]);
});

it("CSVDictReader fills missing fields with restval", async () => {
  const objs = await asyncArrayFrom(
    readCSVObjects(new MemorySource("a,b,c\n1\n"), { restval: "NA" }),
  );

  expect(objs).toEqual([{ a: "1", b: "NA", c: "NA" }]);
});

it("CSVDictReader collects extra fields under restkey", async () => {
  const objs = await asyncArrayFrom(
    readCSVObjects(new MemorySource("a,b\n1,2,3,4\n"), { restkey: "extra" }),
  );

  expect(objs).toEqual([{ a: "1", b: "2", extra: ["3", "4"] }]);
});

it("CSVDictReader throws on extra fields without restkey", async () => {
  const reader = new CSVDictReader(
    new CSVReader(new MemorySource("a,b\n1,2,3\n")),
  );

  await expect(reader.readRow()).rejects.toThrow(
    new FieldCountError("expected 2 fields, got 3", { line: 2 }),
  );
});

it("CSVDictReader reads the header lazily", async () => {
  const reader = new CSVDictReader(
    new CSVReader(new MemorySource("a,b\n1,2\n")),
  );

  expect(reader.fieldnames).toBe(null);
  expect(reader.lineNum).toBe(0);

  expect(await reader.getFieldnames()).toEqual(["a", "b"]);
  expect(reader.fieldnames).toEqual(["a", "b"]);
  expect(reader.lineNum).toBe(1);

  expect(await reader.readRow()).toEqual({ a: "1", b: "2" });
  expect(await reader.readRow()).toBe(null);
});

it("CSVDictReader uses given fieldnames without consuming a header", async () => {
  const reader = new CSVDictReader(
    new CSVReader(new MemorySource("1,2\n3,4\n")),
    { fieldnames: ["x", "y"] },
  );

  expect(await asyncArrayFrom(reader)).toEqual([
    { x: "1", y: "2" },
    { x: "3", y: "4" },
  ]);
});

it("CSVDictReader keeps its own copy of the fieldnames", async () => {
  const fieldnames = ["x", "y"];
  const reader = new CSVDictReader(
    new CSVReader(new MemorySource("1,2\n")),
    { fieldnames },
  );
  fieldnames[0] = "changed";

  expect(reader.fieldnames).toEqual(["x", "y"]);
  expect(Object.isFrozen(reader.fieldnames)).toBe(true);
  expect(await reader.readRow()).toEqual({ x: "1", y: "2" });
});

it("CSVDictReader header fieldnames cannot be changed", async () => {
  const reader = new CSVDictReader(
    new CSVReader(new MemorySource("a,b\n1,2\n")),
  );

  expect(Object.isFrozen(await reader.getFieldnames())).toBe(true);
});

it("CSVDictReader reads the header once for overlapping calls", async () => {
  const reader = new CSVDictReader(
    new CSVReader(new MemorySource("a\n1\n2\n", { chunkSize: 1 })),
  );

  const [first, second] = await Promise.all([
    reader.readRow(),
    reader.readRow(),
  ]);

  expect(first).toEqual({ a: "1" });
  expect(second).toEqual({ a: "2" });
});

it("CSVDictReader has no fieldnames for empty input", async () => {
  const reader = new CSVDictReader(new CSVReader(new MemorySource("")));

  expect(await reader.getFieldnames()).toBe(null);
  expect(await reader.readRow()).toBe(null);
});

it("CSVDictReader close closes the wrapped reader", async () => {
  const csv = new CSVReader(new MemorySource("a\n"));
  const reader = new CSVDictReader(csv);

  await reader.close();

  expect(csv.closed).toBe(true);
});

it("CSVDictWriter writes rows in fieldnames order", async () => {
  const sink = new MemorySink();
  const writer = new CSVDictWriter(new CSVWriter(sink), {
    fieldnames: ["a", "b"],
  });

  await writer.writeHeader();
  await writer.writeRow({ b: "2", a: "1" });
  await writer.writeRow({ a: "x" });
  await writer.close();

  expect(sink.text()).toBe("a,b\r\n1,2\r\nx,\r\n");
});

it("CSVDictWriter keeps its own copy of the fieldnames", async () => {
  const fieldnames = ["a", "b"];
  const sink = new MemorySink();
  const writer = new CSVDictWriter(new CSVWriter(sink), { fieldnames });
  fieldnames.push("c");

  await writer.writeHeader();
  await writer.close();

  expect(writer.fieldnames).toEqual(["a", "b"]);
  expect(sink.text()).toBe("a,b\r\n");
});

it("CSVDictWriter fills missing keys with restval", async () => {
  const sink = new MemorySink();
  const writer = new CSVDictWriter(new CSVWriter(sink), {
    fieldnames: ["a", "b"],
    restval: "NA",
  });

  await writer.writeRow({ a: 1 });
  await writer.flush();

  expect(sink.text()).toBe("1,NA\r\n");
});

it("CSVDictWriter throws on keys missing from fieldnames", async () => {
  const sink = new MemorySink();
  const writer = new CSVDictWriter(new CSVWriter(sink), {
    fieldnames: ["a"],
  });

  await expect(writer.writeRow({ a: "1", c: "3", d: "4" })).rejects.toThrow(
    new FieldCountError("dict contains fields not in fieldnames: 'c', 'd'"),
  );
  await writer.close();
  expect(sink.text()).toBe("");
});

it("CSVDictWriter drops unknown keys with extrasaction ignore", async () => {
  const sink = new MemorySink();
  const writer = new CSVDictWriter(new CSVWriter(sink), {
    fieldnames: ["a"],
    extrasaction: "ignore",
  });

  await writer.writeRows([{ a: "1", c: "3" }, { a: "2" }]);
  await writer.close();

  expect(sink.text()).toBe("1\r\n2\r\n");
});

it("writeCSVObjects output reads back with readCSVObjects", async () => {
  const sink = new MemorySink();
  const objs = [
    { name: "ann", note: "says \"hi\"" },
    { name: "bob", note: "a,b" },
  ];

  await writeCSVObjects(sink, objs, { fieldnames: ["name", "note"] });

  expect(sink.text()).toBe(
    'name,note\r\nann,"says ""hi"""\r\nbob,"a,b"\r\n',
  );
  expect(
    await asyncArrayFrom(readCSVObjects(new MemorySource(sink.bytes()))),
  ).toEqual(objs);
});
