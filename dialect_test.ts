import { expect, it } from "./dev_deps.ts";
import {
  Dialect,
  excel,
  excelTab,
  Quoting,
  resolveDialect,
  unix,
} from "./dialect.ts";
import { ConfigError } from "./errors.ts";
import { CSVReader } from "./reader.ts";
import { MemorySink, MemorySource } from "./source.ts";
import { CSVWriter } from "./writer.ts";

it("Dialect has excel defaults", () => {
  expect(new Dialect().toOptions()).toEqual({
    delimiter: ",",
    quotechar: '"',
    escapechar: null,
    quoting: Quoting.MINIMAL,
    lineterminator: "\r\n",
    skipinitialspace: false,
    strict: false,
    doublequote: true,
  });
});

it("Dialect ignores options set to undefined", () => {
  expect(new Dialect({ delimiter: undefined }).delimiter).toBe(",");
});

it("Dialect presets", () => {
  expect(excel.delimiter).toBe(",");
  expect(excelTab.delimiter).toBe("\t");
  expect(unix.lineterminator).toBe("\n");
  expect(unix.quoting).toBe(Quoting.ALL);
});

it("Dialect is immutable; with() makes a copy", () => {
  const semicolon = excel.with({ delimiter: ";" });

  expect(semicolon.delimiter).toBe(";");
  expect(semicolon.quotechar).toBe('"');
  expect(excel.delimiter).toBe(",");
  expect(Object.isFrozen(excel)).toBe(true);
});

it("Dialect validates special characters", () => {
  expect(() => new Dialect({ delimiter: "" })).toThrow(
    new ConfigError('"delimiter" must be a 1-character string'),
  );
  expect(() => new Dialect({ delimiter: ";;" })).toThrow(
    '"delimiter" must be a 1-character string',
  );
  expect(() => new Dialect({ quotechar: "é" })).toThrow(
    '"quotechar" must be an ASCII character',
  );
  expect(() => new Dialect({ delimiter: "\n" })).toThrow(
    '"delimiter" cannot be a line break',
  );
  expect(() => new Dialect({ escapechar: "\r" })).toThrow(
    '"escapechar" cannot be a line break',
  );
});

it("Dialect requires distinct special characters", () => {
  expect(() => new Dialect({ quotechar: "," })).toThrow(
    '"delimiter" and "quotechar" must differ',
  );
  expect(() => new Dialect({ escapechar: '"' })).toThrow(
    '"escapechar" must differ from "delimiter" and "quotechar"',
  );
  expect(() => new Dialect({ delimiter: "\t", escapechar: "\t" })).toThrow(
    ConfigError,
  );
});

it("Dialect rejects unknown quoting modes", () => {
  const quoting: number = 9;

  expect(() => new Dialect({ quoting })).toThrow('bad "quoting" value: 9');
});

it("resolveDialect reuses a preset when nothing overrides it", () => {
  expect(resolveDialect()).toBe(excel);
  expect(resolveDialect({ dialect: unix })).toBe(unix);
  expect(resolveDialect({ dialect: unix, strict: undefined })).toBe(unix);
});

it("resolveDialect applies overrides on top of a preset", () => {
  const dialect = resolveDialect({ dialect: unix, delimiter: ";" });

  expect(dialect.delimiter).toBe(";");
  expect(dialect.lineterminator).toBe("\n");
  expect(dialect.quoting).toBe(Quoting.ALL);
});

it("CSVReader validates its options", () => {
  const source = new MemorySource("");

  expect(() => new CSVReader(source, { readSize: 0 })).toThrow(
    new ConfigError('"readSize" must be a positive integer'),
  );
  expect(() => new CSVReader(source, { fieldSizeLimit: 1.5 })).toThrow(
    '"fieldSizeLimit" must be a positive integer',
  );
  expect(() => new CSVReader(source, { quotechar: "" })).toThrow(
    ConfigError,
  );
});

it("CSVWriter validates its options", () => {
  expect(() => new CSVWriter(new MemorySink(), { writeSize: -1 })).toThrow(
    new ConfigError('"writeSize" must be a positive integer'),
  );
});
