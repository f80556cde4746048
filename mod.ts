export {
  Dialect,
  excel,
  excelTab,
  Quoting,
  resolveDialect,
  unix,
} from "./dialect.ts";
export type { DialectOptions, LineTerminator } from "./dialect.ts";
export {
  ClosedResourceError,
  ConfigError,
  CSVError,
  FieldCountError,
  FormatError,
  IOError,
  MalformedRecordError,
  WriteRowsError,
} from "./errors.ts";
export type { ErrorPosition, FormatErrorKind } from "./errors.ts";
export {
  CSVReader,
  openCSVReader,
  readCSVRows,
  withCSVReader,
} from "./reader.ts";
export type { CSVReaderOptions, ReadOptions } from "./reader.ts";
export {
  CSVWriter,
  openCSVWriter,
  withCSVWriter,
  writeCSV,
} from "./writer.ts";
export type { CSVWriterOptions, WriteOptions } from "./writer.ts";
export {
  CSVDictReader,
  CSVDictWriter,
  readCSVObjects,
  writeCSVObjects,
} from "./dict.ts";
export type {
  DictReaderOptions,
  DictRow,
  DictWriterOptions,
} from "./dict.ts";
export type { Cell } from "./serializer.ts";
export {
  FileSink,
  FileSource,
  iterableSource,
  MemorySink,
  MemorySource,
  openFileSink,
  openFileSource,
  writableSink,
} from "./source.ts";
export type {
  ByteSink,
  ByteSource,
  SinkOpener,
  SourceOpener,
} from "./source.ts";
export { getLogger } from "./utils.ts";
