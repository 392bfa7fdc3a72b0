export type { Diagnostic, DiagnosticId, DiagnosticSeverity } from './diagnostics/types.js';
export { DiagnosticIds, formatDiagnostic } from './diagnostics/types.js';
export { checksum } from './formats/checksum.js';
export { readHex, readHexToBin } from './formats/readHex.js';
export { checkWindow, MAX_RECORD_SIZE, PAGE_SIZE, pageOf, splitIntoChunks } from './formats/range.js';
export { formatRecord, parseRecordHeader } from './formats/records.js';
export type {
  AddressRange,
  BinArtifact,
  HexArtifact,
  LineSource,
  RecordHeader,
  TextSink,
  WriteHexOptions,
} from './formats/types.js';
export { RecordTypes } from './formats/types.js';
export { writeHex, writeHexRecords } from './formats/writeHex.js';
export { FileLineSource, TextLineSource } from './io/lineSource.js';
export { FileSink, TextBufferSink } from './io/textSink.js';
