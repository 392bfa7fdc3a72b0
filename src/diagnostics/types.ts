/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A codec diagnostic with an optional position inside the HEX text.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `IHX100`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  /** Path of the stream the diagnostic refers to (`<memory>` for in-memory text). */
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
}

/**
 * Known diagnostic IDs.
 *
 * 0xx: I/O and arguments, 1xx: record syntax, 2xx: addressing.
 */
export const DiagnosticIds = {
  /** Reading from the HEX source failed. */
  IoReadFailed: 'IHX001',

  /** Writing to the HEX sink failed. The sink may hold a truncated document. */
  IoWriteFailed: 'IHX002',

  /** An option passed by the caller is out of its accepted range. */
  InvalidArgument: 'IHX003',

  /** Line does not start with a `:LLAAAATT` record header. */
  MalformedHeader: 'IHX100',

  /** Extended segment/linear address record without a 4-digit payload. */
  MalformedExtensionAddress: 'IHX101',

  /** Payload pair is not two hex digits, or is missing (truncated record). */
  MalformedDataByte: 'IHX102',

  /** Data record starts below the window start. */
  AddressBelowRange: 'IHX200',

  /** Data record ends past the window end. */
  AddressAboveRange: 'IHX201',

  /** Window bounds are invalid or the buffer cannot hold the window. */
  InvalidWindow: 'IHX202',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];

/**
 * Render a diagnostic the way the CLI prints it: `file[:line[:column]]: severity: [id] message`.
 */
export function formatDiagnostic(d: Diagnostic): string {
  let loc = d.file;
  if (d.line !== undefined) {
    loc += `:${d.line}`;
    if (d.column !== undefined) loc += `:${d.column}`;
  }
  return `${loc}: ${d.severity}: [${d.id}] ${d.message}`;
}
