#!/usr/bin/env node
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { realpathSync } from 'node:fs';
import { createRequire } from 'node:module';
import { dirname, extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import type { Diagnostic, DiagnosticId } from './diagnostics/types.js';
import { DiagnosticIds, formatDiagnostic } from './diagnostics/types.js';
import { readHexToBin } from './formats/readHex.js';
import { checkWindow, MAX_RECORD_SIZE } from './formats/range.js';
import { writeHexRecords } from './formats/writeHex.js';
import { FileLineSource } from './io/lineSource.js';
import { FileSink } from './io/textSink.js';

type CliExit = { code: number };

type EncodeOptions = {
  command: 'encode';
  inputFile: string;
  outputPath?: string;
  start: number;
  end?: number;
  recordSize: number;
  lineEnding: '\n' | '\r\n';
};

type DecodeOptions = {
  command: 'decode';
  inputFile: string;
  outputPath?: string;
  start: number;
  end: number;
  fill: number;
};

type CliOptions = EncodeOptions | DecodeOptions;

function usage(): string {
  return [
    'ihexkit encode [options] <input.bin>',
    'ihexkit decode [options] <input.hex>',
    '',
    'Encode options:',
    '  -o, --output <file>       Output path (default: input with .hex extension)',
    '  -s, --start <addr>        Address of the first input byte (default: 0)',
    '  -e, --end <addr>          Exclusive end address (default: start + input size)',
    `  -r, --record-size <n>     Data bytes per record, 1..255 (default: ${MAX_RECORD_SIZE})`,
    '      --crlf                Use CRLF line endings',
    '',
    'Decode options:',
    '  -o, --output <file>       Output path (default: input with .bin extension)',
    '  -s, --start <addr>        Window start address (default: 0)',
    '  -e, --end <addr>          Window end address (exclusive, required)',
    '      --fill <byte>         Value for bytes no record covers (default: 0xFF)',
    '',
    '  -V, --version             Print version',
    '  -h, --help                Show help',
    '',
    'Notes:',
    '  - Addresses accept decimal or 0x-prefixed hex.',
    '  - <input> must be the last argument.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function parseNumber(flag: string, text: string): number {
  const value = /^0x[0-9a-f]+$/i.test(text)
    ? Number.parseInt(text.slice(2), 16)
    : /^[0-9]+$/.test(text)
      ? Number.parseInt(text, 10)
      : Number.NaN;
  if (!Number.isSafeInteger(value)) {
    fail(`${flag} expects a decimal or 0x-prefixed number, got "${text}"`);
  }
  return value;
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let command: 'encode' | 'decode' | undefined;
  let outputPath: string | undefined;
  let start = 0;
  let end: number | undefined;
  let recordSize = MAX_RECORD_SIZE;
  let lineEnding: '\n' | '\r\n' = '\n';
  let fill = 0xff;
  let inputFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      const require = createRequire(import.meta.url);
      const here = dirname(fileURLToPath(import.meta.url));
      const packageJsonPath = resolve(here, '..', '..', 'package.json');
      const pkg = require(packageJsonPath) as { version?: unknown };
      process.stdout.write(`${String(pkg.version ?? '0.0.0')}\n`);
      return { code: 0 };
    }

    // Flags taking a value accept both `--flag value` and `--flag=value`.
    const valueFlag = (short: string, long: string): string | undefined => {
      if (a.startsWith(`${long}=`)) {
        const v = a.slice(long.length + 1);
        if (!v) fail(`${long} expects a value`);
        return v;
      }
      if (a !== short && a !== long) return undefined;
      const v = argv[++i];
      if (!v) fail(`${a} expects a value`);
      return v;
    };

    const output = valueFlag('-o', '--output');
    if (output !== undefined) {
      outputPath = output;
      continue;
    }
    const startText = valueFlag('-s', '--start');
    if (startText !== undefined) {
      start = parseNumber('--start', startText);
      continue;
    }
    const endText = valueFlag('-e', '--end');
    if (endText !== undefined) {
      end = parseNumber('--end', endText);
      continue;
    }
    const sizeText = valueFlag('-r', '--record-size');
    if (sizeText !== undefined) {
      recordSize = parseNumber('--record-size', sizeText);
      if (recordSize < 1 || recordSize > 0xff) {
        fail(`Unsupported --record-size ${recordSize} (expected 1..255)`);
      }
      continue;
    }
    const fillText = valueFlag('--fill', '--fill');
    if (fillText !== undefined) {
      fill = parseNumber('--fill', fillText);
      if (fill > 0xff) fail(`Unsupported --fill ${fill} (expected 0..255)`);
      continue;
    }
    if (a === '--crlf') {
      lineEnding = '\r\n';
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (command === undefined) {
      if (a !== 'encode' && a !== 'decode') {
        fail(`Unknown command "${a}" (expected encode|decode)`);
      }
      command = a;
      continue;
    }
    if (inputFile !== undefined || i !== argv.length - 1) {
      fail(`Expected exactly one <input> argument (and it must be last)`);
    }
    inputFile = a;
  }

  if (command === undefined) fail(`Expected a command (encode|decode)`);
  if (!inputFile) fail(`Expected exactly one <input> argument (and it must be last)`);

  if (command === 'decode') {
    if (end === undefined) fail(`decode requires --end`);
    if (end < start) fail(`--end must not be below --start`);
    return {
      command,
      inputFile,
      ...(outputPath ? { outputPath } : {}),
      start,
      end,
      fill,
    };
  }

  if (end !== undefined && end < start) fail(`--end must not be below --start`);
  return {
    command,
    inputFile,
    ...(outputPath ? { outputPath } : {}),
    start,
    ...(end !== undefined ? { end } : {}),
    recordSize,
    lineEnding,
  };
}

function defaultOutputPath(inputFile: string, ext: '.hex' | '.bin'): string {
  const input = resolve(inputFile);
  const inputExt = extname(input);
  const stem = inputExt.length > 0 ? input.slice(0, -inputExt.length) : input;
  return `${stem}${ext}`;
}

function errorDiagnostic(id: DiagnosticId, file: string, message: string): Diagnostic {
  return { id, severity: 'error', message, file };
}

async function runEncode(
  opts: EncodeOptions,
  diagnostics: Diagnostic[],
): Promise<string | undefined> {
  let image: Uint8Array;
  try {
    image = await readFile(opts.inputFile);
  } catch (err) {
    diagnostics.push(
      errorDiagnostic(DiagnosticIds.IoReadFailed, opts.inputFile, `Failed to read input: ${String(err)}`),
    );
    return undefined;
  }
  const end = opts.end ?? opts.start + image.length;
  if (end - opts.start > image.length) {
    fail(`--end 0x${end.toString(16)} is past the ${image.length}-byte input`);
  }

  const range = { start: opts.start, end };
  const problem = checkWindow(range, image.length);
  if (problem) {
    // Reject before the output is opened: creating the sink truncates an existing file.
    diagnostics.push(errorDiagnostic(DiagnosticIds.InvalidWindow, opts.inputFile, problem));
    return undefined;
  }

  const outPath = resolve(opts.outputPath ?? defaultOutputPath(opts.inputFile, '.hex'));
  let sink: FileSink;
  try {
    await mkdir(dirname(outPath), { recursive: true });
    sink = FileSink.create(outPath);
  } catch (err) {
    diagnostics.push(
      errorDiagnostic(DiagnosticIds.IoWriteFailed, outPath, `Failed to open output: ${String(err)}`),
    );
    return undefined;
  }
  try {
    const ok = writeHexRecords(sink, image, range, diagnostics, {
      lineEnding: opts.lineEnding,
      recordSize: opts.recordSize,
    });
    return ok ? outPath : undefined;
  } finally {
    sink.close();
  }
}

async function runDecode(
  opts: DecodeOptions,
  diagnostics: Diagnostic[],
): Promise<string | undefined> {
  let source: FileLineSource;
  try {
    source = FileLineSource.open(opts.inputFile);
  } catch (err) {
    diagnostics.push(
      errorDiagnostic(DiagnosticIds.IoReadFailed, opts.inputFile, `Failed to read input: ${String(err)}`),
    );
    return undefined;
  }

  let res: ReturnType<typeof readHexToBin>;
  try {
    res = readHexToBin(source, { start: opts.start, end: opts.end }, opts.fill);
  } finally {
    source.close();
  }
  diagnostics.push(...res.diagnostics);
  if (!res.artifact) return undefined;

  const outPath = resolve(opts.outputPath ?? defaultOutputPath(opts.inputFile, '.bin'));
  try {
    await mkdir(dirname(outPath), { recursive: true });
    await writeFile(outPath, res.artifact.bytes);
  } catch (err) {
    diagnostics.push(
      errorDiagnostic(DiagnosticIds.IoWriteFailed, outPath, `Failed to write output: ${String(err)}`),
    );
    return undefined;
  }
  return outPath;
}

export async function runCli(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if ('code' in parsed) return parsed.code;

    const diagnostics: Diagnostic[] = [];
    const outPath =
      parsed.command === 'encode'
        ? await runEncode(parsed, diagnostics)
        : await runDecode(parsed, diagnostics);

    for (const d of diagnostics) {
      process.stderr.write(`${formatDiagnostic(d)}\n`);
    }
    if (outPath === undefined || diagnostics.some((d) => d.severity === 'error')) {
      return 1;
    }

    process.stdout.write(`${outPath}\n`);
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`ihexkit: ${msg}\n`);
    process.stderr.write(`${usage()}\n`);
    return 2;
  }
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = (() => {
    try {
      return realpathSync.native(resolved);
    } catch {
      return resolved;
    }
  })();
  const normalized = real.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  const invoked = normalizePathForCompare(invokedAs);
  const self = normalizePathForCompare(fileURLToPath(import.meta.url));
  if (invoked === self) return true;
  // npm bin shims can surface the built entry under a different spelling.
  return invoked.endsWith('/dist/src/cli.js') && self.endsWith('/dist/src/cli.js');
}

if (isDirectCliInvocation(process.argv[1])) {
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
