#!/usr/bin/env node
import { existsSync, realpathSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import type { Diagnostic } from './diagnostics/types.js';
import { ExitCodes, exitCodeFor } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import type { CaseStyleMode, SourceInput } from './pipeline.js';
import { translate } from './translate.js';

const PROGRAM_NAME = 'ippc-parse';
const STDIN_NAME = '<stdin>';

type CliExit = { code: number };

type CliOptions = {
  inputPath?: string;
  outputPath?: string;
  caseStyle: CaseStyleMode;
};

/**
 * Process streams used by the CLI. Tests pass in-memory streams.
 */
export interface CliIo {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

function usage(): string {
  return [
    `${PROGRAM_NAME} [options]`,
    '',
    'Reads IPPcode24 source and writes its XML representation.',
    '',
    'Options:',
    '  -i, --input <file>    Read source from <file> (default: standard input)',
    '  -o, --output <file>   Write XML to <file> (default: standard output)',
    '      --case-style <m>  Opcode case-style lint mode: off|upper|lower|consistent',
    '  -V, --version         Print version',
    '  -h, --help            Show help (must be the only argument)',
    '',
    'Exit status:',
    '  0 success, 10 bad arguments, 21 missing or malformed header,',
    '  23 lexical or syntactic error, 99 internal error',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function isCliError(err: unknown): err is Error {
  return err instanceof Error && err.name === 'CliError';
}

async function readVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url));
  // src/cli.ts and dist/src/cli.js sit at different depths below the package root.
  const candidates = [resolve(here, '..', 'package.json'), resolve(here, '..', '..', 'package.json')];
  const packageJsonPath = candidates.find((p) => existsSync(p));
  if (!packageJsonPath) return '0.0.0';
  const pkg = JSON.parse(await readFile(packageJsonPath, 'utf8')) as unknown;
  if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

function optionValue(argv: string[], i: number, a: string, long: string): { value: string; next: number } {
  if (a.startsWith(`${long}=`)) {
    const v = a.slice(long.length + 1);
    if (!v) fail(`${long} expects a value`);
    return { value: v, next: i };
  }
  const v = argv[i + 1];
  if (!v) fail(`${a} expects a value`);
  return { value: v, next: i + 1 };
}

async function parseArgs(argv: string[], io: CliIo): Promise<CliOptions | CliExit> {
  let inputPath: string | undefined;
  let outputPath: string | undefined;
  let caseStyle: CaseStyleMode = 'off';

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a === '-h' || a === '--help') {
      if (argv.length !== 1) fail(`${a} cannot be combined with other arguments`);
      io.stdout.write(usage());
      return { code: ExitCodes.ok };
    }
    if (a === '-V' || a === '--version') {
      io.stdout.write(`${await readVersion()}\n`);
      return { code: ExitCodes.ok };
    }
    if (a === '-i' || a === '--input' || a.startsWith('--input=')) {
      if (inputPath !== undefined) fail(`--input given more than once`);
      const { value, next } = optionValue(argv, i, a, '--input');
      inputPath = value;
      i = next;
      continue;
    }
    if (a === '-o' || a === '--output' || a.startsWith('--output=')) {
      if (outputPath !== undefined) fail(`--output given more than once`);
      const { value, next } = optionValue(argv, i, a, '--output');
      outputPath = value;
      i = next;
      continue;
    }
    if (a === '--case-style' || a.startsWith('--case-style=')) {
      const { value: v, next } = optionValue(argv, i, a, '--case-style');
      if (v !== 'off' && v !== 'upper' && v !== 'lower' && v !== 'consistent') {
        fail(`Unsupported --case-style "${v}" (expected off|upper|lower|consistent)`);
      }
      caseStyle = v;
      i = next;
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    fail(`Unexpected argument "${a}" (use --input <file> to read from a file)`);
  }

  return {
    ...(inputPath ? { inputPath } : {}),
    ...(outputPath ? { outputPath } : {}),
    caseStyle,
  };
}

async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}

function sourceInput(options: CliOptions, io: CliIo): SourceInput {
  const inputPath = options.inputPath;
  if (inputPath === undefined) {
    return { path: STDIN_NAME, read: () => readStream(io.stdin) };
  }
  return { path: inputPath, read: () => readFile(resolve(inputPath), 'utf8') };
}

function writeStream(stream: NodeJS.WritableStream, text: string): Promise<void> {
  return new Promise((resolveWrite, rejectWrite) => {
    stream.write(text, (err?: Error | null) => (err ? rejectWrite(err) : resolveWrite()));
  });
}

async function writeOutput(text: string, options: CliOptions, io: CliIo): Promise<void> {
  if (options.outputPath === undefined) {
    await writeStream(io.stdout, text);
    return;
  }
  const outPath = resolve(options.outputPath);
  await mkdir(dirname(outPath), { recursive: true });
  await writeFile(outPath, text, 'utf8');
}

function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = a.file.localeCompare(b.file);
  if (fileCmp !== 0) return fileCmp;

  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0) return lineCmp;

  const colCmp = (a.column ?? Number.POSITIVE_INFINITY) - (b.column ?? Number.POSITIVE_INFINITY);
  if (colCmp !== 0) return colCmp;

  const sevRank = (severity: Diagnostic['severity']): number => {
    if (severity === 'error') return 0;
    if (severity === 'warning') return 1;
    return 2;
  };
  const sevCmp = sevRank(a.severity) - sevRank(b.severity);
  if (sevCmp !== 0) return sevCmp;

  const idCmp = a.id.localeCompare(b.id);
  if (idCmp !== 0) return idCmp;

  return a.message.localeCompare(b.message);
}

/**
 * One diagnostic per line: `<file>:<line>:<column>: <severity>: [<id>] <message>`.
 */
export function formatDiagnostic(d: Diagnostic): string {
  const loc =
    d.line !== undefined && d.column !== undefined
      ? `${d.file}:${d.line}:${d.column}`
      : d.line !== undefined
        ? `${d.file}:${d.line}`
        : d.file;
  return `${loc}: ${d.severity}: [${d.id}] ${d.message}`;
}

export async function runCli(argv: string[], io: CliIo = process): Promise<number> {
  let parsed: CliOptions | CliExit;
  try {
    parsed = await parseArgs(argv, io);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    io.stderr.write(`${PROGRAM_NAME}: ${msg}\n`);
    if (isCliError(err)) {
      io.stderr.write(`${usage()}\n`);
      return ExitCodes.usage;
    }
    return ExitCodes.internal;
  }
  if ('code' in parsed) return parsed.code;

  try {
    const res = await translate(sourceInput(parsed, io), { caseStyle: parsed.caseStyle }, {
      formats: defaultFormatWriters,
    });

    for (const d of [...res.diagnostics].sort(compareDiagnosticsForCli)) {
      io.stderr.write(`${formatDiagnostic(d)}\n`);
    }

    const code = exitCodeFor(res.diagnostics);
    if (code !== ExitCodes.ok) return code;

    for (const artifact of res.artifacts) {
      await writeOutput(artifact.text, parsed, io);
    }
    return ExitCodes.ok;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    io.stderr.write(`${PROGRAM_NAME}: internal error: ${msg}\n`);
    return ExitCodes.internal;
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
  const self = fileURLToPath(import.meta.url);
  return normalizePathForCompare(invokedAs) === normalizePathForCompare(self);
}

if (isDirectCliInvocation(process.argv[1])) {
  // eslint-disable-next-line no-void
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
