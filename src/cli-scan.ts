#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Implements main(), parseArgs() and scanSource() for the scanlet binary.
 * Reads a file, stdin or inline code, prints the token stream to stdout
 * and diagnostics to stderr.
 */

import * as fs from 'fs/promises';
import * as fsSync from 'fs';
import { loadConfig, type ScanConfig } from './cli-config.js';
import {
  diagnosticFromError,
  diagnosticFromInvalidToken,
  formatDiagnostic,
  type ScanDiagnostic,
} from './cli-diagnostic.js';
import { explainError } from './cli-explain.js';
import { severityOf } from './error-registry.js';
import {
  formatError,
  formatTokens,
  isOutputFormat,
  OUTPUT_FORMATS,
  type OutputFormat,
  VERSION,
} from './cli-shared.js';
import { NumericOverflowError, Tokenizer } from './lexer/index.js';
import type { Token } from './token-types.js';

// ============================================================
// ARGUMENTS
// ============================================================

export type ScanInput =
  | { kind: 'file'; path: string }
  | { kind: 'stdin' }
  | { kind: 'inline'; code: string };

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | {
      mode: 'scan';
      input: ScanInput;
      format: OutputFormat | undefined;
      configPath: string | undefined;
    }
  | { mode: 'help' | 'version' }
  | { mode: 'explain'; errorId: string };

/**
 * Parse command-line arguments into structured command
 *
 * Arguments are read left to right, so a flag's value is never taken
 * for a flag. Help wins over version, version over explain.
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @throws Error on a missing or unknown flag value, an unknown option,
 *   more than one input, or a missing input
 */
export function parseArgs(argv: string[]): ParsedArgs {
  let help = false;
  let version = false;
  let errorId: string | undefined;
  let format: OutputFormat | undefined;
  let configPath: string | undefined;
  let input: ScanInput | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg === '--help' || arg === '-h') {
      help = true;
    } else if (arg === '--version' || arg === '-v') {
      version = true;
    } else if (arg === '--explain') {
      const value = argv[++i];
      if (!value) {
        throw new Error('Missing error ID after --explain');
      }
      errorId = value;
    } else if (arg === '--format') {
      const value = argv[++i];
      if (!isOutputFormat(value)) {
        throw new Error(
          `Invalid --format value: ${String(value)}. Must be one of: ${OUTPUT_FORMATS.join(', ')}`
        );
      }
      format = value;
    } else if (arg === '--config') {
      const value = argv[++i];
      if (!value) {
        throw new Error('Missing path after --config');
      }
      configPath = value;
    } else if (arg === '-e') {
      const code = argv[++i];
      if (code === undefined) {
        throw new Error('Missing code after -e');
      }
      input = onlyInput(input, { kind: 'inline', code });
    } else if (arg === '-') {
      input = onlyInput(input, { kind: 'stdin' });
    } else if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      input = onlyInput(input, { kind: 'file', path: arg });
    }
  }

  if (help) return { mode: 'help' };
  if (version) return { mode: 'version' };
  if (errorId !== undefined) return { mode: 'explain', errorId };

  if (input === undefined) {
    throw new Error('Missing input: pass a file, - for stdin, or -e "code"');
  }

  return { mode: 'scan', input, format, configPath };
}

function onlyInput(current: ScanInput | undefined, next: ScanInput): ScanInput {
  if (current !== undefined) {
    throw new Error(
      `Multiple inputs: ${describeInput(current)} and ${describeInput(next)}`
    );
  }
  return next;
}

function describeInput(input: ScanInput): string {
  switch (input.kind) {
    case 'file':
      return input.path;
    case 'stdin':
      return 'stdin';
    case 'inline':
      return '-e';
  }
}

// ============================================================
// SCANNING
// ============================================================

export interface ScanReport {
  readonly tokens: Token[];
  readonly diagnostics: ScanDiagnostic[];
}

/**
 * Scan source to completion, collecting diagnostics.
 *
 * Invalid characters become diagnostics at their registry severity
 * (warnings when the config disables failOnInvalid). An out-of-range integer becomes an error
 * diagnostic and scanning resumes after the literal.
 */
export function scanSource(source: string, config: ScanConfig): ScanReport {
  const tokens: Token[] = [];
  const diagnostics: ScanDiagnostic[] = [];
  const severity = config.failOnInvalid ? severityOf('SCAN-L001') : 'warning';

  const tokenizer = new Tokenizer(source, {
    observability: {
      onInvalid: (token) => {
        diagnostics.push(diagnosticFromInvalidToken(token, severity));
      },
    },
  });

  for (;;) {
    let token: Token | null;
    try {
      token = tokenizer.next();
    } catch (err) {
      if (err instanceof NumericOverflowError) {
        diagnostics.push(diagnosticFromError(err));
        continue;
      }
      throw err;
    }
    if (token === null) break;
    tokens.push(token);
  }

  return { tokens, diagnostics };
}

/** 1 when any diagnostic is an error, otherwise 0 */
export function determineExitCode(diagnostics: readonly ScanDiagnostic[]): number {
  return diagnostics.some((d) => d.severity === 'error') ? 1 : 0;
}

async function readSource(input: ScanInput): Promise<string> {
  switch (input.kind) {
    case 'inline':
      return input.code;
    case 'stdin':
      return fsSync.readFileSync(0, 'utf-8');
    case 'file':
      return await fs.readFile(input.path, 'utf-8');
  }
}

// ============================================================
// ENTRY POINT
// ============================================================

const USAGE = `Usage:
  scanlet <file>                 Scan a source file
  scanlet -                      Read source from stdin
  scanlet -e "code"              Scan inline code
  scanlet --explain <SCAN-xxxx>  Explain an error ID
  scanlet --help                 Show this help message
  scanlet --version              Show version information

Options:
  --format human|json|compact    Output format (default from .scanlet.json, else human)
  --config <path>                Configuration file (default ./.scanlet.json)

Examples:
  scanlet program.txt
  scanlet --format compact -e "let x := 1;"`;

/**
 * Entry point for the scanlet binary.
 *
 * Writes tokens to stdout and diagnostics to stderr, then sets the
 * process exit code.
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  try {
    const parsed = parseArgs(argv);

    switch (parsed.mode) {
      case 'help':
        console.log(USAGE);
        return;

      case 'version':
        console.log(VERSION);
        return;

      case 'explain': {
        const text = explainError(parsed.errorId);
        if (text === null) {
          console.error(`Unknown error ID: ${parsed.errorId}`);
          process.exitCode = 1;
          return;
        }
        console.log(text);
        return;
      }

      case 'scan': {
        const config = loadConfig(process.cwd(), parsed.configPath);
        const format = parsed.format ?? config.format;
        const source = await readSource(parsed.input);
        const report = scanSource(source, config);

        if (report.tokens.length > 0) {
          console.log(formatTokens(report.tokens, format));
        }
        for (const diagnostic of report.diagnostics) {
          console.error(formatDiagnostic(diagnostic, source, format));
        }

        process.exitCode = determineExitCode(report.diagnostics);
        return;
      }
    }
  } catch (err) {
    console.error(formatError(err instanceof Error ? err : new Error(String(err))));
    process.exitCode = 1;
  }
}

const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main().catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
}
