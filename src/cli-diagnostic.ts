/**
 * CLI Diagnostics
 * Turn invalid tokens and lexer errors into reportable diagnostics
 */

import { createError } from './error-classes.js';
import { severityOf, type ErrorSeverity } from './error-registry.js';
import { NumericOverflowError, type LexerError } from './lexer/index.js';
import type { SourceSpan } from './source-location.js';
import type { InvalidToken } from './token-types.js';
import { describeChar, type OutputFormat } from './cli-shared.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export interface ScanDiagnostic {
  readonly errorId: string;
  readonly severity: ErrorSeverity;
  readonly message: string;
  readonly span: SourceSpan;
}

// ============================================================
// CONSTRUCTION
// ============================================================

export function diagnosticFromInvalidToken(
  token: InvalidToken,
  severity: ErrorSeverity = severityOf('SCAN-L001')
): ScanDiagnostic {
  const err = createError(
    'SCAN-L001',
    { char: describeChar(token.value) },
    token.span.start
  );
  return {
    errorId: err.errorId,
    severity,
    message: err.toData().message,
    span: token.span,
  };
}

export function diagnosticFromError(err: LexerError): ScanDiagnostic {
  const span =
    err instanceof NumericOverflowError
      ? err.span
      : { start: err.location, end: err.location };
  return {
    errorId: err.errorId,
    severity: severityOf(err.errorId),
    message: err.toData().message,
    span,
  };
}

// ============================================================
// FORMATTING
// ============================================================

/**
 * Format a diagnostic for stderr.
 *
 * Human output:
 * ```
 * error[SCAN-L001]: Invalid character '@'
 *   --> 1:5
 *    |
 *  1 | let @ := 1;
 *    |     ^
 * ```
 */
export function formatDiagnostic(
  diagnostic: ScanDiagnostic,
  source: string,
  format: OutputFormat
): string {
  const { start } = diagnostic.span;

  if (format === 'compact') {
    return `${start.line}:${start.column} ${diagnostic.severity} ${diagnostic.errorId} ${diagnostic.message}`;
  }

  if (format === 'json') {
    return JSON.stringify(toJsonDiagnostic(diagnostic));
  }

  const lines: string[] = [];
  lines.push(
    `${diagnostic.severity}[${diagnostic.errorId}]: ${diagnostic.message}`
  );
  lines.push(`  --> ${start.line}:${start.column}`);

  const content = source.split('\n')[start.line - 1];
  if (content !== undefined) {
    const lineNumber = String(start.line);
    const gutter = ' '.repeat(lineNumber.length);
    lines.push(` ${gutter} |`);
    lines.push(` ${lineNumber} | ${content}`);
    lines.push(` ${gutter} | ${renderCaretUnderline(diagnostic.span, content)}`);
  }

  return lines.join('\n');
}

/**
 * Carets under the span on its first line. Tabs before the span are
 * kept so the carets line up with the source.
 */
function renderCaretUnderline(span: SourceSpan, content: string): string {
  const chars = Array.from(content);
  const indent = chars
    .slice(0, span.start.column - 1)
    .map((ch) => (ch === '\t' ? '\t' : ' '))
    .join('');

  const width =
    span.end.line === span.start.line
      ? Math.max(1, span.end.column - span.start.column)
      : 1;

  return `${indent}${'^'.repeat(width)}`;
}

/** LSP Diagnostic shape, with zero-based positions */
function toJsonDiagnostic(diagnostic: ScanDiagnostic): object {
  const { start, end } = diagnostic.span;
  return {
    range: {
      start: { line: start.line - 1, character: start.column - 1 },
      end: { line: end.line - 1, character: end.column - 1 },
    },
    severity: diagnostic.severity === 'error' ? 1 : 2,
    code: diagnostic.errorId,
    source: 'scanlet',
    message: diagnostic.message,
  };
}
