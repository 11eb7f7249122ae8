/**
 * CLI Shared Utilities
 * Token and error formatting for the scanlet CLI
 */

import { ScanError } from './error-classes.js';
import { LexerError } from './lexer/index.js';
import type { Token } from './token-types.js';

export { VERSION } from './version.js';

/** Output formats accepted by --format and the config file */
export const OUTPUT_FORMATS = ['human', 'json', 'compact'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

// ============================================================
// TOKEN OUTPUT
// ============================================================

/**
 * Printable form of a character for messages: quoted when visible,
 * U+XXXX for control characters and lone surrogates.
 */
export function describeChar(ch: string): string {
  const code = ch.codePointAt(0) ?? 0;
  const isControl = code < 0x20 || code === 0x7f;
  const isSurrogate = code >= 0xd800 && code <= 0xdfff;
  if (isControl || isSurrogate) {
    return `U+${code.toString(16).toUpperCase().padStart(4, '0')}`;
  }
  return `'${ch}'`;
}

function tokenText(token: Token): string {
  return token.type === 'INVALID' ? describeChar(token.value) : String(token.value);
}

/**
 * Render a single token.
 *
 * @example
 * formatToken(token, 'human')   // "1:5 NAME x"
 * formatToken(token, 'compact') // "NAME(x)"
 * formatToken(invalid, 'compact') // "INVALID(U+000D)"
 */
export function formatToken(
  token: Token,
  format: Exclude<OutputFormat, 'json'>
): string {
  const { line, column } = token.span.start;

  if (format === 'human') {
    return `${line}:${column} ${token.type} ${tokenText(token)}`;
  }

  switch (token.type) {
    case 'INVALID':
    case 'BOOLEAN':
    case 'INTEGER':
    case 'NAME':
      return `${token.type}(${tokenText(token)})`;
    default:
      return token.type;
  }
}

/**
 * Render the whole token stream.
 * Human output has one token per line, compact output one line in total.
 */
export function formatTokens(tokens: readonly Token[], format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(tokens, null, 2);
  }

  const rendered = tokens.map((token) => formatToken(token, format));
  return rendered.join(format === 'human' ? '\n' : ' ');
}

// ============================================================
// ERROR OUTPUT
// ============================================================

/**
 * Format error for stderr output.
 */
export function formatError(err: Error): string {
  if (err instanceof LexerError) {
    const location = err.location;
    return `Lexer error at line ${location.line}: ${err.toData().message}`;
  }

  if (err instanceof ScanError) {
    return `${err.errorId}: ${err.toData().message}`;
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}
