/**
 * CLI Error Explanation
 * Renders full error documentation for `scanlet --explain`
 */

import { formatToken } from './cli-shared.js';
import { ERROR_REGISTRY } from './error-registry.js';
import { NumericOverflowError, Tokenizer } from './lexer/index.js';
import type { Token } from './token-types.js';

/**
 * Render documentation for an error ID.
 *
 * Lexer examples are scanned and shown with their compact token stream,
 * so the INVALID token or overflow the example triggers is visible.
 *
 * @returns Formatted documentation, or null if errorId is invalid or unknown
 *
 * @example
 * explainError('SCAN-L002')
 * // "SCAN-L002 [lexer, error]: Integer literal out of range\n  message: ..."
 */
export function explainError(errorId: string): string | null {
  if (!/^SCAN-[LC]\d{3}$/.test(errorId)) {
    return null;
  }

  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    return null;
  }

  const lines = [
    `${definition.errorId} [${definition.category}, ${definition.severity}]: ${definition.description}`,
    `  message: ${definition.messageTemplate}`,
  ];

  if (definition.cause) {
    lines.push('', 'Cause:', `  ${definition.cause}`);
  }
  if (definition.resolution) {
    lines.push('', 'Resolution:', `  ${definition.resolution}`);
  }

  for (const example of definition.examples ?? []) {
    lines.push('', `Example: ${example.description}`);
    for (const line of example.code.replace(/\n$/, '').split('\n')) {
      lines.push(`  | ${line.replace(/\r/g, '\\r')}`);
    }
    if (definition.category === 'lexer') {
      lines.push(`  scans as: ${scanPreview(example.code)}`);
    }
  }

  return lines.join('\n');
}

/** Compact token stream with overflowing literals shown as `<SCAN-L002>` */
function scanPreview(code: string): string {
  const tokenizer = new Tokenizer(code);
  const parts: string[] = [];

  for (;;) {
    let token: Token | null;
    try {
      token = tokenizer.next();
    } catch (err) {
      if (err instanceof NumericOverflowError) {
        parts.push(`<${err.errorId}>`);
        continue;
      }
      throw err;
    }
    if (token === null) break;
    parts.push(formatToken(token, 'compact'));
  }

  return parts.join(' ');
}
