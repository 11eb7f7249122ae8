/**
 * Lexer Errors
 */

import { ERROR_REGISTRY } from '../error-registry.js';
import { ScanError } from '../error-classes.js';
import type { SourceLocation, SourceSpan } from '../source-location.js';

export class LexerError extends ScanError {
  // Override to make location required (lexer errors always have location)
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    const definition = ERROR_REGISTRY.get(errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }

    if (definition.category !== 'lexer') {
      throw new TypeError(`Expected lexer error ID, got: ${errorId}`);
    }

    super({ errorId, message, location, context });

    this.name = 'LexerError';
    this.location = location;
  }
}

/** Largest value an INTEGER token can carry (32-bit signed) */
export const MAX_INTEGER = 2147483647;

/**
 * A digit run whose value exceeds MAX_INTEGER. The digits are already
 * consumed when this is thrown; the next call to `nextToken` resumes
 * after them.
 */
export class NumericOverflowError extends LexerError {
  readonly lexeme: string;
  readonly span: SourceSpan;

  constructor(lexeme: string, span: SourceSpan) {
    super(
      'SCAN-L002',
      `Integer literal ${lexeme} exceeds ${MAX_INTEGER}`,
      span.start,
      { lexeme, max: MAX_INTEGER }
    );
    this.name = 'NumericOverflowError';
    this.lexeme = lexeme;
    this.span = span;
  }
}
