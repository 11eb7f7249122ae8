/**
 * Token Readers
 * Functions to read multi-character tokens from source
 */

import type {
  IntegerToken,
  LexemeToken,
  NameToken,
} from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { MAX_INTEGER, NumericOverflowError } from './errors.js';
import { isDigit, isIdentifierChar } from './helpers.js';
import { KEYWORDS } from './operators.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/**
 * Read a maximal run of digits as a 32-bit signed integer.
 *
 * @throws NumericOverflowError when the value exceeds 2147483647
 */
export function readNumber(state: LexerState): IntegerToken {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && isDigit(peek(state))) {
    value += advance(state);
  }

  const end = currentLocation(state);
  // Exact for every value up to MAX_INTEGER; longer runs only grow
  const parsed = Number(value);
  if (parsed > MAX_INTEGER) {
    throw new NumericOverflowError(value, { start, end });
  }

  return { type: TOKEN_TYPES.INTEGER, value: parsed, span: { start, end } };
}

/** Read a name, or a keyword when the exact spelling is reserved */
export function readIdentifier(state: LexerState): NameToken | LexemeToken {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    value += advance(state);
  }

  const span = { start, end: currentLocation(state) };
  const keyword = KEYWORDS.get(value);
  if (keyword !== undefined) {
    return { type: keyword, value, span };
  }

  return { type: TOKEN_TYPES.NAME, value, span };
}
