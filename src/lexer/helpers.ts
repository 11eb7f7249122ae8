/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type { SourceLocation } from '../source-location.js';
import type { LexemeToken, LexemeType } from '../token-types.js';
import { advance, currentLocation, type LexerState } from './state.js';

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

/** Identifiers start with a letter; underscore only continues one */
export function isIdentifierStart(ch: string): boolean {
  return isLetter(ch);
}

export function isIdentifierChar(ch: string): boolean {
  return isLetter(ch) || isDigit(ch) || ch === '_';
}

export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n';
}

export function makeToken(
  type: LexemeType,
  value: string,
  start: SourceLocation,
  end: SourceLocation
): LexemeToken {
  return { type, value, span: { start, end } };
}

/** Advance n times and return a token */
export function advanceAndMakeToken(
  state: LexerState,
  n: number,
  type: LexemeType,
  value: string,
  start: SourceLocation
): LexemeToken {
  for (let i = 0; i < n; i++) advance(state);
  return makeToken(type, value, start, currentLocation(state));
}
