/**
 * Symbol and Keyword Lookup Tables
 */

import type { KeywordType, LexemeType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: Readonly<Record<string, LexemeType>> =
  Object.freeze({
    ':=': TOKEN_TYPES.ASSIGN,
    '==': TOKEN_TYPES.EQ,
    '>=': TOKEN_TYPES.GE,
    '<=': TOKEN_TYPES.LE,
    '<>': TOKEN_TYPES.NE,
  });

/** Single-character symbol lookup table */
export const SINGLE_CHAR_SYMBOLS: Readonly<Record<string, LexemeType>> =
  Object.freeze({
    '*': TOKEN_TYPES.ASTERISK,
    '{': TOKEN_TYPES.BRACE_LEFT,
    '}': TOKEN_TYPES.BRACE_RIGHT,
    '[': TOKEN_TYPES.BRACKET_LEFT,
    ']': TOKEN_TYPES.BRACKET_RIGHT,
    ':': TOKEN_TYPES.COLON,
    '.': TOKEN_TYPES.DOT,
    '=': TOKEN_TYPES.EQUAL_SIGN,
    '-': TOKEN_TYPES.MINUS,
    '(': TOKEN_TYPES.PAREN_LEFT,
    ')': TOKEN_TYPES.PAREN_RIGHT,
    '+': TOKEN_TYPES.PLUS,
    ';': TOKEN_TYPES.SEMICOLON,
    '/': TOKEN_TYPES.SLASH,
    '>': TOKEN_TYPES.GT,
    '<': TOKEN_TYPES.LT,
  });

/**
 * Keyword lookup table. Matching is exact-case: `If` is a name.
 * A Map, so identifiers such as `constructor` never hit Object.prototype.
 */
export const KEYWORDS: ReadonlyMap<string, KeywordType> = new Map<
  string,
  KeywordType
>([
  ['and', TOKEN_TYPES.AND],
  ['array', TOKEN_TYPES.ARRAY],
  ['if', TOKEN_TYPES.IF],
  ['let', TOKEN_TYPES.LET],
  ['not', TOKEN_TYPES.NOT],
  ['or', TOKEN_TYPES.OR],
  ['print', TOKEN_TYPES.PRINT],
  ['while', TOKEN_TYPES.WHILE],
]);
