import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Unrecognized character
  INVALID: 'INVALID',

  // Values
  BOOLEAN: 'BOOLEAN',
  INTEGER: 'INTEGER',
  NAME: 'NAME',

  // Keywords
  AND: 'AND',
  ARRAY: 'ARRAY',
  IF: 'IF',
  LET: 'LET',
  NOT: 'NOT',
  OR: 'OR',
  PRINT: 'PRINT',
  WHILE: 'WHILE',

  // Symbols
  ASTERISK: 'ASTERISK', // *
  BRACE_LEFT: 'BRACE_LEFT', // {
  BRACE_RIGHT: 'BRACE_RIGHT', // }
  BRACKET_LEFT: 'BRACKET_LEFT', // [
  BRACKET_RIGHT: 'BRACKET_RIGHT', // ]
  COLON: 'COLON', // :
  DOT: 'DOT', // .
  EQUAL_SIGN: 'EQUAL_SIGN', // =
  MINUS: 'MINUS', // -
  PAREN_LEFT: 'PAREN_LEFT', // (
  PAREN_RIGHT: 'PAREN_RIGHT', // )
  PLUS: 'PLUS', // +
  SEMICOLON: 'SEMICOLON', // ;
  SLASH: 'SLASH', // /
  GT: 'GT', // >
  LT: 'LT', // <

  // Operators
  ASSIGN: 'ASSIGN', // :=
  EQ: 'EQ', // ==
  GE: 'GE', // >=
  LE: 'LE', // <=
  NE: 'NE', // <>
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export type KeywordType =
  | typeof TOKEN_TYPES.AND
  | typeof TOKEN_TYPES.ARRAY
  | typeof TOKEN_TYPES.IF
  | typeof TOKEN_TYPES.LET
  | typeof TOKEN_TYPES.NOT
  | typeof TOKEN_TYPES.OR
  | typeof TOKEN_TYPES.PRINT
  | typeof TOKEN_TYPES.WHILE;

/** Token types whose value is the lexeme itself (keywords and symbols) */
export type LexemeType = Exclude<
  TokenType,
  | typeof TOKEN_TYPES.INVALID
  | typeof TOKEN_TYPES.BOOLEAN
  | typeof TOKEN_TYPES.INTEGER
  | typeof TOKEN_TYPES.NAME
>;

// ============================================================
// TOKENS
// ============================================================

interface TokenBase {
  readonly span: SourceSpan;
}

/** A single character no scanning rule accepts */
export interface InvalidToken extends TokenBase {
  readonly type: typeof TOKEN_TYPES.INVALID;
  readonly value: string;
}

/**
 * Reserved for boolean literals. No spelling produces it yet: `true` and
 * `false` scan as names.
 */
export interface BooleanToken extends TokenBase {
  readonly type: typeof TOKEN_TYPES.BOOLEAN;
  readonly value: boolean;
}

export interface IntegerToken extends TokenBase {
  readonly type: typeof TOKEN_TYPES.INTEGER;
  readonly value: number;
}

export interface NameToken extends TokenBase {
  readonly type: typeof TOKEN_TYPES.NAME;
  readonly value: string;
}

export interface LexemeToken extends TokenBase {
  readonly type: LexemeType;
  readonly value: string;
}

export type Token =
  | InvalidToken
  | BooleanToken
  | IntegerToken
  | NameToken
  | LexemeToken;
