/**
 * Tokenizer
 * Main tokenization logic
 */

import type { SourceLocation } from '../source-location.js';
import type { InvalidToken, Token } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import {
  advanceAndMakeToken,
  isDigit,
  isIdentifierStart,
  isWhitespace,
} from './helpers.js';
import { SINGLE_CHAR_SYMBOLS, TWO_CHAR_OPERATORS } from './operators.js';
import { readIdentifier, readNumber } from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
} from './state.js';

export function skipWhitespace(state: LexerState): void {
  while (!isAtEnd(state) && isWhitespace(peek(state))) {
    advance(state);
  }
}

/**
 * Produce the next token, or null once only whitespace remains.
 *
 * @throws NumericOverflowError for an integer literal above 2147483647
 */
export function nextToken(state: LexerState): Token | null {
  skipWhitespace(state);

  if (isAtEnd(state)) {
    return null;
  }

  const start = currentLocation(state);
  const ch = peek(state);

  if (isDigit(ch)) {
    return readNumber(state);
  }

  // Identifier or keyword
  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  // := == >= <= <> win over their one-character prefixes
  const twoChar = peekString(state, 2);
  const twoCharType = TWO_CHAR_OPERATORS[twoChar];
  if (twoCharType) {
    return advanceAndMakeToken(state, 2, twoCharType, twoChar, start);
  }

  const singleCharType = SINGLE_CHAR_SYMBOLS[ch];
  if (singleCharType) {
    return advanceAndMakeToken(state, 1, singleCharType, ch, start);
  }

  // The offending character is consumed with its token
  advance(state);
  return {
    type: TOKEN_TYPES.INVALID,
    value: ch,
    span: { start, end: currentLocation(state) },
  };
}

// ============================================================
// PULL INTERFACE
// ============================================================

/** Callbacks invoked synchronously as tokens are produced */
export interface TokenizerObservability {
  /** Called for every token, invalid ones included */
  onToken?: (token: Token) => void;
  /** Called for each INVALID token, after onToken */
  onInvalid?: (token: InvalidToken) => void;
}

export interface TokenizeOptions {
  /** Location of the first character, for sources cut from a larger file */
  baseLocation?: SourceLocation;
  observability?: TokenizerObservability;
}

/**
 * Forward-only token producer over one source text.
 *
 * @example
 * const tokenizer = new Tokenizer('let x := 1;');
 * for (const token of tokenizer) {
 *   console.log(token.type);
 * }
 */
export class Tokenizer implements Iterable<Token> {
  private readonly state: LexerState;
  private readonly observability: TokenizerObservability;

  constructor(source: string, options?: TokenizeOptions) {
    this.state = createLexerState(source, options?.baseLocation);
    this.observability = options?.observability ?? {};
  }

  /** Location of the next unconsumed character */
  get location(): SourceLocation {
    return currentLocation(this.state);
  }

  next(): Token | null {
    const token = nextToken(this.state);
    if (token === null) return null;

    this.observability.onToken?.(token);
    if (token.type === TOKEN_TYPES.INVALID) {
      this.observability.onInvalid?.(token);
    }
    return token;
  }

  *[Symbol.iterator](): Iterator<Token> {
    let token = this.next();
    while (token !== null) {
      yield token;
      token = this.next();
    }
  }
}

/**
 * Scan the whole source into an array.
 *
 * @throws NumericOverflowError for an integer literal above 2147483647
 */
export function tokenize(source: string, options?: TokenizeOptions): Token[] {
  return [...new Tokenizer(source, options)];
}
