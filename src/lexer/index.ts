/**
 * Lexer Module
 * Converts source text into tokens
 */

export { LexerError, MAX_INTEGER, NumericOverflowError } from './errors.js';
export { KEYWORDS } from './operators.js';
export { createLexerState, type LexerState } from './state.js';
export {
  nextToken,
  tokenize,
  Tokenizer,
  type TokenizeOptions,
  type TokenizerObservability,
} from './tokenizer.js';
