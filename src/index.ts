/**
 * scanlet
 * Lexical scanner: token taxonomy, tokenizer and error taxonomy
 */

export {
  createLexerState,
  KEYWORDS,
  LexerError,
  type LexerState,
  MAX_INTEGER,
  nextToken,
  NumericOverflowError,
  tokenize,
  Tokenizer,
  type TokenizeOptions,
  type TokenizerObservability,
} from './lexer/index.js';

export {
  type BooleanToken,
  type IntegerToken,
  type InvalidToken,
  type KeywordType,
  type LexemeToken,
  type LexemeType,
  type NameToken,
  type Token,
  TOKEN_TYPES,
  type TokenType,
} from './token-types.js';

export type { SourceLocation, SourceSpan } from './source-location.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
  type ErrorSeverity,
  ERROR_REGISTRY,
  renderMessage,
  severityOf,
} from './error-registry.js';
export { createError, ScanError, type ScanErrorData } from './error-classes.js';

export { VERSION } from './version.js';
