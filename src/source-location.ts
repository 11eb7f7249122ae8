// ============================================================
// SOURCE LOCATION
// ============================================================

/**
 * A position in scanned source. `line` and `column` are 1-based;
 * `offset` counts code points from the start of the input.
 */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

/** `end` points just past the last character of the lexeme */
export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}
