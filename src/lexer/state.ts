/**
 * Lexer State
 * Tracks position in source text during tokenization
 */

import type { SourceLocation } from '../source-location.js';

export interface LexerState {
  /** Source split into code points, so astral characters count once */
  readonly chars: readonly string[];
  pos: number;
  line: number;
  column: number;
  baseOffset: number;
}

export function createLexerState(
  source: string,
  baseLocation?: SourceLocation
): LexerState {
  return {
    chars: Array.from(source),
    pos: 0,
    line: baseLocation?.line ?? 1,
    column: baseLocation?.column ?? 1,
    baseOffset: baseLocation?.offset ?? 0,
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return {
    line: state.line,
    column: state.column,
    offset: state.pos + state.baseOffset,
  };
}

/** Current character without consuming it; '' at end of input */
export function peek(state: LexerState): string {
  return state.chars[state.pos] ?? '';
}

export function peekString(state: LexerState, length: number): string {
  return state.chars.slice(state.pos, state.pos + length).join('');
}

export function advance(state: LexerState): string {
  const ch = state.chars[state.pos] ?? '';
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.chars.length;
}
