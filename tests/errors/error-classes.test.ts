/**
 * Error Class Tests
 * ScanError, LexerError, NumericOverflowError and createError
 */

import { describe, expect, it } from 'vitest';
import {
  createError,
  LexerError,
  NumericOverflowError,
  ScanError,
  type SourceLocation,
} from '../../src/index.js';

const location: SourceLocation = { line: 2, column: 7, offset: 12 };

describe('ScanError', () => {
  it('appends the location to the message', () => {
    const error = new ScanError({
      errorId: 'SCAN-C001',
      message: 'Bad config',
      location,
    });

    expect(error.message).toBe('Bad config at 2:7');
    expect(error.name).toBe('ScanError');
  });

  it('omits the location suffix without a location', () => {
    const error = new ScanError({ errorId: 'SCAN-C001', message: 'Bad config' });

    expect(error.message).toBe('Bad config');
  });

  it('strips the location suffix from toData', () => {
    const error = new ScanError({
      errorId: 'SCAN-C001',
      message: 'Bad config',
      location,
      context: { path: 'x.json' },
    });

    expect(error.toData()).toEqual({
      errorId: 'SCAN-C001',
      message: 'Bad config',
      location,
      context: { path: 'x.json' },
    });
  });

  it('formats with a custom formatter', () => {
    const error = new ScanError({ errorId: 'SCAN-C001', message: 'Bad config', location });

    expect(error.format((data) => `[${data.errorId}] ${data.message}`)).toBe(
      '[SCAN-C001] Bad config'
    );
    expect(error.format()).toBe('Bad config at 2:7');
  });

  it('rejects unknown and empty error ids', () => {
    expect(() => new ScanError({ errorId: 'SCAN-X999', message: 'x' })).toThrow(
      'Unknown error ID: SCAN-X999'
    );
    expect(() => new ScanError({ errorId: '', message: 'x' })).toThrow(
      'errorId is required'
    );
  });
});

describe('LexerError', () => {
  it('requires a lexer category id', () => {
    const error = new LexerError('SCAN-L001', 'Invalid character', location);

    expect(error).toBeInstanceOf(ScanError);
    expect(error.name).toBe('LexerError');
    expect(error.location).toEqual(location);
  });

  it('rejects ids from other categories', () => {
    expect(() => new LexerError('SCAN-C001', 'x', location)).toThrow(TypeError);
    expect(() => new LexerError('SCAN-C001', 'x', location)).toThrow(
      'Expected lexer error ID, got: SCAN-C001'
    );
  });

  it('rejects unknown ids', () => {
    expect(() => new LexerError('SCAN-L999', 'x', location)).toThrow(
      'Unknown error ID: SCAN-L999'
    );
  });
});

describe('NumericOverflowError', () => {
  const span = {
    start: { line: 1, column: 1, offset: 0 },
    end: { line: 1, column: 11, offset: 10 },
  };

  it('is a LexerError with id SCAN-L002', () => {
    const error = new NumericOverflowError('4294967296', span);

    expect(error).toBeInstanceOf(LexerError);
    expect(error.name).toBe('NumericOverflowError');
    expect(error.errorId).toBe('SCAN-L002');
  });

  it('carries the lexeme, span and context', () => {
    const error = new NumericOverflowError('4294967296', span);

    expect(error.lexeme).toBe('4294967296');
    expect(error.span).toBe(span);
    expect(error.location).toEqual(span.start);
    expect(error.context).toEqual({ lexeme: '4294967296', max: 2147483647 });
    expect(error.message).toBe('Integer literal 4294967296 exceeds 2147483647 at 1:1');
  });
});

describe('createError', () => {
  it('renders the registry template', () => {
    const error = createError(
      'SCAN-C001',
      { path: '.scanlet.json', reason: 'must be an object' },
      location
    );

    expect(error.errorId).toBe('SCAN-C001');
    expect(error.message).toBe(
      'Invalid configuration in .scanlet.json: must be an object at 2:7'
    );
  });

  it('throws TypeError for unknown ids', () => {
    expect(() => createError('SCAN-X999', {})).toThrow(TypeError);
  });
});
