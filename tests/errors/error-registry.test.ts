/**
 * Error Registry Tests
 * Registry lookup and message template rendering
 */

import { describe, expect, it } from 'vitest';
import { ERROR_REGISTRY, renderMessage, severityOf } from '../../src/index.js';

describe('ERROR_REGISTRY', () => {
  it('contains the lexer and config errors', () => {
    expect([...ERROR_REGISTRY.entries()].map(([id]) => id)).toEqual([
      'SCAN-L001',
      'SCAN-L002',
      'SCAN-C001',
    ]);
    expect(ERROR_REGISTRY.size).toBe(3);
  });

  it('looks up definitions by id', () => {
    const definition = ERROR_REGISTRY.get('SCAN-L002');

    expect(definition?.category).toBe('lexer');
    expect(definition?.messageTemplate).toBe('Integer literal {lexeme} exceeds {max}');
  });

  it('returns undefined for unknown ids', () => {
    expect(ERROR_REGISTRY.get('SCAN-X999')).toBeUndefined();
    expect(ERROR_REGISTRY.has('SCAN-X999')).toBe(false);
  });

  it('gives each definition a severity', () => {
    expect(ERROR_REGISTRY.get('SCAN-L001')?.severity).toBe('error');
    expect(severityOf('SCAN-L001')).toBe('error');
    expect(severityOf('SCAN-L002')).toBe('error');
    expect(severityOf('SCAN-X999')).toBe('error');
  });

  it('gives every definition an id matching its category', () => {
    for (const [id, definition] of ERROR_REGISTRY.entries()) {
      const prefix = definition.category === 'lexer' ? 'SCAN-L' : 'SCAN-C';
      expect(id.startsWith(prefix)).toBe(true);
      expect(definition.errorId).toBe(id);
    }
  });
});

describe('renderMessage', () => {
  it('replaces placeholders with context values', () => {
    expect(
      renderMessage('Integer literal {lexeme} exceeds {max}', {
        lexeme: '9999999999',
        max: 2147483647,
      })
    ).toBe('Integer literal 9999999999 exceeds 2147483647');
  });

  it('renders missing values as empty strings', () => {
    expect(renderMessage('Invalid character {char}!', {})).toBe(
      'Invalid character !'
    );
  });

  it('returns the template unchanged when a brace is not closed', () => {
    expect(renderMessage('broken {char', { char: 'x' })).toBe('broken {char');
  });

  it('leaves text without placeholders alone', () => {
    expect(renderMessage('plain text', { a: 1 })).toBe('plain text');
  });
});
