/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES AND SEVERITY
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'config';

/** Error severity level */
export type ErrorSeverity = 'error' | 'warning';

/**
 * Example demonstrating an error condition.
 * Used by `scanlet --explain` to show common scenarios.
 */
export interface ErrorExample {
  /** Description of the example scenario */
  readonly description: string;
  /** Source text demonstrating the error */
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: SCAN-{category}{3-digit} (e.g., SCAN-L002) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Severity a diagnostic carries unless the caller overrides it */
  readonly severity: ErrorSeverity;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: readonly ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      if (idMap.has(def.errorId)) {
        throw new TypeError(`Duplicate error ID: ${def.errorId}`);
      }
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Lexer Errors (SCAN-L0xx)
  {
    errorId: 'SCAN-L001',
    category: 'lexer',
    severity: 'error',
    description: 'Invalid character',
    messageTemplate: 'Invalid character {char}',
    cause:
      'Character is not whitespace, a digit, a letter, or one of the symbols * { } [ ] : . = - ( ) + ; / > <.',
    resolution:
      'Remove or replace the character. The scanner keeps going and reports it as an INVALID token.',
    examples: [
      {
        description: 'Comma is not a symbol of the language',
        code: 'print(a, b)',
      },
      {
        description: 'Carriage return from a CRLF line ending',
        code: 'let x := 1;\r\n',
      },
    ],
  },
  {
    errorId: 'SCAN-L002',
    category: 'lexer',
    severity: 'error',
    description: 'Integer literal out of range',
    messageTemplate: 'Integer literal {lexeme} exceeds {max}',
    cause:
      'A run of digits whose value does not fit in a 32-bit signed integer.',
    resolution:
      'Use a value no greater than 2147483647. Negative values are written with a separate minus sign.',
    examples: [
      {
        description: 'One past the largest integer',
        code: 'let big := 2147483648;',
      },
    ],
  },

  // Configuration Errors (SCAN-C0xx)
  {
    errorId: 'SCAN-C001',
    category: 'config',
    severity: 'error',
    description: 'Invalid configuration',
    messageTemplate: 'Invalid configuration in {path}: {reason}',
    cause:
      'The configuration file is not valid JSON or has a field with an unsupported value.',
    resolution:
      'Fix the file so that it is a JSON object with an optional "format" of human, json or compact and an optional boolean "failOnInvalid".',
    examples: [
      {
        description: 'Unknown output format',
        code: '{ "format": "xml" }',
      },
    ],
  },
];

export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

/** Registry severity of an error ID; unknown IDs are errors */
export function severityOf(errorId: string): ErrorSeverity {
  return ERROR_REGISTRY.get(errorId)?.severity ?? 'error';
}

// ============================================================
// MESSAGE RENDERING
// ============================================================

/**
 * Replace `{name}` placeholders with values from context.
 *
 * Missing values render as an empty string; a brace with no closing
 * partner leaves the template unchanged.
 *
 * @example
 * renderMessage('Invalid character {char}', { char: '@' })
 * // => 'Invalid character @'
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      const close = template.indexOf('}', i + 1);
      if (close === -1) {
        return template;
      }

      const value = context[template.slice(i + 1, close)];
      if (value !== undefined) {
        result += String(value);
      }

      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
