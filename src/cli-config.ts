/**
 * Configuration Loader for scanlet
 * Loads and validates .scanlet.json configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { createError } from './error-classes.js';
import { isOutputFormat, OUTPUT_FORMATS, type OutputFormat } from './cli-shared.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.scanlet.json';

// ============================================================
// TYPES
// ============================================================

export interface ScanConfig {
  /** Token and diagnostic output format */
  readonly format: OutputFormat;
  /** When false, invalid characters are warnings and do not fail the run */
  readonly failOnInvalid: boolean;
}

export function createDefaultConfig(): ScanConfig {
  return { format: 'human', failOnInvalid: true };
}

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate parsed JSON and merge it over the defaults.
 * Returns a reason string for the first problem found.
 */
function toConfig(data: unknown): ScanConfig | string {
  if (!isRecord(data)) {
    return 'must be an object';
  }

  const defaults = createDefaultConfig();
  let format = defaults.format;
  let failOnInvalid = defaults.failOnInvalid;

  for (const [key, value] of Object.entries(data)) {
    switch (key) {
      case 'format':
        if (!isOutputFormat(value)) {
          return `format must be one of: ${OUTPUT_FORMATS.join(', ')}`;
        }
        format = value;
        break;
      case 'failOnInvalid':
        if (typeof value !== 'boolean') {
          return 'failOnInvalid must be a boolean';
        }
        failOnInvalid = value;
        break;
      default:
        return `unknown field ${key}`;
    }
  }

  return { format, failOnInvalid };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration.
 *
 * Without an explicit path, `.scanlet.json` in `cwd` is used when it
 * exists and the defaults otherwise. An explicit path must exist.
 *
 * @throws ScanError SCAN-C001 if the file is not valid JSON or has bad values
 * @throws Error with code ENOENT if an explicit path does not exist
 */
export function loadConfig(cwd: string, explicitPath?: string): ScanConfig {
  const configPath = explicitPath ?? join(cwd, CONFIG_FILE_NAME);

  if (explicitPath === undefined && !existsSync(configPath)) {
    return createDefaultConfig();
  }

  const fileContent = readFileSync(configPath, 'utf-8');

  let parsedData: unknown;
  try {
    parsedData = JSON.parse(fileContent);
  } catch (err) {
    throw createError('SCAN-C001', {
      path: configPath,
      reason: `invalid JSON (${err instanceof Error ? err.message : String(err)})`,
    });
  }

  const result = toConfig(parsedData);
  if (typeof result === 'string') {
    throw createError('SCAN-C001', { path: configPath, reason: result });
  }
  return result;
}
