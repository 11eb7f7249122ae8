/**
 * Configuration Loader Tests
 * Tests for .scanlet.json loading and validation.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
} from '../../src/cli-config.js';
import { ScanError } from '../../src/index.js';

// ============================================================
// TEST FIXTURES
// ============================================================

let testDir: string;

function writeConfig(content: string, fileName = CONFIG_FILE_NAME): string {
  const configPath = join(testDir, fileName);
  writeFileSync(configPath, content, 'utf-8');
  return configPath;
}

function loadError(cwd: string, explicitPath?: string): unknown {
  try {
    loadConfig(cwd, explicitPath);
  } catch (err) {
    return err;
  }
  return undefined;
}

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), 'scanlet-config-'));
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

// ============================================================
// LOADING
// ============================================================

describe('loadConfig', () => {
  it('returns defaults when no config file exists', () => {
    expect(loadConfig(testDir)).toEqual(createDefaultConfig());
    expect(createDefaultConfig()).toEqual({ format: 'human', failOnInvalid: true });
  });

  it('merges the file over the defaults', () => {
    writeConfig(JSON.stringify({ format: 'compact' }));

    expect(loadConfig(testDir)).toEqual({ format: 'compact', failOnInvalid: true });
  });

  it('reads failOnInvalid', () => {
    writeConfig(JSON.stringify({ failOnInvalid: false, format: 'json' }));

    expect(loadConfig(testDir)).toEqual({ format: 'json', failOnInvalid: false });
  });

  it('prefers an explicit path over the working directory', () => {
    writeConfig(JSON.stringify({ format: 'json' }));
    const explicit = writeConfig(JSON.stringify({ format: 'compact' }), 'other.json');

    expect(loadConfig(testDir, explicit).format).toBe('compact');
  });

  it('throws ENOENT when an explicit path does not exist', () => {
    const err = loadError(testDir, join(testDir, 'missing.json'));

    expect(err).toBeInstanceOf(Error);
    expect(err).toHaveProperty('code', 'ENOENT');
  });
});

// ============================================================
// VALIDATION
// ============================================================

describe('loadConfig validation', () => {
  it('rejects invalid JSON with SCAN-C001', () => {
    const configPath = writeConfig('{ "format": ');
    const err = loadError(testDir);

    expect(err).toBeInstanceOf(ScanError);
    expect(err).toHaveProperty('errorId', 'SCAN-C001');
    expect(err).toHaveProperty(
      'message',
      expect.stringContaining(`Invalid configuration in ${configPath}: invalid JSON (`)
    );
  });

  it('rejects a non-object', () => {
    const configPath = writeConfig('[]');

    expect(() => loadConfig(testDir)).toThrow(
      `Invalid configuration in ${configPath}: must be an object`
    );
  });

  it('rejects an unknown format', () => {
    const configPath = writeConfig(JSON.stringify({ format: 'xml' }));

    expect(() => loadConfig(testDir)).toThrow(
      `Invalid configuration in ${configPath}: format must be one of: human, json, compact`
    );
  });

  it('rejects a non-boolean failOnInvalid', () => {
    const configPath = writeConfig(JSON.stringify({ failOnInvalid: 'yes' }));

    expect(() => loadConfig(testDir)).toThrow(
      `Invalid configuration in ${configPath}: failOnInvalid must be a boolean`
    );
  });

  it('rejects unknown fields', () => {
    const configPath = writeConfig(JSON.stringify({ color: true }));

    expect(() => loadConfig(testDir)).toThrow(
      `Invalid configuration in ${configPath}: unknown field color`
    );
  });
});
