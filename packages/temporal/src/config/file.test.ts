/**
 * File Configuration Tests
 *
 * Tests for file discovery and YAML parsing.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ErrorCode, ValidationError } from '@strata/core';
import {
  CONFIG_FILE_NAME,
  STRATA_DIR,
  convertYamlToConfig,
  discoverConfigFile,
  findStrataDir,
  parseYamlConfig,
  readConfigFile,
  resolveDatabasePath,
} from './file.js';

function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'strata-file-'));
}

// ============================================================================
// findStrataDir / discoverConfigFile
// ============================================================================

describe('findStrataDir', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = createTempDir();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('finds .strata in the start directory', () => {
    const strataPath = path.join(tempDir, STRATA_DIR);
    fs.mkdirSync(strataPath);
    expect(findStrataDir(tempDir)).toBe(strataPath);
  });

  it('finds .strata in an ancestor directory', () => {
    const subDir = path.join(tempDir, 'a', 'b', 'c');
    fs.mkdirSync(subDir, { recursive: true });
    const strataPath = path.join(tempDir, STRATA_DIR);
    fs.mkdirSync(strataPath);
    expect(findStrataDir(subDir)).toBe(strataPath);
  });

  it('ignores a .strata file that is not a directory', () => {
    const inner = path.join(tempDir, 'inner');
    fs.mkdirSync(inner);
    fs.writeFileSync(path.join(inner, STRATA_DIR), '');
    const strataPath = path.join(tempDir, STRATA_DIR);
    fs.mkdirSync(strataPath);
    expect(findStrataDir(inner)).toBe(strataPath);
  });

  it('reports the config path inside the discovered directory', () => {
    const strataPath = path.join(tempDir, STRATA_DIR);
    fs.mkdirSync(strataPath);
    expect(discoverConfigFile(undefined, tempDir)).toEqual({
      path: path.join(strataPath, CONFIG_FILE_NAME),
      exists: false,
      strataDir: strataPath,
    });
  });

  it('resolves an explicit path against the start directory', () => {
    expect(discoverConfigFile('conf/app.yaml', tempDir)).toEqual({
      path: path.join(tempDir, 'conf', 'app.yaml'),
      exists: false,
    });
  });
});

// ============================================================================
// YAML Parsing
// ============================================================================

describe('parseYamlConfig', () => {
  it('returns an empty config for an empty document', () => {
    expect(parseYamlConfig('')).toEqual({});
  });

  it('reads known keys and ignores unknown ones', () => {
    const parsed = parseYamlConfig(
      'database: app.db\nrecording:\n  strict_scope: true\nextra: 1\n'
    );
    expect(parsed).toEqual({ database: 'app.db', recording: { strict_scope: true } });
  });

  it('rejects a document that is not a mapping', () => {
    expect(() => parseYamlConfig('- a\n- b\n', 'list.yaml')).toThrow(
      'Configuration file must contain an object (list.yaml)'
    );
  });

  it('rejects a known key with the wrong type', () => {
    let caught: unknown;
    try {
      parseYamlConfig('storage:\n  busy_timeout: soon\n');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      code: ErrorCode.INVALID_INPUT,
      message: "Configuration value 'storage.busy_timeout' must be a number",
      details: { field: 'storage.busy_timeout', value: 'soon' },
    });
  });

  it('rejects malformed YAML', () => {
    expect(() => parseYamlConfig('recording: [unclosed', 'bad.yaml')).toThrow(ValidationError);
  });
});

describe('convertYamlToConfig', () => {
  it('maps snake_case keys to the internal layout', () => {
    expect(
      convertYamlToConfig({
        database: ':memory:',
        recording: { strict_scope: false },
        storage: { busy_timeout: 0 },
        identifiers: { max_length: 32 },
      })
    ).toEqual({
      database: ':memory:',
      recording: { strictScope: false },
      storage: { busyTimeout: 0 },
      identifiers: { maxLength: 32 },
    });
  });
});

describe('readConfigFile', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = createTempDir();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('returns an empty config for a missing file', () => {
    expect(readConfigFile(path.join(tempDir, 'missing.yaml'))).toEqual({});
  });

  it('resolves a relative database against the file directory', () => {
    const file = path.join(tempDir, CONFIG_FILE_NAME);
    fs.writeFileSync(file, 'database: data/app.db\n');
    expect(readConfigFile(file)).toEqual({ database: path.join(tempDir, 'data', 'app.db') });
  });
});

describe('resolveDatabasePath', () => {
  it('leaves :memory: and absolute paths alone', () => {
    expect(resolveDatabasePath(':memory:', '/srv')).toBe(':memory:');
    expect(resolveDatabasePath('/data/app.db', '/srv')).toBe('/data/app.db');
    expect(resolveDatabasePath('app.db', '/srv')).toBe(path.join('/srv', 'app.db'));
  });
});
