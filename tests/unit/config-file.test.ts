/**
 * Unit tests for config-file utility
 *
 * Tests YAML loading and the error cases for a misplaced config.yaml.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync, mkdirSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

import { checkConfigFileAt, loadConfigYamlAt, loadDefaultsYaml } from '../../src/app/config-file.js';

let tmpDir: string;
let configPath: string;

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'config-file-test-'));
  configPath = join(tmpDir, 'config.yaml');
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
});

describe('checkConfigFileAt', () => {
  it('reports a missing file', () => {
    expect(checkConfigFileAt(configPath)).toEqual({
      exists: false, isDirectory: false, isEmpty: false, path: configPath, error: null,
    });
  });

  it('reports an empty file', () => {
    writeFileSync(configPath, '  \n');
    expect(checkConfigFileAt(configPath).isEmpty).toBe(true);
  });

  it('flags a directory in place of the file', () => {
    mkdirSync(configPath);
    const status = checkConfigFileAt(configPath);
    expect(status.isDirectory).toBe(true);
    expect(status.error).toContain('is a directory, not a file');
  });
});

describe('loadConfigYamlAt', () => {
  it('returns an empty object for a missing or empty file', () => {
    expect(loadConfigYamlAt(configPath)).toEqual({});
    writeFileSync(configPath, '');
    expect(loadConfigYamlAt(configPath)).toEqual({});
  });

  it('parses nested values', () => {
    writeFileSync(configPath, 'auth:\n  user: U1\n  approval:\n    maxWaitMs: 60000\nhttp:\n  proxy: "127.0.0.1:1080"\n');
    expect(loadConfigYamlAt(configPath)).toEqual({
      auth: { user: 'U1', approval: { maxWaitMs: 60000 } },
      http: { proxy: '127.0.0.1:1080' },
    });
  });

  it('throws on invalid YAML', () => {
    writeFileSync(configPath, 'auth:\n  user: [unclosed\n');
    expect(() => loadConfigYamlAt(configPath)).toThrow(`Invalid YAML in ${configPath}`);
  });

  it('throws when the top level is not a mapping', () => {
    writeFileSync(configPath, '- a\n- b\n');
    expect(() => loadConfigYamlAt(configPath)).toThrow('must contain a mapping at the top level');
  });

  it('throws for a directory', () => {
    mkdirSync(configPath);
    expect(() => loadConfigYamlAt(configPath)).toThrow('is a directory');
  });
});

describe('loadDefaultsYaml', () => {
  it('loads the bundled defaults', () => {
    const defaults = loadDefaultsYaml();
    expect(Object.keys(defaults).sort()).toEqual(['auth', 'broker', 'http', 'log', 'signicat']);
  });
});
