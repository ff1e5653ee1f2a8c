/**
 * Config file utilities for reading config.defaults.yaml and config.yaml
 *
 * Note: This module is loaded before logger is initialized, so fatal errors
 * must be handled with console.error + process.exit(1).
 */

import { existsSync, statSync, readFileSync } from 'fs';
import { parseDocument } from 'yaml';
import { resolveProjectPath } from './paths.js';

/**
 * Exit with a fatal error message.
 * Used for config errors that occur before logger is initialized.
 */
export function fatalExit(message: string): never {
  console.error(`FATAL: ${message}`);
  process.exit(1);
}

export interface ConfigFileStatus {
  exists: boolean;
  isDirectory: boolean;
  isEmpty: boolean;
  path: string;
  error: string | null;
}

export function getConfigPath(): string {
  return resolveProjectPath('config.yaml');
}

/**
 * Check config file status at a given path without parsing it.
 */
export function checkConfigFileAt(path: string): ConfigFileStatus {
  if (!existsSync(path)) {
    return { exists: false, isDirectory: false, isEmpty: false, path, error: null };
  }

  if (statSync(path).isDirectory()) {
    return {
      exists: true,
      isDirectory: true,
      isEmpty: false,
      path,
      error:
        `${path} is a directory, not a file.\n` +
        'Fix: rm -rf config.yaml && touch config.yaml',
    };
  }

  const raw = readFileSync(path, 'utf8');
  return { exists: true, isDirectory: false, isEmpty: raw.trim() === '', path, error: null };
}

/**
 * Parse a YAML file into a plain object.
 * Throws on YAML syntax errors or when the document is not a mapping.
 */
export function parseYamlFile(path: string): Record<string, unknown> {
  const doc = parseDocument(readFileSync(path, 'utf8'));
  if (doc.errors.length > 0) {
    throw new Error(`Invalid YAML in ${path}: ${doc.errors[0].message}`);
  }
  const value: unknown = doc.toJS() ?? {};
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`${path} must contain a mapping at the top level`);
  }
  return { ...value };
}

/**
 * Load config.defaults.yaml (bundled defaults file).
 * Exits on fatal errors (missing or corrupted).
 */
export function loadDefaultsYaml(): Record<string, unknown> {
  const path = resolveProjectPath('config.defaults.yaml');
  try {
    return parseYamlFile(path);
  } catch (e) {
    fatalExit(
      `Failed to load config.defaults.yaml: ${e instanceof Error ? e.message : e}\n` +
      'This file should not be edited. Try: git checkout config.defaults.yaml'
    );
  }
}

/**
 * Load a user config file as plain object.
 * Returns empty object if the file doesn't exist or is empty.
 * Throws on a directory in place of the file or invalid YAML.
 */
export function loadConfigYamlAt(path: string): Record<string, unknown> {
  const status = checkConfigFileAt(path);
  if (status.error) throw new Error(status.error);
  if (!status.exists || status.isEmpty) return {};
  return parseYamlFile(path);
}
