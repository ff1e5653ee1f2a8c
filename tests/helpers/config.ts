import merge from 'lodash/merge.js';
import { buildConfig, type Config } from '../../src/app/config.js';
import { loadDefaultsYaml } from '../../src/app/config-file.js';

/**
 * Defaults from config.defaults.yaml with fast approval polling.
 * `overrides` is merged on top, like a config.yaml.
 */
export function testConfig(overrides: Record<string, unknown> = {}): Config {
  const fast = { auth: { approval: { pollIntervalMs: 10, maxWaitMs: 2000 }, requestTimeoutMs: 2000 } };
  return buildConfig(loadDefaultsYaml(), merge({}, fast, overrides));
}
