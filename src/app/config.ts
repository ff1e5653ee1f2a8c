import { z } from 'zod';
import merge from 'lodash/merge.js';
import { getConfigPath, loadConfigYamlAt, loadDefaultsYaml } from './config-file.js';

// ============================================
// Schemas (validation only, defaults live in config.defaults.yaml)
// ============================================

const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

const logConfigSchema = z.object({
  level: logLevelSchema,
  target: z.enum(['stdout', 'file']),
  filePath: z.string(),
});

const httpUrl = z.string().url().refine((val) => /^https?:\/\//.test(val), 'Must be an http(s) URL');

// host:port, optionally prefixed with socks5://
const proxySchema = z.string().refine(
  (val) => val === '' || /^(socks5h?:\/\/)?[^\s:/]+:\d{1,5}$/.test(val),
  'Proxy must be host:port (e.g. "127.0.0.1:1080")'
);

const approvalConfigSchema = z.object({
  pollIntervalMs: z.number().int().positive(),
  maxWaitMs: z.number().int().positive(),
});

// APP: approve in the MitID app. TOKEN: code display plus password.
export const authMethodSchema = z.enum(['APP', 'TOKEN']);

const authConfigSchema = z.object({
  user: z.string(),
  method: authMethodSchema,
  sessionPath: z.string().min(1),
  sessionLifetimeMinutes: z.number().positive(),
  maxRedirects: z.number().int().min(1).max(100),
  requestTimeoutMs: z.number().int().positive(),
  approval: approvalConfigSchema,
});

const httpConfigSchema = z.object({
  proxy: proxySchema,
  verifyTls: z.boolean(),
  userAgent: z.string().min(1),
});

const brokerConfigSchema = z.object({
  baseUrl: httpUrl,
  apiBaseUrl: httpUrl,
  redirectUri: httpUrl,
  locale: z.string().min(1),
  countryCode: z.string().length(2),
});

const signicatConfigSchema = z.object({
  authorizeUrl: httpUrl,
  clientId: z.string().min(1),
  scope: z.string().min(1),
});

const configSchema = z.object({
  log: logConfigSchema,
  auth: authConfigSchema,
  http: httpConfigSchema,
  broker: brokerConfigSchema,
  signicat: signicatConfigSchema,
});

export type Config = z.infer<typeof configSchema>;
export type LogConfig = z.infer<typeof logConfigSchema>;
export type AuthConfig = z.infer<typeof authConfigSchema>;
export type HttpConfig = z.infer<typeof httpConfigSchema>;
export type BrokerConfig = z.infer<typeof brokerConfigSchema>;
export type SignicatConfig = z.infer<typeof signicatConfigSchema>;
export type ApprovalConfig = z.infer<typeof approvalConfigSchema>;
export type AuthMethod = z.infer<typeof authMethodSchema>;

/** Values from command-line flags, applied on top of config.yaml */
export interface ConfigOverrides {
  user?: string;
  /** Validated against authMethodSchema with the rest of the config */
  method?: string;
  proxy?: string;
  verbose?: boolean;
  insecure?: boolean;
}

// ============================================
// Config Loading
// ============================================

/**
 * Merge defaults, user config and CLI overrides, then validate.
 * Throws a readable Error listing every invalid key.
 */
export function buildConfig(
  defaults: Record<string, unknown>,
  user: Record<string, unknown>,
  overrides: ConfigOverrides = {},
): Config {
  const flags: Record<string, Record<string, unknown>> = { auth: {}, http: {}, log: {} };
  if (overrides.user !== undefined) flags.auth.user = overrides.user;
  if (overrides.method !== undefined) flags.auth.method = overrides.method;
  if (overrides.proxy !== undefined) flags.http.proxy = overrides.proxy;
  if (overrides.insecure) flags.http.verifyTls = false;
  if (overrides.verbose) flags.log.level = 'debug';

  const merged: unknown = merge({}, defaults, user, flags);
  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed:\n${details}`);
  }
  return result.data;
}

// ============================================
// State
// ============================================

let config: Config | null = null;

export function initConfig(overrides: ConfigOverrides = {}): Config {
  config = buildConfig(loadDefaultsYaml(), loadConfigYamlAt(getConfigPath()), overrides);
  return config;
}

export function getConfig(): Config {
  if (!config) throw new Error('Config not initialized. Call initConfig() first.');
  return config;
}

// ============================================
// Getters
// ============================================

export const getLogConfig = () => getConfig().log;
export const getAuthConfig = () => getConfig().auth;
