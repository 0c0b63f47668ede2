/**
 * Configuration loader for the ontology lookup server.
 *
 * Loads config from YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { AppConfig } from './types.js';
import { DEFAULT_CONFIG } from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.CONFIG_PATH or './config.yaml') */
  configPath?: string | undefined;
  /** Receives a line when the file is missing or a variable is unset */
  warn?: (message: string) => void;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Substitute environment variables in a string.
 *
 * Supports:
 * - ${VAR_NAME} - Replace with env var value
 * - ${VAR_NAME:-default} - Replace with env var or default
 */
export function substituteEnvVars(
  value: string,
  env: NodeJS.ProcessEnv = process.env,
  warn: (message: string) => void = () => undefined,
): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    warn(`Environment variable ${varName} is not set and has no default`);
    return '';
  });
}

function substituteEnvVarsRecursive(
  obj: unknown,
  env: NodeJS.ProcessEnv,
  warn: (message: string) => void,
): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj, env, warn);
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => substituteEnvVarsRecursive(item, env, warn));
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value, env, warn);
    }
    return result;
  }
  return obj;
}

/**
 * Substituted values arrive as strings; coerce them back to the type the
 * default holds so `port: ${PORT:-3001}` still validates as a number.
 */
function coerceLike(defaultValue: unknown, value: unknown): unknown {
  if (typeof value !== 'string') return value;
  if (typeof defaultValue === 'number' && value.trim() !== '' && !Number.isNaN(Number(value))) {
    return Number(value);
  }
  if (typeof defaultValue === 'boolean' && (value === 'true' || value === 'false')) {
    return value === 'true';
  }
  return value;
}

/**
 * Deep merge a parsed section over its defaults (source overrides target).
 */
function mergeSection(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];
    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = mergeSection(targetValue, sourceValue);
    } else if (sourceValue !== undefined && sourceValue !== null) {
      result[key] = coerceLike(targetValue, sourceValue);
    }
  }

  return result;
}

function requireNumber(
  c: Record<string, unknown>,
  key: string,
  path: string,
  min: number,
  max = Number.MAX_SAFE_INTEGER,
): void {
  const value = c[key];
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
    throw new ConfigValidationError(`${key} must be an integer between ${min} and ${max}`, `${path}.${key}`, value);
  }
}

function requireString(c: Record<string, unknown>, key: string, path: string): void {
  if (typeof c[key] !== 'string') {
    throw new ConfigValidationError(`${key} must be a string`, `${path}.${key}`, c[key]);
  }
}

function requireSection(config: Record<string, unknown>, key: string): Record<string, unknown> {
  const section = config[key];
  if (!isRecord(section)) {
    throw new ConfigValidationError('must be an object', key, section);
  }
  return section;
}

/**
 * Validate server configuration.
 */
function validateServerConfig(c: Record<string, unknown>, path = 'server'): void {
  requireNumber(c, 'port', path, 1, 65535);
  requireString(c, 'host', path);

  if (typeof c.logLevel !== 'string' || !['debug', 'info', 'warn', 'error'].includes(c.logLevel)) {
    throw new ConfigValidationError('logLevel must be one of: debug, info, warn, error', `${path}.logLevel`, c.logLevel);
  }

  const cors = c.cors;
  if (!isRecord(cors) || typeof cors.enabled !== 'boolean') {
    throw new ConfigValidationError('cors.enabled must be a boolean', `${path}.cors`, cors);
  }
  if (!Array.isArray(cors.origins) || !cors.origins.every((o) => typeof o === 'string')) {
    throw new ConfigValidationError('cors.origins must be a list of strings', `${path}.cors.origins`, cors.origins);
  }
}

/**
 * Validate OLS configuration.
 */
function validateOlsConfig(c: Record<string, unknown>, path = 'ols'): void {
  if (typeof c.baseUrl !== 'string' || !/^https?:\/\//.test(c.baseUrl)) {
    throw new ConfigValidationError('baseUrl must be an http(s) URL', `${path}.baseUrl`, c.baseUrl);
  }
  requireNumber(c, 'timeoutMs', path, 1);
  requireNumber(c, 'maxRetries', path, 0, 10);
  requireNumber(c, 'retryBaseDelayMs', path, 0);
}

/**
 * Validate tool defaults. Defaults must sit inside their own limits.
 */
function validateToolDefaults(c: Record<string, unknown>, path = 'tools'): void {
  requireNumber(c, 'searchRows', path, 1, 100);
  requireNumber(c, 'ontologyPageSize', path, 1, 100);
  requireNumber(c, 'hierarchyPageSize', path, 1, 1000);
  requireNumber(c, 'maxDepth', path, 1, 50);
  requireNumber(c, 'defaultDepth', path, 1, typeof c.maxDepth === 'number' ? c.maxDepth : 50);
  requireNumber(c, 'maxTraversalResults', path, 1);
  requireNumber(c, 'traversalConcurrency', path, 1, 32);
  requireNumber(c, 'defaultTopK', path, 1, 50);
  requireNumber(c, 'candidatePoolSize', path, 1, 200);
}

/**
 * Validate embedding configuration.
 */
function validateEmbeddingConfig(c: Record<string, unknown>, path = 'embedding'): void {
  if (c.provider !== 'ngram' && c.provider !== 'openai-compatible' && c.provider !== 'none') {
    throw new ConfigValidationError('provider must be one of: ngram, openai-compatible, none', `${path}.provider`, c.provider);
  }
  requireString(c, 'baseUrl', path);
  requireString(c, 'model', path);
  requireString(c, 'apiKey', path);
  requireNumber(c, 'timeoutMs', path, 1);

  if (c.provider === 'openai-compatible') {
    if (!c.baseUrl) {
      throw new ConfigValidationError('baseUrl is required for openai-compatible', `${path}.baseUrl`, c.baseUrl);
    }
    if (!c.model) {
      throw new ConfigValidationError('model is required for openai-compatible', `${path}.model`, c.model);
    }
  }

  const cache = c.cache;
  if (!isRecord(cache) || typeof cache.enabled !== 'boolean') {
    throw new ConfigValidationError('cache.enabled must be a boolean', `${path}.cache`, cache);
  }
  requireNumber(cache, 'ttlMs', `${path}.cache`, 1);
  requireNumber(cache, 'maxEntries', `${path}.cache`, 1);
}

/**
 * Validate a fully merged configuration.
 */
export function validateConfig(config: unknown): asserts config is AppConfig {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', '', config);
  }

  validateServerConfig(requireSection(config, 'server'));
  validateOlsConfig(requireSection(config, 'ols'));
  validateToolDefaults(requireSection(config, 'tools'));
  validateEmbeddingConfig(requireSection(config, 'embedding'));
}

function defaultsAsRecord(config: AppConfig): Record<string, unknown> {
  const sections: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(config)) {
    sections[key] = value;
  }
  return sections;
}

/**
 * Merge a parsed (partial) document over the defaults and validate it.
 */
export function resolveConfig(
  parsed: unknown,
  options: { env?: NodeJS.ProcessEnv; warn?: (message: string) => void } = {},
): AppConfig {
  if (parsed !== null && parsed !== undefined && !isRecord(parsed)) {
    throw new ConfigValidationError('must be an object', '', parsed);
  }

  const warn = options.warn ?? (() => undefined);
  const substituted = substituteEnvVarsRecursive(parsed ?? {}, options.env ?? process.env, warn);
  const merged = mergeSection(defaultsAsRecord(DEFAULT_CONFIG), isRecord(substituted) ? substituted : {});

  validateConfig(merged);
  return merged;
}

/**
 * Load configuration from a YAML file.
 *
 * @param options - Loading options
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const configPath = options.configPath
    ?? process.env.CONFIG_PATH
    ?? './config.yaml';
  const warn = options.warn ?? (() => undefined);

  const absolutePath = resolve(configPath);

  // If config file doesn't exist, return defaults
  if (!existsSync(absolutePath)) {
    warn(`Config file not found at ${absolutePath}, using defaults`);
    return resolveConfig({}, { warn });
  }

  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  return resolveConfig(parsed, { warn });
}
