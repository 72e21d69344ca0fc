/**
 * Configuration loader for rnode-client
 *
 * Defaults, then a JSON config file, then RNODE_* environment variables.
 */

import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_HOST, DEFAULT_PORT } from '../rpc/connection.js';
import type { RNodeClientConfig } from '../types/index.js';

export interface ConfigLoaderOptions {
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

const DEFAULT_CONFIG_NAMES = [
  'rnode.config.json',
  '.rnoderc',
  '.rnoderc.json'
];

const DEFAULT_CONFIG: RNodeClientConfig = {
  host: DEFAULT_HOST,
  port: DEFAULT_PORT,
  webPort: 8888
};

const portSchema = z.number().int().min(0).max(65535);

const ConfigSchema = z.object({
  host: z.string().min(1),
  port: portSchema,
  webPort: portSchema
});

const FileConfigSchema = ConfigSchema.partial().strict();

/**
 * Find a config file in the given directory
 */
export function findConfigFile(cwd: string = process.cwd()): string | null {
  for (const name of DEFAULT_CONFIG_NAMES) {
    const path = resolve(cwd, name);
    if (existsSync(path)) {
      return path;
    }
  }
  return null;
}

/**
 * Load and parse a JSON config file
 */
export function loadConfigFile(path: string): Partial<RNodeClientConfig> {
  if (!existsSync(path)) {
    throw new Error(`Config file not found: ${path}`);
  }

  const content = readFileSync(path, 'utf-8');
  const parsed = FileConfigSchema.safeParse(JSON.parse(content));
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.') || path}: ${issue.message}`));
  }
  return parsed.data;
}

function parsePort(name: string, value: string): number {
  const port = Number(value);
  if (value.trim() === '' || !Number.isInteger(port)) {
    throw new ConfigError([`${name} must be an integer, got '${value}'`]);
  }
  return port;
}

/**
 * Read RNODE_HOST, RNODE_PORT and RNODE_WEB_PORT
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Partial<RNodeClientConfig> {
  const overrides: Partial<RNodeClientConfig> = {};

  if (env.RNODE_HOST) {
    overrides.host = env.RNODE_HOST;
  }
  if (env.RNODE_PORT) {
    overrides.port = parsePort('RNODE_PORT', env.RNODE_PORT);
  }
  if (env.RNODE_WEB_PORT) {
    overrides.webPort = parsePort('RNODE_WEB_PORT', env.RNODE_WEB_PORT);
  }

  return overrides;
}

/**
 * Validate a config object
 */
export function validateConfig(config: RNodeClientConfig): { valid: boolean; errors: string[] } {
  const result = ConfigSchema.safeParse(config);
  if (result.success) {
    return { valid: true, errors: [] };
  }
  return {
    valid: false,
    errors: result.error.issues.map(issue => `Invalid ${issue.path.join('.')}: ${issue.message}`)
  };
}

/**
 * Load configuration with fallbacks
 *
 * Priority:
 * 1. RNODE_HOST / RNODE_PORT / RNODE_WEB_PORT
 * 2. Explicit config path (option or RNODE_CONFIG)
 * 3. Auto-discovered config file
 * 4. Defaults
 */
export function loadConfig(options: ConfigLoaderOptions = {}): RNodeClientConfig {
  const { cwd = process.cwd(), env = process.env } = options;
  const configPath = options.configPath ?? env.RNODE_CONFIG;

  let fileConfig: Partial<RNodeClientConfig> = {};

  if (configPath) {
    fileConfig = loadConfigFile(resolve(cwd, configPath));
  } else {
    const foundPath = findConfigFile(cwd);
    if (foundPath) {
      try {
        fileConfig = loadConfigFile(foundPath);
      } catch (error) {
        console.warn(`Warning: Failed to load config from ${foundPath}:`, error);
      }
    }
  }

  const config: RNodeClientConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    ...configFromEnv(env)
  };

  const { valid, errors } = validateConfig(config);
  if (!valid) {
    throw new ConfigError(errors);
  }
  return config;
}

/**
 * Get default config
 */
export function getDefaultConfig(): RNodeClientConfig {
  return { ...DEFAULT_CONFIG };
}
