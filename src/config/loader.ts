import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { ConfigError } from '../utils/errors.js';
import { validateYaml } from '../utils/yaml.js';
import { ConfigSchema, type CaseTraceConfig } from './schema.js';

export const DEFAULT_CONFIG_FILE = 'casetrace.config.yaml';

export interface LoadConfigOptions {
  /** Explicit config path (`--config`); must exist */
  path?: string;
  /** Directory searched for the default config file */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(source: PlainObject, key: string): PlainObject {
  const value = source[key];
  return isPlainObject(value) ? value : {};
}

/**
 * Load CaseTrace configuration from an optional YAML file and environment
 * variables.
 *
 * Priority: environment variables > config file > defaults. CLI flags are
 * applied on top by the commands.
 *
 * Config file location (first match wins):
 *   1. `options.path` (`--config`)
 *   2. CASETRACE_CONFIG env var
 *   3. ./casetrace.config.yaml, when present
 *
 * @throws ConfigError when an explicitly named file is missing, or the file
 *   is not valid YAML or fails validation
 */
export function loadConfig(options: LoadConfigOptions = {}): CaseTraceConfig {
  const env = options.env ?? process.env;
  const fileConfig = loadConfigFile(options, env);
  const envConfig = loadEnvConfig(env);

  // Merge: env overrides file, schema provides defaults
  const merged: PlainObject = {
    ...fileConfig,
    ...envConfig,
    output: { ...section(fileConfig, 'output'), ...section(envConfig, 'output') },
    logging: { ...section(fileConfig, 'logging'), ...section(envConfig, 'logging') },
  };

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map(i => `  ${i.path.join('.')}: ${i.message}`);
    throw new ConfigError('Invalid configuration', issues);
  }

  return result.data;
}

function loadConfigFile(options: LoadConfigOptions, env: NodeJS.ProcessEnv): PlainObject {
  const explicit = options.path ?? env.CASETRACE_CONFIG;
  const configPath = explicit
    ? resolve(explicit)
    : join(options.cwd ?? process.cwd(), DEFAULT_CONFIG_FILE);

  if (!existsSync(configPath)) {
    if (explicit) throw new ConfigError(`Config file not found: ${configPath}`);
    return {};
  }

  const parsed = validateYaml(readFileSync(configPath, 'utf-8'));
  if (!parsed.valid) {
    throw new ConfigError(`Config file is not valid YAML: ${configPath}`, parsed.error ? [parsed.error] : []);
  }
  // An empty file parses to null
  if (parsed.data === null || parsed.data === undefined) return {};
  if (!isPlainObject(parsed.data)) {
    throw new ConfigError(`Config file must contain a mapping: ${configPath}`);
  }
  return parsed.data;
}

function loadEnvConfig(env: NodeJS.ProcessEnv): PlainObject {
  const config: PlainObject = {};

  if (env.CASETRACE_ANALYST) config.analyst = env.CASETRACE_ANALYST;
  if (env.CASETRACE_OUTPUT_DIR) config.output = { dir: env.CASETRACE_OUTPUT_DIR };
  if (env.LOG_LEVEL) config.logging = { level: env.LOG_LEVEL };

  return config;
}
