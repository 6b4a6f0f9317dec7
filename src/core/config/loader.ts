import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { fileExists, loadYaml } from '../../utils/index.js';
import { formatZodError } from '../../utils/schema.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

export const DEFAULT_CONFIG_FILE = 'oracle.config.yaml';

type Env = Record<string, string | undefined>;

export interface LoadConfigOptions {
  /** Directory a relative config path is resolved against (default: cwd) */
  cwd?: string;
  /** Explicit config file; overrides ORACLE_CONFIG */
  configPath?: string;
  env?: Env;
}

/**
 * Default configuration values.
 * Used when no config file exists and no environment overrides are set.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration: schema defaults, then the YAML file, then the environment.
 * A missing default config file is not an error; a missing explicit one is.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const explicitPath = options.configPath ?? env.ORACLE_CONFIG;
  const fullPath = path.resolve(cwd, explicitPath ?? DEFAULT_CONFIG_FILE);

  let fromFile: Record<string, unknown> = {};
  if (await fileExists(fullPath)) {
    fromFile = await readConfigFile(fullPath);
  } else if (explicitPath) {
    throw new ConfigError(
      ErrorCodes.CONFIG_LOAD_ERROR,
      `Config file not found: ${fullPath}`,
      { path: fullPath }
    );
  }

  const merged = applyEnvOverrides(fromFile, env);
  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.CONFIG_INVALID,
      `Invalid configuration: ${formatZodError(result.error)}`,
      { path: fullPath }
    );
  }
  return result.data;
}

async function readConfigFile(fullPath: string): Promise<Record<string, unknown>> {
  let raw: unknown;
  try {
    raw = await loadYaml(fullPath);
  } catch (error) {
    throw new ConfigError(
      ErrorCodes.CONFIG_LOAD_ERROR,
      `Failed to load config from ${fullPath}: ${error instanceof Error ? error.message : String(error)}`,
      { path: fullPath }
    );
  }
  if (!isRecord(raw)) {
    throw new ConfigError(
      ErrorCodes.CONFIG_INVALID,
      `Config file ${fullPath} must contain a mapping at the top level`,
      { path: fullPath }
    );
  }
  return raw;
}

/**
 * Layer environment variables over the file contents.
 * Numeric variables that do not parse are passed through as strings so
 * that schema validation reports them.
 */
export function applyEnvOverrides(
  base: Record<string, unknown>,
  env: Env
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  const set = (section: string, key: string, value: unknown): void => {
    const current = result[section];
    result[section] = { ...(isRecord(current) ? current : {}), [key]: value };
  };

  if (env.ORACLE_REGISTRY_BASE_URL) set('registry', 'base_url', env.ORACLE_REGISTRY_BASE_URL);
  if (env.ORACLE_CACHE_TTL_SECONDS) set('registry', 'cache_ttl_seconds', toNumber(env.ORACLE_CACHE_TTL_SECONDS));
  if (env.ORACLE_GITHUB_REPO) set('github', 'repo', env.ORACLE_GITHUB_REPO);
  if (env.ORACLE_GITHUB_BRANCH) set('github', 'branch', env.ORACLE_GITHUB_BRANCH);
  if (env.GITHUB_TOKEN) set('github', 'token', env.GITHUB_TOKEN);
  if (env.ORACLE_LOG_LEVEL) set('logging', 'level', env.ORACLE_LOG_LEVEL);

  return result;
}

function toNumber(value: string): number | string {
  const parsed = Number(value);
  return value.trim() !== '' && Number.isFinite(parsed) ? parsed : value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
