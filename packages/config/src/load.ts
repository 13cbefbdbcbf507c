import { readFileSync } from 'node:fs';
import { type AppConfig, appConfigSchema } from './schema.js';

/**
 * Configuration could not be loaded. Fatal at startup.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Validate a parsed configuration object
 *
 * @throws ConfigError listing every invalid field
 */
export function parseConfig(raw: unknown): AppConfig {
  const result = appConfigSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.') || '(root)'}: ${e.message}`)
      .join('\n');
    throw new ConfigError(`Configuration validation failed:\n${errors}`);
  }

  return result.data;
}

/**
 * Apply LOG_LEVEL / LOG_FORMAT on top of the file's logging block
 */
function withEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  if (!env.LOG_LEVEL && !env.LOG_FORMAT) {
    return raw;
  }
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return raw;
  }

  const record: Record<string, unknown> = { ...raw };
  const logging = record['logging'];
  const current: Record<string, unknown> =
    typeof logging === 'object' && logging !== null && !Array.isArray(logging) ? { ...logging } : {};
  if (env.LOG_LEVEL) current['level'] = env.LOG_LEVEL;
  if (env.LOG_FORMAT) current['format'] = env.LOG_FORMAT;
  record['logging'] = current;
  return record;
}

/**
 * Load and validate configuration from a JSON file
 *
 * An empty (or whitespace-only) file is treated as `{}` and takes every default.
 *
 * @param path - Path to the JSON configuration file
 * @param env - Environment variables (defaults to process.env)
 * @throws ConfigError if the file is missing, is not JSON, or fails validation
 */
export function loadConfig(path: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot open configuration file ${path}: ${reason}`);
  }

  let raw: unknown = {};
  if (content.trim() !== '') {
    try {
      raw = JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Cannot parse configuration file ${path}: ${reason}`);
    }
  }

  return parseConfig(withEnvOverrides(raw, env));
}

/**
 * Show only the last few characters of a secret
 */
export function maskSecret(value: string, visible = 4): string {
  if (value === '') return '(not set)';
  if (value.length <= visible) return '***';
  return `***${value.slice(-visible)}`;
}
