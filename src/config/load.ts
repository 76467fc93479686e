import { readFileSync } from 'node:fs';
import { SessionOptionsSchema, type Config, type SessionOptionsInput } from '../types/config.js';
import { ConfigError } from '../utils/errors.js';

export const CONFIG_ENV_VAR = 'PTY_EXPECT_CONFIG';

/**
 * Load session defaults from a JSON file.
 * Without an explicit path, PTY_EXPECT_CONFIG is consulted; with neither,
 * the schema defaults are returned.
 */
export function loadConfig(configPath?: string): Config {
  const path = configPath || process.env[CONFIG_ENV_VAR];
  if (!path) {
    return SessionOptionsSchema.parse({});
  }

  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigError(`Config file not found: ${path}`, { path });
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Config file is not valid JSON: ${path}: ${reason}`, { path });
  }

  return parseConfig(parsed, path);
}

export function parseConfig(input: unknown, source = 'options'): Config {
  const result = SessionOptionsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid ${source}: ${issues.join('; ')}`, { source, issues });
  }
  return result.data;
}

/** Per-call options win over loaded defaults */
export function mergeConfig(defaults: Config, overrides: SessionOptionsInput = {}): Config {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  return parseConfig({ ...defaults, ...defined });
}
