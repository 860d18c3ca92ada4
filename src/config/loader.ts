import { readFileSync } from 'node:fs';
import { dirname, isAbsolute, resolve } from 'node:path';
import { load } from 'js-yaml';
import { ConfigurationError, errorMessage } from '../errors.js';
import type { RetryPolicy } from '../pipeline/retry.js';
import { snapdiffConfigSchema, type RetryConfig, type SnapdiffConfig } from './schema.js';

const ENV_PLACEHOLDER = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Replace `${VAR}` in every string of a parsed YAML tree with process.env values.
 * Throws when a referenced variable is not set.
 */
export function resolveEnvVars(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') {
    return value.replace(ENV_PLACEHOLDER, (_match, name: string) => {
      const resolved = env[name];
      if (resolved === undefined) {
        throw new ConfigurationError([`Environment variable ${name} is not set`]);
      }
      return resolved;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvVars(item, env));
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, resolveEnvVars(v, env)]));
  }
  return value;
}

export function parseConfig(raw: unknown): SnapdiffConfig {
  const result = snapdiffConfigSchema.safeParse(resolveEnvVars(raw));
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return result.data;
}

/**
 * Load and validate a YAML config file. Relative source and state paths are
 * resolved against the config file's directory.
 */
export function loadConfig(configPath: string): SnapdiffConfig {
  let text: string;
  try {
    text = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigurationError([`Cannot read config file ${configPath}: ${errorMessage(err)}`]);
  }

  let raw: unknown;
  try {
    raw = load(text);
  } catch (err) {
    throw new ConfigurationError([`Config file ${configPath} is not valid YAML: ${errorMessage(err)}`]);
  }

  const config = parseConfig(raw);
  const baseDir = dirname(resolve(configPath));
  const within = (p: string): string => (isAbsolute(p) ? p : resolve(baseDir, p));

  config.source.path = within(config.source.path);
  if (config.state.type === 'sqlite') {
    config.state.path = within(config.state.path);
  } else {
    config.state.dir = within(config.state.dir);
  }
  return config;
}

export function toRetryPolicy(retry: RetryConfig): RetryPolicy {
  return { maxAttempts: retry.max_attempts, delayMs: retry.delay_ms, backoff: retry.backoff };
}
