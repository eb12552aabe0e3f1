// Configuration loading logic
import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { AutomationError, ValidationError } from '../errors';
import { AutomationConfig } from '../types';
import { ConfigLoadOptions } from './types';
import { validateAndNormalizeConfig } from './validator';

type PlainObject = Record<string, unknown>;

export function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with the second object taking precedence.
 * Undefined values in `source` leave the target untouched.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) {
      continue;
    }
    const current = result[key];
    if (isPlainObject(value)) {
      result[key] = deepMerge(isPlainObject(current) ? current : {}, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

/**
 * Substitute environment variables in a string.
 * Supports ${VAR_NAME} and ${VAR_NAME:-default_value} syntax; an unset variable
 * without a default keeps its placeholder.
 */
export function substituteEnvironmentVariables(text: string, env: NodeJS.ProcessEnv = process.env): string {
  return text.replace(/\$\{([^}]+)\}/g, (match, expression: string) => {
    const separator = expression.indexOf(':-');
    const name = separator === -1 ? expression : expression.slice(0, separator);
    const fallback = separator === -1 ? undefined : expression.slice(separator + 2);

    const value = env[name];
    if (value !== undefined) {
      return value;
    }
    return fallback ?? match;
  });
}

export function resolveEnvironmentVariables(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') {
    return substituteEnvironmentVariables(value, env);
  }
  if (Array.isArray(value)) {
    return value.map(item => resolveEnvironmentVariables(item, env));
  }
  if (isPlainObject(value)) {
    const result: PlainObject = {};
    for (const [key, nested] of Object.entries(value)) {
      result[key] = resolveEnvironmentVariables(nested, env);
    }
    return result;
  }
  return value;
}

/**
 * Loads the configuration file (YAML or JSON), applies environment
 * substitution and CLI overrides, and hands the result to the validator.
 */
export class AutomationConfigLoader {
  async load(options: ConfigLoadOptions = {}): Promise<AutomationConfig> {
    const env = options.env ?? process.env;
    const fromFile = options.path ? await this.readFile(options.path, env) : {};
    const merged = deepMerge(fromFile, { ...options.overrides });

    return validateAndNormalizeConfig(merged);
  }

  async readFile(path: string, env: NodeJS.ProcessEnv = process.env): Promise<PlainObject> {
    if (!existsSync(path)) {
      throw new ValidationError([`Configuration file not found: ${path}`]);
    }

    let parsed: unknown;
    try {
      const content = await readFile(path, 'utf-8');
      if (path.endsWith('.json')) {
        parsed = JSON.parse(content);
      } else if (path.endsWith('.yml') || path.endsWith('.yaml')) {
        parsed = parseYaml(content);
      } else {
        throw new Error('Unsupported file format. Only .json, .yml, and .yaml files are supported.');
      }
    } catch (error) {
      if (error instanceof AutomationError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new ValidationError([`Failed to load configuration from ${path}: ${reason}`]);
    }

    // an empty YAML document parses to null
    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (!isPlainObject(parsed)) {
      throw new ValidationError([`Configuration in ${path} must be a mapping`]);
    }

    const resolved = resolveEnvironmentVariables(parsed, env);
    return isPlainObject(resolved) ? resolved : {};
  }
}

/**
 * Convenience function to create a new configuration loader
 */
export function createConfigLoader(): AutomationConfigLoader {
  return new AutomationConfigLoader();
}

export const DEFAULT_CONFIG_PATHS = [
  './mail-deploy.yml',
  './mail-deploy.yaml',
  './mail-deploy.json'
];

/** First of {@link DEFAULT_CONFIG_PATHS} that exists */
export function findDefaultConfig(): string | undefined {
  return DEFAULT_CONFIG_PATHS.find(path => existsSync(path));
}
