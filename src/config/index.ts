import * as fs from 'fs';
import * as path from 'path';
import { ZodError } from 'zod';
import { ConfigSchema, type Config } from '@/types/config';
import { ConfigurationError, errorMessage } from '@/core/errors';

export interface LoadConfigOptions {
  /** Explicit config file, e.g. from --config */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

type JsonObject = { [key: string]: unknown };

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function resolveEnvVars(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === 'string') {
    // Replace ${VAR_NAME} with env.VAR_NAME
    return value.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
      const resolved = env[varName];
      if (resolved === undefined) {
        throw new ConfigurationError(`Missing required environment variable: ${varName}`, { varName });
      }
      return resolved;
    });
  }
  if (Array.isArray(value)) {
    return value.map(item => resolveEnvVars(item, env));
  }
  if (isJsonObject(value)) {
    const resolved: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      resolved[key] = resolveEnvVars(item, env);
    }
    return resolved;
  }
  return value;
}

export function deepMerge(target: JsonObject, source: JsonObject): JsonObject {
  const result: JsonObject = { ...target };

  for (const [key, value] of Object.entries(source)) {
    const current = result[key];
    if (isJsonObject(value) && isJsonObject(current)) {
      result[key] = deepMerge(current, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

function readJsonFile(filePath: string): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read configuration file ${filePath}: ${errorMessage(error)}`, { filePath });
  }

  if (!isJsonObject(parsed)) {
    throw new ConfigurationError(`Configuration file ${filePath} must contain a JSON object`, { filePath });
  }
  return parsed;
}

function loadRawConfig(options: LoadConfigOptions): JsonObject {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const explicitPath = options.configPath ?? env.TIMELINE_MAILER_CONFIG;
  if (explicitPath) {
    return readJsonFile(path.resolve(cwd, explicitPath));
  }

  const configDir = path.resolve(cwd, 'config');
  const defaultConfig = readJsonFile(path.join(configDir, 'default.json'));

  // Environment-specific overrides, e.g. config/production.json
  const envConfigPath = path.join(configDir, `${env.NODE_ENV || 'development'}.json`);
  if (fs.existsSync(envConfigPath)) {
    return deepMerge(defaultConfig, readJsonFile(envConfigPath));
  }
  return defaultConfig;
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map(issue => `  • ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('\n');
}

/**
 * Loads, resolves and validates the configuration.
 *
 * @throws ConfigurationError with every validation issue listed
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const resolved = resolveEnvVars(loadRawConfig(options), env);
  const result = ConfigSchema.safeParse(resolved);

  if (!result.success) {
    throw new ConfigurationError(
      `Configuration validation failed:\n${formatIssues(result.error)}`,
      { issues: result.error.issues.length }
    );
  }

  const config = result.data;
  const baseDir = options.cwd ?? process.cwd();
  config.state.filePath = path.resolve(baseDir, config.state.filePath);
  config.state.lockFilePath = path.resolve(baseDir, config.state.lockFilePath);
  if (config.metrics.textfilePath) {
    config.metrics.textfilePath = path.resolve(baseDir, config.metrics.textfilePath);
  }
  return config;
}
