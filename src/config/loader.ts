import { existsSync, readFileSync } from 'fs';
import { join, dirname, resolve } from 'path';
import type { ZodIssue } from 'zod';
import { ConfigurationError } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { configSchema, type ChainDeployConfig } from './schema.js';

export const CONFIG_FILENAME = '.chain-deploy.json';
export const CONFIG_ENV_VAR = 'CHAIN_DEPLOY_CONFIG';

/**
 * Pattern for environment variable substitution: ${VAR_NAME}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)\}/g;
const HAS_ENV_VAR = /\$\{[A-Z_][A-Z0-9_]*\}/;

/**
 * Patterns that suggest sensitive values that should use env vars
 */
const SENSITIVE_PATTERNS = [
  /password/i,
  /secret/i,
  /token/i,
  /api[_-]?key/i,
  /credential/i,
  /webhook[_-]?url/i,
];

/**
 * Substitute environment variables in a string
 * @throws ConfigurationError if a referenced variable is not set
 */
export function substituteEnvVars(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string) => {
    const envValue = env[varName];
    if (envValue === undefined) {
      throw new ConfigurationError(`Environment variable ${varName} is not set (referenced in config as \${${varName}})`);
    }
    return envValue;
  });
}

/**
 * Recursively substitute env vars in parsed JSON
 */
export function substituteEnvVarsInObject(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') {
    return substituteEnvVars(value, env);
  }
  if (Array.isArray(value)) {
    return value.map(item => substituteEnvVarsInObject(item, env));
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = substituteEnvVarsInObject(item, env);
    }
    return result;
  }
  return value;
}

/**
 * Collect hard-coded values under sensitive-looking keys
 */
export function findHardcodedSecrets(config: unknown): string[] {
  const findings: string[] = [];

  function checkValue(value: unknown, path: string): void {
    if (typeof value === 'string') {
      if (HAS_ENV_VAR.test(value) || value.length === 0) return;
      const keyName = path.split('.').pop() || '';
      if (SENSITIVE_PATTERNS.some(pattern => pattern.test(keyName))) {
        findings.push(path);
      }
    } else if (Array.isArray(value)) {
      value.forEach((item, index) => checkValue(item, `${path}[${index}]`));
    } else if (value !== null && typeof value === 'object') {
      for (const [key, item] of Object.entries(value)) {
        checkValue(item, path ? `${path}.${key}` : key);
      }
    }
  }

  checkValue(config, '');
  return findings;
}

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

/**
 * Validate raw (already env-substituted) JSON against the config schema
 */
export function parseConfig(raw: unknown, source: string = CONFIG_FILENAME): ChainDeployConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(formatIssue);
    throw new ConfigurationError(
      `Invalid configuration in ${source}:\n  ${issues.join('\n  ')}`,
      { issues }
    );
  }
  return result.data;
}

/**
 * Find config file by walking up directory tree
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = startDir;

  while (currentDir !== dirname(currentDir)) {
    const configPath = join(currentDir, CONFIG_FILENAME);
    if (existsSync(configPath)) {
      return configPath;
    }
    currentDir = dirname(currentDir);
  }

  return null;
}

/**
 * Explicit path, then $CHAIN_DEPLOY_CONFIG, then a walk up from cwd
 */
export function resolveConfigPath(configPath?: string): string {
  const path = configPath || process.env[CONFIG_ENV_VAR] || findConfigFile();
  if (!path) {
    throw new ConfigurationError(
      `Config file ${CONFIG_FILENAME} not found. Pass --config or set ${CONFIG_ENV_VAR}.`
    );
  }
  return resolve(path);
}

/**
 * Load and parse config file.
 * Performs env var substitution, security checks and schema validation.
 */
export function loadConfig(configPath?: string, logger: Logger = silentLogger): ChainDeployConfig {
  const path = resolveConfigPath(configPath);

  if (!existsSync(path)) {
    throw new ConfigurationError(`Config file ${path} does not exist.`);
  }

  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${path}: ${error.message}`);
    }
    throw error;
  }

  const secrets = findHardcodedSecrets(rawConfig);
  if (secrets.length > 0) {
    logger.warn(`Possible hardcoded secrets in ${path} (use \${ENV_VAR} syntax instead): ${secrets.join(', ')}`);
  }

  const config = parseConfig(substituteEnvVarsInObject(rawConfig), path);
  logger.debug(`Configuration loaded from ${path}`);
  return config;
}

/**
 * List configured repositories
 */
export function listRepositories(config: ChainDeployConfig): string[] {
  return Object.keys(config.repositories);
}
