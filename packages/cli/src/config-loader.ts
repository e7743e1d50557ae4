import { ConfigError, parseConfig } from '@kubeql/shared';
import type { Config } from '@kubeql/shared';
import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { ZodError } from 'zod';

export const DEFAULT_CONFIG_FILE = 'kubeql.json';

export interface CliOverrides {
  output?: string;
  color?: boolean;
  logLevel?: string;
}

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Section, key: string): Section {
  const value = raw[key];
  return isSection(value) ? { ...value } : {};
}

function readConfigFile(path: string): Section {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read config file ${path}: ${reason}`, { cause: err });
  }
  if (!isSection(parsed)) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`);
  }
  return parsed;
}

function validate(raw: unknown): Config {
  try {
    return parseConfig(raw);
  } catch (err) {
    if (err instanceof ZodError) {
      const issues = err.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${issues}`, { cause: err });
    }
    throw err;
  }
}

export function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): Config {
  let raw: Section = {};

  // 1. Try configPath if provided, else look for kubeql.json in CWD
  if (configPath) {
    const resolved = resolve(cwd, configPath);
    if (!existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    raw = readConfigFile(resolved);
  } else {
    const defaultPath = resolve(cwd, DEFAULT_CONFIG_FILE);
    if (existsSync(defaultPath)) {
      raw = readConfigFile(defaultPath);
    }
  }

  // 2. Build nested structure, applying env var overrides
  const kubeconfig = section(raw, 'kubeconfig');
  const parser = section(raw, 'parser');
  const cluster = section(raw, 'cluster');
  const output = section(raw, 'output');
  let logLevel = raw.logLevel;

  // KUBECONFIG itself is honoured by the default kubeconfig lookup
  if (env.KUBEQL_KUBECONFIG) {
    kubeconfig.path = env.KUBEQL_KUBECONFIG;
  }
  if (env.KUBEQL_DIALECT) {
    parser.dialect = env.KUBEQL_DIALECT;
  }
  if (env.KUBEQL_MAX_ATTEMPTS) {
    cluster.maxAttempts = parseInt(env.KUBEQL_MAX_ATTEMPTS, 10);
  }
  if (env.KUBEQL_OUTPUT) {
    output.format = env.KUBEQL_OUTPUT;
  }
  if (env.KUBEQL_LOG_LEVEL) {
    logLevel = env.KUBEQL_LOG_LEVEL;
  }

  // 3. Validate with zod and return typed Config
  return validate({ kubeconfig, parser, cluster, output, logLevel });
}

/** Command-line flags win over file and environment settings. */
export function applyOverrides(config: Config, overrides: CliOverrides): Config {
  return validate({
    ...config,
    output: {
      format: overrides.output ?? config.output.format,
      color: overrides.color ?? config.output.color,
    },
    logLevel: overrides.logLevel ?? config.logLevel,
  });
}
