import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import chalk from 'chalk';
import type { ResolvedAgentConfig } from '@hostpulse/shared';
import {
  ConfigValidationError,
  ENV_ENDPOINT,
  ENV_TOKEN,
  HOSTPULSE_CONFIG_FILE,
  errorMessage,
  resolveAgentConfig,
} from '@hostpulse/shared';

export interface CliOptions {
  endpoint?: string;
  interval?: string;
  cpuWindow?: string;
  timeout?: string;
  token?: string;
  display?: boolean;
  config?: string;
  procRoot?: string;
  logLevel?: string;
}

export interface ConfigSources {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * A bare number on the command line means seconds.
 */
export function cliDuration(value: string): string {
  return /^\d+(\.\d+)?$/.test(value.trim()) ? `${value.trim()}s` : value;
}

export function findConfigFile(cwd: string): string | null {
  const candidate = join(cwd, HOSTPULSE_CONFIG_FILE);
  return existsSync(candidate) ? candidate : null;
}

export function readConfigFile(path: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigValidationError([`${path}: ${errorMessage(err)}`]);
  }

  if (!isRecord(parsed)) {
    throw new ConfigValidationError([`${path}: Expected a JSON object`]);
  }
  return parsed;
}

/**
 * Merge configuration sources. Flags win over the config file, the file wins
 * over the environment, and the schema fills whatever is left.
 */
export function buildRawConfig(
  options: CliOptions,
  sources: ConfigSources = {},
): Record<string, unknown> {
  const cwd = sources.cwd ?? process.cwd();
  const env = sources.env ?? process.env;

  const path = options.config ? resolve(cwd, options.config) : findConfigFile(cwd);
  const raw: Record<string, unknown> = path ? { ...readConfigFile(path) } : {};

  if (raw.endpoint === undefined && env[ENV_ENDPOINT]) raw.endpoint = env[ENV_ENDPOINT];
  if (raw.token === undefined && env[ENV_TOKEN]) raw.token = env[ENV_TOKEN];

  if (options.endpoint !== undefined) raw.endpoint = options.endpoint;
  if (options.interval !== undefined) raw.interval = cliDuration(options.interval);
  if (options.cpuWindow !== undefined) raw.cpuSampleWindow = cliDuration(options.cpuWindow);
  if (options.timeout !== undefined) raw.timeout = cliDuration(options.timeout);
  if (options.token !== undefined) raw.token = options.token;
  if (options.procRoot !== undefined) raw.procRoot = options.procRoot;
  if (options.logLevel !== undefined) raw.logLevel = options.logLevel;
  // commander defaults --no-display to true, so only an explicit flag counts
  if (options.display === false) raw.display = false;

  return raw;
}

export function loadAgentConfig(
  options: CliOptions,
  sources: ConfigSources = {},
): ResolvedAgentConfig {
  return resolveAgentConfig(buildRawConfig(options, sources));
}

/**
 * Load the config for a command, printing validation problems and setting a
 * failing exit code instead of throwing.
 */
export function loadConfigOrReport(options: CliOptions): ResolvedAgentConfig | null {
  try {
    return loadAgentConfig(options);
  } catch (err) {
    if (err instanceof ConfigValidationError) {
      console.error(chalk.red(err.message));
      process.exitCode = 1;
      return null;
    }
    throw err;
  }
}
