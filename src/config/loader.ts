import fs from 'fs';
import path from 'path';
import { CONFIG_FILE_NAME } from './constants.js';
import { formatIssues, RelaunchFileConfigSchema } from './schema.js';
import type { CliOptions, EnvConfig, RelaunchFileConfig, WatchConfig } from './types.js';
import { resolveWatchConfig } from './resolver.js';
import { ConfigError, getErrorMessage } from '../utils/errors.js';
import { log } from '../utils/logger.js';

export interface LoadedFileConfig {
  path: string;
  config: RelaunchFileConfig;
}

/**
 * Locate the config file: an explicit path must exist, the default
 * relaunch.json in the working directory is optional.
 */
export function findConfigFile(cwd: string, explicitPath?: string): string | null {
  if (explicitPath) {
    const resolved = path.resolve(cwd, explicitPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError('config file not found', resolved);
    }
    return resolved;
  }

  const discovered = path.join(cwd, CONFIG_FILE_NAME);
  return fs.existsSync(discovered) ? discovered : null;
}

/**
 * Read and validate the project config file
 * @readonly Never modifies files
 */
export function readProjectConfig(cwd: string, explicitPath?: string): LoadedFileConfig | null {
  const configPath = findConfigFile(cwd, explicitPath);
  if (!configPath) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    throw new ConfigError(`malformed config file: ${getErrorMessage(error)}`, configPath, { cause: error });
  }

  const parsed = RelaunchFileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`invalid config file: ${formatIssues(parsed.error)}`, configPath);
  }

  log.debug('Loaded config file', { path: configPath });
  return { path: configPath, config: parsed.data };
}

function readMilliseconds(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    log.warn(`Ignoring ${name}: expected a non-negative integer`, { value: raw });
    return undefined;
  }
  return value;
}

/**
 * Read configuration from RELAUNCH_* environment variables
 * @readonly Never modifies the environment
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const config: EnvConfig = {};

  const delay = readMilliseconds(env, 'RELAUNCH_DELAY');
  if (delay !== undefined) {
    config.delay = delay;
  }

  const killTimeout = readMilliseconds(env, 'RELAUNCH_KILL_TIMEOUT');
  if (killTimeout !== undefined) {
    config.killTimeout = killTimeout;
  }

  if (env.RELAUNCH_SIGNAL && env.RELAUNCH_SIGNAL.trim()) {
    config.signal = env.RELAUNCH_SIGNAL.trim();
  }

  if (env.RELAUNCH_EXEC && env.RELAUNCH_EXEC.trim()) {
    config.exec = env.RELAUNCH_EXEC.trim();
  }

  return config;
}

/**
 * Load the effective configuration from every source
 * Priority: cli > env > config file > defaults
 */
export function loadWatchConfig(
  cli: CliOptions,
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): WatchConfig {
  const file = readProjectConfig(cwd, cli.config);

  return resolveWatchConfig({
    cli,
    file: file?.config ?? null,
    env: readEnvConfig(env),
    cwd,
    configFile: file?.path ?? null
  });
}
