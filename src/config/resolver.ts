import fs from 'fs';
import os from 'os';
import path from 'path';
import { EXEC_MAP, MATCH_CONSTANTS, PROCESS_CONSTANTS, WATCHER_CONSTANTS } from './constants.js';
import type { ConfigSources, LaunchCommand, ListMergeMode, RelaunchFileConfig, WatchConfig } from './types.js';
import { ConfigError } from '../utils/errors.js';

function unique(values: string[]): string[] {
  return Array.from(new Set(values));
}

/**
 * Split a comma-separated flag value; an empty result counts as "not given"
 */
export function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  const entries = value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  return entries.length > 0 ? entries : undefined;
}

/**
 * Combine a CLI list with a config file list.
 * `override`: an explicit CLI list replaces the file list.
 * `union`: both lists apply, file entries first.
 */
export function mergeList(
  cli: string[] | undefined,
  file: string[] | undefined,
  mode: ListMergeMode
): string[] | undefined {
  const fromCli = cli && cli.length > 0 ? cli : undefined;
  if (!fromCli) {
    return file && file.length > 0 ? file : undefined;
  }
  if (!file || mode === 'override') {
    return unique(fromCli);
  }
  return unique([...file, ...fromCli]);
}

export function normalizeExtensions(extensions: string[]): string[] {
  return unique(
    extensions
      .map((ext) => ext.trim().replace(/^\.+/, ''))
      .filter((ext) => ext.length > 0)
  );
}

export function isSignal(value: string): value is NodeJS.Signals {
  return Object.prototype.hasOwnProperty.call(os.constants.signals, value);
}

export function parseSignal(raw: string, source: string): NodeJS.Signals {
  const upper = raw.trim().toUpperCase();
  const candidate = upper.startsWith('SIG') ? upper : `SIG${upper}`;
  if (!isSignal(candidate)) {
    throw new ConfigError(`unknown signal "${raw}"`, source);
  }
  return candidate;
}

export function parseMilliseconds(raw: string, source: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isInteger(value) || value < 0) {
    throw new ConfigError(`expected a non-negative integer number of milliseconds, got "${raw}"`, source);
  }
  return value;
}

/**
 * Resolve watch paths to absolute, symlink-free directories
 */
export function resolveWatchPaths(paths: string[], cwd: string): string[] {
  const resolved = paths.map((entry) => {
    const absolute = path.resolve(cwd, entry);
    try {
      return fs.realpathSync(absolute);
    } catch {
      throw new ConfigError('watch path does not exist', absolute);
    }
  });

  if (resolved.length === 0) {
    throw new ConfigError('no watch paths resolved', cwd);
  }

  return unique(resolved);
}

interface ResolvedCommand {
  executable: string;
  execArgs: string[];
  script: string | null;
}

function resolveCommand(sources: ConfigSources, script: string | null): ResolvedCommand {
  const { cli, env, file } = sources;
  const execCandidates: Array<[string | undefined, string]> = [
    [cli.exec, '--exec'],
    [env.exec, 'RELAUNCH_EXEC'],
    [file?.executable, sources.configFile ?? 'config file'],
  ];

  for (const [value, source] of execCandidates) {
    if (value === undefined) continue;
    const [executable, ...execArgs] = value.trim().split(/\s+/).filter(Boolean);
    if (!executable) {
      throw new ConfigError('executable is empty', source);
    }
    return { executable, execArgs, script };
  }

  if (!script) {
    throw new ConfigError('nothing to run: pass a script or --exec <program>', sources.cwd);
  }

  const interpreter = EXEC_MAP[path.extname(script).slice(1)];
  if (interpreter) {
    return { executable: interpreter, execArgs: [], script };
  }

  // No known interpreter: the script is itself the program
  return { executable: path.resolve(sources.cwd, script), execArgs: [], script: null };
}

/**
 * Merge CLI, environment, config file and defaults into one WatchConfig.
 * Scalars: cli > env > file > default. Lists: see mergeList.
 */
export function resolveWatchConfig(sources: ConfigSources): WatchConfig {
  const { cli, env } = sources;
  const file: RelaunchFileConfig = sources.file ?? {};
  const cwd = path.resolve(sources.cwd);
  const listMerge: ListMergeMode = cli.union ? 'union' : 'override';
  const fileLabel = sources.configFile ?? 'config file';

  const script = cli.script ?? file.script ?? null;
  const scriptArgs = cli.script !== undefined ? cli.args ?? [] : file.args ?? [];
  const command = resolveCommand(sources, script);

  let extensions = mergeList(splitList(cli.ext), file.extensions, listMerge);
  if (!extensions) {
    const scriptExt = script ? path.extname(script).slice(1) : '';
    extensions = scriptExt
      ? [...MATCH_CONSTANTS.DEFAULT_EXTENSIONS, scriptExt]
      : [...MATCH_CONSTANTS.DEFAULT_EXTENSIONS];
  }

  const watchPaths = resolveWatchPaths(mergeList(cli.watch, file.watch, listMerge) ?? ['.'], cwd);
  const ignorePatterns = unique([
    ...(mergeList(cli.ignore, file.ignore, listMerge) ?? []),
    ...MATCH_CONSTANTS.ALWAYS_IGNORED,
  ]);

  const debounceMs = cli.delay !== undefined
    ? parseMilliseconds(cli.delay, '--delay')
    : env.delay ?? file.delay ?? WATCHER_CONSTANTS.DEFAULT_DEBOUNCE_MS;

  const killTimeoutMs = cli.killTimeout !== undefined
    ? parseMilliseconds(cli.killTimeout, '--kill-timeout')
    : env.killTimeout ?? file.killTimeout ?? PROCESS_CONSTANTS.DEFAULT_KILL_TIMEOUT_MS;

  const stopSignal = cli.signal !== undefined
    ? parseSignal(cli.signal, '--signal')
    : env.signal !== undefined
      ? parseSignal(env.signal, 'RELAUNCH_SIGNAL')
      : parseSignal(file.signal ?? PROCESS_CONSTANTS.DEFAULT_STOP_SIGNAL, fileLabel);

  const restartable = cli.restartable ?? file.restartable ?? PROCESS_CONSTANTS.DEFAULT_RESTARTABLE;

  return {
    cwd,
    executable: command.executable,
    execArgs: command.execArgs,
    script: command.script,
    scriptArgs,
    watchPaths,
    extensions: normalizeExtensions(extensions),
    ignorePatterns,
    restartable: restartable === false ? null : restartable,
    debounceMs: Math.max(debounceMs, WATCHER_CONSTANTS.MIN_DEBOUNCE_MS),
    stopSignal,
    killTimeoutMs,
    restartOnCrash: cli.restartOnCrash ?? file.restartOnCrash ?? false,
    once: cli.once ?? false,
    forwardStdin: cli.stdin ?? file.stdin ?? true,
    polling: cli.legacyWatch ?? file.legacyWatch ?? false,
    env: file.env ?? {},
    listMerge,
    configFile: sources.configFile ?? null,
  };
}

export function buildLaunchCommand(config: WatchConfig, baseEnv: NodeJS.ProcessEnv = process.env): LaunchCommand {
  return {
    executable: config.executable,
    args: [...config.execArgs, ...(config.script ? [config.script] : []), ...config.scriptArgs],
    cwd: config.cwd,
    env: { ...baseEnv, ...config.env },
  };
}

/**
 * Printable form of a launch command, for logs and errors
 */
export function formatCommand(command: Pick<LaunchCommand, 'executable' | 'args'>): string {
  return [command.executable, ...command.args].join(' ');
}
