import { Command } from 'commander';
import { loadWatchConfig } from '../../config/loader.js';
import type { CliOptions, WatchConfig } from '../../config/types.js';
import { startRelaunch, type RelaunchDeps, type RelaunchHandle } from '../../core/RelaunchService.js';
import { formatConfigDump, showConfiguration } from '../../utils/cli-ui.js';
import { EXIT_CODES, RelaunchError } from '../../utils/errors.js';
import { log, LogLevel, parseLogLevel, print } from '../../utils/logger.js';

type RunCommandOptions = {
  watch?: string[];
  ext?: string;
  ignore?: string[];
  exec?: string;
  delay?: string;
  signal?: string;
  killTimeout?: string;
  restartOnCrash?: boolean;
  once?: boolean;
  stdin?: boolean;
  restartable?: string | boolean;
  legacyWatch?: boolean;
  union?: boolean;
  config?: string;
  dump?: boolean;
  verbose?: boolean;
  quiet?: boolean;
};

export interface RunFlags {
  dump: boolean;
  verbose: boolean;
  quiet: boolean;
}

export interface ParsedCommandLine {
  cli: CliOptions;
  flags: RunFlags;
}

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

export function registerRunOptions(program: Command): Command {
  return program
    .argument('[script]', 'script to run (interpreter picked from its extension)')
    .argument('[args...]', 'arguments passed to the script')
    .option('-w, --watch <path>', 'watch a directory or file (repeatable, default: cwd)', collect)
    .option('-e, --ext <list>', 'comma-separated extensions to watch, "*" for any')
    .option('-i, --ignore <pattern>', 'ignore a path or glob (repeatable)', collect)
    .option('-x, --exec <program>', 'program to run, with optional leading arguments')
    .option('-d, --delay <ms>', 'debounce window in milliseconds (default 100)')
    .option('-s, --signal <signal>', 'signal sent to stop the child (default SIGTERM)')
    .option('--kill-timeout <ms>', 'wait before escalating to SIGKILL (default 3000)')
    .option('--restart-on-crash', 'restart the child after it exits with an error')
    .option('--once', 'run the child once and exit with its exit code')
    .option('--no-stdin', 'do not forward stdin to the child')
    .option('--restartable <token>', 'stdin line that restarts the child (default "rs")')
    .option('--no-restartable', 'disable the stdin restart command')
    .option('-L, --legacy-watch', 'use polling instead of filesystem events')
    .option('--union', 'combine list settings from the CLI and config file instead of overriding')
    .option('--config <file>', 'path to a config file (default ./relaunch.json)')
    .option('--dump', 'print the resolved configuration as JSON and exit')
    .option('--verbose', 'show debug output')
    .option('-q, --quiet', 'only show warnings and errors')
    .passThroughOptions();
}

/**
 * Read operands and options from a parsed program. Options the user did not
 * pass stay undefined so lower-precedence sources can fill them.
 */
export function readCommandLine(program: Command): ParsedCommandLine {
  const options = program.opts<RunCommandOptions>();
  const [script, ...args] = program.args;

  const cli: CliOptions = {
    script,
    args,
    watch: options.watch,
    ext: options.ext,
    ignore: options.ignore,
    exec: options.exec,
    delay: options.delay,
    signal: options.signal,
    killTimeout: options.killTimeout,
    restartOnCrash: options.restartOnCrash,
    once: options.once,
    legacyWatch: options.legacyWatch,
    union: options.union,
    config: options.config,
  };

  // --no-stdin gives the option a default of true; only an explicit flag counts
  if (program.getOptionValueSource('stdin') === 'cli') {
    cli.stdin = options.stdin;
  }

  if (typeof options.restartable === 'string') {
    cli.restartable = options.restartable;
  } else if (options.restartable === false) {
    cli.restartable = false;
  }

  return {
    cli,
    flags: {
      dump: options.dump ?? false,
      verbose: options.verbose ?? false,
      quiet: options.quiet ?? false,
    },
  };
}

export function applyLogFlags(flags: RunFlags, env: NodeJS.ProcessEnv = process.env): void {
  const quiet = flags.quiet || env.RELAUNCH_QUIET === 'true';
  log.setLevel(flags.verbose ? LogLevel.DEBUG : parseLogLevel(env.RELAUNCH_LOG_LEVEL, quiet));
  log.setQuiet(quiet && !flags.verbose);
}

/**
 * Forward SIGINT/SIGTERM to the controller. A second signal while shutdown is
 * in progress exits immediately.
 */
function installSignalHandlers(handle: RelaunchHandle): () => void {
  let received = 0;
  const onSignal = (signal: NodeJS.Signals): void => {
    received += 1;
    if (received > 1) {
      log.warn(`received ${signal} again, exiting without waiting for the child`);
      process.exit(EXIT_CODES.INTERNAL);
    }
    log.info(`received ${signal}, shutting down`);
    handle.shutdown();
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
  return () => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  };
}

/**
 * Resolve configuration and supervise until shutdown. Returns the exit code
 * for the supervisor process.
 */
export async function runRelaunch(
  parsed: ParsedCommandLine,
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
  deps: RelaunchDeps = {}
): Promise<number> {
  applyLogFlags(parsed.flags, env);

  let config: WatchConfig;
  try {
    config = loadWatchConfig(parsed.cli, cwd, env);
  } catch (error) {
    if (error instanceof RelaunchError) {
      log.error(error.message, error);
      return error.exitCode;
    }
    throw error;
  }

  if (parsed.flags.dump) {
    print(formatConfigDump(config));
    return EXIT_CODES.OK;
  }

  if (parsed.flags.verbose) {
    showConfiguration(config);
  }

  const handle = startRelaunch(config, deps);
  const removeSignalHandlers = installSignalHandlers(handle);

  try {
    return await handle.done;
  } catch (error) {
    if (error instanceof RelaunchError) {
      log.error(error.message, error);
      return error.exitCode;
    }
    throw error;
  } finally {
    removeSignalHandlers();
  }
}
