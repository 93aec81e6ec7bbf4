/**
 * Centralized configuration constants for relaunch
 *
 * Every tunable default the supervisor relies on lives here so the resolver,
 * watcher and controller agree on the same values.
 */

/**
 * File Watcher Configuration
 */
export const WATCHER_CONSTANTS = {
  /** Default debounce window in milliseconds */
  DEFAULT_DEBOUNCE_MS: 100,

  /** Minimum debounce window in milliseconds */
  MIN_DEBOUNCE_MS: 10,

  /** An add this soon after an unlink with the same basename or directory is reported as a rename */
  RENAME_WINDOW_MS: 50,

  /** How often a removed watch root is checked for reappearance */
  ROOT_RECHECK_MS: 1000,

  /** Poll interval when polling mode is on (network drives, containers) */
  POLL_INTERVAL_MS: 100,
} as const;

/**
 * Child process lifecycle configuration
 */
export const PROCESS_CONSTANTS = {
  /** Signal sent first when stopping the child */
  DEFAULT_STOP_SIGNAL: 'SIGTERM',

  /** Grace period before the stop escalates to SIGKILL */
  DEFAULT_KILL_TIMEOUT_MS: 3000,

  /** Pause before a crashed child is started again (restart-on-crash only) */
  CRASH_RESTART_DELAY_MS: 1000,

  /** Stdin line that triggers a manual restart */
  DEFAULT_RESTARTABLE: 'rs',
} as const;

/**
 * Path matching defaults
 */
export const MATCH_CONSTANTS = {
  /** Extensions watched when neither the CLI nor the config file names any */
  DEFAULT_EXTENSIONS: ['js', 'mjs', 'cjs', 'json'],

  /** Patterns ignored in every configuration */
  ALWAYS_IGNORED: ['**/node_modules/**'],

  /** Version-control metadata directories */
  VCS_DIRECTORIES: ['.git', '.hg', '.svn', '.bzr', '_darcs', 'CVS'],
} as const;

export const CONFIG_FILE_NAME = 'relaunch.json';

/**
 * Interpreter chosen for a script when no executable is configured
 */
export const EXEC_MAP: Readonly<Record<string, string>> = {
  js: 'node',
  mjs: 'node',
  cjs: 'node',
  ts: 'tsx',
  mts: 'tsx',
  cts: 'tsx',
  py: 'python3',
  php: 'php',
  rb: 'ruby',
  sh: 'sh',
  pl: 'perl',
};
