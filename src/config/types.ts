import type { z } from 'zod';
import type { RelaunchFileConfigSchema } from './schema.js';

/**
 * Config file shape after validation
 */
export type RelaunchFileConfig = z.infer<typeof RelaunchFileConfigSchema>;

export type ListMergeMode = 'override' | 'union';

/**
 * Options as given on the command line. A field is undefined when the flag
 * was not passed, so the resolver can tell "not given" from "given".
 */
export interface CliOptions {
  script?: string;
  args?: string[];
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
  restartable?: string | false;
  legacyWatch?: boolean;
  union?: boolean;
  config?: string;
}

/**
 * Settings read from RELAUNCH_* environment variables
 */
export interface EnvConfig {
  delay?: number;
  signal?: string;
  killTimeout?: number;
  exec?: string;
}

/**
 * Fully resolved configuration the supervisor runs with
 */
export interface WatchConfig {
  cwd: string;
  executable: string;
  execArgs: string[];
  script: string | null;
  scriptArgs: string[];
  watchPaths: string[];
  extensions: string[];
  ignorePatterns: string[];
  restartable: string | null;
  debounceMs: number;
  stopSignal: NodeJS.Signals;
  killTimeoutMs: number;
  restartOnCrash: boolean;
  once: boolean;
  forwardStdin: boolean;
  polling: boolean;
  env: Record<string, string>;
  listMerge: ListMergeMode;
  configFile: string | null;
}

export interface ConfigSources {
  cli: CliOptions;
  file: RelaunchFileConfig | null;
  env: EnvConfig;
  cwd: string;
  configFile?: string | null;
}

export interface LaunchCommand {
  executable: string;
  args: string[];
  cwd: string;
  env: NodeJS.ProcessEnv;
}
