import chalk from 'chalk';
import { buildLaunchCommand, formatCommand } from '../config/resolver.js';
import type { WatchConfig } from '../config/types.js';

function write(line: string): void {
  process.stdout.write(`${line}\n`);
}

export function showHeader(version: string): void {
  write(chalk.yellow(`[relaunch] ${version}`));
}

/**
 * Human-readable summary of a resolved configuration, one setting per line
 */
export function describeConfig(config: WatchConfig): string[] {
  const command = formatCommand(buildLaunchCommand(config, {}));
  const lines = [
    `Command:     ${command}`,
    `Watching:    ${config.once ? '(disabled, --once)' : config.watchPaths.join(', ')}`,
    `Extensions:  ${config.extensions.join(', ')}`,
    `Ignoring:    ${config.ignorePatterns.length > 0 ? config.ignorePatterns.join(', ') : '(none)'}`,
    `Delay:       ${config.debounceMs}ms`,
    `Stop signal: ${config.stopSignal} (SIGKILL after ${config.killTimeoutMs}ms)`,
  ];

  if (config.configFile) {
    lines.push(`Config file: ${config.configFile}`);
  }
  if (config.polling) {
    lines.push('Mode:        polling');
  }
  return lines;
}

export function showConfiguration(config: WatchConfig): void {
  write(chalk.white('Configuration'));
  for (const line of describeConfig(config)) {
    write(chalk.gray(`   ${line}`));
  }
}

/**
 * JSON rendering of a resolved configuration for --dump
 */
export function formatConfigDump(config: WatchConfig): string {
  return JSON.stringify(config, null, 2);
}
