import os from 'os';
import { PROCESS_CONSTANTS } from '../config/constants.js';
import type { LaunchCommand } from '../config/types.js';
import { AsyncChannel } from '../utils/channel.js';
import { ChildExitError, getErrorMessage, SpawnError } from '../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { systemScheduler, type Scheduler } from '../utils/scheduler.js';
import type { ChildProcessHandle, ExitStatus, Supervisor } from './types.js';

export type ControllerState = 'idle' | 'starting' | 'running' | 'stopping' | 'stopped';

export type RestartReason = 'change' | 'manual' | 'crash';

type ControllerMessage =
  | { type: 'start' }
  | { type: 'restart'; reason: RestartReason; paths: readonly string[] }
  | { type: 'exited'; handle: ChildProcessHandle; status: ExitStatus }
  | { type: 'shutdown' };

export interface RestartControllerOptions {
  supervisor: Supervisor;
  command: LaunchCommand;
  killTimeoutMs: number;
  stopSignal?: NodeJS.Signals;
  restartOnCrash?: boolean;
  /** End the run when the first child exits, reporting its exit code */
  once?: boolean;
  crashRestartDelayMs?: number;
  scheduler?: Scheduler;
  logger?: Logger;
  onStateChange?: (state: ControllerState) => void;
}

/**
 * Exit code to report for a finished child: its own code, or 128 + signal
 * number when a signal ended it.
 */
export function exitCodeOf(status: ExitStatus): number {
  if (status.code !== null) {
    return status.code;
  }
  if (status.signal) {
    return 128 + (os.constants.signals[status.signal] ?? 0);
  }
  return 1;
}

/**
 * Single owner of the current child. Every input (change signals, manual
 * restarts, child exits, shutdown) arrives as a message on one channel and
 * is handled to completion before the next is read, so teardown of the old
 * child always finishes before a new one is spawned.
 */
export class RestartController {
  private channel = new AsyncChannel<ControllerMessage>();
  private state: ControllerState = 'idle';
  private current: ChildProcessHandle | null = null;
  private shuttingDown = false;
  private exitCode = 0;
  private cancelCrashRestart: (() => void) | null = null;
  private loop: Promise<number> | null = null;
  private readonly scheduler: Scheduler;
  private readonly logger: Logger;

  constructor(private options: RestartControllerOptions) {
    this.scheduler = options.scheduler ?? systemScheduler;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Start the first child and process messages until shutdown. Resolves with
   * the supervisor exit code; rejects if the first spawn fails.
   */
  run(): Promise<number> {
    if (!this.loop) {
      this.loop = this.processMessages();
    }
    return this.loop;
  }

  requestRestart(reason: RestartReason, paths: readonly string[] = []): void {
    if (this.shuttingDown) return;
    this.channel.push({ type: 'restart', reason, paths });
  }

  /**
   * Begin teardown. From this call on nothing can spawn a new child.
   */
  shutdown(): void {
    if (this.shuttingDown) return;
    this.shuttingDown = true;
    this.clearCrashRestart();
    this.channel.push({ type: 'shutdown' });
  }

  getState(): ControllerState {
    return this.state;
  }

  getCurrentPid(): number | null {
    return this.current?.pid ?? null;
  }

  isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  private async processMessages(): Promise<number> {
    this.channel.push({ type: 'start' });

    try {
      for await (const message of this.channel) {
        await this.dispatch(message);
        if (this.state === 'stopped') {
          break;
        }
      }
    } finally {
      this.clearCrashRestart();
      this.channel.close();
    }

    return this.exitCode;
  }

  private async dispatch(message: ControllerMessage): Promise<void> {
    switch (message.type) {
      case 'start':
        if (this.shuttingDown || this.current) return;
        await this.spawnChild(true);
        return;

      case 'restart':
        if (this.shuttingDown) return;
        this.clearCrashRestart();
        if (message.reason === 'crash') {
          // a change may already have brought up a new child
          if (this.current) return;
        } else if (message.reason === 'manual') {
          this.logger.info('restarting (requested from stdin)');
        } else {
          this.logger.info('restarting due to changes...');
          this.logger.debug('changed paths', { paths: [...message.paths] });
        }
        await this.stopChild();
        await this.spawnChild(false);
        return;

      case 'exited':
        this.handleExit(message.handle, message.status);
        return;

      case 'shutdown':
        this.clearCrashRestart();
        await this.stopChild();
        this.setState('stopped');
        return;
    }
  }

  private async spawnChild(initial: boolean): Promise<void> {
    if (this.shuttingDown) {
      return;
    }

    this.setState('starting');
    const { supervisor, command } = this.options;

    try {
      const handle = await supervisor.start(command);
      this.current = handle;
      supervisor.forward(handle);
      void handle.exited.then((status) => {
        this.channel.push({ type: 'exited', handle, status });
      });
      this.setState('running');
      this.logger.info(`starting \`${handle.command}\``, { pid: handle.pid });
    } catch (error) {
      this.setState('idle');
      if (initial || !(error instanceof SpawnError)) {
        throw error;
      }
      this.logger.error(`${error.message} - waiting for changes before trying again`, error);
    }
  }

  private async stopChild(): Promise<void> {
    const handle = this.current;
    if (!handle) {
      return;
    }

    this.setState('stopping');
    try {
      const status = await this.options.supervisor.stop(
        handle,
        this.options.killTimeoutMs,
        this.options.stopSignal ?? PROCESS_CONSTANTS.DEFAULT_STOP_SIGNAL
      );
      this.logger.debug(`Stopped child ${handle.pid}`, { code: status.code, signal: status.signal });
    } catch (error) {
      this.logger.error(`Failed to stop child ${handle.pid}: ${getErrorMessage(error)}`, error);
      throw error;
    } finally {
      this.current = null;
    }
  }

  private handleExit(handle: ChildProcessHandle, status: ExitStatus): void {
    // Exits of children we stopped ourselves were already handled by stopChild
    if (handle !== this.current) {
      return;
    }

    this.current = null;
    this.setState('idle');

    if (this.options.once) {
      this.exitCode = exitCodeOf(status);
      this.setState('stopped');
      return;
    }

    if (this.shuttingDown) {
      return;
    }

    if (status.code === 0) {
      this.logger.info('clean exit - waiting for changes before restart');
      return;
    }

    const exitError = new ChildExitError(handle.command, status);
    if (this.options.restartOnCrash) {
      const delay = this.options.crashRestartDelayMs ?? PROCESS_CONSTANTS.CRASH_RESTART_DELAY_MS;
      this.logger.info(`app crashed: ${exitError.message} - restarting in ${delay}ms`);
      this.cancelCrashRestart = this.scheduler.schedule(() => {
        this.cancelCrashRestart = null;
        this.channel.push({ type: 'restart', reason: 'crash', paths: [] });
      }, delay);
      return;
    }

    this.logger.info(`app crashed: ${exitError.message} - waiting for file changes before starting...`);
  }

  private clearCrashRestart(): void {
    this.cancelCrashRestart?.();
    this.cancelCrashRestart = null;
  }

  private setState(state: ControllerState): void {
    if (this.state === state) return;
    this.state = state;
    this.options.onStateChange?.(state);
  }
}
