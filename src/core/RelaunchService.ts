import type { Readable, Writable } from 'stream';
import { buildLaunchCommand } from '../config/resolver.js';
import type { WatchConfig } from '../config/types.js';
import { ProcessSupervisor } from '../supervisor/ProcessSupervisor.js';
import { RestartController, type ControllerState } from '../supervisor/RestartController.js';
import { StdinRelay } from '../supervisor/StdinRelay.js';
import type { Supervisor } from '../supervisor/types.js';
import { getErrorMessage } from '../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { systemScheduler, type Scheduler } from '../utils/scheduler.js';
import { Debouncer } from '../watcher/Debouncer.js';
import { FileWatcher, type FileWatcherOptions } from '../watcher/FileWatcher.js';
import { createPathMatcher, type PathMatcher } from '../watcher/path-matcher.js';
import type { ChangeEvent, ChangeSource } from '../watcher/types.js';

export type WatcherFactory = (options: FileWatcherOptions) => ChangeSource;

export interface RelaunchDeps {
  supervisor?: Supervisor;
  createWatcher?: WatcherFactory;
  stdout?: Writable;
  stderr?: Writable;
  /** Null disables stdin handling entirely */
  stdin?: Readable | null;
  scheduler?: Scheduler;
  logger?: Logger;
  /** Environment the child inherits before config `env` is applied */
  baseEnv?: NodeJS.ProcessEnv;
  onStateChange?: (state: ControllerState) => void;
}

export interface RelaunchHandle {
  controller: RestartController;
  /** Resolves once the watcher has finished its initial scan */
  ready: Promise<void>;
  /** Settles with the supervisor exit code after everything is torn down */
  done: Promise<number>;
  shutdown: () => void;
}

/**
 * RelaunchService wires the watcher, debouncer, stdin relay and restart
 * controller together for one resolved configuration.
 */
export class RelaunchService {
  private controller: RestartController;
  private supervisor: Supervisor;
  private matcher: PathMatcher;
  private debouncer: Debouncer;
  private watcher: ChangeSource | null;
  private relay: StdinRelay | null = null;
  private ready: Promise<void>;
  private done: Promise<number> | null = null;
  private readonly logger: Logger;

  constructor(private config: WatchConfig, private deps: RelaunchDeps = {}) {
    this.logger = deps.logger ?? defaultLogger;
    const scheduler = deps.scheduler ?? systemScheduler;

    this.supervisor = deps.supervisor ?? new ProcessSupervisor({
      stdout: deps.stdout,
      stderr: deps.stderr,
      forwardStdin: config.forwardStdin,
      logger: this.logger,
    });

    this.controller = new RestartController({
      supervisor: this.supervisor,
      command: buildLaunchCommand(config, deps.baseEnv ?? process.env),
      killTimeoutMs: config.killTimeoutMs,
      stopSignal: config.stopSignal,
      restartOnCrash: config.restartOnCrash,
      once: config.once,
      scheduler,
      logger: this.logger,
      onStateChange: deps.onStateChange,
    });

    this.matcher = createPathMatcher({
      watchPaths: config.watchPaths,
      extensions: config.extensions,
      ignorePatterns: config.ignorePatterns,
    });

    this.debouncer = new Debouncer({
      windowMs: config.debounceMs,
      scheduler,
      onSignal: (signal) => this.controller.requestRestart('change', signal.paths),
    });

    // A one-shot run never restarts on changes, so there is nothing to watch
    this.watcher = config.once ? null : this.createWatcher();
    this.ready = this.watcher ? this.watcher.ready() : Promise.resolve();
  }

  private createWatcher(): ChangeSource {
    const factory = this.deps.createWatcher ?? ((options: FileWatcherOptions) => new FileWatcher(options));
    return factory({
      watchPaths: this.config.watchPaths,
      ignored: (filePath) => this.matcher.isIgnored(filePath),
      polling: this.config.polling,
      logger: this.logger,
    });
  }

  /**
   * Start the first child and begin reacting to changes. Calling start()
   * again returns the same run.
   */
  start(): Promise<number> {
    if (this.done) {
      return this.done;
    }

    this.attachStdin();
    const pumping = this.watcher ? this.pumpEvents(this.watcher) : Promise.resolve();

    if (this.watcher) {
      void this.ready.then(() => this.logWatching());
    }

    this.done = this.controller.run().finally(() => this.cleanup(pumping));
    return this.done;
  }

  private logWatching(): void {
    this.logger.info(`watching path(s): ${this.config.watchPaths.join(' ')}`);
    this.logger.info(`watching extensions: ${this.config.extensions.join(',')}`);
    if (this.config.restartable) {
      this.logger.info(`to restart at any time, enter \`${this.config.restartable}\``);
    }
  }

  private attachStdin(): void {
    const input = this.deps.stdin === undefined ? process.stdin : this.deps.stdin;
    const restartable = this.config.once ? null : this.config.restartable;
    if (!input || (restartable === null && !this.config.forwardStdin)) {
      return;
    }

    this.relay = new StdinRelay({
      input,
      restartable,
      onRestart: () => this.controller.requestRestart('manual'),
      onInput: this.config.forwardStdin ? (chunk) => this.supervisor.input(chunk) : undefined,
    });
    this.relay.start();
  }

  private async pumpEvents(watcher: ChangeSource): Promise<void> {
    try {
      for await (const event of watcher.events()) {
        this.handleChange(event);
      }
    } catch (error) {
      this.logger.error(`Watcher stopped delivering events: ${getErrorMessage(error)}`, error);
    }
  }

  private handleChange(event: ChangeEvent): void {
    if (this.controller.isShuttingDown()) {
      return;
    }

    const relevant =
      this.matcher.isRelevant(event.path) ||
      (event.previousPath !== undefined && this.matcher.isRelevant(event.previousPath));
    if (!relevant) {
      this.logger.debug(`Ignoring ${event.kind} ${event.path}`);
      return;
    }

    this.logger.debug(`${event.kind} ${event.path}`);
    this.debouncer.push(event);
  }

  private async cleanup(pumping: Promise<void>): Promise<void> {
    this.debouncer.cancel();
    this.relay?.stop();
    if (this.watcher) {
      await this.watcher.close();
    }
    await pumping;
  }

  shutdown(): void {
    this.debouncer.cancel();
    this.controller.shutdown();
  }

  getHandle(): RelaunchHandle {
    return {
      controller: this.controller,
      ready: this.ready,
      done: this.start(),
      shutdown: () => this.shutdown(),
    };
  }
}

/**
 * Start supervising a resolved configuration
 */
export function startRelaunch(config: WatchConfig, deps: RelaunchDeps = {}): RelaunchHandle {
  const service = new RelaunchService(config, deps);
  return service.getHandle();
}
