import chokidar from 'chokidar';
import fs from 'fs';
import path from 'path';
import { WATCHER_CONSTANTS } from '../config/constants.js';
import { AsyncChannel } from '../utils/channel.js';
import { getErrorCode, getErrorMessage, getErrorProperty, WatchError } from '../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { ChangeEvent, ChangeKind, ChangeSource } from './types.js';

export type ChokidarEventName = 'add' | 'addDir' | 'change' | 'unlink' | 'unlinkDir';

export interface FileWatcherOptions {
  watchPaths: readonly string[];
  /** Paths for which this returns true are never subscribed */
  ignored?: (filePath: string) => boolean;
  polling?: boolean;
  logger?: Logger;
  now?: () => number;
}

const KIND_BY_EVENT: Record<ChokidarEventName, ChangeKind> = {
  add: 'created',
  addDir: 'created',
  change: 'modified',
  unlink: 'removed',
  unlinkDir: 'removed',
};

/**
 * Pairs a removal with a creation shortly after it, which is how a move
 * shows up in filesystem notifications. A creation matches a recent removal
 * with the same basename (moved to another directory) or, failing that, one
 * in the same directory (renamed in place).
 */
export class RenameTracker {
  private removals: Array<{ path: string; at: number }> = [];

  constructor(private windowMs: number = WATCHER_CONSTANTS.RENAME_WINDOW_MS) {}

  recordRemoval(filePath: string, at: number): void {
    this.prune(at);
    this.removals.push({ path: filePath, at });
  }

  /**
   * Returns the removed path this creation completes a rename of, if any
   */
  matchCreation(filePath: string, at: number): string | null {
    this.prune(at);
    const basename = path.basename(filePath);
    const directory = path.dirname(filePath);
    const candidates = this.removals.filter((removal) => removal.path !== filePath);

    const match =
      candidates.find((removal) => path.basename(removal.path) === basename) ??
      candidates.find((removal) => path.dirname(removal.path) === directory);
    if (!match) {
      return null;
    }

    this.removals = this.removals.filter((removal) => removal !== match);
    return match.path;
  }

  private prune(at: number): void {
    this.removals = this.removals.filter((removal) => at - removal.at <= this.windowMs);
  }
}

/**
 * Turns raw chokidar notifications into ChangeEvents
 */
export class ChangeTranslator {
  private renames: RenameTracker;

  constructor(windowMs: number = WATCHER_CONSTANTS.RENAME_WINDOW_MS) {
    this.renames = new RenameTracker(windowMs);
  }

  translate(eventName: ChokidarEventName, absolutePath: string, timestamp: number): ChangeEvent {
    const kind = KIND_BY_EVENT[eventName];

    if (kind === 'removed') {
      this.renames.recordRemoval(absolutePath, timestamp);
    } else if (kind === 'created') {
      const renamedFrom = this.renames.matchCreation(absolutePath, timestamp);
      if (renamedFrom) {
        return { path: absolutePath, kind: 'renamed', timestamp, previousPath: renamedFrom };
      }
    }

    return { path: absolutePath, kind, timestamp };
  }
}

/**
 * Recursive filesystem watcher over the configured roots. Raw chokidar
 * notifications are turned into ChangeEvents and handed out through an async
 * iterator; nothing here decides relevance beyond the `ignored` filter.
 */
export class FileWatcher implements ChangeSource {
  private watcher: ReturnType<typeof chokidar.watch>;
  private channel = new AsyncChannel<ChangeEvent>();
  private translator = new ChangeTranslator();
  private recoveryTimers = new Map<string, NodeJS.Timeout>();
  private readyPromise: Promise<void>;
  private readonly roots: Set<string>;
  private readonly logger: Logger;
  private readonly now: () => number;
  private closed = false;

  constructor(private options: FileWatcherOptions) {
    this.roots = new Set(options.watchPaths.map((root) => path.resolve(root)));
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? Date.now;

    const ignored = options.ignored;
    this.watcher = chokidar.watch(Array.from(this.roots), {
      ignoreInitial: true,
      persistent: true,
      ignored: ignored ? (filePath: string) => ignored(filePath) : undefined,
      usePolling: options.polling ?? false,
      interval: WATCHER_CONSTANTS.POLL_INTERVAL_MS,
    });

    this.readyPromise = new Promise<void>((resolve) => {
      this.watcher.once('ready', () => resolve());
    });

    this.attachEventHandlers();
  }

  private attachEventHandlers(): void {
    this.watcher.on('all', (eventName: ChokidarEventName, filePath: string) => this.handleFileEvent(eventName, filePath));
    this.watcher.on('error', (error: Error) => this.handleError(error));
  }

  private handleFileEvent(eventName: ChokidarEventName, filePath: string): void {
    if (this.closed) return;

    const event = this.translator.translate(eventName, path.resolve(filePath), this.now());
    if (event.kind === 'removed' && this.roots.has(event.path)) {
      this.handleRootRemoved(event.path);
    }
    this.channel.push(event);
  }

  /**
   * A removed root is re-added once it exists again; other roots keep working.
   */
  private handleRootRemoved(root: string): void {
    if (this.recoveryTimers.has(root)) return;

    this.logger.warn(`Watch path removed, waiting for it to reappear: ${root}`);
    const timer = setInterval(() => {
      if (!fs.existsSync(root)) return;

      clearInterval(timer);
      this.recoveryTimers.delete(root);
      if (this.closed) return;

      this.watcher.add(root);
      this.logger.info(`Watch path restored: ${root}`);
    }, WATCHER_CONSTANTS.ROOT_RECHECK_MS);
    timer.unref();
    this.recoveryTimers.set(root, timer);
  }

  /**
   * Log a watcher error with the path it concerns. Watching carries on.
   */
  handleError(error: unknown): void {
    const errorPath = getErrorProperty(error, 'path');
    const watchError = new WatchError(
      typeof errorPath === 'string' ? errorPath : undefined,
      `watch error: ${getErrorMessage(error)}`,
      { cause: error }
    );
    this.logger.warn(watchError.message, { code: getErrorCode(error) ?? null });
  }

  events(): AsyncIterableIterator<ChangeEvent> {
    return this.channel;
  }

  ready(): Promise<void> {
    return this.readyPromise;
  }

  getWatchedRoots(): string[] {
    return Array.from(this.roots);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    for (const timer of this.recoveryTimers.values()) {
      clearInterval(timer);
    }
    this.recoveryTimers.clear();

    await this.watcher.close();
    this.channel.close();
  }
}
