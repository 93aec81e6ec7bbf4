export type ChangeKind = 'created' | 'modified' | 'removed' | 'renamed';

export interface ChangeEvent {
  /** Absolute path of the changed file or directory */
  path: string;
  kind: ChangeKind;
  timestamp: number;
  /** Set on `renamed` events */
  previousPath?: string;
}

/**
 * Emitted once per coalesced burst of relevant changes
 */
export interface RestartSignal {
  at: number;
  /** Distinct paths in the burst, for logging only */
  paths: readonly string[];
}

/**
 * A live source of change events, ended by close()
 */
export interface ChangeSource {
  events(): AsyncIterableIterator<ChangeEvent>;
  ready(): Promise<void>;
  close(): Promise<void>;
}
