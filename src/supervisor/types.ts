import type { Readable, Writable } from 'stream';
import type { LaunchCommand } from '../config/types.js';

export interface ExitStatus {
  /** Null when the process was terminated by a signal */
  code: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * A live (or finished) child process owned by the supervisor
 */
export interface ChildProcessHandle {
  readonly pid: number;
  /** Printable command line */
  readonly command: string;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  /** Set once the exit has been observed and the process reaped */
  readonly exitStatus: ExitStatus | null;
  /** Resolves with the exit status; never rejects */
  readonly exited: Promise<ExitStatus>;
  readonly alive: boolean;
  kill(signal: NodeJS.Signals): boolean;
}

export interface Supervisor {
  start(command: LaunchCommand): Promise<ChildProcessHandle>;
  stop(handle: ChildProcessHandle, timeoutMs: number, signal?: NodeJS.Signals): Promise<ExitStatus>;
  forward(handle: ChildProcessHandle): void;
  input(chunk: string | Buffer): boolean;
}
