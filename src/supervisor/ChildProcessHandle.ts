import type { ChildProcess } from 'child_process';
import type { Readable, Writable } from 'stream';
import type { ChildProcessHandle, ExitStatus } from './types.js';

/**
 * Listen for `exit` straight after spawn(), before anything is awaited, so
 * a short-lived child cannot exit unobserved. Node reaps the process before
 * emitting the event.
 */
export function observeExit(child: ChildProcess): Promise<ExitStatus> {
  return new Promise<ExitStatus>((resolve) => {
    child.once('exit', (code, signal) => resolve({ code, signal }));
  });
}

/**
 * ChildProcessHandle backed by a spawned Node ChildProcess
 */
export class SpawnedProcess implements ChildProcessHandle {
  readonly pid: number;
  readonly exited: Promise<ExitStatus>;
  private status: ExitStatus | null = null;

  constructor(private child: ChildProcess, pid: number, readonly command: string, exit: Promise<ExitStatus>) {
    this.pid = pid;
    this.exited = exit.then((status) => {
      this.status = status;
      return status;
    });
  }

  get stdin(): Writable | null {
    return this.child.stdin;
  }

  get stdout(): Readable | null {
    return this.child.stdout;
  }

  get stderr(): Readable | null {
    return this.child.stderr;
  }

  get exitStatus(): ExitStatus | null {
    return this.status;
  }

  get alive(): boolean {
    return this.status === null;
  }

  kill(signal: NodeJS.Signals): boolean {
    if (!this.alive) {
      return false;
    }
    return this.child.kill(signal);
  }
}
