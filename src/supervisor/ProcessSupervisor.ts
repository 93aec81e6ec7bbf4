import { spawn, type ChildProcess } from 'child_process';
import type { Writable } from 'stream';
import { PROCESS_CONSTANTS } from '../config/constants.js';
import { formatCommand } from '../config/resolver.js';
import type { LaunchCommand } from '../config/types.js';
import { describeExit, getErrorCode, getErrorMessage, SpawnError } from '../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { observeExit, SpawnedProcess } from './ChildProcessHandle.js';
import type { ChildProcessHandle, ExitStatus, Supervisor } from './types.js';

export interface ProcessSupervisorOptions {
  stdout?: Writable;
  stderr?: Writable;
  /** Pipe the child's stdin so input can be forwarded; otherwise it is ignored */
  forwardStdin?: boolean;
  logger?: Logger;
}

/**
 * Resolves once the OS has created the process, rejects with SpawnError when
 * it refuses (missing executable, permissions).
 */
function waitForSpawn(child: ChildProcess, printable: string): Promise<number> {
  return new Promise<number>((resolve, reject) => {
    const onSpawn = (): void => {
      child.off('error', onError);
      if (child.pid === undefined) {
        reject(new SpawnError(printable, undefined));
        return;
      }
      resolve(child.pid);
    };
    const onError = (error: Error): void => {
      child.off('spawn', onSpawn);
      reject(new SpawnError(printable, getErrorCode(error), { cause: error }));
    };

    child.once('spawn', onSpawn);
    child.once('error', onError);
  });
}

function waitWithTimeout(exited: Promise<ExitStatus>, timeoutMs: number): Promise<ExitStatus | null> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<null>((resolve) => {
    timer = setTimeout(() => resolve(null), timeoutMs);
  });

  return Promise.race([exited, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Owns child process creation and teardown. One supervisor may start many
 * children over its life, but the restart controller only ever keeps one alive.
 */
export class ProcessSupervisor implements Supervisor {
  private stdinTarget: ChildProcessHandle | null = null;
  private readonly stdout: Writable;
  private readonly stderr: Writable;
  private readonly logger: Logger;

  constructor(private options: ProcessSupervisorOptions = {}) {
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
    this.logger = options.logger ?? defaultLogger;
  }

  async start(command: LaunchCommand): Promise<ChildProcessHandle> {
    const printable = formatCommand(command);

    let child: ChildProcess;
    try {
      child = spawn(command.executable, command.args, {
        cwd: command.cwd,
        env: command.env,
        stdio: [this.options.forwardStdin ? 'pipe' : 'ignore', 'pipe', 'pipe'],
      });
    } catch (error) {
      // spawn throws synchronously for invalid arguments (e.g. a NUL byte)
      throw new SpawnError(printable, getErrorCode(error) ?? getErrorMessage(error), { cause: error });
    }

    const exit = observeExit(child);
    const pid = await waitForSpawn(child, printable);
    const handle = new SpawnedProcess(child, pid, printable, exit);

    child.on('error', (error) => {
      this.logger.warn(`Child process error: ${getErrorMessage(error)}`, { pid, command: printable });
    });
    child.stdin?.on('error', (error) => {
      // EPIPE once the child has gone; input is best effort
      this.logger.debug(`Child stdin closed: ${getErrorMessage(error)}`, { pid });
    });

    void handle.exited.then((status) => {
      this.logger.debug(`Child ${pid} ${describeExit(status)}`, { code: status.code, signal: status.signal });
      if (this.stdinTarget === handle) {
        this.stdinTarget = null;
      }
    });

    this.logger.debug(`Started child ${pid}`, { command: printable });
    return handle;
  }

  /**
   * Graceful-then-forceful termination. Resolves once the exit has been
   * observed, so the process table entry is gone when this returns.
   */
  async stop(
    handle: ChildProcessHandle,
    timeoutMs: number,
    signal: NodeJS.Signals = PROCESS_CONSTANTS.DEFAULT_STOP_SIGNAL
  ): Promise<ExitStatus> {
    if (handle.exitStatus) {
      return handle.exitStatus;
    }

    this.logger.debug(`Sending ${signal} to child ${handle.pid}`);
    handle.kill(signal);

    const graceful = await waitWithTimeout(handle.exited, timeoutMs);
    if (graceful) {
      return graceful;
    }

    this.logger.warn(`Child ${handle.pid} did not exit within ${timeoutMs}ms, sending SIGKILL`, {
      command: handle.command,
    });
    handle.kill('SIGKILL');
    return handle.exited;
  }

  /**
   * Wire the child's output to ours and route forwarded input to it
   */
  forward(handle: ChildProcessHandle): void {
    handle.stdout?.pipe(this.stdout, { end: false });
    handle.stderr?.pipe(this.stderr, { end: false });
    this.stdinTarget = handle;
  }

  input(chunk: string | Buffer): boolean {
    const target = this.stdinTarget;
    if (!target || !target.alive || !target.stdin || target.stdin.destroyed) {
      return false;
    }
    target.stdin.write(chunk);
    return true;
  }
}
