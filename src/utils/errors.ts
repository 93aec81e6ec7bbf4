/**
 * Error taxonomy and safe accessors for unknown error values
 */

export const EXIT_CODES = {
  OK: 0,
  INTERNAL: 1,
  CONFIG: 78,
  SPAWN: 127,
} as const;

export type RelaunchErrorCode = 'CONFIG_ERROR' | 'SPAWN_ERROR' | 'WATCH_ERROR' | 'CHILD_EXIT';

export class RelaunchError extends Error {
  readonly code: RelaunchErrorCode;
  readonly exitCode: number;

  constructor(code: RelaunchErrorCode, message: string, exitCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
  }
}

/**
 * Invalid or unreadable configuration. Always fatal, raised before watching starts.
 */
export class ConfigError extends RelaunchError {
  constructor(message: string, readonly source?: string, options?: { cause?: unknown }) {
    super('CONFIG_ERROR', source ? `${message} (${source})` : message, EXIT_CODES.CONFIG, options);
  }
}

export class SpawnError extends RelaunchError {
  constructor(readonly command: string, readonly osCode: string | undefined, options?: { cause?: unknown }) {
    super(
      'SPAWN_ERROR',
      `failed to start "${command}"${osCode ? `: ${describeSpawnCode(osCode)}` : ''}`,
      EXIT_CODES.SPAWN,
      options
    );
  }
}

/**
 * A failure scoped to one watched path; logged, never fatal.
 */
export class WatchError extends RelaunchError {
  constructor(readonly path: string | undefined, message: string, options?: { cause?: unknown }) {
    super('WATCH_ERROR', path ? `${message} (${path})` : message, EXIT_CODES.INTERNAL, options);
  }
}

export class ChildExitError extends RelaunchError {
  constructor(readonly command: string, readonly exitStatus: { code: number | null; signal: NodeJS.Signals | null }) {
    super('CHILD_EXIT', `"${command}" ${describeExit(exitStatus)}`, exitStatus.code ?? EXIT_CODES.INTERNAL);
  }
}

function describeSpawnCode(code: string): string {
  switch (code) {
    case 'ENOENT':
      return 'executable not found (ENOENT)';
    case 'EACCES':
      return 'permission denied (EACCES)';
    default:
      return code;
  }
}

export function describeExit(status: { code: number | null; signal: NodeJS.Signals | null }): string {
  if (status.signal) {
    return `was killed by ${status.signal}`;
  }
  return `exited with code ${status.code ?? 'unknown'}`;
}

export interface ErrorLike {
  message?: unknown;
  code?: unknown;
  path?: unknown;
  [key: string]: unknown;
}

export function isErrorLike(value: unknown): value is ErrorLike {
  return typeof value === 'object' && value !== null;
}

export function getErrorMessage(error: unknown): string {
  if (isErrorLike(error) && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

export function getErrorProperty(error: unknown, key: string): unknown {
  if (isErrorLike(error) && key in error) {
    return error[key];
  }
  return undefined;
}

export function getErrorCode(error: unknown): string | undefined {
  const code = getErrorProperty(error, 'code');
  return typeof code === 'string' ? code : undefined;
}
