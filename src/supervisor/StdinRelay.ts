import type { Readable } from 'stream';

export interface StdinRelayOptions {
  input: Readable;
  /** Line that requests a manual restart; null disables the hotkey */
  restartable: string | null;
  onRestart: () => void;
  /** Receives all input except lines that are the restart token */
  onInput?: (chunk: string | Buffer) => void;
}

/**
 * Reads the supervisor's stdin: a line holding the restartable token triggers
 * a manual restart, anything else is handed on to the child.
 */
export class StdinRelay {
  private attached = false;
  private readonly onData = (chunk: string | Buffer): void => this.handleChunk(chunk);

  constructor(private options: StdinRelayOptions) {}

  start(): void {
    if (this.attached) return;
    this.attached = true;
    this.options.input.on('data', this.onData);
    this.options.input.resume();
  }

  private handleChunk(chunk: string | Buffer): void {
    const token = this.options.restartable;
    if (token === null) {
      this.options.onInput?.(chunk);
      return;
    }

    // Piped input can carry several lines per chunk; each line keeps its newline
    const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8');
    const lines = text.split(/(?<=\n)/);
    if (!lines.some((line) => line.trim() === token)) {
      this.options.onInput?.(chunk);
      return;
    }

    let pending = '';
    for (const line of lines) {
      if (line.trim() !== token) {
        pending += line;
        continue;
      }
      if (pending) {
        this.options.onInput?.(pending);
        pending = '';
      }
      this.options.onRestart();
    }
    if (pending) {
      this.options.onInput?.(pending);
    }
  }

  stop(): void {
    if (!this.attached) return;
    this.attached = false;
    this.options.input.off('data', this.onData);
    this.options.input.pause();
  }
}
