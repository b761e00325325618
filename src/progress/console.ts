/**
 * Console sinks for the progress bar
 *
 * The progress actor is the only writer; sinks do no synchronization of
 * their own.
 */

/** Column count assumed when the stream cannot report one */
export const DEFAULT_COLUMNS = 80

export interface ConsoleSink {
  /** Write raw text, ANSI sequences included */
  write(text: string): void
  /** Current terminal width in columns */
  columns(): number
}

/**
 * The parts of a tty stream the sink uses
 */
export interface TerminalStream {
  write(text: string): unknown
  columns?: number
  isTTY?: boolean
}

/**
 * Writes to a terminal stream (stdout by default)
 */
export class TerminalSink implements ConsoleSink {
  constructor(private readonly stream: TerminalStream = process.stdout) {}

  write(text: string): void {
    this.stream.write(text)
  }

  columns(): number {
    return this.stream.columns || DEFAULT_COLUMNS
  }

  /**
   * Whether the stream is an interactive terminal
   */
  isInteractive(): boolean {
    return Boolean(this.stream.isTTY)
  }
}

/**
 * Discards everything. Used when stdout is not a terminal or JSON output
 * was requested.
 */
export class SilentSink implements ConsoleSink {
  write(_text: string): void {}

  columns(): number {
    return DEFAULT_COLUMNS
  }
}

/**
 * Pick the sink for a run
 */
export function createConsoleSink(options: { silent?: boolean } = {}): ConsoleSink {
  const terminal = new TerminalSink()
  if (options.silent || !terminal.isInteractive()) {
    return new SilentSink()
  }
  return terminal
}
