import { ByteBar, DEFAULT_BAR_STYLE } from './byteBar.js'
import type { BarRenderer, RenderCallback } from './byteBar.js'
import { trimBarCaption } from './caption.js'
import { Channel, ChannelClosedError } from './channel.js'
import { BarCommandKind } from './commands.js'
import type { BarCommand, Caption } from './commands.js'
import { createConsoleSink } from './console.js'
import type { ConsoleSink } from './console.js'
import { ProgressReader } from './reader.js'
import type { ProgressReporter } from './reader.js'

/**
 * Copy Progress Bar
 *
 * Any number of copy workers report through a shared `CopyBar` handle. A
 * single actor loop consumes their commands in arrival order and is the only
 * code that touches progress state or writes to the console.
 */

/** Move the cursor one line up */
export const CURSOR_UP = '\u001b[1A'

/**
 * Options for creating a copy progress bar
 */
export interface CopyBarOptions {
  /** Where frames are written (defaults to stdout, silent when not a TTY) */
  sink?: ConsoleSink
  /** Minimum interval between redraws in milliseconds */
  refreshRate?: number
  /** Five-character bar style */
  style?: string
  /** Show transfer speed */
  showSpeed?: boolean
  /** Renderer factory; defaults to a ByteBar sized to the sink */
  createRenderer?: (onRender: RenderCallback, sink: ConsoleSink) => BarRenderer
}

/** Default minimum redraw interval */
export const DEFAULT_REFRESH_RATE = 100

/**
 * Progress state owned by the actor loop
 */
interface ProgressState {
  total: number
  current: number
  started: boolean
  /** Next frame must repaint from a fresh line */
  redraw: boolean
  caption: string
}

/**
 * Handle used by producers to talk to the progress actor
 */
export class CopyBar implements ProgressReporter {
  private finishing?: Promise<void>
  private failure?: unknown
  private readonly stopped: Promise<void>

  constructor(
    private readonly commands: Channel<BarCommand>,
    done: Promise<void>
  ) {
    // A failed actor receives nothing more; release every waiting producer
    this.stopped = done.catch((error: unknown) => {
      this.failure = error ?? new Error('progress bar stopped')
      this.commands.close()
    })
  }

  /**
   * Grow the expected total by `total` bytes
   */
  extend(total: number): Promise<void> {
    return this.commands.send({ kind: BarCommandKind.EXTEND, total })
  }

  /**
   * Report `delta` bytes as transferred
   */
  progress(delta: number): Promise<void> {
    return this.commands.send({ kind: BarCommandKind.PROGRESS, delta })
  }

  /**
   * Roll back `size` bytes that were counted but failed to write
   */
  errorOnWrite(size: number): Promise<void> {
    return this.commands.send({ kind: BarCommandKind.ERROR_ON_WRITE, size })
  }

  /**
   * Account for `size` bytes of a source that will not be read
   */
  errorOnRead(size: number): Promise<void> {
    return this.commands.send({ kind: BarCommandKind.ERROR_ON_READ, size })
  }

  setCaption(caption: Caption): Promise<void> {
    return this.commands.send({ kind: BarCommandKind.SET_CAPTION, caption })
  }

  /**
   * Stop the actor
   *
   * Resolves once the final frame is drawn. All producers must have stopped
   * sending before this is called. Rejects with the actor's error if it
   * failed while drawing.
   */
  finish(): Promise<void> {
    if (!this.finishing) {
      this.finishing = this.shutdown()
    }
    return this.finishing
  }

  /**
   * Wrap a byte source so everything read from it counts as progress
   */
  newProxyReader(source: AsyncIterable<Uint8Array>): ProgressReader {
    return new ProgressReader(source, this)
  }

  private async shutdown(): Promise<void> {
    try {
      await this.commands.send({ kind: BarCommandKind.FINISH })
    } catch (error) {
      // Closed because the actor already failed
      if (!(error instanceof ChannelClosedError)) {
        throw error
      }
    }

    await this.stopped
    this.commands.close()

    if (this.failure !== undefined) {
      throw this.failure
    }
  }
}

/**
 * Create a copy progress bar with its actor already running
 */
export function newCopyBar(options: CopyBarOptions = {}): CopyBar {
  const sink = options.sink ?? createConsoleSink()
  const commands = new Channel<BarCommand>()

  const createRenderer =
    options.createRenderer ??
    ((onRender: RenderCallback, target: ConsoleSink) =>
      new ByteBar({
        refreshRate: options.refreshRate ?? DEFAULT_REFRESH_RATE,
        showSpeed: options.showSpeed ?? true,
        columns: () => target.columns(),
        onRender,
      }))

  const done = runCopyBar(commands, sink, createRenderer, options.style ?? DEFAULT_BAR_STYLE)
  return new CopyBar(commands, done)
}

/**
 * Actor loop: apply commands one at a time until Finish or close
 */
async function runCopyBar(
  commands: Channel<BarCommand>,
  sink: ConsoleSink,
  createRenderer: NonNullable<CopyBarOptions['createRenderer']>,
  style: string
): Promise<void> {
  const state: ProgressState = {
    total: 0,
    current: 0,
    started: false,
    redraw: false,
    caption: '',
  }

  const bar = createRenderer((line) => {
    if (state.redraw) {
      sink.write('\n')
    }
    // Clear the caption line
    sink.write('\r' + CURSOR_UP + ' '.repeat(line.length) + '\r')
    // Print the caption and the progress bar
    sink.write(state.caption + '\n' + line)
    state.redraw = false
  }, sink)
  bar.format(style)

  for await (const command of commands) {
    switch (command.kind) {
      case BarCommandKind.SET_CAPTION:
        state.caption = trimBarCaption(command.caption, bar.getWidth())
        break

      case BarCommandKind.EXTEND:
        if (command.total > 0) {
          state.total += command.total
          bar.setTotal(state.total)
        }
        break

      case BarCommandKind.PROGRESS:
        if (state.total > 0 && !state.started) {
          state.started = true
          state.redraw = true
          bar.start()
        }
        if (command.delta > 0) {
          state.current += command.delta
          bar.add(command.delta)
        }
        break

      case BarCommandKind.ERROR_ON_WRITE:
        state.redraw = true
        if (command.size > 0 && state.current > command.size) {
          state.current -= command.size
          bar.set(state.current)
        }
        break

      case BarCommandKind.ERROR_ON_READ:
        state.redraw = true
        if (command.size > 0) {
          state.current += command.size
          bar.add(command.size)
        }
        break

      case BarCommandKind.FINISH:
        if (state.started) {
          bar.finish()
        }
        return

      default:
        assertNever(command)
    }
  }
}

function assertNever(command: never): never {
  throw new Error(`Unhandled bar command: ${JSON.stringify(command)}`)
}
