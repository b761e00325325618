import cliProgress from 'cli-progress'
import type { Options, Params } from 'cli-progress'

/**
 * Byte Progress Bar Renderer
 *
 * A single-line bar measured in bytes. It never writes to the terminal
 * itself: every frame is handed to the render callback, which decides how
 * to place it on screen.
 */

/**
 * Renderer interface consumed by the progress actor
 */
export interface BarRenderer {
  readonly total: number
  readonly current: number
  readonly isStarted: boolean
  setTotal(total: number): void
  add(delta: number): void
  set(value: number): void
  start(): void
  finish(): void
  /** Width available for the caption and the bar */
  getWidth(): number
  /** Apply a five-character style: box start, fill, head, empty, box end */
  format(style: string): void
}

export type RenderCallback = (line: string) => void

/**
 * Turns a template plus bar parameters into one line of text
 */
export type LineFormatter = (
  options: Options,
  params: Params,
  payload: Record<string, string>
) => string

export interface ByteBarOptions {
  /** Minimum interval between redraws in milliseconds */
  refreshRate: number
  /** Invoked synchronously with each formatted frame */
  onRender: RenderCallback
  /** Terminal width provider */
  columns: () => number
  /** Append transfer speed to the line */
  showSpeed?: boolean
  /** Clock, in milliseconds */
  now?: () => number
  /** Line formatter; defaults to cli-progress's token formatter */
  formatter?: LineFormatter
}

/** Wget-like look */
export const DEFAULT_BAR_STYLE = '[=> ]'

const UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB', 'PiB']

/**
 * Format a byte count with binary units
 *
 * @example
 * formatBytes(1536) // '1.50 KiB'
 */
export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes < 1024) {
    return `${Math.max(0, Math.round(Number.isFinite(bytes) ? bytes : 0))} B`
  }

  let value = bytes
  let unit = 0
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024
    unit++
  }
  return `${value.toFixed(2)} ${UNITS[unit]}`
}

interface BarStyle {
  boxStart: string
  fill: string
  head: string
  empty: string
  boxEnd: string
}

const DEFAULT_STYLE: BarStyle = { boxStart: '[', fill: '=', head: '>', empty: ' ', boxEnd: ']' }

function parseStyle(style: string): BarStyle | null {
  const [boxStart, fill, head, empty, boxEnd, ...rest] = Array.from(style)
  if (!boxStart || !fill || !head || !empty || !boxEnd || rest.length > 0) {
    return null
  }
  return { boxStart, fill, head, empty, boxEnd }
}

export class ByteBar implements BarRenderer {
  private totalBytes = 0
  private value = 0
  private startTime = 0
  private started = false
  private finished = false
  private timer?: NodeJS.Timeout
  private style: BarStyle = DEFAULT_STYLE
  private readonly now: () => number
  private readonly formatter: LineFormatter

  constructor(private readonly options: ByteBarOptions) {
    this.now = options.now ?? Date.now
    this.formatter = options.formatter ?? cliProgress.Format.Formatter
  }

  get total(): number {
    return this.totalBytes
  }

  get current(): number {
    return this.value
  }

  get isStarted(): boolean {
    return this.started
  }

  setTotal(total: number): void {
    this.totalBytes = Math.max(0, total)
  }

  add(delta: number): void {
    this.value = Math.max(0, this.value + delta)
  }

  set(value: number): void {
    this.value = Math.max(0, value)
  }

  /**
   * Start the refresh timer and draw the first frame
   */
  start(): void {
    if (this.started) {
      return
    }
    this.started = true
    this.startTime = this.now()
    this.render()

    this.timer = setInterval(() => this.render(), this.options.refreshRate)
    // A parked bar must not hold the process open
    this.timer.unref()
  }

  /**
   * Stop refreshing and draw the final frame
   */
  finish(): void {
    if (this.finished) {
      return
    }
    this.finished = true
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = undefined
    }
    this.render()
  }

  getWidth(): number {
    return Math.max(0, this.options.columns())
  }

  format(style: string): void {
    const parsed = parseStyle(style)
    if (parsed) {
      this.style = parsed
    }
  }

  /**
   * Format the current frame and pass it to the render callback
   */
  render(): void {
    this.options.onRender(this.toString())
  }

  toString(): string {
    const width = this.getWidth()
    const elapsedSeconds = this.started ? (this.now() - this.startTime) / 1000 : 0
    const speed = elapsedSeconds > 0 ? this.value / elapsedSeconds : 0
    const remaining = Math.max(0, this.totalBytes - this.value)

    const params: Params = {
      progress: this.totalBytes > 0 ? Math.min(this.value / this.totalBytes, 1) : 0,
      eta: speed > 0 ? Math.round(remaining / speed) : 0,
      startTime: this.startTime,
      stopTime: null,
      total: this.totalBytes,
      value: this.value,
      maxWidth: width,
    }
    const payload = { speed: `${formatBytes(speed)}/s` }

    // Measure everything but the bar, then give the bar what is left
    const withoutBar = this.formatter(this.lineOptions(0), params, payload)
    const barSize = Math.max(0, width - withoutBar.length - 1)
    return this.formatter(this.lineOptions(barSize), params, payload)
  }

  private lineOptions(barSize: number): Options {
    const template = this.options.showSpeed
      ? '{value} / {total} {bar} {percentage}% {speed} {eta_formatted}'
      : '{value} / {total} {bar} {percentage}%'

    return {
      format: template,
      barsize: barSize,
      autopaddingChar: '0',
      formatBar: (progress: number) => this.formatBar(progress, barSize),
      formatValue: (value: number, _options: Options, type: string) =>
        type === 'value' || type === 'total' ? formatBytes(value) : String(value),
    }
  }

  /**
   * Draw the bar body: `[=====>    ]`
   */
  formatBar(progress: number, size: number): string {
    const { boxStart, fill, head, empty, boxEnd } = this.style
    const inner = size - 2
    if (inner <= 0) {
      return ''
    }

    const filled = Math.min(inner, Math.max(0, Math.round(progress * inner)))
    if (filled === 0) {
      return boxStart + empty.repeat(inner) + boxEnd
    }
    if (filled === inner) {
      return boxStart + fill.repeat(inner) + boxEnd
    }
    return boxStart + fill.repeat(filled - 1) + head + empty.repeat(inner - filled) + boxEnd
  }
}
