/**
 * Ferry - parallel file copy with a terminal progress bar
 *
 * Main entry point and exports for the ferry CLI application.
 */

export { run } from '@oclif/core'

// Progress bar API for programmatic usage
export { newCopyBar, CopyBar, DEFAULT_REFRESH_RATE } from './progress/copyBar.js'
export type { CopyBarOptions } from './progress/copyBar.js'
export { ProgressReader } from './progress/reader.js'
export type { ProgressReporter } from './progress/reader.js'
export { trimBarCaption } from './progress/caption.js'
export { BarCommandKind } from './progress/commands.js'
export type { BarCommand, Caption } from './progress/commands.js'
export { ByteBar, formatBytes } from './progress/byteBar.js'
export type { BarRenderer } from './progress/byteBar.js'
export { TerminalSink, SilentSink } from './progress/console.js'
export type { ConsoleSink, TerminalStream } from './progress/console.js'
export { Channel, ChannelClosedError } from './progress/channel.js'

// Copy engine
export * from './utils/copy.js'
