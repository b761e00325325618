/**
 * Progress Bar Command Protocol
 *
 * Commands sent from copy workers to the progress actor. Each kind carries
 * exactly one payload shape so the actor can switch over them exhaustively.
 */

/**
 * Command kinds understood by the progress actor
 */
export enum BarCommandKind {
  EXTEND = 'extend',
  PROGRESS = 'progress',
  FINISH = 'finish',
  ERROR_ON_WRITE = 'error_on_write',
  ERROR_ON_READ = 'error_on_read',
  SET_CAPTION = 'set_caption',
}

/**
 * Label rendered above the bar, usually a file path
 */
export interface Caption {
  readonly message: string
  /** Single character that splits the message into components */
  readonly separator: string
}

export interface ExtendCommand {
  readonly kind: BarCommandKind.EXTEND
  /** Bytes added to the running total */
  readonly total: number
}

export interface ProgressCommand {
  readonly kind: BarCommandKind.PROGRESS
  readonly delta: number
}

export interface FinishCommand {
  readonly kind: BarCommandKind.FINISH
}

/**
 * Bytes already counted as progress whose write to the destination failed
 */
export interface ErrorOnWriteCommand {
  readonly kind: BarCommandKind.ERROR_ON_WRITE
  readonly size: number
}

/**
 * Bytes of an abandoned source that will never be read
 */
export interface ErrorOnReadCommand {
  readonly kind: BarCommandKind.ERROR_ON_READ
  readonly size: number
}

export interface SetCaptionCommand {
  readonly kind: BarCommandKind.SET_CAPTION
  readonly caption: Caption
}

export type BarCommand =
  | ExtendCommand
  | ProgressCommand
  | FinishCommand
  | ErrorOnWriteCommand
  | ErrorOnReadCommand
  | SetCaptionCommand
