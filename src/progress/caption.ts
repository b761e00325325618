import type { Caption } from './commands.js'

const ELLIPSIS = '...'

/**
 * Fit a caption into the available width
 *
 * Keeps the tail of the message, which for a path is its most specific
 * component. The visible part starts at a separator when one is found after
 * the ellipsis, dropping a half-cut leading component.
 *
 * The result is never longer than `width`.
 *
 * @example
 * trimBarCaption({ message: '/a/bb/ccc/dddd', separator: '/' }, 10) // '/dddd'
 */
export function trimBarCaption(caption: Caption, width: number): string {
  const { message, separator } = caption

  if (message.length <= width) {
    return message
  }

  if (width <= 0) {
    return ''
  }

  // Room for the ellipsis plus one column of slack
  const trimSize = message.length - width + ELLIPSIS.length + 1
  if (trimSize >= message.length) {
    // Too narrow for an ellipsis; show what fits of the tail
    return message.slice(message.length - width)
  }

  const trimmed = ELLIPSIS + message.slice(trimSize)

  // Further trim partial names
  const partialTrimSize = separator ? trimmed.indexOf(separator) : -1
  if (partialTrimSize > 0) {
    return trimmed.slice(partialTrimSize)
  }

  return trimmed
}
