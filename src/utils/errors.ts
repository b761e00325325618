import type { Command } from '@oclif/core'

/**
 * Error Helper Utility
 *
 * Centralized error handling for the Ferry CLI with stack trace control
 * and JSON output support.
 *
 * Usage Guidelines:
 * - Use `validation()` for expected user errors (missing arguments, bad values)
 * - Use `operation()` for runtime failures (unreadable sources, full disks)
 * - Use `warn()` for problems that do not stop the command
 *
 * @example
 * try {
 *   await planCopy(sources, target)
 * } catch (error) {
 *   ErrorHelper.operation(this, toError(error), 'Failed to scan sources', flags.json)
 * }
 */
export class ErrorHelper {
  /**
   * Handle validation errors (user input, preconditions, etc.)
   *
   * Displays a clean message without a stack trace and exits with code 1.
   *
   * @param command - The oclif command instance
   * @param message - User-facing error message
   * @param json - Whether to output JSON format (from --json flag)
   */
  static validation(command: Command, message: string, json?: boolean): never {
    if (json) {
      command.log(
        JSON.stringify(
          {
            status: 'error',
            error: message,
          },
          null,
          2
        )
      )
    } else {
      // Use { exit: false } to prevent stack trace display
      command.error(message, { exit: false })
    }
    return command.exit(1)
  }

  /**
   * Handle operation errors (runtime failures, external dependencies)
   *
   * The context names the operation that failed.
   *
   * @param command - The oclif command instance
   * @param error - The caught error
   * @param context - Description of what operation failed
   * @param json - Whether to output JSON format (from --json flag)
   */
  static operation(command: Command, error: Error, context: string, json?: boolean): never {
    const message = `${context}: ${error.message}`

    if (json) {
      command.log(
        JSON.stringify(
          {
            status: 'error',
            error: message,
            context,
            details: error.message,
          },
          null,
          2
        )
      )
    } else {
      command.error(message, { exit: false })
    }
    return command.exit(1)
  }

  /**
   * Warn the user without exiting
   *
   * @param command - The oclif command instance
   * @param message - Warning message
   * @param json - Whether to output JSON format (from --json flag)
   */
  static warn(command: Command, message: string, json?: boolean): void {
    if (json) {
      command.log(
        JSON.stringify(
          {
            status: 'warning',
            warning: message,
          },
          null,
          2
        )
      )
    } else {
      command.warn(message)
    }
  }
}

/**
 * Normalize a caught value into an Error
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error
  }
  return new Error(typeof error === 'string' ? error : JSON.stringify(error))
}
