import { describe, it, expect, vi, beforeEach } from 'vitest'
import { ErrorHelper, toError } from '../../src/utils/errors.js'
import type { Command } from '@oclif/core'

class ExitError extends Error {
  constructor(public readonly code: number) {
    super(`EEXIT: ${code}`)
  }
}

describe('ErrorHelper', () => {
  let mockCommand: Command
  let mockLog: ReturnType<typeof vi.fn>
  let mockError: ReturnType<typeof vi.fn>
  let mockWarn: ReturnType<typeof vi.fn>
  let mockExit: ReturnType<typeof vi.fn>

  beforeEach(() => {
    mockLog = vi.fn()
    mockError = vi.fn()
    mockWarn = vi.fn()
    mockExit = vi.fn((code: number) => {
      throw new ExitError(code)
    })

    mockCommand = {
      log: mockLog,
      error: mockError,
      warn: mockWarn,
      exit: mockExit,
    } as unknown as Command
  })

  function lastLogged(): unknown {
    const call = mockLog.mock.calls.at(-1)
    return JSON.parse(String(call?.[0]))
  }

  describe('validation()', () => {
    it('should print a clean message and exit with 1', () => {
      expect(() =>
        ErrorHelper.validation(mockCommand, 'Missing target path', false)
      ).toThrow(ExitError)

      expect(mockError).toHaveBeenCalledWith('Missing target path', { exit: false })
      expect(mockExit).toHaveBeenCalledWith(1)
      expect(mockLog).not.toHaveBeenCalled()
    })

    it('should print JSON when json is set', () => {
      expect(() => ErrorHelper.validation(mockCommand, 'Missing target path', true)).toThrow(
        ExitError
      )

      expect(lastLogged()).toEqual({ status: 'error', error: 'Missing target path' })
      expect(mockError).not.toHaveBeenCalled()
    })

    it('should default to human output', () => {
      expect(() => ErrorHelper.validation(mockCommand, 'Bad value', undefined)).toThrow(ExitError)

      expect(mockError).toHaveBeenCalledWith('Bad value', { exit: false })
    })
  })

  describe('operation()', () => {
    it('should prefix the message with its context', () => {
      const error = new Error('ENOENT: no such file or directory, stat "missing.txt"')

      expect(() =>
        ErrorHelper.operation(mockCommand, error, 'Failed to scan sources', false)
      ).toThrow(ExitError)

      expect(mockError).toHaveBeenCalledWith(
        'Failed to scan sources: ENOENT: no such file or directory, stat "missing.txt"',
        { exit: false }
      )
      expect(mockExit).toHaveBeenCalledWith(1)
    })

    it('should split context and details in JSON mode', () => {
      expect(() =>
        ErrorHelper.operation(mockCommand, new Error('1 of 3 file(s) failed'), 'Copy incomplete', true)
      ).toThrow(ExitError)

      expect(lastLogged()).toEqual({
        status: 'error',
        error: 'Copy incomplete: 1 of 3 file(s) failed',
        context: 'Copy incomplete',
        details: '1 of 3 file(s) failed',
      })
    })
  })

  describe('warn()', () => {
    it('should warn without exiting', () => {
      ErrorHelper.warn(mockCommand, 'Nothing to copy', false)

      expect(mockWarn).toHaveBeenCalledWith('Nothing to copy')
      expect(mockLog).not.toHaveBeenCalled()
      expect(mockExit).not.toHaveBeenCalled()
    })

    it('should print JSON when json is set', () => {
      ErrorHelper.warn(mockCommand, 'Failed to parse .ferry.toml', true)

      expect(lastLogged()).toEqual({
        status: 'warning',
        warning: 'Failed to parse .ferry.toml',
      })
      expect(mockWarn).not.toHaveBeenCalled()
    })
  })
})

describe('toError', () => {
  it('should return errors unchanged', () => {
    const error = new TypeError('bad input')
    expect(toError(error)).toBe(error)
  })

  it('should wrap strings', () => {
    expect(toError('disk full').message).toBe('disk full')
  })

  it('should serialize other values', () => {
    expect(toError({ code: 28 }).message).toBe('{"code":28}')
  })
})
