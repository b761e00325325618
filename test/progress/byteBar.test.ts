import { describe, it, expect, vi, afterEach } from 'vitest'
import type { Options, Params } from 'cli-progress'
import { ByteBar, formatBytes } from '../../src/progress/byteBar.js'
import type { ByteBarOptions } from '../../src/progress/byteBar.js'

function createBar(overrides: Partial<ByteBarOptions> = {}): { bar: ByteBar; frames: string[] } {
  const frames: string[] = []
  const bar = new ByteBar({
    refreshRate: 100,
    columns: () => 40,
    showSpeed: false,
    onRender: (line) => frames.push(line),
    ...overrides,
  })
  return { bar, frames }
}

describe('formatBytes', () => {
  it('should print small counts in bytes', () => {
    expect(formatBytes(0)).toBe('0 B')
    expect(formatBytes(1023)).toBe('1023 B')
  })

  it('should switch to binary units from 1024', () => {
    expect(formatBytes(1024)).toBe('1.00 KiB')
    expect(formatBytes(1536)).toBe('1.50 KiB')
    expect(formatBytes(1024 * 1024)).toBe('1.00 MiB')
    expect(formatBytes(5 * 1024 ** 3)).toBe('5.00 GiB')
  })

  it('should clamp invalid counts to zero', () => {
    expect(formatBytes(-5)).toBe('0 B')
    expect(formatBytes(Number.NaN)).toBe('0 B')
  })
})

describe('ByteBar', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  describe('counters', () => {
    it('should never go below zero', () => {
      const { bar } = createBar()

      bar.setTotal(-1)
      bar.add(-5)
      expect(bar.total).toBe(0)
      expect(bar.current).toBe(0)

      bar.add(10)
      bar.set(-3)
      expect(bar.current).toBe(0)
    })

    it('should track total and current', () => {
      const { bar } = createBar()

      bar.setTotal(100)
      bar.add(30)
      bar.add(5)
      bar.set(20)

      expect(bar.total).toBe(100)
      expect(bar.current).toBe(20)
    })
  })

  describe('formatBar', () => {
    it('should draw empty, partial and full bars', () => {
      const { bar } = createBar()

      expect(bar.formatBar(0, 12)).toBe('[          ]')
      expect(bar.formatBar(0.5, 12)).toBe('[====>     ]')
      expect(bar.formatBar(1, 12)).toBe('[==========]')
    })

    it('should use a custom style', () => {
      const { bar } = createBar()
      bar.format('[#- ]')

      expect(bar.formatBar(0.5, 7)).toBe('[##-  ]')
    })

    it('should ignore styles that are not five characters', () => {
      const { bar } = createBar()
      bar.format('<=>')

      expect(bar.formatBar(1, 5)).toBe('[===]')
    })

    it('should draw nothing without room for the box', () => {
      const { bar } = createBar()

      expect(bar.formatBar(0.5, 2)).toBe('')
      expect(bar.formatBar(0.5, 0)).toBe('')
    })
  })

  describe('toString', () => {
    it('should fill the width with the default formatter', () => {
      const { bar } = createBar()
      bar.setTotal(2048)
      bar.add(1024)

      const line = bar.toString()

      expect(line).toBe('1.00 KiB / 2.00 KiB [======>      ] 50%')
      expect(line.length).toBe(39)
    })

    it('should give the bar whatever the rest of the line leaves', () => {
      const formatter = vi.fn(
        (_options: Options, params: Params, _payload: Record<string, string>) =>
          `${params.value}/${params.total}`
      )
      const { bar } = createBar({ columns: () => 30, formatter })
      bar.setTotal(10)
      bar.add(5)

      expect(bar.toString()).toBe('5/10')
      expect(formatter).toHaveBeenCalledTimes(2)
      expect(formatter.mock.calls[0]?.[0].barsize).toBe(0)
      expect(formatter.mock.calls[1]?.[0].barsize).toBe(25)
    })

    it('should report speed and remaining time', () => {
      let now = 1000
      const formatter = vi.fn(
        (_options: Options, _params: Params, _payload: Record<string, string>) => ''
      )
      const { bar } = createBar({ formatter, showSpeed: true, now: () => now })
      bar.setTotal(4096)
      bar.start()

      now = 3000
      bar.add(2048)
      formatter.mockClear()
      bar.toString()

      const call = formatter.mock.calls[0]
      expect(call?.[2]).toEqual({ speed: '1.00 KiB/s' })
      expect(call?.[1].eta).toBe(2)
      expect(call?.[1].progress).toBe(0.5)
      bar.finish()
    })
  })

  describe('refresh', () => {
    it('should draw on start, on every interval and once on finish', () => {
      vi.useFakeTimers()
      const { bar, frames } = createBar({ refreshRate: 100 })
      bar.setTotal(100)

      bar.start()
      expect(frames).toHaveLength(1)
      expect(bar.isStarted).toBe(true)

      vi.advanceTimersByTime(250)
      expect(frames).toHaveLength(3)

      bar.finish()
      expect(frames).toHaveLength(4)

      vi.advanceTimersByTime(1000)
      bar.finish()
      expect(frames).toHaveLength(4)
    })

    it('should start only once', () => {
      vi.useFakeTimers()
      const { bar, frames } = createBar()

      bar.start()
      bar.start()
      vi.advanceTimersByTime(100)
      bar.finish()

      expect(frames).toHaveLength(3)
    })
  })
})
