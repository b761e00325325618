import { describe, it, expect } from 'vitest'
import { ChannelClosedError } from '../../src/progress/channel.js'
import { CURSOR_UP, newCopyBar } from '../../src/progress/copyBar.js'
import type { CopyBar } from '../../src/progress/copyBar.js'
import { FakeRenderer, MemorySink, chunksOf, flush } from '../helpers/test-utils.js'

/**
 * Tests for the progress actor and its handle
 *
 * A FakeRenderer stands in for the terminal bar so the actor's state
 * changes can be read back directly.
 */

function setup(options: { width?: number; style?: string } = {}): {
  bar: CopyBar
  sink: MemorySink
  renderer: () => FakeRenderer
} {
  const sink = new MemorySink(options.width)
  let created: FakeRenderer | undefined

  const bar = newCopyBar({
    sink,
    style: options.style,
    createRenderer: (onRender) => {
      created = new FakeRenderer(onRender, options.width)
      return created
    },
  })

  return {
    bar,
    sink,
    renderer: () => {
      if (!created) {
        throw new Error('renderer was not created')
      }
      return created
    },
  }
}

describe('newCopyBar', () => {
  describe('extend', () => {
    it('should sum every extension into the total', async () => {
      const { bar, renderer } = setup()

      await bar.extend(100)
      await bar.extend(50)
      await bar.progress(10)
      await bar.extend(25)
      await bar.finish()

      expect(renderer().total).toBe(175)
    })

    it('should ignore non-positive extensions', async () => {
      const { bar, renderer } = setup()

      await bar.extend(40)
      await bar.extend(0)
      await bar.extend(-10)
      await bar.finish()

      expect(renderer().total).toBe(40)
    })
  })

  describe('progress', () => {
    it('should accumulate deltas and start exactly once', async () => {
      const { bar, renderer } = setup()

      await bar.extend(100)
      await bar.progress(10)
      await bar.progress(0)
      await bar.progress(20)
      await bar.finish()

      expect(renderer().current).toBe(30)
      expect(renderer().startCalls).toBe(1)
      expect(renderer().finishCalls).toBe(1)
    })

    it('should not start before there is a total', async () => {
      const { bar, renderer } = setup()

      await bar.progress(5)
      await flush()
      expect(renderer().startCalls).toBe(0)

      await bar.extend(10)
      await bar.progress(1)
      await flush()
      expect(renderer().startCalls).toBe(1)

      await bar.finish()
      expect(renderer().current).toBe(6)
    })

    it('should ignore negative deltas', async () => {
      const { bar, renderer } = setup()

      await bar.extend(10)
      await bar.progress(4)
      await bar.progress(-3)
      await bar.finish()

      expect(renderer().current).toBe(4)
    })
  })

  describe('errorOnWrite', () => {
    it('should roll back the failed size', async () => {
      const { bar, renderer } = setup()

      await bar.extend(100)
      await bar.progress(60)
      await bar.errorOnWrite(25)
      await bar.finish()

      expect(renderer().current).toBe(35)
      expect(renderer().setCalls).toEqual([35])
    })

    it('should never go below zero', async () => {
      const { bar, renderer } = setup()

      await bar.extend(100)
      await bar.progress(20)
      await bar.errorOnWrite(20)
      await bar.errorOnWrite(50)
      await bar.errorOnWrite(-5)
      await bar.finish()

      expect(renderer().current).toBe(20)
      expect(renderer().setCalls).toEqual([])
    })
  })

  describe('errorOnRead', () => {
    it('should advance by the skipped size', async () => {
      const { bar, renderer } = setup()

      await bar.extend(100)
      await bar.progress(30)
      await bar.errorOnRead(15)
      await bar.errorOnRead(0)
      await bar.finish()

      expect(renderer().current).toBe(45)
    })
  })

  describe('rendering', () => {
    it('should repaint from a fresh line after starting', async () => {
      const { bar, sink } = setup()

      await bar.extend(100)
      await bar.progress(10)
      await bar.finish()

      const line = '10/100'
      expect(sink.output).toBe(
        '\n' + '\r' + CURSOR_UP + ' '.repeat(line.length) + '\r' + '\n' + line
      )
    })

    it('should only emit the leading newline while a redraw is pending', async () => {
      const { bar, sink, renderer } = setup()

      await bar.extend(100)
      await bar.progress(10)
      await flush()
      renderer().tick()
      renderer().tick()

      expect(sink.writes.filter((text) => text === '\n')).toHaveLength(1)

      await bar.errorOnWrite(5)
      await flush()
      renderer().tick()
      await bar.finish()

      expect(sink.writes.filter((text) => text === '\n')).toHaveLength(2)
    })

    it('should print the trimmed caption above the bar', async () => {
      const { bar, sink, renderer } = setup({ width: 10 })

      await bar.extend(100)
      await bar.setCaption({ message: '/a/bb/ccc/dddd', separator: '/' })
      await bar.progress(50)
      await flush()
      renderer().tick()

      expect(sink.writes.at(-1)).toBe('/dddd\n50/100')
      await bar.finish()
    })

    it('should show only the latest caption', async () => {
      const { bar, sink, renderer } = setup()

      await bar.extend(10)
      await bar.setCaption({ message: 'first.txt', separator: '/' })
      await bar.setCaption({ message: 'second.txt', separator: '/' })
      await bar.progress(1)
      await flush()
      renderer().tick()

      expect(sink.writes.at(-1)).toBe('second.txt\n1/10')
      await bar.finish()
    })

    it('should pass the configured style to the renderer', async () => {
      const { bar, renderer } = setup({ style: '[#> ]' })
      await bar.finish()

      expect(renderer().style).toBe('[#> ]')
    })
  })

  describe('finish', () => {
    it('should resolve without drawing when never started', async () => {
      const { bar, sink, renderer } = setup()

      await bar.finish()

      expect(renderer().finishCalls).toBe(0)
      expect(sink.output).toBe('')
    })

    it('should return the same promise when called again', async () => {
      const { bar } = setup()

      const first = bar.finish()
      expect(bar.finish()).toBe(first)
      await first
    })

    it('should reject further commands', async () => {
      const { bar } = setup()
      await bar.finish()

      await expect(bar.extend(1)).rejects.toBeInstanceOf(ChannelClosedError)
    })
  })

  describe('actor failure', () => {
    class BrokenRenderer extends FakeRenderer {
      start(): void {
        throw new Error('terminal gone')
      }
    }

    it('should release producers and report the error from finish', async () => {
      const sink = new MemorySink()
      const bar = newCopyBar({
        sink,
        createRenderer: (onRender) => new BrokenRenderer(onRender),
      })

      await bar.extend(10)
      await bar.progress(1)
      await flush()

      await expect(bar.progress(1)).rejects.toBeInstanceOf(ChannelClosedError)
      await expect(bar.finish()).rejects.toThrow('terminal gone')
      expect(sink.output).toBe('')
    })

    it('should reject a producer already waiting when the actor fails', async () => {
      const bar = newCopyBar({
        sink: new MemorySink(),
        createRenderer: (onRender) => new BrokenRenderer(onRender),
      })
      await bar.extend(10)

      const results = await Promise.allSettled([bar.progress(1), bar.progress(2)])

      expect(results[0]?.status).toBe('fulfilled')
      expect(results[1]?.status).toBe('rejected')
      await expect(bar.finish()).rejects.toThrow('terminal gone')
    })
  })

  describe('concurrent producers', () => {
    it('should aggregate progress from many producers exactly', async () => {
      const { bar, renderer } = setup()
      const producers = 12
      const reportsPerProducer = 100

      await Promise.all(
        Array.from({ length: producers }, async (_, id) => {
          await bar.extend(reportsPerProducer * 3)
          for (let i = 0; i < reportsPerProducer; i++) {
            await bar.progress(3)
            if (i % 10 === id % 10) {
              await bar.setCaption({ message: `worker-${id}/file-${i}`, separator: '/' })
            }
          }
        })
      )
      await bar.finish()

      expect(renderer().total).toBe(producers * reportsPerProducer * 3)
      expect(renderer().current).toBe(producers * reportsPerProducer * 3)
      expect(renderer().startCalls).toBe(1)
    })
  })

  describe('newProxyReader', () => {
    it('should report bytes read through the proxy', async () => {
      const { bar, renderer } = setup()
      await bar.extend(9)

      const reader = bar.newProxyReader(chunksOf('abcd', 'efghi'))
      const chunks: Uint8Array[] = []
      for await (const chunk of reader) {
        chunks.push(chunk)
      }
      await bar.finish()

      expect(Buffer.concat(chunks).toString()).toBe('abcdefghi')
      expect(renderer().current).toBe(9)
    })
  })
})
