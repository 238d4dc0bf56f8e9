/**
 * Tests for debug timing
 *
 * Tests:
 * - createTiming: disabled no-op, per-render batches, slow operation warnings
 * - Deferred slot and render timing through configure()
 */

import { describe, expect, it, vi } from 'vitest'

import { configure } from '~/core/config'
import { isInterpolationError } from '~/core/errors'
import { gstr } from '~/template/tag'
import {
  createTiming,
  type TimingEvent,
  type TimingSummary,
} from '~/utils/timing'

/** performance.now() advancing by `step` ms on every call */
const tickingClock = (step = 10) => {
  let now = 0
  return vi.spyOn(performance, 'now').mockImplementation(() => (now += step))
}

describe('createTiming', () => {
  it('should only run the function when disabled', () => {
    const onSlowOperation = vi.fn()
    const onSummary = vi.fn()
    const timing = createTiming({
      timing: false,
      timingThreshold: 0,
      onSlowOperation,
      onSummary,
    })

    const batch = timing.open()
    expect(batch.deferred(0, 'f', () => 42)).toBe(42)
    batch.close()

    expect(onSlowOperation).not.toHaveBeenCalled()
    expect(onSummary).not.toHaveBeenCalled()
  })

  it('should summarise deferred slots and the whole render', () => {
    tickingClock()
    const summaries: TimingSummary[] = []
    const timing = createTiming({
      timing: true,
      timingThreshold: 100,
      onSummary: (summary) => summaries.push(summary),
    })

    // open at 10, slot from 20 to 30, close at 40
    const batch = timing.open()
    batch.deferred(0, 'f', () => 1)
    batch.close()

    expect(summaries).toEqual([
      {
        renderDuration: 30,
        deferredDuration: 10,
        deferredCount: 1,
        slowOperations: [],
      },
    ])
  })

  it('should start every render with fresh totals', () => {
    tickingClock()
    const summaries: TimingSummary[] = []
    const timing = createTiming({
      timing: true,
      timingThreshold: 0,
      onSlowOperation: () => undefined,
      onSummary: (summary) => summaries.push(summary),
    })

    for (let i = 0; i < 2; i++) {
      const batch = timing.open()
      batch.deferred(0, 'f', () => i)
      batch.close()
    }

    expect(summaries.map((s) => s.deferredCount)).toEqual([1, 1])
    expect(summaries.map((s) => s.slowOperations.length)).toEqual([2, 2])
    expect(summaries[1]?.renderDuration).toBe(30)
  })

  it('should report slow operations once per slot', () => {
    tickingClock()
    const onSlowOperation = vi.fn()
    const timing = createTiming({
      timing: true,
      timingThreshold: 0,
      onSlowOperation,
      onSummary: () => undefined,
    })

    const batch = timing.open()
    batch.deferred(0, 'f', () => 1)
    batch.deferred(0, 'f', () => 1)
    batch.deferred(1, 'g', () => 1)
    batch.close()
    const again = timing.open()
    again.deferred(0, 'f', () => 1)
    again.close()

    expect(onSlowOperation.mock.calls.map(([event]) => [event.type, event.slot, event.name])).toEqual([
      ['deferred', 0, 'f'],
      ['deferred', 1, 'g'],
      ['render', -1, 'render'],
    ])
  })

  it('should not treat durations at the threshold as slow', () => {
    tickingClock()
    const onSlowOperation = vi.fn()
    const timing = createTiming({
      timing: true,
      timingThreshold: 10,
      onSlowOperation,
      onSummary: () => undefined,
    })

    const batch = timing.open()
    batch.deferred(0, 'f', () => 1)
    batch.close()

    expect(onSlowOperation).toHaveBeenCalledTimes(1)
    expect(onSlowOperation).toHaveBeenCalledWith(
      expect.objectContaining({ type: 'render', duration: 30, threshold: 10 }),
    )
  })

  it('should warn on the console by default', () => {
    tickingClock()
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    const timing = createTiming({ timing: true, timingThreshold: 0 })

    const batch = timing.open()
    batch.deferred(2, 'price', () => 1)
    batch.close()

    expect(warn.mock.calls).toEqual([
      [
        '[lazy-interpolated-string] Slow deferred: slot 2/price took 10.00ms (threshold: 0ms)',
      ],
      [
        '[lazy-interpolated-string] Slow render: slot -1/render took 30.00ms (threshold: 0ms)',
      ],
      [
        '[lazy-interpolated-string] render: 1 deferred slots in 10.00ms of 30.00ms (2 slow)',
      ],
    ])
  })
})

describe('configured timing', () => {
  it('should time named deferred slots during render', () => {
    tickingClock()
    const events: TimingEvent[] = []
    configure(
      { debug: { timing: true, timingThreshold: 0 } },
      { onSlowOperation: (event) => events.push(event), onSummary: () => undefined },
    )

    function price(): number {
      return 10
    }
    gstr`a${1}b${price}`.toString()

    expect(events.map((e) => [e.type, e.slot, e.name])).toEqual([
      ['deferred', 1, 'price'],
      ['render', -1, 'render'],
    ])
  })

  it('should summarise each render separately', () => {
    tickingClock()
    const summaries: TimingSummary[] = []
    configure(
      { debug: { timing: true, timingThreshold: 1000 } },
      { onSummary: (summary) => summaries.push(summary) },
    )

    const gs = gstr`${() => 'a'}${() => 'b'}`
    gs.toString()
    gs.toString()

    expect(summaries.map((s) => s.deferredCount)).toEqual([2, 2])
  })

  it('should keep hooks across later configure calls', () => {
    tickingClock()
    const onSlowOperation = vi.fn()
    configure(
      { debug: { timing: true, timingThreshold: 0 } },
      { onSlowOperation, onSummary: () => undefined },
    )
    configure({ nullText: '-' })

    gstr`${() => null}`.toString()

    expect(onSlowOperation).toHaveBeenCalledWith(
      expect.objectContaining({ type: 'deferred', slot: 0 }),
    )
  })

  it('should reject a negative threshold', () => {
    let caught: unknown
    try {
      configure({ debug: { timingThreshold: -1 } })
    } catch (error) {
      caught = error
    }
    expect(isInterpolationError(caught, 'INVALID_CONFIG')).toBe(true)
  })

  it('should not time anything by default', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    gstr`${() => 1}`.toString()
    expect(warn).not.toHaveBeenCalled()
  })
})
