/**
 * Debug Timing Utilities
 *
 * Every render opens its own batch: the batch times the render's deferred
 * slots and the render as a whole, and closing it hands the totals to the
 * summary callback. Batches hold no state once closed.
 */

type TimingType = 'deferred' | 'render'

export interface TimingEvent {
  type: TimingType
  /** Value slot index; -1 for a whole render */
  slot: number
  name: string
  duration: number
  threshold: number
}

export interface TimingSummary {
  /** Whole render, deferred slots included */
  renderDuration: number
  deferredDuration: number
  deferredCount: number
  slowOperations: TimingEvent[]
}

export type OnSlowOperation = (event: TimingEvent) => void
export type OnTimingSummary = (summary: TimingSummary) => void

const PREFIX = '[lazy-interpolated-string]'

const defaultOnSlowOperation: OnSlowOperation = (event) => {
  console.warn(
    `${PREFIX} Slow ${event.type}: slot ${String(event.slot)}/${event.name} took ${event.duration.toFixed(2)}ms (threshold: ${String(event.threshold)}ms)`,
  )
}

const defaultOnTimingSummary: OnTimingSummary = (summary) => {
  if (summary.slowOperations.length > 0) {
    console.warn(
      `${PREFIX} render: ${String(summary.deferredCount)} deferred slots in ${summary.deferredDuration.toFixed(2)}ms of ${summary.renderDuration.toFixed(2)}ms (${String(summary.slowOperations.length)} slow)`,
    )
  }
}

/** Timing scope of a single render */
export interface RenderBatch {
  deferred: <T>(slot: number, name: string, fn: () => T) => T
  close: () => void
}

export interface Timing {
  open: () => RenderBatch
}

export interface TimingConfig {
  timing: boolean
  timingThreshold: number
  onSlowOperation?: OnSlowOperation
  onSummary?: OnTimingSummary
}

const NOOP_BATCH: RenderBatch = {
  deferred: (_slot, _name, fn) => fn(),
  close: () => {
    // Do nothing
  },
}

const NOOP_TIMING: Timing = { open: () => NOOP_BATCH }

/**
 * Create a timing instance.
 * If timing is disabled, every batch is a no-op.
 *
 * Slow operations are reported once per `type:slot:name` for the lifetime
 * of the instance; summaries are reported for every batch.
 */
export const createTiming = (options: TimingConfig): Timing => {
  const {
    timing,
    timingThreshold,
    onSlowOperation = defaultOnSlowOperation,
    onSummary = defaultOnTimingSummary,
  } = options

  if (!timing) return NOOP_TIMING

  const warned = new Set<string>()

  const open = (): RenderBatch => {
    const start = performance.now()
    const slowOperations: TimingEvent[] = []
    let deferredDuration = 0
    let deferredCount = 0

    const check = (
      type: TimingType,
      slot: number,
      name: string,
      duration: number,
    ): void => {
      if (duration <= timingThreshold) return
      const event: TimingEvent = {
        type,
        slot,
        name,
        duration,
        threshold: timingThreshold,
      }
      slowOperations.push(event)

      const key = `${type}:${String(slot)}:${name}`
      if (!warned.has(key)) {
        warned.add(key)
        onSlowOperation(event)
      }
    }

    return {
      deferred: (slot, name, fn) => {
        const slotStart = performance.now()
        const result = fn()
        const duration = performance.now() - slotStart
        deferredDuration += duration
        deferredCount++
        check('deferred', slot, name, duration)
        return result
      },

      close: () => {
        const renderDuration = performance.now() - start
        check('render', -1, 'render', renderDuration)
        onSummary({
          renderDuration,
          deferredDuration,
          deferredCount,
          slowOperations,
        })
      },
    }
  }

  return { open }
}
