/**
 * Rendering
 *
 * Interleaves fragments and slot values into a sink:
 * `strings[0], values[0], strings[1], values[1], …`
 *
 * Slot values are written as follows:
 * - `() => x`: invoked, `x` is written with these same rules
 * - `(sink) => void`: invoked with the render sink, writes for itself
 * - a callable declaring 2+ parameters: InterpolationError
 * - anything else: the value-to-text coercion (write-value)
 *
 * Class constructors (`Map`, `class Point {}`) are values, not callables:
 * they go to the coercion and are never invoked.
 *
 * Nothing is cached; every render invokes every deferred slot again.
 */

import { getConfig, getLogger, getTiming } from '../core/config'
import type { Sink } from '../core/types'
import { guard } from '../utils/guards'
import { is } from '../utils/is'
import type { RenderBatch } from '../utils/timing'
import { StringSink } from './sink'
import { type CoercionOptions, writeValue } from './write-value'

export interface RenderParts {
  readonly strings: readonly string[]
  readonly values: readonly unknown[]
}

interface SlotContext {
  sink: Sink
  slot: number
  options: CoercionOptions
  batch: RenderBatch
}

const writeSlot = (value: unknown, context: SlotContext): void => {
  const { sink, slot, batch } = context

  if (is.function(value) && !is.classConstructor(value)) {
    guard.deferredArity(value, slot)
    const name = value.name || '(anonymous)'

    if (is.deferredWriter(value)) {
      const writer = value
      batch.deferred(slot, name, () => writer(sink))
      return
    }
    if (is.deferredValue(value)) {
      const thunk = value
      const result = batch.deferred(slot, name, () => thunk())
      writeSlot(result, context)
      return
    }
  }

  writeValue(sink, value, context.options)
}

/** Count slots whose value is a deferred callable */
export const countDeferred = (values: readonly unknown[]): number =>
  values.reduce<number>(
    (count, value) =>
      is.function(value) && !is.classConstructor(value) ? count + 1 : count,
    0,
  )

/**
 * Render `parts` into `sink` and return the sink.
 * Sink and callable failures propagate unchanged.
 */
export const renderTo = <S extends Sink>(sink: S, parts: RenderParts): S => {
  const { strings, values } = parts
  const logger = getLogger()
  const options = getConfig()
  const start = performance.now()
  const batch = getTiming().open()

  for (const [index, fragment] of strings.entries()) {
    sink.write(fragment)
    if (index < values.length) {
      writeSlot(values[index], { sink, slot: index, options, batch })
    }
  }

  batch.close()

  logger.logRender({
    fragments: strings.length,
    values: values.length,
    deferred: countDeferred(values),
    length: sink instanceof StringSink ? sink.length : null,
    durationMs: performance.now() - start,
  })

  return sink
}
