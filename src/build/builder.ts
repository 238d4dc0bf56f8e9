/**
 * Structured-output builders
 *
 * InterpolatedString.build() emits one 'literal' event per fragment and one
 * 'value' event per slot, in document order. The builders here consume those
 * events without ever rendering a value.
 */

import { InterpolatedString } from '../core/interpolated-string'
import type { BuildEvent, Builder } from '../core/types'

export interface EventCollector extends Builder {
  readonly events: readonly BuildEvent[]
}

/** Builder that records every event it receives */
export const createEventCollector = (): EventCollector => {
  const events: BuildEvent[] = []
  return {
    events,
    yield: (piece, kind) => {
      events.push({ kind, piece })
    },
  }
}

/** Events emitted by `gs.build()`, collected into an array */
export const collectBuildEvents = (
  gs: InterpolatedString,
): readonly BuildEvent[] => {
  const collector = createEventCollector()
  gs.build(collector)
  return collector.events
}

export type Placeholder = string | ((position: number) => string)

export interface ParameterizedText {
  text: string
  params: unknown[]
}

/**
 * Replace every value slot with a placeholder and collect the values as
 * bound parameters, e.g. for a prepared SQL statement. Nested interpolated
 * strings are inlined rather than bound.
 *
 * @param placeholder - literal placeholder, or a function of the 1-based
 *   parameter position
 *
 * @example
 * ```typescript
 * parameterize(gstr`select * from users where id = ${id} and org = ${org}`)
 * // { text: 'select * from users where id = ? and org = ?', params: [id, org] }
 *
 * parameterize(gs, (n) => `$${n}`)
 * // { text: '... id = $1 and org = $2', params: [id, org] }
 * ```
 */
export const parameterize = (
  gs: InterpolatedString,
  placeholder: Placeholder = '?',
): ParameterizedText => {
  const chunks: string[] = []
  const params: unknown[] = []

  const builder: Builder = {
    yield: (piece, kind) => {
      if (kind === 'literal') {
        chunks.push(String(piece))
        return
      }
      if (piece instanceof InterpolatedString) {
        piece.build(builder)
        return
      }
      params.push(piece)
      chunks.push(
        typeof placeholder === 'string'
          ? placeholder
          : placeholder(params.length),
      )
    },
  }

  gs.build(builder)
  return { text: chunks.join(''), params }
}
