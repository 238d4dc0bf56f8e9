/**
 * Debug logging for renders and concatenations.
 *
 * Two log functions:
 * 1. logRender: called once per render with slot statistics
 * 2. logConcat: called once per concat with the merge decision
 *
 * Returns a no-op logger when the log flag is false.
 */

import type { DebugConfig } from '../core/types'

// ---------------------------------------------------------------------------
// Logger types
// ---------------------------------------------------------------------------

export interface RenderLogData {
  fragments: number
  values: number
  /** Slots holding a deferred callable */
  deferred: number
  /** Characters held by an in-memory sink after the render; null for other sinks */
  length: number | null
  durationMs: number
}

export interface ConcatLogData {
  left: { fragments: number; values: number }
  right: { fragments: number; values: number }
  /** Whether the boundary fragments were merged */
  merged: boolean
}

export interface InterpolationLogger {
  logRender: (data: RenderLogData) => void
  logConcat: (data: ConcatLogData) => void
}

// ---------------------------------------------------------------------------
// No-op singleton
// ---------------------------------------------------------------------------

const noop = () => {
  // no-op
}

const NOOP_LOGGER: InterpolationLogger = {
  logRender: noop,
  logConcat: noop,
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const PREFIX = 'lazy-interpolated-string'

/** Build a short shape label, e.g. "3f/2v". @internal */
export const shapeLabel = (shape: {
  fragments: number
  values: number
}): string => `${String(shape.fragments)}f/${String(shape.values)}v`

/** Build console summary object for a render. @internal */
export const buildRenderSummary = (
  data: RenderLogData,
): Record<string, unknown> => {
  const summary: Record<string, unknown> = {
    shape: shapeLabel(data),
    duration: `${data.durationMs.toFixed(2)}ms`,
  }
  if (data.deferred > 0) summary['deferred'] = data.deferred
  if (data.length !== null) summary['length'] = data.length
  return summary
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create a logger.
 * Returns the no-op logger when the log flag is disabled.
 */
export const createLogger = (config: DebugConfig): InterpolationLogger => {
  const { log = false } = config

  if (!log) return NOOP_LOGGER

  return {
    logRender: (data) => {
      console.groupCollapsed(`${PREFIX}:render | ${shapeLabel(data)}`)
      console.log(buildRenderSummary(data))
      console.groupEnd()
    },

    logConcat: (data) => {
      const action = data.merged ? 'merge' : 'append'
      console.groupCollapsed(
        `${PREFIX}:concat | ${action} ${shapeLabel(data.left)} + ${shapeLabel(data.right)}`,
      )
      console.log({ left: data.left, right: data.right, merged: data.merged })
      console.groupEnd()
    },
  }
}
