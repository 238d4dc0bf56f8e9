/**
 * Render sinks
 *
 * StringSink accumulates into memory; createWritableSink adapts anything
 * with a stream-like write(chunk) (a Node Writable, a test double).
 */

import { InterpolationError } from '../core/errors'
import type { Sink } from '../core/types'

const sinkFailure = (error: unknown): InterpolationError =>
  new InterpolationError(
    'SINK_FAILURE',
    `In-memory sink failed: ${error instanceof Error ? error.message : String(error)}`,
    { cause: error },
  )

/**
 * In-memory sink. It has no failure mode of its own, so anything thrown
 * while buffering is a bug and surfaces as `SINK_FAILURE`.
 */
export class StringSink implements Sink {
  private readonly chunks: string[] = []
  private size = 0

  write(text: string): void {
    try {
      this.chunks.push(text)
    } catch (error) {
      throw sinkFailure(error)
    }
    this.size += text.length
  }

  /** Number of UTF-16 code units written so far */
  get length(): number {
    return this.size
  }

  toString(): string {
    try {
      return this.chunks.join('')
    } catch (error) {
      throw sinkFailure(error)
    }
  }
}

interface ChunkWriter {
  write: (chunk: string) => unknown
}

/**
 * Adapt a stream-like writer to the Sink contract.
 * Errors thrown synchronously by the writer propagate through render().
 *
 * @example
 * ```typescript
 * gs.render(createWritableSink(process.stdout))
 * ```
 */
export const createWritableSink = (writer: ChunkWriter): Sink => ({
  write: (text) => {
    if (text.length === 0) return
    writer.write(text)
  },
})
