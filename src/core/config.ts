/**
 * Process-wide configuration
 *
 * Holds the coercion texts, the default byte encoding and the debug flags,
 * together with the logger and timing instances derived from them.
 */

import { z } from 'zod'

import { isSupportedEncoding, SUPPORTED_ENCODINGS } from '../render/encode'
import { createLogger, type InterpolationLogger } from '../utils/log'
import {
  createTiming,
  type OnSlowOperation,
  type OnTimingSummary,
  type Timing,
} from '../utils/timing'
import { InterpolationError } from './errors'
import type { DebugConfig, InterpolationConfig } from './types'

const debugConfigSchema = z
  .object({
    log: z.boolean(),
    timing: z.boolean(),
    timingThreshold: z.number().nonnegative(),
  })
  .partial()
  .strict()

const configInputSchema = z
  .object({
    nullText: z.string(),
    undefinedText: z.string(),
    defaultEncoding: z
      .string()
      .refine(isSupportedEncoding, {
        message: `Unsupported encoding (supported: ${SUPPORTED_ENCODINGS.join(', ')})`,
      }),
    debug: debugConfigSchema,
  })
  .partial()
  .strict()

export type ConfigInput = z.input<typeof configInputSchema>

export interface ConfigHooks {
  onSlowOperation?: OnSlowOperation
  onSummary?: OnTimingSummary
}

const DEFAULT_TIMING_THRESHOLD = 5

export const DEFAULT_CONFIG: Readonly<InterpolationConfig> = Object.freeze({
  nullText: 'null',
  undefinedText: 'undefined',
  defaultEncoding: 'utf-8',
  debug: Object.freeze({}),
})

interface Runtime {
  config: Readonly<InterpolationConfig>
  hooks: Readonly<ConfigHooks>
  logger: InterpolationLogger
  timing: Timing
}

const createRuntime = (
  config: InterpolationConfig,
  hooks: ConfigHooks = {},
): Runtime => {
  const debug: DebugConfig = config.debug
  return {
    config: Object.freeze({ ...config, debug: Object.freeze({ ...debug }) }),
    hooks: Object.freeze({ ...hooks }),
    logger: createLogger(debug),
    timing: createTiming({
      timing: debug.timing ?? false,
      timingThreshold: debug.timingThreshold ?? DEFAULT_TIMING_THRESHOLD,
      ...hooks,
    }),
  }
}

let runtime: Runtime = createRuntime(DEFAULT_CONFIG)

/**
 * Merge options into the current configuration.
 *
 * Timing hooks merge the same way: hooks given once stay in place until
 * replaced or until resetConfig().
 *
 * @throws InterpolationError `INVALID_CONFIG` when the input fails validation
 *
 * @example
 * ```typescript
 * configure({ nullText: '', debug: { log: true } })
 * ```
 */
export const configure = (
  input: ConfigInput,
  hooks?: ConfigHooks,
): Readonly<InterpolationConfig> => {
  const parsed = configInputSchema.safeParse(input)
  if (!parsed.success) {
    throw new InterpolationError(
      'INVALID_CONFIG',
      `Invalid configuration: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')}`,
      { cause: parsed.error },
    )
  }

  const current = runtime.config
  const { debug, ...rest } = parsed.data
  runtime = createRuntime(
    {
      ...current,
      ...rest,
      debug: { ...current.debug, ...debug },
    },
    { ...runtime.hooks, ...hooks },
  )
  return runtime.config
}

/** Current configuration snapshot (frozen) */
export const getConfig = (): Readonly<InterpolationConfig> => runtime.config

/** Restore defaults and drop any timing hooks */
export const resetConfig = (): void => {
  runtime = createRuntime(DEFAULT_CONFIG)
}

/** @internal */
export const getLogger = (): InterpolationLogger => runtime.logger

/** @internal */
export const getTiming = (): Timing => runtime.timing
