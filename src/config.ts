/**
 * Framework-wide configuration and logging.
 *
 * Binding validation defaults are deliberately inverted relative to most UI
 * toolkits: models are expected to take part in validation, so both
 * `validatesOnDataErrors` and `validatesOnExceptions` start as `true`.
 * Set them to `false` here (or per binding) to get the toolkit behaviour.
 */

import type { BindingMode } from './descriptor'

// =============================================================================
// LOGGING
// =============================================================================

interface Logger {
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
}

const PREFIX = '[statewire]'

/**
 * Logger writing to the console. Debug lines are only written when
 * `debug` is enabled in the active configuration.
 */
const consoleLogger: Logger = {
  debug: (message, ...details) => {
    if (currentConfig.debug) console.debug(`${PREFIX} ${message}`, ...details)
  },
  info: (message, ...details) => console.info(`${PREFIX} ${message}`, ...details),
  warn: (message, ...details) => console.warn(`${PREFIX} ${message}`, ...details),
  error: (message, ...details) => console.error(`${PREFIX} ${message}`, ...details)
}

// =============================================================================
// CONFIGURATION
// =============================================================================

interface FrameworkConfig {
  /** Mode given to bindings that carry neither a format nor a one-way converter. */
  defaultMode: BindingMode
  validatesOnDataErrors: boolean
  validatesOnExceptions: boolean
  /** Enables reentrancy diagnostics and debug logging. */
  debug: boolean
  logger: Logger
  /**
   * Top-level channel for errors nobody handled (handler failures under the
   * default `onError`, failing async feeds). The default rethrows on a
   * microtask so the host's uncaught-error handler sees the original error.
   */
  onUnhandledError: (error: unknown) => void
}

const rethrowOnMicrotask = (error: unknown): void => {
  queueMicrotask(() => {
    throw error
  })
}

const createDefaultConfig = (): FrameworkConfig => ({
  defaultMode: 'TwoWay',
  validatesOnDataErrors: true,
  validatesOnExceptions: true,
  debug: false,
  logger: consoleLogger,
  onUnhandledError: rethrowOnMicrotask
})

let currentConfig: FrameworkConfig = createDefaultConfig()

/**
 * Merges the given settings into the active configuration.
 *
 * @example
 * ```ts
 * configure({ debug: true, validatesOnExceptions: false })
 * ```
 */
function configure(settings: Partial<FrameworkConfig>): Readonly<FrameworkConfig> {
  currentConfig = { ...currentConfig, ...settings }
  return currentConfig
}

function getConfig(): Readonly<FrameworkConfig> {
  return currentConfig
}

/** Restores every setting to its default. */
function resetConfig(): void {
  currentConfig = createDefaultConfig()
}

function getLogger(): Logger {
  return currentConfig.logger
}

export { configure, getConfig, resetConfig, getLogger, consoleLogger }
export type { FrameworkConfig, Logger }
