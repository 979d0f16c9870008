import type { Component } from './compose'
import { DispatchRuntime } from './dispatch'
import type { RuntimeOptions } from './dispatch'

/**
 * Creates a runtime for `component` over `model` and starts it.
 *
 * @example
 * ```ts
 * const runtime = start(createModel({ x: 0, y: 0, result: 0 }), calculator)
 * // later
 * runtime.dispose()
 * ```
 */
function start<M extends object, E>(
  model: M,
  component: Component<M, E>,
  options: RuntimeOptions<E> = {}
): DispatchRuntime<M, E> {
  const runtime = new DispatchRuntime(model, component.view, component.controller, options)
  runtime.start()
  return runtime
}

export { start }
