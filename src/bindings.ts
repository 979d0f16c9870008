import type { BindingAdapter, BindingAdapterOptions, BindingHandle } from './adapter'
import { createBindingAdapter } from './adapter'
import { compileBindings } from './compiler'
import type { CompiledBinding } from './compiler'
import { getLogger } from './config'
import type { BindingOptions } from './descriptor'
import type { BindingError } from './errors'
import type { BindingScope } from './expression'

interface ApplyBindingsOptions extends BindingAdapterOptions {
  /** Name standing for the model in the statements. Defaults to `model`. */
  sourceName?: string
  /** Applied to every statement; `withOptions` in a statement wins. */
  defaults?: BindingOptions
  /** Adapter to install through; one is created for the model otherwise. */
  adapter?: BindingAdapter
  /** Throw an `AggregateError` when any statement failed, after binding the rest. */
  strict?: boolean
}

interface BindingReport {
  readonly installed: readonly BindingHandle[]
  readonly failed: ReadonlyArray<{ readonly text: string; readonly error: BindingError | Error }>
  dispose(): void
}

/**
 * Compiles a batch of binding statements and installs them against `model`.
 *
 * Statements are handled one at a time in source order. A statement that does
 * not compile, or that the adapter refuses, leaves its widget unbound and is
 * reported in `failed`; the statements around it still bind.
 *
 * @example
 * ```ts
 * const report = applyBindings(model, `
 *   total.text = format('Total: {0}', model.total);
 *   name.text = withOptions(model.name, { updateTrigger: 'onEveryChange' });
 * `, { total: totalLabel, name: nameBox })
 * ```
 */
function applyBindings(
  model: object,
  statements: string,
  scope: BindingScope,
  options: ApplyBindingsOptions = {}
): BindingReport {
  const adapter = options.adapter ?? createBindingAdapter(model, options)
  const installed: BindingHandle[] = []
  const failed: Array<{ text: string; error: BindingError | Error }> = []

  const install = (binding: CompiledBinding): void => {
    try {
      installed.push(adapter.installBinding(binding.target, binding.property, binding.descriptor))
    } catch (error) {
      if (!(error instanceof Error)) throw error
      failed.push({ text: binding.text, error })
    }
  }

  const results = compileBindings(statements, {
    scope,
    sourceName: options.sourceName,
    options: options.defaults
  })
  for (const result of results) {
    if (result.ok) install(result.binding)
    else failed.push({ text: result.text, error: result.error })
  }

  failed.forEach(({ text, error }) => getLogger().warn(`Binding \`${text}\` was not installed: ${error.message}`))
  if (options.strict && failed.length > 0) {
    throw new AggregateError(
      failed.map(failure => failure.error),
      `${failed.length} binding statement(s) failed`
    )
  }

  return {
    installed,
    failed,
    dispose() {
      installed.forEach(handle => handle.dispose())
    }
  }
}

export { applyBindings }
export type { ApplyBindingsOptions, BindingReport }
