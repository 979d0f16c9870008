/**
 * lit-html integration
 * ====================
 *
 * Renders a view's markup with lit-html and binds the rendered elements the
 * same way headless widgets are bound: every element carrying an `id` is put
 * in the binding scope under that id.
 *
 * @example
 * ```ts
 * const view = createLitView<Calculator, CalculatorEvent>(document.body, {
 *   template: send => html`
 *     <input id="x" type="number">
 *     <input id="y" type="number">
 *     <button @click=${() => send({ type: 'add' })}>Add</button>
 *     <output id="result"></output>`,
 *   bindings: `
 *     x.value = model.x;
 *     y.value = model.y;
 *     result.textContent = model.result;
 *   `,
 *   eventTypes: ['add']
 * })
 * start(model, { view, controller })
 * ```
 */

import { html, render } from 'lit-html'
import type { TemplateResult } from 'lit-html'
import type { TargetObserver } from './adapter'
import { applyBindings } from './bindings'
import type { ApplyBindingsOptions, BindingReport } from './bindings'
import type { View } from './dispatch'
import { createEvent, createStream } from './events'
import type { EventStream } from './events'
import type { BindingScope } from './expression'

// =============================================================================
// DOM EVENTS AND TARGETS
// =============================================================================

function isEventTarget(value: object): value is EventTarget {
  return (
    'addEventListener' in value &&
    typeof value.addEventListener === 'function' &&
    'removeEventListener' in value &&
    typeof value.removeEventListener === 'function'
  )
}

/**
 * Wraps a DOM event as a stream of domain events.
 *
 * @example
 * ```ts
 * const submits = fromDomEvent(form, 'submit', () => ({ type: 'save' }))
 * ```
 */
function fromDomEvent<E>(target: EventTarget, type: string, toEvent: (event: Event) => E): EventStream<E> {
  return createStream<E>(observer => {
    const listener = (event: Event): void => observer(toEvent(event))
    target.addEventListener(type, listener)
    return () => target.removeEventListener(type, listener)
  })
}

/**
 * Observes form controls: `change` for the default trigger, `input` for
 * `onEveryChange`.
 */
const domTargetObserver: TargetObserver = (target, _property, trigger, onChange) => {
  if (!isEventTarget(target)) return undefined
  const type = trigger === 'onEveryChange' ? 'input' : 'change'
  target.addEventListener(type, onChange)
  return () => target.removeEventListener(type, onChange)
}

// =============================================================================
// LIT VIEW
// =============================================================================

interface LitViewOptions<E> extends Pick<ApplyBindingsOptions, 'sourceName' | 'defaults' | 'strict'> {
  /** Renders the markup once; event listeners raise domain events through `send`. */
  template: (send: (event: E) => void) => TemplateResult
  /** Binding statements over the ids of the rendered elements. */
  bindings: string
  /** Converters and other names the statements refer to. */
  helpers?: BindingScope
  eventTypes?: readonly string[]
}

interface LitView<M, E> extends View<M, E> {
  readonly container: HTMLElement
  /** Rendered elements by id. */
  elements(): Readonly<Record<string, Element>>
  setBindings(model: M): BindingReport
  /** Clears the container. */
  destroy(): void
}

function collectElements(container: HTMLElement): Record<string, Element> {
  const elements: Record<string, Element> = {}
  container.querySelectorAll('[id]').forEach(element => {
    elements[element.id] = element
  })
  return elements
}

function createLitView<M extends object, E>(container: HTMLElement, options: LitViewOptions<E>): LitView<M, E> {
  const [events, send] = createEvent<E>()
  render(options.template(send), container)

  return {
    container,
    events,
    eventTypes: options.eventTypes,
    elements: () => collectElements(container),
    setBindings(model: M): BindingReport {
      const scope: BindingScope = { ...options.helpers, ...collectElements(container) }
      return applyBindings(model, options.bindings, scope, {
        sourceName: options.sourceName,
        defaults: options.defaults,
        strict: options.strict,
        observeTarget: domTargetObserver
      })
    },
    destroy() {
      render(html``, container)
    }
  }
}

export { fromDomEvent, domTargetObserver, createLitView }
export type { LitView, LitViewOptions }
