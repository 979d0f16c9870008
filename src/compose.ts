import type { Controller, Disposable, Handler, View } from './dispatch'
import { isDisposable, mapHandler, verifyHandlers } from './dispatch'
import type { Either } from './unify'
import { matchEither, unify } from './unify'

/** A view and the controller that handles its events, over the same model type. */
interface Component<M, E> {
  readonly view: View<M, E>
  readonly controller: Controller<M, E>
}

/**
 * Combines a parent component with a child component that works on part of
 * the parent's model.
 *
 * The composite view raises `left(parentEvent)` and `right(childEvent)` and
 * installs both sets of bindings. The composite controller initialises the
 * parent model, then the child model, and routes each tagged event to the
 * matching controller; child handlers run against `select(parentModel)`.
 *
 * Composites compose again: `compose(compose(a, b, selectB), c, selectC)`.
 * Starting a composite checks every part's declared event types against its
 * controller, as for a single component.
 *
 * @example
 * ```ts
 * const screen = compose(shell, counter, model => model.counter)
 * start(createModel({ title: '', counter: { value: 0 } }), screen)
 * ```
 */
function compose<PM, PE, CM, CE>(
  parent: Component<PM, PE>,
  child: Component<CM, CE>,
  select: (parentModel: PM) => CM
): Component<PM, Either<PE, CE>> {
  const view: View<PM, Either<PE, CE>> = {
    events: unify(parent.view.events, child.view.events),
    setBindings(model: PM): Disposable {
      const disposables: unknown[] = [parent.view.setBindings(model), child.view.setBindings(select(model))]
      return {
        dispose() {
          for (const disposable of disposables) {
            if (isDisposable(disposable)) disposable.dispose()
          }
        }
      }
    }
  }

  const controller: Controller<PM, Either<PE, CE>> = {
    verifyParts(): void {
      verifyHandlers(parent.view, parent.controller)
      verifyHandlers(child.view, child.controller)
    },
    initModel(model: PM): void {
      parent.controller.initModel(model)
      child.controller.initModel(select(model))
    },
    dispatch(event: Either<PE, CE>): Handler<PM> {
      return matchEither(
        event,
        parentEvent => parent.controller.dispatch(parentEvent),
        childEvent => mapHandler(child.controller.dispatch(childEvent), select)
      )
    }
  }

  return { view, controller }
}

export { compose }
export type { Component }
