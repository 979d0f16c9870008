/**
 * Dispatch context (with unctx)
 * =============================
 *
 * While a handler runs, or while work entered through `enter` runs, the active
 * {@link DispatchScope} is available through `useDispatch()`. As with every
 * `unctx` context it is only set synchronously: async handlers must keep the
 * scope (or use the `HandlerContext` they are given) across an `await`.
 */

import { getContext } from 'unctx'

interface DispatchScope {
  /** The runtime owning this scope. */
  readonly owner: object
  /** The event being handled. */
  readonly event: unknown
  /** Cancellation signal of the handler in progress. */
  readonly signal: AbortSignal
  /** Runs `work` inside the dispatch context, after the current delivery. */
  enter<T>(work: () => T): Promise<T>
}

const dispatchContext = getContext<DispatchScope>('statewire-dispatch')

/** Model → runtime that started with it. */
const modelOwners = new WeakMap<object, object>()

/**
 * The active dispatch scope.
 * @throws when called outside a handler.
 */
function useDispatch(): DispatchScope {
  return dispatchContext.use()
}

function tryUseDispatch(): DispatchScope | undefined {
  return dispatchContext.tryUse() ?? undefined
}

/**
 * Runs `fn` with `scope` as the active dispatch scope. Scopes nest: a runtime
 * delivering synchronously into another runtime restores the outer scope
 * when the inner delivery returns.
 */
function runInScope<T>(scope: DispatchScope, fn: () => T): T {
  const outer = tryUseDispatch()
  dispatchContext.set(scope, true)
  try {
    return fn()
  } finally {
    if (outer) dispatchContext.set(outer, true)
    else dispatchContext.unset()
  }
}

function attachModel(model: object, owner: object): void {
  modelOwners.set(model, owner)
}

function detachModel(model: object, owner: object): void {
  if (modelOwners.get(model) === owner) modelOwners.delete(model)
}

/**
 * False when `model` belongs to a running runtime and the caller is not inside
 * that runtime's dispatch context.
 */
function isInOwnerContext(model: object): boolean {
  const owner = modelOwners.get(model)
  if (!owner) return true
  return tryUseDispatch()?.owner === owner
}

export { useDispatch, tryUseDispatch, runInScope, attachModel, detachModel, isInOwnerContext }
export type { DispatchScope }
