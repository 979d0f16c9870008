/**
 * Notifying models
 * ================
 *
 * A model is a plain-looking object whose fields are getter/setter pairs.
 * Assigning a different value to a field notifies every subscriber with the
 * field's name, which is what the binding adapter listens to.
 *
 * @example
 * ```ts
 * const model = createModel({ x: 0, y: 0, result: 0 })
 * model.subscribe(name => console.log(`${name} changed`))
 * model.result = model.x + model.y
 * ```
 */

import { getConfig, getLogger } from './config'
import { StatewireError } from './errors'
import { isInOwnerContext } from './context'

// =============================================================================
// TYPES
// =============================================================================

type PropertyChangedListener<K extends string = string> = (name: K) => void

/** Anything that reports property changes by name. */
interface Notifying<K extends string = string> {
  subscribe(listener: PropertyChangedListener<K>): () => void
}

/** Sources that can report a validation message per property. */
interface DataErrorInfo {
  getError(name: string): string | undefined
}

type ValidationRules<T> = {
  [K in keyof T]?: (value: T[K]) => string | undefined
}

interface ModelOptions<T> {
  validate?: ValidationRules<T>
}

type Model<T extends object> = T &
  Notifying<keyof T & string> &
  DataErrorInfo & {
    /** Notifies subscribers of `name` without changing it. */
    notify(name: keyof T & string): void
  }

const RESERVED_KEYS = new Set(['subscribe', 'notify', 'getError'])

// =============================================================================
// IMPLEMENTATION
// =============================================================================

function isNotifying(value: unknown): value is Notifying {
  return (
    typeof value === 'object' &&
    value !== null &&
    'subscribe' in value &&
    typeof value.subscribe === 'function'
  )
}

function isDataErrorInfo(value: unknown): value is DataErrorInfo {
  return (
    typeof value === 'object' &&
    value !== null &&
    'getError' in value &&
    typeof value.getError === 'function'
  )
}

/**
 * Creates a notifying model with one observable field per key of `initial`.
 *
 * @param options.validate Per-field rules answered by `getError(name)`.
 */
function createModel<T extends object>(initial: T, options: ModelOptions<T> = {}): Model<T> {
  const values = new Map<string, unknown>(Object.entries(initial))
  const listeners = new Set<PropertyChangedListener>()
  const rules: Record<string, unknown> = { ...options.validate }

  const notify = (name: string): void => {
    for (const listener of [...listeners]) listener(name)
  }

  const model = {
    subscribe(listener: PropertyChangedListener): () => void {
      listeners.add(listener)
      return () => {
        listeners.delete(listener)
      }
    },
    notify(name: string): void {
      notify(name)
    },
    getError(name: string): string | undefined {
      const rule = rules[name]
      if (typeof rule !== 'function') return undefined
      const message: unknown = rule(values.get(name))
      return typeof message === 'string' ? message : undefined
    }
  }

  for (const key of values.keys()) {
    if (RESERVED_KEYS.has(key)) {
      throw new StatewireError(`"${key}" is reserved and cannot be a model field`)
    }
    Object.defineProperty(model, key, {
      enumerable: true,
      get: () => values.get(key),
      set: (value: unknown) => {
        if (Object.is(values.get(key), value)) return
        if (getConfig().debug && !isInOwnerContext(model)) {
          getLogger().warn(`Field "${key}" was changed outside the dispatch context`)
        }
        values.set(key, value)
        notify(key)
      }
    })
  }

  // Fields are attached with defineProperty above, which the type system cannot follow.
  return model as Model<T>
}

// =============================================================================
// COLLECTION VIEW
// =============================================================================

interface CollectionState<T> {
  items: readonly T[]
  currentIndex: number
  currentItem: T | undefined
}

type CollectionView<T> = Model<CollectionState<T>> & {
  moveCurrentTo(index: number): void
}

/**
 * A collection with a current position, the target of `current(...)` and
 * `.currentItem` in binding paths.
 */
function createCollectionView<T>(items: readonly T[]): CollectionView<T> {
  const view = createModel<CollectionState<T>>({
    items,
    currentIndex: items.length > 0 ? 0 : -1,
    currentItem: items[0]
  })

  const sync = (): void => {
    view.currentItem = view.items[view.currentIndex]
  }
  view.subscribe(name => {
    if (name === 'items' || name === 'currentIndex') sync()
  })

  return Object.assign(view, {
    moveCurrentTo(index: number): void {
      view.currentIndex = index >= 0 && index < view.items.length ? index : -1
    }
  })
}

export { createModel, createCollectionView, isNotifying, isDataErrorInfo }
export type {
  Model,
  ModelOptions,
  ValidationRules,
  Notifying,
  DataErrorInfo,
  PropertyChangedListener,
  CollectionView,
  CollectionState
}
