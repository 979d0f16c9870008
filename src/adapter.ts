/**
 * Binding adapter
 * ===============
 *
 * Attaches compiled {@link BindingDescriptor}s to widget properties. The
 * adapter is created for one root model; every descriptor path is resolved
 * against that model.
 *
 * Source to target: each notifying object along the path is observed, and the
 * observation is moved when an intermediate object is replaced.
 * Target to source: the target is observed through a {@link TargetObserver};
 * the default one understands headless widgets, the lit-html module provides
 * one for DOM elements.
 */

import { getLogger } from './config'
import type { BindingDescriptor, PathSegment, UpdateTrigger } from './descriptor'
import { isObjectLike } from './expression'
import { isDataErrorInfo, isNotifying } from './model'
import { isWidget } from './widgets'

// =============================================================================
// TYPES
// =============================================================================

/**
 * Starts observing `target[property]`, calling `onChange` according to
 * `trigger`. Returns `undefined` when the target is not of a kind it knows.
 */
type TargetObserver = (
  target: object,
  property: string,
  trigger: UpdateTrigger,
  onChange: () => void
) => (() => void) | undefined

interface BindingAdapterOptions {
  /** Tried in order before the built-in widget observer. */
  observeTarget?: TargetObserver | readonly TargetObserver[]
}

interface BindingHandle {
  readonly target: object
  readonly property: string
  readonly descriptor: BindingDescriptor
  /** Current validation messages: conversion failures and data errors. */
  readonly errors: readonly string[]
  /** Pushes the source value to the target again. */
  refresh(): void
  dispose(): void
}

interface BindingAdapter {
  installBinding(target: object, property: string, descriptor: BindingDescriptor): BindingHandle
  /** Disposes every binding installed through this adapter. */
  dispose(): void
}

type Resolution = {
  /** Notifying objects on the path with the property each one is read through. */
  readonly watched: ReadonlyArray<{ readonly object: object; readonly name?: string }>
  readonly found: boolean
  readonly value: unknown
}

type WriteLocation = { readonly owner: object; readonly key: string | number } | undefined

// =============================================================================
// PATH RESOLUTION
// =============================================================================

function currentItemOf(collection: object): { found: boolean; value: unknown } {
  if ('currentItem' in collection) return { found: true, value: collection.currentItem }
  if (Array.isArray(collection)) return { found: collection.length > 0, value: collection[0] }
  return { found: false, value: undefined }
}

function step(owner: object, segment: PathSegment): { found: boolean; value: unknown } {
  switch (segment.kind) {
    case 'property':
      return segment.name in owner
        ? { found: true, value: Reflect.get(owner, segment.name) }
        : { found: false, value: undefined }
    case 'index':
      return { found: segment.index in owner, value: Reflect.get(owner, segment.index) }
    case 'current':
      return currentItemOf(owner)
  }
}

function watchName(segment: PathSegment | undefined): string | undefined {
  if (segment?.kind === 'property') return segment.name
  if (segment?.kind === 'index') return String(segment.index)
  return undefined
}

function resolvePath(root: object, segments: readonly PathSegment[]): Resolution {
  const watched: Array<{ object: object; name?: string }> = []
  let current: unknown = root

  for (const [index, segment] of segments.entries()) {
    if (!isObjectLike(current)) return { watched, found: false, value: undefined }
    if (isNotifying(current)) watched.push({ object: current, name: watchName(segment) })
    const next = step(current, segment)
    if (!next.found) return { watched, found: false, value: undefined }
    current = next.value
    if (index === segments.length - 1 && isNotifying(current)) watched.push({ object: current })
  }
  if (segments.length === 0 && isNotifying(root)) watched.push({ object: root })
  return { watched, found: true, value: current }
}

/** Owner and key the last segment writes to, if the path ends in a property or index. */
function writeLocation(root: object, segments: readonly PathSegment[]): WriteLocation {
  const last = segments.at(-1)
  if (!last || last.kind === 'current') return undefined
  const owner = resolvePath(root, segments.slice(0, -1))
  if (!owner.found || !isObjectLike(owner.value)) return undefined
  return { owner: owner.value, key: last.kind === 'property' ? last.name : last.index }
}

// =============================================================================
// VALUE CONVERSION
// =============================================================================

/**
 * Renders `value` through a display format. `{0}` is the value, `{0:F2}`
 * a fixed number of decimals, `{{` and `}}` literal braces.
 */
function formatValue(pattern: string, value: unknown): string {
  return pattern.replace(/\{\{|\}\}|\{0(?::F(\d+))?\}/g, (token, decimals: string | undefined) => {
    if (token === '{{') return '{'
    if (token === '}}') return '}'
    if (decimals !== undefined && typeof value === 'number') return value.toFixed(Number(decimals))
    return String(value ?? '')
  })
}

/** Toolkit-side conversion of `value` to the primitive kind of `sample`. */
function coerceTo(sample: unknown, value: unknown): unknown {
  switch (typeof sample) {
    case 'string':
      return value === null || value === undefined ? '' : String(value)
    case 'number': {
      if (typeof value === 'number' || value === null || value === undefined) return value
      const parsed = typeof value === 'string' && value.trim() === '' ? Number.NaN : Number(value)
      if (Number.isNaN(parsed)) throw new TypeError(`"${String(value)}" is not a number`)
      return parsed
    }
    case 'boolean':
      if (typeof value === 'boolean' || value === null || value === undefined) return value
      if (value === 'true' || value === 'false') return value === 'true'
      return Boolean(value)
    default:
      return value
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

// =============================================================================
// TARGET OBSERVATION
// =============================================================================

const widgetObserver: TargetObserver = (target, property, trigger, onChange) => {
  if (!isWidget(target)) return undefined
  const phase = trigger === 'onEveryChange' ? 'changed' : 'committed'
  return target.subscribe((changed, changedPhase) => {
    if (changed === property && changedPhase === phase) onChange()
  })
}

// =============================================================================
// ADAPTER
// =============================================================================

/**
 * Creates an adapter binding widget properties to paths of `source`.
 *
 * @example
 * ```ts
 * const adapter = createBindingAdapter(model)
 * adapter.installBinding(label, 'text', compileBinding('model.total'))
 * ```
 */
function createBindingAdapter(source: object, options: BindingAdapterOptions = {}): BindingAdapter {
  const custom = options.observeTarget
  const observers: readonly TargetObserver[] = [
    ...(custom === undefined ? [] : typeof custom === 'function' ? [custom] : custom),
    widgetObserver
  ]
  const handles = new Set<BindingHandle>()

  const observeTarget = (target: object, property: string, trigger: UpdateTrigger, onChange: () => void) => {
    for (const observe of observers) {
      const stop = observe(target, property, trigger, onChange)
      if (stop) return stop
    }
    return undefined
  }

  const installBinding = (target: object, property: string, descriptor: BindingDescriptor): BindingHandle => {
    const { mode, segments } = descriptor
    let sourceSubscriptions: Array<() => void> = []
    let watchedObjects: ReadonlyArray<{ readonly object: object; readonly name?: string }> = []
    let stopTarget: (() => void) | undefined
    let updatingTarget = false
    let updatingSource = false
    let conversionError: string | undefined
    let dataError: string | undefined
    let disposed = false

    const fail = (error: unknown): void => {
      if (!descriptor.validatesOnExceptions) throw error
      conversionError = messageOf(error)
      getLogger().debug(`Binding "${descriptor.path}" → ${property} failed: ${conversionError}`)
    }

    const checkDataErrors = (): void => {
      if (!descriptor.validatesOnDataErrors) return
      const location = writeLocation(source, segments)
      dataError =
        location && isDataErrorInfo(location.owner) ? location.owner.getError(String(location.key)) : undefined
    }

    const rewire = (watched: Resolution['watched']): void => {
      const unchanged =
        watched.length === watchedObjects.length &&
        watched.every((entry, index) => entry.object === watchedObjects[index].object)
      if (unchanged) return
      sourceSubscriptions.forEach(unsubscribe => unsubscribe())
      watchedObjects = watched
      sourceSubscriptions = watched.map(({ object, name }) => {
        if (!isNotifying(object)) return () => undefined
        return object.subscribe(changed => {
          if (name === undefined || changed === name) onSourceChanged()
        })
      })
    }

    const pushToTarget = (): void => {
      const resolution = resolvePath(source, segments)
      rewire(resolution.watched)
      if (mode === 'OneWayToSource') return

      let value: unknown
      if (!resolution.found) {
        if (!('fallbackValue' in descriptor)) return
        value = descriptor.fallbackValue
      } else if ((resolution.value === null || resolution.value === undefined) && 'nullValue' in descriptor) {
        value = descriptor.nullValue
      } else {
        try {
          value = descriptor.converter ? descriptor.converter.convert(resolution.value) : resolution.value
          if (descriptor.format !== undefined) value = formatValue(descriptor.format, value)
          value = coerceTo(Reflect.get(target, property), value)
          conversionError = undefined
        } catch (error) {
          fail(error)
          return
        }
      }

      updatingTarget = true
      try {
        Reflect.set(target, property, value)
      } finally {
        updatingTarget = false
      }
      checkDataErrors()
    }

    const pullFromTarget = (): void => {
      const location = writeLocation(source, segments)
      if (!location) {
        getLogger().warn(`Binding path "${descriptor.path}" cannot be written back`)
        return
      }
      const { converter } = descriptor
      updatingSource = true
      try {
        let value: unknown = Reflect.get(target, property)
        if (converter) {
          if (!converter.convertBack) return
          value = converter.convertBack(value)
        }
        value = coerceTo(Reflect.get(location.owner, location.key), value)
        Reflect.set(location.owner, location.key, value)
        conversionError = undefined
      } catch (error) {
        fail(error)
      } finally {
        updatingSource = false
      }
      checkDataErrors()
    }

    function onSourceChanged(): void {
      if (disposed || updatingSource) return
      pushToTarget()
    }

    const onTargetChanged = (): void => {
      if (disposed || updatingTarget) return
      pullFromTarget()
    }

    if (mode !== 'OneWay') {
      stopTarget = observeTarget(target, property, descriptor.updateTrigger, onTargetChanged)
      if (!stopTarget) {
        getLogger().warn(`Target property "${property}" cannot be observed; "${descriptor.path}" will not update its source`)
      }
    }

    const handle: BindingHandle = {
      target,
      property,
      descriptor,
      get errors() {
        return [conversionError, dataError].filter((message): message is string => message !== undefined)
      },
      refresh: pushToTarget,
      dispose() {
        if (disposed) return
        disposed = true
        sourceSubscriptions.forEach(unsubscribe => unsubscribe())
        sourceSubscriptions = []
        stopTarget?.()
        handles.delete(handle)
      }
    }

    if (mode === 'OneWayToSource') {
      rewire(resolvePath(source, segments).watched)
      pullFromTarget()
    } else {
      pushToTarget()
    }
    handles.add(handle)
    return handle
  }

  return {
    installBinding,
    dispose() {
      for (const handle of [...handles]) handle.dispose()
    }
  }
}

export { createBindingAdapter, formatValue, coerceTo, widgetObserver }
export type { BindingAdapter, BindingAdapterOptions, BindingHandle, TargetObserver }
