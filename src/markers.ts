/**
 * Binding markers.
 *
 * These functions only exist so binding statements can name them; the
 * compiler recognises them syntactically and never calls them. Calling one at
 * run time throws {@link MarkerInvocationError}.
 */

import type { BindingOptions, ValueConverter } from './descriptor'
import { MarkerInvocationError } from './errors'

/** Display format for the inner value, `{0}` being the value. */
function format<T>(_pattern: string, _value: T): string {
  throw new MarkerInvocationError('format')
}

/** The current item of a collection. */
function current<T>(_collection: Iterable<T>): T {
  throw new MarkerInvocationError('current')
}

/** Lets a non-nullable source feed a nullable target. */
function nullable<T>(_value: T): T | null {
  throw new MarkerInvocationError('nullable')
}

/** Applies a two-way converter. */
function convert<TSource, TTarget>(_converter: ValueConverter<TSource, TTarget>, _value: TSource): TTarget {
  throw new MarkerInvocationError('convert')
}

/** Attaches binding options to one statement. */
function withOptions<T>(_value: T, _options: BindingOptions): T {
  throw new MarkerInvocationError('withOptions')
}

const markers = { format, current, nullable, convert, withOptions } as const

type MarkerName = keyof typeof markers

const MARKER_NAMES: readonly MarkerName[] = ['format', 'current', 'nullable', 'convert', 'withOptions']

function isMarkerName(name: string): name is MarkerName {
  return MARKER_NAMES.some(marker => marker === name)
}

/** Name of the marker `value` is, if it is one. */
function markerOf(value: unknown): MarkerName | undefined {
  return MARKER_NAMES.find(name => markers[name] === value)
}

export { format, current, nullable, convert, withOptions, isMarkerName, markerOf }
export type { MarkerName }
