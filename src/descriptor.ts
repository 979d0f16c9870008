// =============================================================================
// BINDING DESCRIPTOR
// =============================================================================

type BindingMode = 'OneWay' | 'TwoWay' | 'OneWayToSource'

/**
 * When a target change is written back to the source.
 * `default` waits for the widget to commit (e.g. focus loss), `onEveryChange`
 * writes on every edit.
 */
type UpdateTrigger = 'default' | 'onEveryChange'

/**
 * One step of a source path. `current` is the "current item of the
 * collection" marker, rendered as `/` in the path string.
 */
type PathSegment =
  | { readonly kind: 'property'; readonly name: string }
  | { readonly kind: 'index'; readonly index: number }
  | { readonly kind: 'current' }

interface ValueConverter<TSource = unknown, TTarget = unknown> {
  convert(value: TSource): TTarget
  convertBack?(value: TTarget): TSource
}

/**
 * Compiled description of how one target property tracks a source path.
 * Produced by the binding compiler, consumed by a {@link BindingAdapter}.
 */
interface BindingDescriptor {
  readonly path: string
  readonly segments: readonly PathSegment[]
  readonly mode: BindingMode
  readonly converter?: ValueConverter
  readonly format?: string
  readonly updateTrigger: UpdateTrigger
  readonly fallbackValue?: unknown
  readonly nullValue?: unknown
  readonly validatesOnDataErrors: boolean
  readonly validatesOnExceptions: boolean
}

/** Caller-supplied settings applied after compilation. */
interface BindingOptions {
  mode?: BindingMode
  updateTrigger?: UpdateTrigger
  fallbackValue?: unknown
  nullValue?: unknown
  validatesOnDataErrors?: boolean
  validatesOnExceptions?: boolean
}

const BINDING_MODES: readonly BindingMode[] = ['OneWay', 'TwoWay', 'OneWayToSource']
const UPDATE_TRIGGERS: readonly UpdateTrigger[] = ['default', 'onEveryChange']

function isBindingMode(value: unknown): value is BindingMode {
  return BINDING_MODES.some(mode => mode === value)
}

function isUpdateTrigger(value: unknown): value is UpdateTrigger {
  return UPDATE_TRIGGERS.some(trigger => trigger === value)
}

function isValueConverter(value: unknown): value is ValueConverter {
  return (
    typeof value === 'object' &&
    value !== null &&
    'convert' in value &&
    typeof value.convert === 'function'
  )
}

/** True when the converter can map target values back to the source. */
function isTwoWayConverter(value: unknown): value is Required<ValueConverter> {
  return isValueConverter(value) && 'convertBack' in value && typeof value.convertBack === 'function'
}

/** Renders segments as `a.b/c`, `a/`, `items[0].name`. */
function formatPath(segments: readonly PathSegment[]): string {
  let path = ''
  for (const segment of segments) {
    switch (segment.kind) {
      case 'property':
        path = path === '' || path.endsWith('/') ? `${path}${segment.name}` : `${path}.${segment.name}`
        break
      case 'index':
        path = `${path}[${segment.index}]`
        break
      case 'current':
        path = `${path}/`
        break
    }
  }
  return path
}

export { isBindingMode, isUpdateTrigger, isValueConverter, isTwoWayConverter, formatPath }
export type {
  BindingMode,
  UpdateTrigger,
  PathSegment,
  ValueConverter,
  BindingDescriptor,
  BindingOptions
}
