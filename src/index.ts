/**
 * statewire
 * =========
 *
 * Bindings written as ordinary assignment statements, and a dispatch runtime
 * that turns widget events into model changes.
 *
 * - Binding statements (`label.text = format('Total: {0}', model.total)`) are
 *   parsed and compiled into binding descriptors, then installed on widgets
 *   by an adapter that keeps source and target in sync.
 * - Components pair a view (event stream plus bindings) with a controller
 *   (event to handler). Components compose, and a runtime delivers their
 *   events one at a time.
 *
 * @license MIT
 */

// =============================================================================
// BINDING EXPRESSIONS
// =============================================================================

export { parseBindingStatements, parseBindingExpression, evaluateChain } from './expression'
export type { BindingScope, BindingStatement, Evaluation } from './expression'

export { extractPath } from './path'
export type { ExtractedPath } from './path'

export { resolveTarget } from './target'
export type { ResolvedTarget } from './target'

export { compileBinding, compileStatement, compileBindings, BINDING_RULES } from './compiler'
export type {
  BindingRule,
  CompileOptions,
  CompiledBinding,
  CompileResult,
  PartialDescriptor
} from './compiler'

export { format, current, nullable, convert, withOptions } from './markers'

export { isBindingMode, isUpdateTrigger, isValueConverter, isTwoWayConverter, formatPath } from './descriptor'
export type {
  BindingDescriptor,
  BindingMode,
  BindingOptions,
  PathSegment,
  UpdateTrigger,
  ValueConverter
} from './descriptor'

// =============================================================================
// BINDING INSTALLATION
// =============================================================================

export { createBindingAdapter, formatValue, coerceTo, widgetObserver } from './adapter'
export type { BindingAdapter, BindingAdapterOptions, BindingHandle, TargetObserver } from './adapter'

export { applyBindings } from './bindings'
export type { ApplyBindingsOptions, BindingReport } from './bindings'

export { createModel, createCollectionView, isNotifying, isDataErrorInfo } from './model'
export type { Model, ModelOptions, Notifying, DataErrorInfo, ValidationRules, CollectionView } from './model'

export { computed, dependenciesOf } from './computed'
export type { Computed } from './computed'

export { Widget, Label, TextBox, CheckBox, Button, isWidget } from './widgets'
export type { WidgetPhase, WidgetListener } from './widgets'

// =============================================================================
// EVENTS AND DISPATCH
// =============================================================================

export { createStream, createEvent, fromProducer, fromInterval, fromAsyncIterable, merge } from './events'
export type { EventStream, EventProducer, Observer } from './events'

export { left, right, isLeft, isRight, matchEither, unify } from './unify'
export type { Either, Left, Right } from './unify'

export { createSerialQueue, serialObserver, ReentrancyGuard } from './serial'
export type { SerialQueue, SerialQueueOptions } from './serial'

export {
  syncHandler,
  asyncHandler,
  mapHandler,
  createController,
  verifyHandlers,
  defineView,
  createCancellation,
  sharedCancellation,
  delay,
  isDisposable,
  DispatchRuntime
} from './dispatch'
export type {
  Handler,
  SyncHandler,
  AsyncHandler,
  HandlerContext,
  HandlerMap,
  Controller,
  View,
  Disposable,
  Cancellation,
  RuntimeOptions
} from './dispatch'

export { useDispatch, tryUseDispatch } from './context'
export type { DispatchScope } from './context'

export type { LifecycleState } from './lifecycle'

export { compose } from './compose'
export type { Component } from './compose'

export { start } from './mvc'

// =============================================================================
// CONFIGURATION AND ERRORS
// =============================================================================

export { configure, getConfig, resetConfig, getLogger, consoleLogger } from './config'
export type { FrameworkConfig, Logger } from './config'

export {
  StatewireError,
  BindingError,
  BindingSyntaxError,
  UnsupportedExpressionShapeError,
  AmbiguousOrMissingTargetError,
  MarkerInvocationError,
  HandlerError,
  ReentrancyViolationError,
  MissingHandlerError,
  LifecycleError
} from './errors'
