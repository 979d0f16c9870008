/**
 * Dispatch runtime
 * ================
 *
 * Owns the subscription to a component's event stream and routes every event
 * to the handler its controller maps it to.
 *
 * - Deliveries are serialised: an event raised while a handler is running
 *   (typically by the handler's own model change) is queued and dispatched
 *   after the handler returns.
 * - Sync handlers run inline. Async handlers are started and not awaited;
 *   they come back into the dispatch context through `enter`.
 * - Handler failures never stop the runtime. They are wrapped in a
 *   `HandlerError` and passed to `onError`, whose default forwards them to the
 *   configured unhandled-error channel.
 */

import { getConfig, getLogger } from './config'
import type { DispatchScope } from './context'
import { attachModel, detachModel, runInScope } from './context'
import { HandlerError, LifecycleError, MissingHandlerError } from './errors'
import type { EventStream } from './events'
import { Lifecycle } from './lifecycle'
import type { LifecycleState } from './lifecycle'
import { createSerialQueue, ReentrancyGuard, serialObserver } from './serial'
import type { SerialQueue } from './serial'

// =============================================================================
// HANDLERS
// =============================================================================

interface HandlerContext {
  /** Aborted when the handler is cancelled. */
  readonly signal: AbortSignal
  /**
   * Runs `work` inside the dispatch context. Model changes made after an
   * `await` belong here. Rejects without running `work` once `signal` is
   * aborted.
   */
  enter<T>(work: () => T): Promise<T>
}

interface SyncHandler<M> {
  readonly kind: 'sync'
  run(model: M): void
}

interface AsyncHandler<M> {
  readonly kind: 'async'
  run(model: M, context: HandlerContext): Promise<void>
  /** Compensating action, run in the dispatch context when the handler is cancelled. */
  readonly onCancel?: (model: M) => void
  /** Own cancellation signal; the runtime's shared one is used otherwise. */
  readonly signal?: AbortSignal
}

type Handler<M> = SyncHandler<M> | AsyncHandler<M>

function syncHandler<M>(run: (model: M) => void): SyncHandler<M> {
  return { kind: 'sync', run }
}

/**
 * @example
 * ```ts
 * asyncHandler(async (model, { signal, enter }) => {
 *   await delay(1000, signal)
 *   await enter(() => { model.status = 'done' })
 * }, { onCancel: model => { model.status = 'cancelled' } })
 * ```
 */
function asyncHandler<M>(
  run: (model: M, context: HandlerContext) => Promise<void>,
  options: { onCancel?: (model: M) => void; signal?: AbortSignal } = {}
): AsyncHandler<M> {
  return { kind: 'async', run, ...options }
}

/** Rebases a handler written for a child model onto its parent model. */
function mapHandler<P, C>(handler: Handler<C>, select: (parent: P) => C): Handler<P> {
  if (handler.kind === 'sync') {
    return { kind: 'sync', run: parent => handler.run(select(parent)) }
  }
  const { onCancel } = handler
  return {
    kind: 'async',
    run: (parent, context) => handler.run(select(parent), context),
    ...(onCancel && { onCancel: (parent: P) => onCancel(select(parent)) }),
    ...(handler.signal && { signal: handler.signal })
  }
}

// =============================================================================
// CONTROLLER AND VIEW
// =============================================================================

interface Controller<M, E> {
  initModel(model: M): void
  dispatch(event: E): Handler<M>
  /** Event types this controller maps, checked against `View.eventTypes` at start. */
  readonly handledTypes?: readonly string[]
  /** Checks the components this controller was composed from. Called at start. */
  verifyParts?(): void
}

interface Disposable {
  dispose(): void
}

interface View<M, E> {
  readonly events: EventStream<E>
  setBindings(model: M): Disposable | void
  /** Every event type the view can raise. */
  readonly eventTypes?: readonly string[]
}

type HandlerMap<M, E extends { type: string }> = {
  [K in E['type']]: (event: Extract<E, { type: K }>) => Handler<M>
}

/**
 * Builds a controller from one handler factory per event type. The map must
 * name every member of the event union.
 *
 * @example
 * ```ts
 * type Event = { type: 'add' } | { type: 'reset' }
 * const controller = createController<Calculator, Event>(model => { model.result = 0 }, {
 *   add: () => syncHandler(model => { model.result = model.x + model.y }),
 *   reset: () => syncHandler(model => { model.result = 0 })
 * })
 * ```
 */
function createController<M, E extends { type: string }>(
  initModel: (model: M) => void,
  handlers: HandlerMap<M, E>
): Controller<M, E> {
  return {
    initModel,
    handledTypes: Object.keys(handlers),
    dispatch(event: E): Handler<M> {
      if (!Object.hasOwn(handlers, event.type)) throw new MissingHandlerError(event.type)
      const type: E['type'] = event.type
      const handler = handlers[type]
      // The map is keyed by the event's own type, so the event has the handler's parameter type.
      return handler(event as Extract<E, { type: E['type'] }>)
    }
  }
}

/**
 * Throws `MissingHandlerError` for the first event type `view` declares that
 * `controller` does not map. Sides that declare no types are not checked.
 */
function verifyHandlers<M, E>(view: View<M, E>, controller: Controller<M, E>): void {
  controller.verifyParts?.()
  const { eventTypes } = view
  const { handledTypes } = controller
  if (!eventTypes || !handledTypes) return
  const missing = eventTypes.find(type => !handledTypes.includes(type))
  if (missing !== undefined) throw new MissingHandlerError(missing)
}

/** Builds a view from its event stream and a bindings installer. */
function defineView<M, E>(view: View<M, E>): View<M, E> {
  return view
}

// =============================================================================
// CANCELLATION
// =============================================================================

interface Cancellation {
  /** Signal handed to handlers started from now on. */
  readonly signal: AbortSignal
  /** Aborts the current signal and arms a fresh one for later handlers. */
  cancel(reason?: unknown): void
}

function createCancellation(): Cancellation {
  let controller = new AbortController()
  return {
    get signal() {
      return controller.signal
    },
    cancel(reason?: unknown) {
      const cancelled = controller
      controller = new AbortController()
      cancelled.abort(reason)
    }
  }
}

/** Process-wide cancellation used by async handlers that bring no signal. */
const sharedCancellation = createCancellation()

function abortReason(signal: AbortSignal): unknown {
  const reason: unknown = signal.reason
  return reason ?? new DOMException('This operation was aborted', 'AbortError')
}

/** Resolves after `ms`, or rejects with the abort reason when `signal` aborts first. */
function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal))
      return
    }
    const onAbort = (): void => {
      clearTimeout(timeoutId)
      reject(signal ? abortReason(signal) : undefined)
    }
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

// =============================================================================
// RUNTIME
// =============================================================================

interface RuntimeOptions<E> {
  /** Replaces the default `onError` policy. */
  onError?: (event: E, error: HandlerError<E>) => void
  /** Source of the signal given to async handlers. Defaults to `sharedCancellation`. */
  cancellation?: Cancellation
  /** How the dispatch queue drains when work arrives from outside a delivery. */
  schedule?: (drain: () => void) => void
  /** Overrides the configured `debug` flag for this runtime. */
  debug?: boolean
  /** Name used in log lines. */
  label?: string
}

function isDisposable(value: unknown): value is Disposable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'dispose' in value &&
    typeof value.dispose === 'function'
  )
}

class DispatchRuntime<M extends object, E> {
  private readonly lifecycle: Lifecycle
  private readonly queue: SerialQueue
  private readonly guard: ReentrancyGuard
  private readonly cancellation: Cancellation
  private readonly debug: boolean
  private unsubscribe: (() => void) | undefined
  private bindings: Disposable | undefined

  constructor(
    readonly model: M,
    private readonly view: View<M, E>,
    private readonly controller: Controller<M, E>,
    private readonly options: RuntimeOptions<E> = {}
  ) {
    const label = options.label ?? 'runtime'
    this.lifecycle = new Lifecycle(label)
    this.guard = new ReentrancyGuard(label)
    this.cancellation = options.cancellation ?? sharedCancellation
    this.debug = options.debug ?? getConfig().debug
    this.queue = createSerialQueue({
      schedule: options.schedule,
      onError: error => {
        getLogger().error(`${label}: delivery failed outside a handler`, error)
        getConfig().onUnhandledError(error)
      }
    })
  }

  get state(): LifecycleState {
    return this.lifecycle.state
  }

  /**
   * Initialises the model, installs the view's bindings and subscribes to the
   * view's events.
   *
   * @throws {LifecycleError} when the runtime was already started or disposed.
   * @throws {MissingHandlerError} when a view, or a view it was composed from, declares an event type its controller does not map.
   */
  start(): Disposable {
    if (this.state !== 'idle') {
      throw new LifecycleError(`Cannot start a runtime that is ${this.state}`)
    }
    verifyHandlers(this.view, this.controller)

    attachModel(this.model, this)
    runInScope(this.scopeFor(undefined, this.cancellation.signal), () => this.controller.initModel(this.model))

    const bindings: unknown = this.view.setBindings(this.model)
    if (isDisposable(bindings)) this.bindings = bindings

    this.lifecycle.send('start')
    this.unsubscribe = this.view.events.subscribe(serialObserver(this.queue, event => this.deliver(event)))
    return { dispose: () => this.dispose() }
  }

  dispose(): void {
    if (this.state === 'disposed') return
    this.lifecycle.send('dispose')
    this.unsubscribe?.()
    this.unsubscribe = undefined
    this.bindings?.dispose()
    this.bindings = undefined
    detachModel(this.model, this)
  }

  /**
   * Runs `work` in the dispatch context: immediately when nothing is being
   * delivered, otherwise right after the current delivery.
   */
  enter<T>(work: () => T, signal?: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      if (this.state === 'disposed') {
        reject(new LifecycleError('Cannot enter a disposed runtime'))
        return
      }
      if (signal?.aborted) {
        reject(abortReason(signal))
        return
      }
      this.queue.post(() => {
        if (signal?.aborted) {
          reject(abortReason(signal))
          return
        }
        try {
          resolve(runInScope(this.scopeFor(undefined, signal ?? this.cancellation.signal), work))
        } catch (error) {
          reject(error)
        }
      })
    })
  }

  /**
   * Called with every handler failure. Override (or pass `onError`) to
   * handle failures; the default forwards them to the configured
   * unhandled-error channel with the original error as `cause`.
   */
  onError(event: E, error: HandlerError<E>): void {
    if (this.options.onError) {
      this.options.onError(event, error)
      return
    }
    getLogger().error(error.message, error.cause)
    getConfig().onUnhandledError(error)
  }

  private scopeFor(event: unknown, signal: AbortSignal): DispatchScope {
    return {
      owner: this,
      event,
      signal,
      enter: work => this.enter(work, signal)
    }
  }

  private deliver(event: E): void {
    if (this.state === 'disposed') return
    if (this.debug) this.guard.run(() => this.dispatchOne(event))
    else this.dispatchOne(event)
  }

  private dispatchOne(event: E): void {
    this.lifecycle.send('dispatch')
    try {
      let handler: Handler<M>
      try {
        handler = this.controller.dispatch(event)
      } catch (error) {
        this.fail(event, error)
        return
      }
      if (handler.kind === 'sync') this.runSync(event, handler)
      else this.runAsync(event, handler)
    } finally {
      this.lifecycle.send('done')
    }
  }

  private runSync(event: E, handler: SyncHandler<M>): void {
    try {
      runInScope(this.scopeFor(event, this.cancellation.signal), () => handler.run(this.model))
    } catch (error) {
      this.fail(event, error)
    }
  }

  private runAsync(event: E, handler: AsyncHandler<M>): void {
    const signal = handler.signal ?? this.cancellation.signal
    const context: HandlerContext = { signal, enter: work => this.enter(work, signal) }

    let running: Promise<void>
    try {
      running = runInScope(this.scopeFor(event, signal), () => handler.run(this.model, context))
    } catch (error) {
      this.fail(event, error)
      return
    }

    running.then(
      () => {
        if (signal.aborted) this.compensate(event, handler)
      },
      error => {
        if (signal.aborted) this.compensate(event, handler)
        else this.fail(event, error)
      }
    )
  }

  private compensate(event: E, handler: AsyncHandler<M>): void {
    const { onCancel } = handler
    getLogger().debug(`${this.options.label ?? 'runtime'}: handler cancelled`)
    if (!onCancel) return
    this.enter(() => onCancel(this.model)).catch(error => this.fail(event, error))
  }

  private fail(event: E, error: unknown): void {
    this.onError(event, new HandlerError(event, error))
  }
}

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
}
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
}
