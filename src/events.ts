/**
 * Event streams
 * =============
 *
 * Every event source of a component (widget events, timers, external feeds)
 * is wrapped as an {@link EventStream} of domain events. Streams are push
 * based: an occurrence nobody is subscribed to is dropped, nothing is buffered.
 */

import { getConfig, getLogger } from './config'

// =============================================================================
// TYPES
// =============================================================================

type Observer<T> = (event: T) => void

/** Raw producer of occurrences, e.g. a widget's click or a socket's messages. */
interface EventProducer<T> {
  subscribe(listener: (occurrence: T) => void): () => void
}

interface EventStream<T> extends EventProducer<T> {
  subscribe(observer: Observer<T>): () => void
  map<U>(transform: (event: T) => U): EventStream<U>
  filter(predicate: (event: T) => boolean): EventStream<T>
  /** Emits the last event once `ms` have passed without another one. */
  debounce(ms: number): EventStream<T>
  /** Emits at most one event every `ms`, dropping the rest. */
  throttle(ms: number): EventStream<T>
}

// =============================================================================
// STREAM CONSTRUCTION
// =============================================================================

/**
 * Builds a stream from a subscribe function. Operators create new streams
 * that subscribe to this one lazily.
 */
function createStream<T>(subscribe: (observer: Observer<T>) => () => void): EventStream<T> {
  const stream: EventStream<T> = {
    subscribe,

    map: <U>(transform: (event: T) => U) =>
      createStream<U>(observer => subscribe(event => observer(transform(event)))),

    filter: (predicate: (event: T) => boolean) =>
      createStream<T>(observer =>
        subscribe(event => {
          if (predicate(event)) observer(event)
        })
      ),

    debounce: (ms: number) =>
      createStream<T>(observer => {
        let timeoutId: ReturnType<typeof setTimeout> | null = null
        const unsubscribe = subscribe(event => {
          if (timeoutId) clearTimeout(timeoutId)
          timeoutId = setTimeout(() => {
            timeoutId = null
            observer(event)
          }, ms)
        })
        return () => {
          if (timeoutId) clearTimeout(timeoutId)
          unsubscribe()
        }
      }),

    throttle: (ms: number) =>
      createStream<T>(observer => {
        let lastEmit = Number.NEGATIVE_INFINITY
        return subscribe(event => {
          const now = Date.now()
          if (now - lastEmit >= ms) {
            lastEmit = now
            observer(event)
          }
        })
      })
  }
  return stream
}

/**
 * Creates a stream together with the function that emits into it.
 *
 * @example
 * ```ts
 * const [clicked, emitClicked] = createEvent<{ type: 'clicked' }>()
 * clicked.subscribe(event => console.log(event.type))
 * emitClicked({ type: 'clicked' })
 * ```
 */
function createEvent<T>(): [EventStream<T>, (event: T) => void] {
  const subscribers = new Set<Observer<T>>()

  const stream = createStream<T>(observer => {
    subscribers.add(observer)
    return () => {
      subscribers.delete(observer)
    }
  })

  const emit = (event: T): void => {
    for (const observer of [...subscribers]) observer(event)
  }

  return [stream, emit]
}

// =============================================================================
// ADAPTERS
// =============================================================================

/**
 * Wraps a producer so that every raw occurrence becomes exactly one domain
 * event, in emission order.
 */
function fromProducer<TRaw, TEvent>(
  producer: EventProducer<TRaw>,
  toEvent: (occurrence: TRaw) => TEvent
): EventStream<TEvent> {
  return createStream<TEvent>(observer => producer.subscribe(occurrence => observer(toEvent(occurrence))))
}

/** A timer source ticking every `ms` while subscribed. `tick` counts from 1. */
function fromInterval<TEvent>(ms: number, toEvent: (tick: number) => TEvent): EventStream<TEvent> {
  return createStream<TEvent>(observer => {
    let tick = 0
    const intervalId = setInterval(() => {
      tick += 1
      observer(toEvent(tick))
    }, ms)
    return () => clearInterval(intervalId)
  })
}

/**
 * Pulls an external async feed while subscribed. Unsubscribing stops the
 * iteration; a failing feed is logged and sent to the unhandled-error channel.
 */
function fromAsyncIterable<TRaw, TEvent>(
  iterable: AsyncIterable<TRaw>,
  toEvent: (item: TRaw) => TEvent
): EventStream<TEvent> {
  const reportFailure = (error: unknown): void => {
    getLogger().error('Async event source failed', error)
    getConfig().onUnhandledError(error)
  }

  return createStream<TEvent>(observer => {
    let active = true
    const iterator = iterable[Symbol.asyncIterator]()

    const pump = async (): Promise<void> => {
      while (active) {
        const next = await iterator.next()
        if (next.done || !active) return
        observer(toEvent(next.value))
      }
    }
    pump().catch(reportFailure)

    return () => {
      if (!active) return
      active = false
      iterator.return?.()?.catch(reportFailure)
    }
  })
}

/** Merges same-typed sibling sources into one stream, in arrival order. */
function merge<T>(...streams: ReadonlyArray<EventProducer<T>>): EventStream<T> {
  return createStream<T>(observer => {
    const unsubscribers = streams.map(stream => stream.subscribe(observer))
    return () => unsubscribers.forEach(unsubscribe => unsubscribe())
  })
}

export { createStream, createEvent, fromProducer, fromInterval, fromAsyncIterable, merge }
export type { EventStream, EventProducer, Observer }
