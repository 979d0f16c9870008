import type { EventProducer, EventStream } from './events'
import { createStream } from './events'
import { getConfig, getLogger } from './config'
import { createSerialQueue, serialObserver } from './serial'

// =============================================================================
// EITHER
// =============================================================================

type Either<A, B> = { readonly tag: 'left'; readonly value: A } | { readonly tag: 'right'; readonly value: B }

type Left<A> = Extract<Either<A, never>, { tag: 'left' }>
type Right<B> = Extract<Either<never, B>, { tag: 'right' }>

function left<A>(value: A): Left<A> {
  return { tag: 'left', value }
}

function right<B>(value: B): Right<B> {
  return { tag: 'right', value }
}

function isLeft<A, B>(either: Either<A, B>): either is Left<A> {
  return either.tag === 'left'
}

function isRight<A, B>(either: Either<A, B>): either is Right<B> {
  return either.tag === 'right'
}

function matchEither<A, B, R>(either: Either<A, B>, onLeft: (value: A) => R, onRight: (value: B) => R): R {
  return either.tag === 'left' ? onLeft(either.value) : onRight(either.value)
}

// =============================================================================
// UNIFY
// =============================================================================

/**
 * Merges two differently typed streams into one stream of tagged events.
 *
 * Per-stream order is preserved and events interleave in arrival order. Each
 * subscriber receives one event at a time: an event arriving while the
 * subscriber is still handling the previous one is queued behind it.
 * Nested unifiers share the outermost one's queue, so reentrant events keep
 * their emission order across the whole tree.
 * Unifying unified streams nests the tags, so `unify(unify(a, b), c)` yields
 * `left(left(x))`, `left(right(y))` and `right(z)`.
 *
 * @example
 * ```ts
 * const events = unify(parent.view.events, child.view.events)
 * events.subscribe(event => matchEither(event, handleParent, handleChild))
 * ```
 */
/** Observers that already feed a serial queue; a unifier subscribed through one delivers straight to it. */
const serialisedObservers = new WeakSet<object>()

function unify<A, B>(streamA: EventProducer<A>, streamB: EventProducer<B>): EventStream<Either<A, B>> {
  return createStream<Either<A, B>>(observer => {
    const deliver = serialisedObservers.has(observer)
      ? observer
      : serialObserver(
          createSerialQueue({
            onError: error => {
              getLogger().error('Unified stream observer failed', error)
              getConfig().onUnhandledError(error)
            }
          }),
          observer
        )
    const onA = (value: A): void => deliver(left(value))
    const onB = (value: B): void => deliver(right(value))
    serialisedObservers.add(onA)
    serialisedObservers.add(onB)
    const unsubscribeA = streamA.subscribe(onA)
    const unsubscribeB = streamB.subscribe(onB)
    return () => {
      unsubscribeA()
      unsubscribeB()
    }
  })
}

export { left, right, isLeft, isRight, matchEither, unify }
export type { Either, Left, Right }
