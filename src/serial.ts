/**
 * Serial delivery
 * ===============
 *
 * A queue that runs posted work strictly one item at a time. Work posted
 * while an item is running (for example an event raised synchronously by a
 * handler's own state change) is appended and runs after the current item
 * returns, never nested inside it. Nothing is dropped.
 */

import type { Observer } from './events'
import { ReentrancyViolationError } from './errors'

interface SerialQueueOptions {
  /**
   * Decides when an idle queue starts draining after work is posted. The
   * default drains immediately; a toolkit can pass its own UI-thread
   * scheduler here.
   */
  schedule?: (drain: () => void) => void
  /** Receives errors thrown by posted work. */
  onError: (error: unknown) => void
}

interface SerialQueue {
  post(work: () => void): void
  /** True while an item is running. */
  readonly busy: boolean
  readonly pending: number
}

function createSerialQueue(options: SerialQueueOptions): SerialQueue {
  const items: Array<() => void> = []
  let draining = false
  let scheduled = false

  const drain = (): void => {
    scheduled = false
    if (draining) return
    draining = true
    try {
      let work = items.shift()
      while (work) {
        try {
          work()
        } catch (error) {
          options.onError(error)
        }
        work = items.shift()
      }
    } finally {
      draining = false
    }
  }

  return {
    post(work) {
      items.push(work)
      if (draining || scheduled) return
      if (options.schedule) {
        scheduled = true
        options.schedule(drain)
      } else {
        drain()
      }
    },
    get busy() {
      return draining
    },
    get pending() {
      return items.length
    }
  }
}

/** Wraps `observer` so deliveries go through `queue`. */
function serialObserver<T>(queue: SerialQueue, observer: Observer<T>): Observer<T> {
  return event => queue.post(() => observer(event))
}

/**
 * Debug check that a delivery never starts while another is running. With
 * deliveries going through a {@link SerialQueue} this only fires on a
 * framework bug.
 */
class ReentrancyGuard {
  private depth = 0

  constructor(private readonly label: string) {}

  get active(): boolean {
    return this.depth > 0
  }

  run<T>(work: () => T): T {
    if (this.depth > 0) {
      throw new ReentrancyViolationError(`${this.label} started while a delivery was still running`)
    }
    this.depth += 1
    try {
      return work()
    } finally {
      this.depth -= 1
    }
  }
}

export { createSerialQueue, serialObserver, ReentrancyGuard }
export type { SerialQueue, SerialQueueOptions }
