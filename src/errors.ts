import type { Node } from 'acorn'

const PREFIX = '[statewire]'

export class StatewireError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(`${PREFIX} ${message}`, options)
    this.name = 'StatewireError'
  }
}

// -----------------------------------------------------------------------------
// Binding compilation
// -----------------------------------------------------------------------------

export class BindingError extends StatewireError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'BindingError'
  }
}

/** The binding source could not be parsed at all. */
export class BindingSyntaxError extends BindingError {
  constructor(detail: string, options?: ErrorOptions) {
    super(`Invalid binding source: ${detail}`, options)
    this.name = 'BindingSyntaxError'
  }
}

export class UnsupportedExpressionShapeError extends BindingError {
  readonly node: Node
  readonly text: string

  constructor(node: Node, text: string, detail?: string) {
    super(`Unsupported binding expression \`${text}\`${detail ? `: ${detail}` : ''}`)
    this.name = 'UnsupportedExpressionShapeError'
    this.node = node
    this.text = text
  }
}

export class AmbiguousOrMissingTargetError extends BindingError {
  readonly text: string

  constructor(text: string, detail: string) {
    super(`Cannot resolve binding target \`${text}\`: ${detail}`)
    this.name = 'AmbiguousOrMissingTargetError'
    this.text = text
  }
}

/** A compile-time marker (`format`, `current`, `convert` ...) was called at run time. */
export class MarkerInvocationError extends StatewireError {
  constructor(marker: string) {
    super(`\`${marker}\` is a binding marker and must only appear inside binding statements`)
    this.name = 'MarkerInvocationError'
  }
}

// -----------------------------------------------------------------------------
// Dispatch
// -----------------------------------------------------------------------------

/** Wraps a failure raised by a sync or async handler. The original is kept as `cause`. */
export class HandlerError<E = unknown> extends StatewireError {
  readonly event: E

  constructor(event: E, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Handler failed for event ${describeEvent(event)}: ${reason}`, { cause })
    this.name = 'HandlerError'
    this.event = event
  }
}

export class ReentrancyViolationError extends StatewireError {
  constructor(detail: string) {
    super(`Reentrant dispatch detected: ${detail}`)
    this.name = 'ReentrancyViolationError'
  }
}

export class MissingHandlerError extends StatewireError {
  readonly eventType: string

  constructor(eventType: string) {
    super(`No handler is mapped for event "${eventType}"`)
    this.name = 'MissingHandlerError'
    this.eventType = eventType
  }
}

export class LifecycleError extends StatewireError {
  constructor(message: string) {
    super(message)
    this.name = 'LifecycleError'
  }
}

function describeEvent(event: unknown): string {
  if (typeof event === 'object' && event !== null) {
    if ('type' in event && typeof event.type === 'string') return `"${event.type}"`
    if ('tag' in event && typeof event.tag === 'string') return `<${event.tag}>`
  }
  return String(event)
}
