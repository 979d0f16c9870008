/**
 * Headless widgets
 * ================
 *
 * A minimal property-store toolkit for running views without a GUI. Every
 * widget property reports two phases: `changed` on each assignment and
 * `committed` once the edit is final. Deferred properties (the text of a text
 * box) only commit when `commit()` is called, like a text field losing focus;
 * all others commit immediately.
 */

import type { EventProducer } from './events'

type WidgetPhase = 'changed' | 'committed'

type WidgetListener = (property: string, phase: WidgetPhase) => void

class Widget {
  private readonly values = new Map<string, unknown>()
  private readonly listeners = new Set<WidgetListener>()
  private readonly uncommitted = new Set<string>()

  constructor(private readonly deferred: readonly string[] = []) {}

  subscribe(listener: WidgetListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /** Commits pending edits of deferred properties. */
  commit(): void {
    const pending = [...this.uncommitted]
    this.uncommitted.clear()
    pending.forEach(property => this.emit(property, 'committed'))
  }

  protected read<T>(property: string, fallback: T): T {
    return this.values.has(property) ? this.readStored(property, fallback) : fallback
  }

  protected write(property: string, value: unknown): void {
    if (this.values.has(property) && Object.is(this.values.get(property), value)) return
    this.values.set(property, value)
    this.emit(property, 'changed')
    if (this.deferred.includes(property)) {
      this.uncommitted.add(property)
    } else {
      this.emit(property, 'committed')
    }
  }

  private readStored<T>(property: string, fallback: T): T {
    const value = this.values.get(property)
    return isSameKind(value, fallback) ? value : fallback
  }

  private emit(property: string, phase: WidgetPhase): void {
    for (const listener of [...this.listeners]) listener(property, phase)
  }
}

function isSameKind<T>(value: unknown, fallback: T): value is T {
  return fallback === undefined || fallback === null || typeof value === typeof fallback
}

class Label extends Widget {
  get text(): string {
    return this.read('text', '')
  }

  set text(value: string) {
    this.write('text', value)
  }
}

class TextBox extends Widget {
  constructor() {
    super(['text'])
  }

  get text(): string {
    return this.read('text', '')
  }

  set text(value: string) {
    this.write('text', value)
  }

  get isEnabled(): boolean {
    return this.read('isEnabled', true)
  }

  set isEnabled(value: boolean) {
    this.write('isEnabled', value)
  }

  /** Types `value` into the box and commits it. */
  enter(value: string): void {
    this.text = value
    this.commit()
  }
}

class CheckBox extends Widget {
  get isChecked(): boolean {
    return this.read('isChecked', false)
  }

  set isChecked(value: boolean) {
    this.write('isChecked', value)
  }
}

class Button extends Widget {
  private readonly clickListeners = new Set<() => void>()

  /** Click occurrences, for wrapping with `fromProducer`. */
  readonly click: EventProducer<void> = {
    subscribe: listener => {
      this.clickListeners.add(listener)
      return () => {
        this.clickListeners.delete(listener)
      }
    }
  }

  get content(): string {
    return this.read('content', '')
  }

  set content(value: string) {
    this.write('content', value)
  }

  get isEnabled(): boolean {
    return this.read('isEnabled', true)
  }

  set isEnabled(value: boolean) {
    this.write('isEnabled', value)
  }

  /** Raises a click unless the button is disabled. */
  performClick(): void {
    if (!this.isEnabled) return
    this.clickListeners.forEach(listener => listener())
  }
}

function isWidget(value: unknown): value is Widget {
  return value instanceof Widget
}

export { Widget, Label, TextBox, CheckBox, Button, isWidget }
export type { WidgetPhase, WidgetListener }
