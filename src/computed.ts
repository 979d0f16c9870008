/**
 * Computed properties
 * ===================
 *
 * A computed value reads its dependencies from the source of the function
 * that derives it: `computed(model, m => m.x + m.y)` depends on `x` and `y`
 * and recomputes when the model notifies either of them. The result is a
 * notifying object, so `label.text = model.total.value` binds to it.
 */

import { parseExpressionAt } from 'acorn'
import type { Expression, Node, Property } from 'acorn'
import { getLogger } from './config'
import { isExpressionOfType } from './expression'
import type { Notifying } from './model'
import { extractPath } from './path'

interface Computed<T> extends Notifying<'value'> {
  readonly value: T
  /** Model paths the deriving function reads. `''` means the whole model. */
  readonly dependencies: readonly string[]
  dispose(): void
}

// =============================================================================
// DEPENDENCY ANALYSIS
// =============================================================================

const WHOLE_MODEL = ''

function isNode(value: unknown): value is Node {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    typeof value.type === 'string' &&
    'start' in value &&
    typeof value.start === 'number'
  )
}

function childrenOf(node: Node): Node[] {
  const children: Node[] = []
  for (const value of Object.values(node)) {
    if (Array.isArray(value)) children.push(...value.filter(isNode))
    else if (isNode(value)) children.push(value)
  }
  return children
}

function findFunction(node: Node): ExpressionOfFunction | undefined {
  if (isExpressionOfType(node, 'ArrowFunctionExpression') || isExpressionOfType(node, 'FunctionExpression')) {
    return node
  }
  for (const child of childrenOf(node)) {
    const found = findFunction(child)
    if (found) return found
  }
  return undefined
}

/** `{ key: value }` with a non-computed key; the key is not a read. */
function isStaticProperty(node: Node): node is Property {
  return node.type === 'Property' && 'computed' in node && node.computed === false
}

type ExpressionOfFunction = Extract<Expression, { type: 'ArrowFunctionExpression' | 'FunctionExpression' }>

/** Arrow functions and function expressions parse wrapped in parentheses, methods inside an object literal. */
function parseFunctionSource(source: string): ExpressionOfFunction | undefined {
  for (const wrapped of [`(${source})`, `({${source}})`]) {
    try {
      const expression = parseExpressionAt(wrapped, 0, { ecmaVersion: 'latest' })
      const fn = findFunction(expression)
      if (fn) return fn
    } catch {
      continue
    }
  }
  return undefined
}

function collectPaths(node: Node, root: string, paths: Set<string>): void {
  if (isExpressionOfType(node, 'Identifier')) {
    if (node.name === root) paths.add(WHOLE_MODEL)
    return
  }
  if (isExpressionOfType(node, 'MemberExpression')) {
    const extracted = extractPath(node)
    if (extracted?.source === root) paths.add(extracted.path)
    else collectPaths(node.object, root, paths)
    if (node.computed) collectPaths(node.property, root, paths)
    return
  }
  if (isStaticProperty(node)) {
    collectPaths(node.value, root, paths)
    return
  }
  for (const child of childrenOf(node)) collectPaths(child, root, paths)
}

/**
 * Model paths read by a deriving function, given the function or its source.
 *
 * @example
 * ```ts
 * dependenciesOf(m => m.order.total * m.rate) // ['order.total', 'rate']
 * ```
 */
function dependenciesOf(fn: ((model: never) => unknown) | string): string[] {
  const source = typeof fn === 'string' ? fn : fn.toString()
  const parsed = parseFunctionSource(source)
  if (!parsed) {
    getLogger().debug('Could not parse a computed function; it will recompute on every change')
    return [WHOLE_MODEL]
  }
  const [param] = parsed.params
  if (!param) return []
  if (param.type !== 'Identifier') return [WHOLE_MODEL]

  const paths = new Set<string>()
  collectPaths(parsed.body, param.name, paths)
  return [...paths]
}

function firstSegment(path: string): string {
  return path.split(/[./[]/, 1)[0]
}

// =============================================================================
// COMPUTED
// =============================================================================

/**
 * Derives a cached value from `model`. Subscribers hear `'value'` whenever a
 * recomputation yields a different value.
 *
 * @example
 * ```ts
 * const model = createModel({ price: 2, quantity: 3 })
 * const total = computed(model, m => m.price * m.quantity)
 * total.value // 6
 * model.quantity = 4
 * total.value // 8
 * ```
 */
function computed<M extends Notifying, T>(model: M, fn: (model: M) => T): Computed<T> {
  const dependencies = dependenciesOf(fn)
  const names = new Set(dependencies.map(firstSegment))
  const listeners = new Set<(name: 'value') => void>()
  let value = fn(model)

  const unsubscribe = model.subscribe(name => {
    if (!names.has(WHOLE_MODEL) && !names.has(name)) return
    const next = fn(model)
    if (Object.is(next, value)) return
    value = next
    for (const listener of [...listeners]) listener('value')
  })

  return {
    get value() {
      return value
    },
    dependencies,
    subscribe(listener) {
      listeners.add(listener)
      return () => {
        listeners.delete(listener)
      }
    },
    dispose() {
      unsubscribe()
      listeners.clear()
    }
  }
}

export { computed, dependenciesOf }
export type { Computed }
