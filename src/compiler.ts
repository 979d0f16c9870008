/**
 * Binding expression compiler
 * ===========================
 *
 * Reduces the right side of a binding statement to a {@link BindingDescriptor}
 * by running an ordered list of rules over the expression tree. The first rule
 * that recognises a node wins; most rules recurse into a sub-expression and
 * then adjust the descriptor that comes back.
 *
 * Supported shapes, in order:
 *
 * 1. `model.a.b`, `model.items.currentItem.name`, `current(model.items)`
 * 2. `Number(x)`, `Boolean(x)`, `+x` (coercions, dropped)
 * 3. `String(x)`, `x.toString()`, `` `${x}` `` (stringification, dropped)
 * 4. `nullable(x)`, `x ?? null`, `x ?? undefined` (nullable shims, dropped)
 * 5. `format('Total: {0}', x)`
 * 6. `fn(x)` where `fn` is a function in scope (one-way converter)
 * 7. `convert(converter, x)` (two-way converter)
 * 8. `withOptions(x, { mode: 'TwoWay' })`
 */

import type { CallExpression, Expression, Node, SpreadElement } from 'acorn'
import { getConfig } from './config'
import type {
  BindingDescriptor,
  BindingMode,
  BindingOptions,
  PathSegment,
  ValueConverter
} from './descriptor'
import { isBindingMode, isTwoWayConverter, isUpdateTrigger } from './descriptor'
import { BindingError, UnsupportedExpressionShapeError } from './errors'
import {
  evaluateChain,
  isExpressionOfType,
  isObjectLike,
  parseBindingExpression,
  parseBindingStatements,
  rootIdentifier
} from './expression'
import type { BindingScope, BindingStatement } from './expression'
import { markerOf } from './markers'
import { extractPath, isMarkerCall } from './path'
import { resolveTarget } from './target'

// =============================================================================
// TYPES
// =============================================================================

interface CompileOptions {
  /** Widgets, helpers and converters the statements refer to. */
  scope?: BindingScope
  /** Name of the variable standing for the model. Defaults to `model`. */
  sourceName?: string
  /** Applied to every compiled descriptor. */
  options?: BindingOptions
}

/** What the rules build up before defaults are applied. */
interface PartialDescriptor {
  readonly path: string
  readonly segments: readonly PathSegment[]
  readonly mode?: BindingMode
  readonly converter?: ValueConverter
  readonly format?: string
  readonly options: BindingOptions
}

interface CompileEnvironment {
  readonly scope: BindingScope
  readonly sourceName: string
}

type Recurse = (node: Node) => PartialDescriptor | undefined

interface BindingRule {
  readonly name: string
  match(node: Node, env: CompileEnvironment, recurse: Recurse): PartialDescriptor | undefined
}

interface CompiledBinding {
  readonly text: string
  readonly target: object
  readonly property: string
  readonly descriptor: BindingDescriptor
}

type CompileResult =
  | { readonly ok: true; readonly binding: CompiledBinding }
  | { readonly ok: false; readonly text: string; readonly error: BindingError }

// =============================================================================
// RULE HELPERS
// =============================================================================

type Argument = Expression | SpreadElement

function plainArguments(call: CallExpression, count: number): Expression[] | undefined {
  if (call.arguments.length !== count) return undefined
  const args = call.arguments.filter((arg: Argument): arg is Expression => arg.type !== 'SpreadElement')
  return args.length === count ? args : undefined
}

/** A call to a global such as `String` that the scope does not shadow. */
function isGlobalCall(node: CallExpression, names: readonly string[], env: CompileEnvironment): boolean {
  const { callee } = node
  return (
    callee.type === 'Identifier' &&
    names.includes(callee.name) &&
    !Object.hasOwn(env.scope, callee.name)
  )
}

function literalString(node: Node): string | undefined {
  if (isExpressionOfType(node, 'Literal') && typeof node.value === 'string') return node.value
  if (isExpressionOfType(node, 'TemplateLiteral') && node.expressions.length === 0) {
    return node.quasis.map(quasi => quasi.value.cooked ?? quasi.value.raw).join('')
  }
  return undefined
}

/** Options given inline to `withOptions`, either as an object literal or a scope value. */
function readInlineOptions(node: Node, env: CompileEnvironment): BindingOptions | undefined {
  const raw: Record<string, unknown> = {}
  if (isExpressionOfType(node, 'ObjectExpression')) {
    for (const property of node.properties) {
      if (property.type !== 'Property' || property.computed || property.kind !== 'init') return undefined
      const key = property.key.type === 'Identifier' ? property.key.name : literalString(property.key)
      if (key === undefined) return undefined
      if (isExpressionOfType(property.value, 'Literal')) {
        raw[key] = property.value.value
      } else if (isExpressionOfType(property.value, 'Identifier') && property.value.name === 'undefined') {
        raw[key] = undefined
      } else {
        const value = evaluateChain(property.value, env.scope)
        if (!value.ok) return undefined
        raw[key] = value.value
      }
    }
  } else {
    const value = evaluateChain(node, env.scope)
    if (!value.ok || !isObjectLike(value.value)) return undefined
    Object.assign(raw, value.value)
  }
  return toBindingOptions(raw)
}

function toBindingOptions(raw: Record<string, unknown>): BindingOptions | undefined {
  const options: BindingOptions = {}
  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case 'mode':
        if (!isBindingMode(value)) return undefined
        options.mode = value
        break
      case 'updateTrigger':
        if (!isUpdateTrigger(value)) return undefined
        options.updateTrigger = value
        break
      case 'validatesOnDataErrors':
      case 'validatesOnExceptions':
        if (typeof value !== 'boolean') return undefined
        options[key] = value
        break
      case 'fallbackValue':
      case 'nullValue':
        options[key] = value
        break
      default:
        return undefined
    }
  }
  return options
}

function isUnaryFunction(value: unknown): value is (value: unknown) => unknown {
  return typeof value === 'function'
}

function compose(outer: (value: unknown) => unknown, inner: ValueConverter | undefined): ValueConverter {
  if (!inner) return { convert: outer }
  return { convert: value => outer(inner.convert(value)) }
}

// =============================================================================
// RULES
// =============================================================================

const pathRule: BindingRule = {
  name: 'path',
  match(node, env) {
    const extracted = extractPath(node, env.scope)
    if (!extracted || extracted.source !== env.sourceName) return undefined
    return { path: extracted.path, segments: extracted.segments, options: {} }
  }
}

const coercionRule: BindingRule = {
  name: 'coercion',
  match(node, env, recurse) {
    if (isExpressionOfType(node, 'UnaryExpression') && node.operator === '+') {
      return recurse(node.argument)
    }
    if (isExpressionOfType(node, 'CallExpression') && isGlobalCall(node, ['Number', 'Boolean'], env)) {
      const args = plainArguments(node, 1)
      return args ? recurse(args[0]) : undefined
    }
    return undefined
  }
}

const stringifyRule: BindingRule = {
  name: 'stringify',
  match(node, env, recurse) {
    if (isExpressionOfType(node, 'CallExpression')) {
      if (isGlobalCall(node, ['String'], env)) {
        const args = plainArguments(node, 1)
        return args ? recurse(args[0]) : undefined
      }
      const { callee } = node
      if (
        callee.type === 'MemberExpression' &&
        !callee.computed &&
        callee.property.type === 'Identifier' &&
        callee.property.name === 'toString' &&
        callee.object.type !== 'Super' &&
        node.arguments.length === 0
      ) {
        return recurse(callee.object)
      }
      return undefined
    }
    if (
      isExpressionOfType(node, 'TemplateLiteral') &&
      node.expressions.length === 1 &&
      node.quasis.every(quasi => quasi.value.raw === '')
    ) {
      return recurse(node.expressions[0])
    }
    return undefined
  }
}

const nullableRule: BindingRule = {
  name: 'nullable',
  match(node, env, recurse) {
    if (isExpressionOfType(node, 'CallExpression') && isMarkerCall(node.callee, 'nullable', env.scope)) {
      const args = plainArguments(node, 1)
      return args ? recurse(args[0]) : undefined
    }
    if (isExpressionOfType(node, 'LogicalExpression') && node.operator === '??') {
      const { right } = node
      const isNull = isExpressionOfType(right, 'Literal') && right.value === null
      const isUndefined = isExpressionOfType(right, 'Identifier') && right.name === 'undefined'
      return isNull || isUndefined ? recurse(node.left) : undefined
    }
    return undefined
  }
}

const formatRule: BindingRule = {
  name: 'format',
  match(node, env, recurse) {
    if (!isExpressionOfType(node, 'CallExpression') || !isMarkerCall(node.callee, 'format', env.scope)) {
      return undefined
    }
    const args = plainArguments(node, 2)
    if (!args) return undefined
    const pattern = literalString(args[0])
    if (pattern === undefined) return undefined
    const inner = recurse(args[1])
    return inner ? { ...inner, format: pattern } : undefined
  }
}

const unaryConverterRule: BindingRule = {
  name: 'unary-converter',
  match(node, env, recurse) {
    if (!isExpressionOfType(node, 'CallExpression') || node.callee.type === 'Super') return undefined
    const args = plainArguments(node, 1)
    if (!args) return undefined
    if (rootIdentifier(node.callee) === env.sourceName) return undefined

    const callee = evaluateChain(node.callee, env.scope)
    if (!callee.ok || !isUnaryFunction(callee.value) || markerOf(callee.value) !== undefined) {
      return undefined
    }
    const inner = recurse(args[0])
    if (!inner) return undefined

    const forward = callee.value
    return {
      ...inner,
      mode: 'OneWay',
      converter: inner.converter ? compose(forward, inner.converter) : { convert: forward }
    }
  }
}

const twoWayConverterRule: BindingRule = {
  name: 'two-way-converter',
  match(node, env, recurse) {
    if (!isExpressionOfType(node, 'CallExpression') || !isMarkerCall(node.callee, 'convert', env.scope)) {
      return undefined
    }
    const args = plainArguments(node, 2)
    if (!args) return undefined
    const converter = evaluateChain(args[0], env.scope)
    if (!converter.ok || !isTwoWayConverter(converter.value)) return undefined
    const inner = recurse(args[1])
    if (!inner) return undefined
    if (!inner.converter) return { ...inner, converter: converter.value }
    // Wrapping a one-way converter stays forward-only.
    const outer = converter.value
    return { ...inner, mode: 'OneWay', converter: compose(value => outer.convert(value), inner.converter) }
  }
}

const optionsRule: BindingRule = {
  name: 'options',
  match(node, env, recurse) {
    if (!isExpressionOfType(node, 'CallExpression') || !isMarkerCall(node.callee, 'withOptions', env.scope)) {
      return undefined
    }
    const args = plainArguments(node, 2)
    if (!args) return undefined
    const options = readInlineOptions(args[1], env)
    if (!options) return undefined
    const inner = recurse(args[0])
    return inner ? { ...inner, options: { ...inner.options, ...options } } : undefined
  }
}

/** Rules in precedence order. */
const BINDING_RULES: readonly BindingRule[] = [
  pathRule,
  coercionRule,
  stringifyRule,
  nullableRule,
  formatRule,
  unaryConverterRule,
  twoWayConverterRule,
  optionsRule
]

// =============================================================================
// COMPILATION
// =============================================================================

function matchExpression(node: Node, env: CompileEnvironment): PartialDescriptor | undefined {
  const recurse: Recurse = inner => matchExpression(inner, env)
  for (const rule of BINDING_RULES) {
    const result = rule.match(node, env, recurse)
    if (result) return result
  }
  return undefined
}

function finalize(
  partial: PartialDescriptor,
  callerOptions: BindingOptions,
  node: Node,
  text: string
): BindingDescriptor {
  const config = getConfig()
  const options: BindingOptions = { ...callerOptions, ...partial.options }
  const forwardOnly = partial.converter !== undefined && !isTwoWayConverter(partial.converter)

  const mode =
    options.mode ??
    partial.mode ??
    (partial.format !== undefined || forwardOnly ? 'OneWay' : config.defaultMode)

  if (mode !== 'OneWay' && forwardOnly) {
    throw new UnsupportedExpressionShapeError(
      node,
      text,
      `a one-way converter cannot be used in a ${mode} binding`
    )
  }

  const descriptor: BindingDescriptor = {
    path: partial.path,
    segments: Object.freeze([...partial.segments]),
    mode,
    updateTrigger: options.updateTrigger ?? 'default',
    validatesOnDataErrors: options.validatesOnDataErrors ?? config.validatesOnDataErrors,
    validatesOnExceptions: options.validatesOnExceptions ?? config.validatesOnExceptions,
    ...(partial.converter !== undefined && { converter: partial.converter }),
    ...(partial.format !== undefined && { format: partial.format }),
    ...('fallbackValue' in options && { fallbackValue: options.fallbackValue }),
    ...('nullValue' in options && { nullValue: options.nullValue })
  }
  return Object.freeze(descriptor)
}

function toEnvironment(options: CompileOptions): CompileEnvironment {
  return { scope: options.scope ?? {}, sourceName: options.sourceName ?? 'model' }
}

/**
 * Compiles the right side of one binding statement.
 *
 * @param expression Source text or an already parsed node.
 * @throws {UnsupportedExpressionShapeError} when no rule recognises the expression.
 *
 * @example
 * ```ts
 * compileBinding("format('Running time: {0}', model.elapsed)")
 * // { path: 'elapsed', format: 'Running time: {0}', mode: 'OneWay', ... }
 * ```
 */
function compileBinding(expression: string | Node, options: CompileOptions = {}): BindingDescriptor {
  const node = typeof expression === 'string' ? parseBindingExpression(expression) : expression
  const text = typeof expression === 'string' ? expression.trim() : `<${node.type}>`
  return compileNode(node, text, toEnvironment(options), options.options ?? {})
}

function compileNode(
  node: Node,
  text: string,
  env: CompileEnvironment,
  callerOptions: BindingOptions
): BindingDescriptor {
  const partial = matchExpression(node, env)
  if (!partial) throw new UnsupportedExpressionShapeError(node, text)
  return finalize(partial, callerOptions, node, text)
}

/**
 * Compiles one `target.property = expression` statement, resolving the target
 * against the scope.
 */
function compileStatement(statement: BindingStatement, options: CompileOptions = {}): CompiledBinding {
  const { assignment, text } = statement
  if (!assignment) {
    throw new UnsupportedExpressionShapeError(statement.node, text, 'expected `target.property = expression`')
  }
  const env = toEnvironment(options)
  const { target, property } = resolveTarget(assignment.left, env.scope, text)
  const rightText = text.slice(assignment.right.start - statement.node.start)
  const descriptor = compileNode(assignment.right, rightText, env, options.options ?? {})
  return { text, target, property, descriptor }
}

/**
 * Compiles every statement of a batch independently, in source order. A
 * failing statement is reported in its own result and does not affect the
 * others.
 *
 * @throws {BindingSyntaxError} when the source does not parse.
 */
function compileBindings(source: string, options: CompileOptions = {}): CompileResult[] {
  return parseBindingStatements(source).map((statement): CompileResult => {
    try {
      return { ok: true, binding: compileStatement(statement, options) }
    } catch (error) {
      if (error instanceof BindingError) return { ok: false, text: statement.text, error }
      throw error
    }
  })
}

export { compileBinding, compileStatement, compileBindings, BINDING_RULES }
export type {
  CompileOptions,
  CompiledBinding,
  CompileResult,
  BindingRule,
  PartialDescriptor,
  CompileEnvironment
}
