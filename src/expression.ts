/**
 * Binding statements are ordinary JavaScript assignment statements parsed with
 * acorn into ESTree nodes. The compiler only ever reads these trees; the
 * right-hand sides are never executed.
 */

import { parse, parseExpressionAt } from 'acorn'
import type { AssignmentExpression, Expression, MemberExpression, Node, Options, Program } from 'acorn'
import { BindingSyntaxError } from './errors'

/** Closed-over environment of a binding batch: widgets, helpers, converters. */
type BindingScope = Readonly<Record<string, unknown>>

/**
 * One top-level statement of a binding batch. `assignment` is absent when the
 * statement is not a plain `target.property = expression` assignment.
 */
interface BindingStatement {
  readonly text: string
  readonly node: Node
  readonly assignment?: AssignmentExpression
}

type Evaluation = { readonly ok: true; readonly value: unknown } | { readonly ok: false }

const PARSE_OPTIONS: Options = { ecmaVersion: 'latest', sourceType: 'script' }

const NOT_EVALUABLE: Evaluation = { ok: false }

function parseBindingStatements(source: string): BindingStatement[] {
  let program: Program
  try {
    program = parse(source, PARSE_OPTIONS)
  } catch (error) {
    throw new BindingSyntaxError(error instanceof Error ? error.message : String(error), { cause: error })
  }

  return program.body.map(statement => {
    const text = source.slice(statement.start, statement.end).replace(/;\s*$/, '')
    if (
      statement.type === 'ExpressionStatement' &&
      statement.expression.type === 'AssignmentExpression' &&
      statement.expression.operator === '='
    ) {
      return { text, node: statement, assignment: statement.expression }
    }
    return { text, node: statement }
  })
}

/** Parses a single right-hand-side expression. */
function parseBindingExpression(source: string): Expression {
  let expression: Expression
  try {
    expression = parseExpressionAt(source, 0, PARSE_OPTIONS)
  } catch (error) {
    throw new BindingSyntaxError(error instanceof Error ? error.message : String(error), { cause: error })
  }
  if (source.slice(expression.end).trim() !== '') {
    throw new BindingSyntaxError(`unexpected input after expression: ${source.slice(expression.end).trim()}`)
  }
  return expression
}

/** Source text of `node` as written by the user. */
function textOf(node: Node, source: string): string {
  return source.slice(node.start, node.end)
}

/**
 * Key of a member access: the identifier of `a.b`, or the literal of
 * `a['b']` / `a[0]`. Computed keys of any other form have no static key.
 */
function memberKey(node: MemberExpression): string | number | undefined {
  if (!node.computed) {
    return node.property.type === 'Identifier' ? node.property.name : undefined
  }
  if (node.property.type === 'Literal') {
    const { value } = node.property
    if (typeof value === 'string' || typeof value === 'number') return value
  }
  return undefined
}

/**
 * Evaluates an identifier or member-access chain against `scope`, falling back
 * to globals for identifiers the scope does not define. Any other node shape,
 * or a chain that walks through `null`/`undefined`, is not evaluable.
 */
function evaluateChain(node: Node, scope: BindingScope): Evaluation {
  if (isExpressionOfType(node, 'ChainExpression')) {
    return evaluateChain(node.expression, scope)
  }
  if (isExpressionOfType(node, 'Identifier')) {
    if (Object.hasOwn(scope, node.name)) return { ok: true, value: scope[node.name] }
    if (node.name in globalThis) return { ok: true, value: Reflect.get(globalThis, node.name) }
    return NOT_EVALUABLE
  }
  if (isExpressionOfType(node, 'MemberExpression')) {
    const key = memberKey(node)
    if (key === undefined || node.object.type === 'Super') return NOT_EVALUABLE
    const owner = evaluateChain(node.object, scope)
    if (!owner.ok || !isObjectLike(owner.value)) return NOT_EVALUABLE
    return { ok: true, value: Reflect.get(owner.value, key) }
  }
  return NOT_EVALUABLE
}

/** Root identifier of a member chain (`view` for `view.a.b`). */
function rootIdentifier(node: Node): string | undefined {
  if (isExpressionOfType(node, 'Identifier')) return node.name
  if (isExpressionOfType(node, 'MemberExpression') && node.object.type !== 'Super') {
    return rootIdentifier(node.object)
  }
  if (isExpressionOfType(node, 'ChainExpression')) return rootIdentifier(node.expression)
  return undefined
}

function isObjectLike(value: unknown): value is object {
  return (typeof value === 'object' && value !== null) || typeof value === 'function'
}

type ExpressionOfType<K extends Expression['type']> = Extract<Expression, { type: K }>

function isExpressionOfType<K extends Expression['type']>(node: Node, type: K): node is ExpressionOfType<K> {
  return node.type === type
}

export {
  parseBindingStatements,
  parseBindingExpression,
  textOf,
  memberKey,
  evaluateChain,
  rootIdentifier,
  isObjectLike,
  isExpressionOfType
}
export type { BindingScope, BindingStatement, Evaluation, ExpressionOfType }
