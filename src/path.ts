import type { Node } from 'acorn'
import type { PathSegment } from './descriptor'
import { formatPath } from './descriptor'
import { evaluateChain, isExpressionOfType, memberKey } from './expression'
import type { BindingScope } from './expression'
import { markerOf } from './markers'

/** Result of walking a member chain back to its root. */
interface ExtractedPath {
  /** Root identifier, or `undefined` when the chain starts at a literal. */
  readonly source: string | undefined
  readonly path: string
  readonly segments: readonly PathSegment[]
}

const CURRENT_ITEM_PROPERTY = 'currentItem'

/**
 * Turns a member-access chain into a source path.
 *
 * `model.a.b.c` gives `a.b.c`, `model.items.currentItem.name` and
 * `current(model.items).name` give `items/name`, `model.items.currentItem`
 * gives `items/`. Shapes that are not member chains give `undefined` so the
 * caller can try other interpretations.
 *
 * @param scope Used to recognise a renamed `current` marker.
 */
function extractPath(node: Node, scope: BindingScope = {}): ExtractedPath | undefined {
  const segments = collectSegments(node, scope)
  if (!segments) return undefined
  return { source: segments.source, segments: segments.list, path: formatPath(segments.list) }
}

function collectSegments(
  node: Node,
  scope: BindingScope
): { source: string | undefined; list: PathSegment[] } | undefined {
  if (isExpressionOfType(node, 'Identifier')) {
    return { source: node.name, list: [] }
  }
  if (isExpressionOfType(node, 'Literal')) {
    return { source: undefined, list: [] }
  }
  if (isExpressionOfType(node, 'ChainExpression')) {
    return collectSegments(node.expression, scope)
  }
  if (isExpressionOfType(node, 'MemberExpression')) {
    if (node.object.type === 'Super') return undefined
    const key = memberKey(node)
    if (key === undefined) return undefined
    const inner = collectSegments(node.object, scope)
    if (!inner) return undefined

    if (typeof key === 'number') {
      if (!Number.isInteger(key) || key < 0) return undefined
      return { source: inner.source, list: [...inner.list, { kind: 'index', index: key }] }
    }
    if (!node.computed && key === CURRENT_ITEM_PROPERTY) {
      return { source: inner.source, list: [...inner.list, { kind: 'current' }] }
    }
    return { source: inner.source, list: [...inner.list, { kind: 'property', name: key }] }
  }
  if (isExpressionOfType(node, 'CallExpression') && isMarkerCall(node.callee, 'current', scope)) {
    const [collection] = node.arguments
    if (node.arguments.length !== 1 || collection.type === 'SpreadElement') return undefined
    const inner = collectSegments(collection, scope)
    if (!inner) return undefined
    return { source: inner.source, list: [...inner.list, { kind: 'current' }] }
  }
  return undefined
}

/**
 * True when `callee` names the given marker: either an identifier bound to the
 * marker in scope, or the marker's own name left unbound.
 */
function isMarkerCall(callee: Node, marker: string, scope: BindingScope): boolean {
  if (!isExpressionOfType(callee, 'Identifier')) return false
  if (Object.hasOwn(scope, callee.name)) {
    const bound = evaluateChain(callee, scope)
    return bound.ok && markerOf(bound.value) === marker
  }
  return callee.name === marker
}

export { extractPath, isMarkerCall }
export type { ExtractedPath }
