import type { Node } from 'acorn'
import { AmbiguousOrMissingTargetError } from './errors'
import { evaluateChain, isExpressionOfType, isObjectLike, memberKey } from './expression'
import type { BindingScope } from './expression'

interface ResolvedTarget {
  readonly target: object
  readonly property: string
}

/**
 * Resolves the left side of a binding statement to the widget and the property
 * being bound. The owner chain is evaluated against the scope right away, so
 * a scope entry may be any alias of a widget.
 *
 * @param text Statement text, used in error messages.
 */
function resolveTarget(left: Node, scope: BindingScope, text: string): ResolvedTarget {
  if (!isExpressionOfType(left, 'MemberExpression')) {
    throw new AmbiguousOrMissingTargetError(text, 'the left side must be a property access such as `widget.text`')
  }
  const property = memberKey(left)
  if (typeof property !== 'string') {
    throw new AmbiguousOrMissingTargetError(text, 'the target property must be a static name')
  }
  if (left.object.type === 'Super') {
    throw new AmbiguousOrMissingTargetError(text, '`super` cannot be a binding target')
  }

  const owner = evaluateChain(left.object, scope)
  if (!owner.ok) {
    throw new AmbiguousOrMissingTargetError(text, 'the target is not reachable from the binding scope')
  }
  if (!isObjectLike(owner.value)) {
    throw new AmbiguousOrMissingTargetError(text, `the target evaluated to ${String(owner.value)}`)
  }
  if (!(property in owner.value)) {
    throw new AmbiguousOrMissingTargetError(text, `the target has no property "${property}"`)
  }
  return { target: owner.value, property }
}

export { resolveTarget }
export type { ResolvedTarget }
