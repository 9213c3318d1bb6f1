/**
 * Scope Markup
 *
 * Adds the scope attribute to every element of a component's markup
 */

import { defaultTreeAdapter, parseFragment, serialize, type DefaultTreeAdapterMap } from 'parse5'
import { SCOPE_ATTRIBUTE } from '../constants'

type ParentNode = DefaultTreeAdapterMap['parentNode']

function tag(node: ParentNode, scopeId: string): void {
  for (const child of node.childNodes) {
    if (!defaultTreeAdapter.isElementNode(child)) continue

    const existing = child.attrs.find(attr => attr.name === SCOPE_ATTRIBUTE)
    if (existing) {
      existing.value = scopeId
    } else {
      child.attrs.push({ name: SCOPE_ATTRIBUTE, value: scopeId })
    }

    tag(child, scopeId)
  }
}

/**
 * Parse a markup fragment, tag its elements and serialize it back
 */
export function addScopeAttribute(markup: string, scopeId: string): string {
  if (!markup.trim()) return markup
  const fragment = parseFragment(markup)
  tag(fragment, scopeId)
  return serialize(fragment)
}
