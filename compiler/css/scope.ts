/**
 * Scoped Component Styles
 *
 * Rewrites component CSS so every rule only matches elements carrying the
 * instance's scope attribute.
 */

import postcss, { AtRule, type Container, type Document as CssDocument, type Rule } from 'postcss'
import { SCOPE_ATTRIBUTE } from '../constants'

const PSEUDO_ELEMENT = /::[\w-]+|:(?:before|after|first-line|first-letter)\b/i

export function scopeAttributeSelector(scopeId: string): string {
  return `[${SCOPE_ATTRIBUTE}="${scopeId}"]`
}

/**
 * Attach the scope attribute to the last compound of a selector, ahead of any pseudo-element.
 *
 *   .title        -> .title[data-stitch-scope="x"]
 *   ul li::marker -> ul li[data-stitch-scope="x"]::marker
 */
export function scopeSelector(selector: string, scopeId: string): string {
  const attribute = scopeAttributeSelector(scopeId)
  const trimmed = selector.trim()
  const pseudo = PSEUDO_ELEMENT.exec(trimmed)
  if (pseudo) {
    return trimmed.slice(0, pseudo.index) + attribute + trimmed.slice(pseudo.index)
  }
  return trimmed + attribute
}

function insideKeyframes(rule: Rule): boolean {
  let parent: Container | CssDocument | undefined = rule.parent
  while (parent) {
    if (parent instanceof AtRule && /keyframes$/i.test(parent.name)) return true
    parent = parent.parent
  }
  return false
}

/**
 * Scope every style rule in a stylesheet. Rules nested in @media and @supports
 * are scoped too; keyframe steps are left alone.
 */
export function scopeStyles(css: string, scopeId: string): string {
  if (!css.trim()) return ''

  const root = postcss.parse(css)
  root.walkRules(rule => {
    if (insideKeyframes(rule)) return
    rule.selectors = rule.selectors.map(selector => scopeSelector(selector, scopeId))
  })
  return root.toString()
}
