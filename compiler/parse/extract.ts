/**
 * Extraction Rules
 *
 * Each rule takes the remaining document text, pulls one kind of fragment out of it
 * and returns the text without that fragment. parseDocument applies them in order:
 * component tags, style blocks, stylesheet links, script blocks, then sections.
 */

import { randomUUID } from 'crypto'
import { COMPONENT_PLACEHOLDER_PREFIX } from '../constants'
import type { ComponentInvocation, ComponentTable, PropValue } from '../ir/types'

// ============================================
// Shared helpers
// ============================================

const ATTRIBUTE_SOURCE = `(?:\\s+[A-Za-z_:][\\w:.-]*(?:\\s*=\\s*(?:"[^"]*"|'[^']*'))?)*`
const ATTRIBUTE_PATTERN = /([A-Za-z_:][\w:.-]*)(?:\s*=\s*(?:"([^"]*)"|'([^']*)'))?/g
const COMPONENT_NAME_SOURCE = `[A-Z][A-Za-z0-9_]*(?:\\.[A-Z][A-Za-z0-9_]*)*`

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Parse the attribute list of a start tag. Bare attributes map to `true`.
 */
export function parseAttributes(source: string): Record<string, PropValue> {
  const attributes: Record<string, PropValue> = {}
  for (const match of source.matchAll(ATTRIBUTE_PATTERN)) {
    const name = match[1]
    if (name === undefined) continue
    const value = match[2] ?? match[3]
    attributes[name] = value ?? true
  }
  return attributes
}

export function componentPlaceholder(id: string): string {
  return `<!--${COMPONENT_PLACEHOLDER_PREFIX}${id}-->`
}

/** A fresh global pattern matching placeholder comments; group 1 is the id */
export function componentPlaceholderPattern(): RegExp {
  return new RegExp(`<!--${escapeRegExp(COMPONENT_PLACEHOLDER_PREFIX)}([0-9a-zA-Z-]+)-->`, 'g')
}

export function countOccurrences(text: string, needle: string): number {
  if (needle === '') return 0
  let count = 0
  let index = text.indexOf(needle)
  while (index !== -1) {
    count++
    index = text.indexOf(needle, index + needle.length)
  }
  return count
}

// ============================================
// Component tags
// ============================================

export interface ComponentExtraction {
  text: string
  components: ComponentTable
  diagnostics: string[]
}

// Script and style bodies are copied through the component pass untouched
const RAW_BLOCK_PATTERN = /<(python|style)\b[^>]*>[\s\S]*?<\/\1\s*>/gi
const RAW_BLOCK_TOKEN = /\u0000raw:(\d+)\u0000/g

interface MaskedText {
  text: string
  blocks: string[]
}

function maskRawBlocks(text: string): MaskedText {
  const blocks: string[] = []
  const masked = text.replace(RAW_BLOCK_PATTERN, block => {
    blocks.push(block)
    return `\u0000raw:${blocks.length - 1}\u0000`
  })
  return { text: masked, blocks }
}

function restoreRawBlocks(text: string, blocks: string[]): string {
  if (blocks.length === 0) return text
  return text.replace(RAW_BLOCK_TOKEN, (token, index: string) => blocks[Number(index)] ?? token)
}

function findClosingTag(text: string, name: string, from: number): { start: number; end: number } | null {
  const escaped = escapeRegExp(name)
  const pattern = new RegExp(`<${escaped}(?=[\\s/>])${ATTRIBUTE_SOURCE}\\s*(/?)>|</${escaped}\\s*>`, 'g')
  pattern.lastIndex = from
  let depth = 1

  for (let match = pattern.exec(text); match !== null; match = pattern.exec(text)) {
    if (match[0].startsWith('</')) {
      depth--
      if (depth === 0) {
        return { start: match.index, end: match.index + match[0].length }
      }
    } else if (match[1] !== '/') {
      depth++
    }
  }

  return null
}

function replaceComponentTags(
  text: string,
  components: ComponentTable,
  diagnostics: string[],
  createId: () => string
): string {
  const opening = new RegExp(`<(${COMPONENT_NAME_SOURCE})(${ATTRIBUTE_SOURCE})\\s*(/?)>`, 'g')
  let output = ''
  let cursor = 0

  for (let match = opening.exec(text); match !== null; match = opening.exec(text)) {
    const name = match[1] ?? ''
    const attributeSource = match[2] ?? ''
    const selfClosing = match[3] === '/'
    const tagEnd = match.index + match[0].length
    let children = ''
    let resumeAt = tagEnd

    if (!selfClosing) {
      const closing = findClosingTag(text, name, tagEnd)
      if (closing) {
        children = replaceComponentTags(text.slice(tagEnd, closing.start), components, diagnostics, createId)
        resumeAt = closing.end
      } else {
        diagnostics.push(`Component <${name}> has no closing tag; treating it as self-closing`)
      }
    }

    const invocation: ComponentInvocation = {
      id: createId(),
      name,
      props: parseAttributes(attributeSource),
      children
    }
    components.set(invocation.id, invocation)

    output += text.slice(cursor, match.index) + componentPlaceholder(invocation.id)
    cursor = resumeAt
    opening.lastIndex = resumeAt
  }

  return output + text.slice(cursor)
}

/**
 * Replace every component invocation with a placeholder comment.
 *
 * Pre: raw document text. Tags are case-sensitive: an uppercase-led, optionally dotted
 * name such as `Card` or `Ui.Button`, either self-closing or paired with its closing tag.
 * Post: no component tag remains in `text`; each placeholder id maps to an entry in
 * `components`. Tags nested inside a paired tag become placeholders in that
 * invocation's `children`, with their own entries in the same table. `<python>` and
 * `<style>` blocks are left as they are.
 */
export function extractComponentTags(text: string, createId: () => string = randomUUID): ComponentExtraction {
  const components: ComponentTable = new Map()
  const diagnostics: string[] = []
  const masked = maskRawBlocks(text)
  const replaced = replaceComponentTags(masked.text, components, diagnostics, createId)

  for (const invocation of components.values()) {
    invocation.children = restoreRawBlocks(invocation.children, masked.blocks)
  }
  return { text: restoreRawBlocks(replaced, masked.blocks), components, diagnostics }
}

// ============================================
// Styles
// ============================================

export interface StyleExtraction {
  text: string
  styleText: string
}

/**
 * Collect and remove `<style>` blocks.
 *
 * Post: `styleText` holds the trimmed non-empty block contents in source order,
 * joined by a blank line; `text` contains no `<style>` block.
 */
export function extractStyleBlocks(text: string): StyleExtraction {
  const blocks: string[] = []
  const remaining = text.replace(/<style\b[^>]*>([\s\S]*?)<\/style\s*>/gi, (_match, content: string) => {
    const trimmed = content.trim()
    if (trimmed) blocks.push(trimmed)
    return ''
  })
  return { text: remaining, styleText: blocks.join('\n\n') }
}

export interface StylesheetLinkExtraction {
  text: string
  hrefs: string[]
}

/** True for hrefs that point off the source tree: URLs, protocol-relative and root paths */
export function isExternalHref(href: string): boolean {
  return /^(?:[a-z][a-z0-9+.-]*:|\/)/i.test(href)
}

/**
 * Collect and remove `<link rel="stylesheet" href="...">` markers with a relative href.
 *
 * Post: `hrefs` lists the relative hrefs in source order, duplicates kept.
 * Links to URLs and root paths stay in the markup untouched.
 */
export function extractStylesheetLinks(text: string): StylesheetLinkExtraction {
  const hrefs: string[] = []
  const remaining = text.replace(/<link\b([^>]*?)\/?>/gi, (match, attributeSource: string) => {
    const attributes = parseAttributes(attributeSource)
    const rel = attributes.rel
    const href = attributes.href
    if (typeof rel !== 'string' || !rel.toLowerCase().split(/\s+/).includes('stylesheet')) return match
    if (typeof href !== 'string' || href.trim() === '' || isExternalHref(href.trim())) return match
    hrefs.push(href.trim())
    return ''
  })
  return { text: remaining, hrefs }
}

// ============================================
// Scripts
// ============================================

export interface ScriptExtraction {
  text: string
  inlineScript: string | null
  externalScriptRef: string | null
  diagnostics: string[]
  /** Extra diagnostics worth showing only in verbose mode */
  notes: string[]
}

/**
 * Collect and remove `<python>` blocks.
 *
 * Pre: style blocks already removed. Post: at most one of `inlineScript` and
 * `externalScriptRef` is set. The first block with a non-empty `src` wins and every
 * inline block is discarded. Without one, inline contents are joined in source order.
 * Layouts ignore `src` and keep their inline content.
 */
export function extractScript(text: string, isLayout: boolean): ScriptExtraction {
  const diagnostics: string[] = []
  const notes: string[] = []
  const inlineBlocks: string[] = []
  const sources: string[] = []

  const remaining = text.replace(/<python\b([^>]*)>([\s\S]*?)<\/python\s*>/gi, (_match, attributeSource: string, content: string) => {
    const src = parseAttributes(attributeSource).src
    if (typeof src === 'string') {
      if (isLayout) {
        diagnostics.push(`Ignoring src="${src}" on a layout script block; layouts only take inline scripts`)
      } else if (src.trim() === '') {
        diagnostics.push('Ignoring a script block with an empty src attribute')
      } else {
        sources.push(src.trim())
        if (content.trim()) {
          diagnostics.push(`Script block with src="${src.trim()}" also has inline content; the inline content is ignored`)
        }
        return ''
      }
    }
    if (content.trim()) inlineBlocks.push(content.trim())
    return ''
  })

  const [first, ...rest] = sources
  if (first !== undefined) {
    if (rest.length > 0) {
      notes.push(`Several script src attributes found; using "${first}" and ignoring ${rest.map(src => `"${src}"`).join(', ')}`)
    }
    if (inlineBlocks.length > 0) {
      diagnostics.push(`Inline script blocks are ignored because src="${first}" is set`)
    }
    return { text: remaining, inlineScript: null, externalScriptRef: first, diagnostics, notes }
  }

  const inlineScript = inlineBlocks.length > 0 ? inlineBlocks.join('\n\n') : null
  return { text: remaining, inlineScript, externalScriptRef: null, diagnostics, notes }
}

// ============================================
// Sections
// ============================================

export interface SectionExtraction {
  text: string
  content: string | null
}

/**
 * Pull out the first `<tag>...</tag>` section and drop any further ones.
 *
 * Post: `content` is the first section's inner markup (untrimmed), or null when absent.
 */
export function extractSection(text: string, tag: string): SectionExtraction {
  const pattern = new RegExp(`<${escapeRegExp(tag)}\\b[^>]*>([\\s\\S]*?)</${escapeRegExp(tag)}\\s*>`, 'gi')
  let content: string | null = null
  const remaining = text.replace(pattern, (_match, inner: string) => {
    if (content === null) content = inner
    return ''
  })
  return { text: remaining, content }
}

export interface PrimaryMarkup {
  head: string | null
  body: string
}

/**
 * Find the primary `<html>` element.
 *
 * Post: null when the text has no `<html>` element. When the element holds
 * `<head>`/`<body>` children, those become head and body; otherwise the whole
 * inner markup is the body.
 */
export function extractPrimaryMarkup(text: string): PrimaryMarkup | null {
  const match = /<html\b[^>]*>([\s\S]*)<\/html\s*>/i.exec(text)
  if (!match) return null
  const inner = match[1] ?? ''

  const bodyMatch = /<body\b[^>]*>([\s\S]*?)<\/body\s*>/i.exec(inner)
  const headMatch = /<head\b[^>]*>([\s\S]*?)<\/head\s*>/i.exec(inner)
  if (!bodyMatch && !headMatch) {
    return { head: null, body: inner }
  }

  let body = bodyMatch ? (bodyMatch[1] ?? '') : inner
  if (!bodyMatch && headMatch) {
    body = inner.replace(headMatch[0], '')
  }
  return { head: headMatch ? (headMatch[1] ?? '') : null, body }
}

/** Remove every `<title>` element, returning the first title's text */
export function extractTitle(fragment: string): { text: string; title: string | null } {
  let title: string | null = null
  const remaining = fragment.replace(/<title\b[^>]*>([\s\S]*?)<\/title\s*>/gi, (_match, inner: string) => {
    if (title === null) title = inner.trim()
    return ''
  })
  return { text: remaining, title }
}
