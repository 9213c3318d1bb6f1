/**
 * Component Expander
 *
 * Replaces component placeholders with rendered component markup.
 * Recursion is bounded by maxDepth; unknown components and overflow leave a marker comment.
 */

import fs from 'fs'
import path from 'path'
import { createHash } from 'crypto'
import { MAX_COMPONENT_DEPTH } from '../constants'
import { DependencyError } from '../errors/compilerError'
import type { ComponentInvocation, ComponentTable } from '../ir/types'
import { parseDocument } from '../parse/parseDocument'
import { componentPlaceholderPattern } from '../parse/extract'
import { scopeStyles } from '../css/scope'
import { addScopeAttribute } from './scopeMarkup'
import type { ComponentRegistry } from './registry'
import type { Logger } from '../../core/logger'

const PROPS_PATTERN = /\{props\.([a-zA-Z0-9_]+)\}/g

export interface ExpansionContext {
  registry: ComponentRegistry
  logger: Logger
  maxDepth: number
  /** Scoped component CSS in render order */
  scopedStyles: string[]
  /** Component source files read while rendering */
  componentFiles: Set<string>
  /** Stylesheets linked from components */
  stylesheets: Set<string>
  /** Instances rendered so far; feeds scope ids */
  instanceCount: number
}

export function createExpansionContext(
  registry: ComponentRegistry,
  logger: Logger,
  maxDepth: number = MAX_COMPONENT_DEPTH
): ExpansionContext {
  return {
    registry,
    logger,
    maxDepth,
    scopedStyles: [],
    componentFiles: new Set(),
    stylesheets: new Set(),
    instanceCount: 0
  }
}

/**
 * Scope id for the n-th component instance rendered on a page.
 * Stable across builds of an unchanged source tree.
 */
export function scopeIdFor(name: string, ordinal: number): string {
  return 'c' + createHash('sha1').update(`${name}:${ordinal}`).digest('hex').slice(0, 8)
}

/**
 * Replace `{props.KEY}` with the invocation's value. Missing keys become empty strings.
 */
export function substituteProps(markup: string, invocation: ComponentInvocation): string {
  return markup.replace(PROPS_PATTERN, (_match, key: string) => {
    if (key === 'children' && invocation.children !== '') return invocation.children
    const value = invocation.props[key]
    if (value === undefined) return ''
    return value === true ? 'true' : String(value)
  })
}

function componentCss(componentFile: string, styleText: string, refs: string[], context: ExpansionContext): string {
  const blocks: string[] = []
  const seen = new Set<string>()

  for (const href of refs) {
    const stylesheet = path.resolve(path.dirname(componentFile), href)
    if (seen.has(stylesheet)) continue
    seen.add(stylesheet)

    if (!fs.existsSync(stylesheet)) {
      throw new DependencyError(`Stylesheet "${href}" linked from component not found at ${stylesheet}`, componentFile, href)
    }
    context.stylesheets.add(stylesheet)
    blocks.push(fs.readFileSync(stylesheet, 'utf-8').trim())
  }

  if (styleText) blocks.push(styleText)
  return blocks.filter(block => block !== '').join('\n\n')
}

function marker(message: string): string {
  return `<!-- stitch: ${message} -->`
}

function renderInvocation(
  invocation: ComponentInvocation,
  outerTable: ComponentTable,
  context: ExpansionContext,
  depth: number
): string {
  const file = context.registry.getPath(invocation.name)
  if (file === null) {
    context.logger.warn(`Component "${invocation.name}" not found`)
    return marker(`component "${invocation.name}" not found`)
  }

  if (depth >= context.maxDepth) {
    context.logger.warn(`Component "${invocation.name}" exceeds max depth ${context.maxDepth}; not rendered`)
    return marker(`component "${invocation.name}" exceeds max depth ${context.maxDepth}`)
  }

  const component = parseDocument(file, { logger: context.logger })
  context.componentFiles.add(file)

  if (component.inlineScript !== null || component.externalScriptRef !== null || component.headFragment !== null) {
    context.logger.debug(`Component "${invocation.name}": script and head sections are not rendered`)
  }

  let body = component.bodyMarkup
  const css = componentCss(file, component.styleText, component.externalStyleRefs, context)
  if (css) {
    const scopeId = scopeIdFor(invocation.name, context.instanceCount)
    context.scopedStyles.push(`/* Component: ${invocation.name} */\n${scopeStyles(css, scopeId)}`)
    body = addScopeAttribute(body, scopeId)
  }
  context.instanceCount++

  body = substituteProps(body, invocation)

  const table: ComponentTable = new Map([...outerTable, ...component.components])
  return expandComponents(body, table, context, depth + 1)
}

/**
 * Expand every component placeholder in `markup`.
 * Children of an invocation keep their ids in the outer table, so both tables are
 * visible while rendering a component body.
 */
export function expandComponents(
  markup: string,
  components: ComponentTable,
  context: ExpansionContext,
  depth = 0
): string {
  return markup.replace(componentPlaceholderPattern(), (token, id: string) => {
    const invocation = components.get(id)
    if (!invocation) return token
    return renderInvocation(invocation, components, context, depth)
  })
}
