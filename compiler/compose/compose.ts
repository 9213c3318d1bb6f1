/**
 * Compositor
 *
 * Merges expanded page fragments with the optional layout and shell template
 * into the final HTML document. Pure: the caller writes the result.
 */

import {
  DEFAULT_SHELL_TITLE,
  DEFAULT_TITLE,
  LAYOUT_FILENAME,
  PAGE_CONTENT_PLACEHOLDER,
  SHELL_BODY_PLACEHOLDER,
  SHELL_HEAD_PLACEHOLDER
} from '../constants'
import { StructuralError } from '../errors/compilerError'
import { countOccurrences, extractTitle } from '../parse/extract'
import {
  DEBUG_CALL_PATTERN,
  LIVE_RELOAD_SCRIPT,
  bootstrapCall,
  bootstrapScriptTags,
  withHelperPrelude
} from './snippets'

// ============================================
// Types
// ============================================

export type PageScript =
  | { kind: 'inline'; code: string }
  | { kind: 'external'; src: string }

export interface PageFragments {
  /** Source file name, used in style banners */
  fileName: string
  head: string | null
  body: string
  styleText: string
}

export interface LayoutFragments {
  head: string | null
  body: string
  styleText: string
  inlineScript: string | null
}

export interface CompositionInput {
  page: PageFragments
  layout: LayoutFragments | null
  shell: string | null
  /** Hrefs relative to the output HTML file */
  stylesheetHrefs: string[]
  scopedStyles: string[]
  pageScript: PageScript | null
  production: boolean
  watch: boolean
  /** Output file name without extension, used in the default title */
  outputStem: string
}

export interface ShellMarkers {
  head: boolean
  body: boolean
}

// ============================================
// Helpers
// ============================================

const SHELL_TITLE_PATTERN = /<title\b[^>]*>([\s\S]*?)<\/title\s*>/i
const BOOTSTRAP_SCRIPT_PATTERN = /brython(?:\.min)?\.js/i
const BOOTSTRAP_CALL_PATTERN = /brython\s*\(/i
const EMPTY_CALL_PATTERN = /brython\s*\(\s*\)/gi

export function debugLevelFor(production: boolean): number {
  return production ? 0 : 1
}

export function shouldInjectLiveReload(watch: boolean, production: boolean): boolean {
  return watch && !production
}

/** Report which shell placeholders are present */
export function inspectShell(shell: string): ShellMarkers {
  return {
    head: shell.includes(SHELL_HEAD_PLACEHOLDER),
    body: shell.includes(SHELL_BODY_PLACEHOLDER)
  }
}

function insertBefore(html: string, closingTag: string, content: string): string | null {
  const index = html.toLowerCase().lastIndexOf(closingTag)
  if (index === -1) return null
  return html.slice(0, index) + content + html.slice(index)
}

function nonEmpty(parts: Array<string | null | undefined>): string[] {
  return parts.map(part => (part ?? '').trim()).filter(part => part !== '')
}

function combineStyles(input: CompositionInput): string {
  const sections: string[] = []
  if (input.layout && input.layout.styleText.trim()) {
    sections.push(`/* Layout Styles: ${LAYOUT_FILENAME} */\n${input.layout.styleText.trim()}`)
  }
  if (input.page.styleText.trim()) {
    sections.push(`/* Page Styles: ${input.page.fileName} */\n${input.page.styleText.trim()}`)
  }
  return sections.join('\n\n')
}

function scriptTags(input: CompositionInput): string[] {
  const tags: string[] = []
  const layoutScript = input.layout?.inlineScript ?? null

  if (layoutScript !== null) {
    tags.push(`<script type="text/python" id="stitch-layout-script">\n${withHelperPrelude(layoutScript)}\n</script>`)
  }

  const pageScript = input.pageScript
  if (pageScript?.kind === 'external') {
    tags.push(`<script type="text/python" src="${pageScript.src}" id="stitch-page-script"></script>`)
  } else if (pageScript?.kind === 'inline') {
    const code = layoutScript === null ? withHelperPrelude(pageScript.code) : pageScript.code
    tags.push(`<script type="text/python" id="stitch-page-script">\n${code}\n</script>`)
  }

  return tags
}

function composeBody(input: CompositionInput): string {
  if (!input.layout) return input.page.body.trim()

  const count = countOccurrences(input.layout.body, PAGE_CONTENT_PLACEHOLDER)
  if (count !== 1) {
    throw new StructuralError(
      `Layout body must contain ${PAGE_CONTENT_PLACEHOLDER} exactly once (found ${count})`,
      LAYOUT_FILENAME
    )
  }
  return input.layout.body.replace(PAGE_CONTENT_PLACEHOLDER, () => input.page.body.trim()).trim()
}

// ============================================
// Composition
// ============================================

/**
 * Assemble the final HTML for one page
 */
export function composeDocument(input: CompositionInput): string {
  const pageHead = extractTitle(input.page.head ?? '')
  const layoutHead = extractTitle(input.layout?.head ?? '')
  const body = composeBody(input)
  const debugLevel = debugLevelFor(input.production)

  const links = input.stylesheetHrefs.map(href => `<link rel="stylesheet" href="${href}">`)
  const styles = combineStyles(input)
  const scoped = input.scopedStyles.map(block => block.trim()).filter(block => block !== '').join('\n\n')
  const styleTags = nonEmpty([
    styles ? `<style id="stitch-styles">\n${styles}\n</style>` : null,
    scoped ? `<style id="stitch-component-styles">\n${scoped}\n</style>` : null
  ])

  const scripts = scriptTags(input)
  const liveReload = shouldInjectLiveReload(input.watch, input.production) ? LIVE_RELOAD_SCRIPT : null

  if (input.shell !== null) {
    return composeWithShell(input.shell, {
      title: pageHead.title ?? layoutHead.title,
      headParts: [...links, ...styleTags, layoutHead.text, pageHead.text],
      body,
      scripts,
      liveReload,
      debugLevel
    })
  }

  const title = pageHead.title ?? layoutHead.title ?? `${DEFAULT_TITLE} (${input.outputStem})`
  const head = nonEmpty([
    '<meta charset="UTF-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1.0">',
    `<title>${title}</title>`,
    ...bootstrapScriptTags(),
    ...links,
    ...styleTags,
    layoutHead.text,
    pageHead.text
  ])
  const tail = nonEmpty([...scripts, liveReload])

  return [
    '<!DOCTYPE html>',
    '<html>',
    '<head>',
    ...head.map(line => `    ${line}`),
    '</head>',
    `<body onload="${bootstrapCall(debugLevel)}">`,
    body,
    ...tail,
    '</body>',
    '</html>',
    ''
  ].join('\n')
}

export interface ShellParts {
  /** Winning page or layout title, if any */
  title: string | null
  headParts: Array<string | null>
  body: string
  scripts: string[]
  liveReload: string | null
  debugLevel: number
}

/**
 * Fill a shell template. Missing placeholders fall back to </head> and </body>.
 */
export function composeWithShell(shell: string, parts: ShellParts): string {
  let html = shell
  const headParts = [...parts.headParts]
  const tail = [...parts.scripts]

  const existingTitle = SHELL_TITLE_PATTERN.exec(html)
  const title = parts.title ?? (existingTitle ? (existingTitle[1] ?? '').trim() : DEFAULT_SHELL_TITLE)
  const titleTag = `<title>${title}</title>`
  if (existingTitle) {
    html = html.replace(SHELL_TITLE_PATTERN, () => titleTag)
  } else {
    html = insertBefore(html, '</head>', `    ${titleTag}\n`) ?? html
    if (!html.includes(titleTag)) headParts.unshift(titleTag)
  }

  html = html.replace(DEBUG_CALL_PATTERN, (_match, prefix: string) => `${prefix}${parts.debugLevel}`)
  html = html.replace(EMPTY_CALL_PATTERN, () => bootstrapCall(parts.debugLevel))

  if (!BOOTSTRAP_SCRIPT_PATTERN.test(html)) {
    headParts.unshift(...bootstrapScriptTags())
  }
  if (!BOOTSTRAP_CALL_PATTERN.test(html)) {
    tail.push(`<script>window.addEventListener('load', function () { ${bootstrapCall(parts.debugLevel)}; });</script>`)
  }
  if (parts.liveReload) tail.push(parts.liveReload)

  const headContent = nonEmpty(headParts).join('\n    ')
  if (html.includes(SHELL_HEAD_PLACEHOLDER)) {
    html = html.replace(SHELL_HEAD_PLACEHOLDER, () => headContent)
  } else if (headContent) {
    html = insertBefore(html, '</head>', `${headContent}\n`) ?? `${headContent}\n${html}`
  }

  if (html.includes(SHELL_BODY_PLACEHOLDER)) {
    html = html.replace(SHELL_BODY_PLACEHOLDER, () => parts.body)
  } else {
    html = insertBefore(html, '</body>', `${parts.body}\n`) ?? `${html}\n${parts.body}`
  }

  if (tail.length > 0) {
    const scripts = `\n${tail.join('\n')}\n`
    html = insertBefore(html, '</body>', scripts) ?? `${html}${scripts}`
  }

  return html
}
