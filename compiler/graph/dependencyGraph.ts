/**
 * Dependency Graph
 *
 * Forward and reverse edges between pages and the scripts and stylesheets they use.
 * Every mutation keeps both directions in lockstep; empty reverse sets are dropped.
 */

import path from 'path'
import type { SourceDocument } from '../ir/types'
import { parseDocument } from '../parse/parseDocument'
import { trackedPageScript, trackedStylesheets, type SourceRoots } from '../build/resolve'
import type { Logger } from '../../core/logger'
import { silentLogger } from '../../core/logger'

export interface PageDependencies {
  script: string | null
  stylesheets: Set<string>
}

function addEdge(index: Map<string, Set<string>>, key: string, page: string): void {
  const pages = index.get(key)
  if (pages) {
    pages.add(page)
  } else {
    index.set(key, new Set([page]))
  }
}

function removeEdge(index: Map<string, Set<string>>, key: string, page: string): void {
  const pages = index.get(key)
  if (!pages) return
  pages.delete(page)
  if (pages.size === 0) index.delete(key)
}

/**
 * Work out what a page depends on. Parse failures yield no dependencies.
 */
export function analyzePage(
  pagePath: string,
  roots: SourceRoots,
  layout: SourceDocument | null,
  logger: Logger = silentLogger
): PageDependencies {
  let document: SourceDocument
  try {
    document = parseDocument(pagePath, { logger })
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err)
    logger.debug(`Could not analyze ${path.basename(pagePath)}: ${message}`)
    return { script: null, stylesheets: new Set() }
  }

  return {
    script: trackedPageScript(pagePath, document, roots),
    stylesheets: trackedStylesheets(pagePath, document, layout)
  }
}

export class DependencyGraph {
  readonly pages = new Set<string>()
  readonly pageToScript = new Map<string, string | null>()
  readonly scriptToPages = new Map<string, Set<string>>()
  readonly pageToStyles = new Map<string, Set<string>>()
  readonly styleToPages = new Map<string, Set<string>>()
  layout: SourceDocument | null = null

  /**
   * Record a page's dependencies, replacing whatever was known before
   */
  setPage(pagePath: string, dependencies: PageDependencies): void {
    this.removePage(pagePath)
    this.pages.add(pagePath)

    this.pageToScript.set(pagePath, dependencies.script)
    if (dependencies.script !== null) {
      addEdge(this.scriptToPages, dependencies.script, pagePath)
    }

    const styles = new Set(dependencies.stylesheets)
    this.pageToStyles.set(pagePath, styles)
    for (const style of styles) {
      addEdge(this.styleToPages, style, pagePath)
    }
  }

  /**
   * Forget a page and every edge it owns
   */
  removePage(pagePath: string): void {
    const script = this.pageToScript.get(pagePath)
    if (script !== undefined && script !== null) {
      removeEdge(this.scriptToPages, script, pagePath)
    }
    for (const style of this.pageToStyles.get(pagePath) ?? []) {
      removeEdge(this.styleToPages, style, pagePath)
    }

    this.pageToScript.delete(pagePath)
    this.pageToStyles.delete(pagePath)
    this.pages.delete(pagePath)
  }

  /**
   * Drop a script or stylesheet. Returns the pages that depended on it.
   */
  removeDependency(filePath: string): Set<string> {
    const dependents = new Set<string>([...this.pagesUsingScript(filePath), ...this.pagesUsingStyle(filePath)])

    for (const page of this.scriptToPages.get(filePath) ?? []) {
      this.pageToScript.set(page, null)
    }
    this.scriptToPages.delete(filePath)

    for (const page of this.styleToPages.get(filePath) ?? []) {
      this.pageToStyles.get(page)?.delete(filePath)
    }
    this.styleToPages.delete(filePath)

    return dependents
  }

  pagesUsingScript(scriptPath: string): Set<string> {
    return new Set(this.scriptToPages.get(scriptPath) ?? [])
  }

  pagesUsingStyle(stylePath: string): Set<string> {
    return new Set(this.styleToPages.get(stylePath) ?? [])
  }

  /** Pages depending on a script or stylesheet */
  dependentsOf(filePath: string): Set<string> {
    return new Set([...this.pagesUsingScript(filePath), ...this.pagesUsingStyle(filePath)])
  }

  isTracked(filePath: string): boolean {
    return this.scriptToPages.has(filePath) || this.styleToPages.has(filePath)
  }

  clear(): void {
    this.pages.clear()
    this.pageToScript.clear()
    this.scriptToPages.clear()
    this.pageToStyles.clear()
    this.styleToPages.clear()
  }

  /**
   * Check that forward and reverse indexes agree. Returns the problems found.
   */
  verify(): string[] {
    const problems: string[] = []

    for (const [page, script] of this.pageToScript) {
      if (script !== null && !this.scriptToPages.get(script)?.has(page)) {
        problems.push(`script ${script} missing reverse edge to ${page}`)
      }
    }
    for (const [script, pages] of this.scriptToPages) {
      if (pages.size === 0) problems.push(`script ${script} has an empty page set`)
      for (const page of pages) {
        if (this.pageToScript.get(page) !== script) problems.push(`page ${page} missing forward edge to ${script}`)
      }
    }
    for (const [page, styles] of this.pageToStyles) {
      for (const style of styles) {
        if (!this.styleToPages.get(style)?.has(page)) problems.push(`style ${style} missing reverse edge to ${page}`)
      }
    }
    for (const [style, pages] of this.styleToPages) {
      if (pages.size === 0) problems.push(`style ${style} has an empty page set`)
      for (const page of pages) {
        if (!this.pageToStyles.get(page)?.has(style)) problems.push(`page ${page} missing forward edge to ${style}`)
      }
    }

    return problems
  }
}
