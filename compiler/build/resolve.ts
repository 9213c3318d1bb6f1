/**
 * Dependency Resolution
 *
 * Locates the script and stylesheets a page depends on. The page compiler uses
 * the strict variants, which throw; the dependency graph uses the lenient ones.
 */

import fs from 'fs'
import path from 'path'
import { SCRIPT_EXTENSION } from '../constants'
import { DependencyError } from '../errors/compilerError'
import type { SourceDocument } from '../ir/types'
import { isInside } from '../util/files'

export interface SourceRoots {
  sourceDir: string
  /** Absolute static root, or null when static handling is off */
  staticDir: string | null
}

export type ResolvedScript =
  | { kind: 'external'; path: string }
  | { kind: 'inline'; code: string }
  | { kind: 'none' }

/** `<dir>/<stem>.py` for a page at `<dir>/<stem>.stitch` */
export function conventionalScriptPath(pagePath: string): string {
  const parsed = path.parse(pagePath)
  return path.join(parsed.dir, parsed.name + SCRIPT_EXTENSION)
}

function inStatic(file: string, roots: SourceRoots): boolean {
  return roots.staticDir !== null && isInside(file, roots.staticDir)
}

function isFile(file: string): boolean {
  return fs.existsSync(file) && fs.statSync(file).isFile()
}

/**
 * Validate an explicit script or stylesheet reference, returning its absolute path
 */
export function validateReference(reference: string, baseDir: string, referrer: string, roots: SourceRoots, kind: 'Script' | 'Stylesheet'): string {
  const resolved = path.resolve(baseDir, reference)
  if (!isFile(resolved)) {
    throw new DependencyError(`${kind} "${reference}" not found at ${resolved}`, referrer, reference)
  }
  if (!isInside(resolved, roots.sourceDir)) {
    throw new DependencyError(`${kind} "${reference}" is outside the source directory ${roots.sourceDir}`, referrer, reference)
  }
  if (inStatic(resolved, roots)) {
    throw new DependencyError(`${kind} "${reference}" is inside the static directory ${roots.staticDir ?? ''}`, referrer, reference)
  }
  return resolved
}

/**
 * Resolve the script a page runs. An explicit src must be valid; otherwise a
 * same-stem .py beside the page is used, then the inline script.
 */
export function resolvePageScript(pagePath: string, document: SourceDocument, roots: SourceRoots): ResolvedScript {
  if (document.externalScriptRef !== null) {
    const scriptPath = validateReference(document.externalScriptRef, path.dirname(pagePath), pagePath, roots, 'Script')
    return { kind: 'external', path: scriptPath }
  }

  const conventional = conventionalScriptPath(pagePath)
  if (isFile(conventional) && !inStatic(conventional, roots)) {
    return { kind: 'external', path: conventional }
  }

  if (document.inlineScript !== null) {
    return { kind: 'inline', code: document.inlineScript }
  }
  return { kind: 'none' }
}

/**
 * Graph variant: an unusable explicit src falls back to the conventional script.
 * Returns null when the page runs inline code or nothing.
 */
export function trackedPageScript(pagePath: string, document: SourceDocument, roots: SourceRoots): string | null {
  if (document.externalScriptRef !== null) {
    const explicit = path.resolve(path.dirname(pagePath), document.externalScriptRef)
    if (isFile(explicit) && isInside(explicit, roots.sourceDir) && !inStatic(explicit, roots)) {
      return explicit
    }
  }

  const conventional = conventionalScriptPath(pagePath)
  if (isFile(conventional) && !inStatic(conventional, roots)) {
    return conventional
  }
  return null
}

export interface StylesheetSource {
  href: string
  /** Directory the href is relative to */
  baseDir: string
  referrer: string
}

/** Layout stylesheets first, then the page's own */
export function stylesheetSources(pagePath: string, page: SourceDocument, layout: SourceDocument | null): StylesheetSource[] {
  const sources: StylesheetSource[] = []
  if (layout) {
    for (const href of layout.externalStyleRefs) {
      sources.push({ href, baseDir: path.dirname(layout.filePath), referrer: layout.filePath })
    }
  }
  for (const href of page.externalStyleRefs) {
    sources.push({ href, baseDir: path.dirname(pagePath), referrer: pagePath })
  }
  return sources
}

/**
 * Absolute stylesheet paths for the graph, deduplicated; existence not required
 */
export function trackedStylesheets(pagePath: string, page: SourceDocument, layout: SourceDocument | null): Set<string> {
  const paths = new Set<string>()
  for (const source of stylesheetSources(pagePath, page, layout)) {
    paths.add(path.resolve(source.baseDir, source.href))
  }
  return paths
}
