/**
 * Directory Build
 *
 * Compiles every page under a source root. Page failures are collected, not thrown.
 */

import fs from 'fs'
import path from 'path'
import { LAYOUT_FILENAME, SOURCE_EXTENSION } from '../constants'
import { describeError } from '../errors/compilerError'
import { isInside, walkFiles } from '../util/files'
import { beginPass, createBuildContext, type BuildContext, type BuildOptions } from './context'
import { compilePage, type PageResult } from './compilePage'
import { copyStaticAssets } from './static'

// ============================================
// Types
// ============================================

export interface PageFailure {
  pagePath: string
  message: string
  error: unknown
}

export interface BuildResult {
  compiled: PageResult[]
  failures: PageFailure[]
  errorCount: number
  staticAssets: number
}

// ============================================
// Discovery
// ============================================

/** True for source files that compile to a page of their own */
export function isPagePath(context: BuildContext, filePath: string): boolean {
  const resolved = path.resolve(filePath)
  if (path.extname(resolved) !== SOURCE_EXTENSION) return false
  if (resolved === context.layoutPath || path.basename(resolved) === LAYOUT_FILENAME) return false
  if (!isInside(resolved, context.sourceDir)) return false
  if (isInside(resolved, context.outputDir)) return false
  if (context.staticDir !== null && isInside(resolved, context.staticDir)) return false
  if (isInside(resolved, context.componentsDir)) return false
  return true
}

/**
 * Find all page files under the source root
 */
export function discoverPages(context: BuildContext): string[] {
  return walkFiles(context.sourceDir, file => isPagePath(context, file))
}

// ============================================
// Build
// ============================================

function recordFailure(context: BuildContext, failures: PageFailure[], pagePath: string, err: unknown): void {
  const message = describeError(err)
  context.logger.error(`Failed processing ${path.relative(context.sourceDir, pagePath) || pagePath}: ${message}`)
  if (context.logger.verbose && err instanceof Error && err.stack) {
    context.logger.debug(err.stack)
  }
  failures.push({ pagePath, message, error: err })
}

/**
 * Compile the given pages with an existing context
 */
export function compilePages(context: BuildContext, pages: string[]): BuildResult {
  const compiled: PageResult[] = []
  const failures: PageFailure[] = []

  for (const pagePath of pages) {
    try {
      compiled.push(compilePage(context, pagePath))
    } catch (err: unknown) {
      recordFailure(context, failures, pagePath, err)
    }
  }

  return { compiled, failures, errorCount: failures.length, staticAssets: 0 }
}

/**
 * Full build with an existing context: static assets, then every page.
 * A broken layout fails the build before any page is written.
 */
export function buildAll(context: BuildContext): BuildResult {
  beginPass(context)

  try {
    fs.mkdirSync(context.outputDir, { recursive: true })
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err)
    throw new Error(`Output directory creation failed: ${message}`)
  }

  const staticAssets = copyStaticAssets(context)

  if (context.layoutError !== null) {
    const failures: PageFailure[] = []
    recordFailure(context, failures, context.layoutPath, context.layoutError)
    return { compiled: [], failures, errorCount: failures.length, staticAssets }
  }

  const pages = discoverPages(context)
  if (pages.length === 0) {
    context.logger.warn(`No page ${SOURCE_EXTENSION} files found in ${context.sourceDir}`)
  } else {
    context.logger.debug(`Compiling ${pages.length} page file(s)...`)
  }

  const result = compilePages(context, pages)
  return { ...result, staticAssets }
}

export function summarize(context: BuildContext, result: BuildResult): void {
  const { logger } = context
  logger.log(`Mode: ${context.mode.production ? 'Production' : 'Development'}`)
  logger.log(`Processed: ${result.compiled.length + result.failures.length} page file(s)`)
  if (result.staticAssets > 0) logger.log(`Static assets copied: ${result.staticAssets}`)

  if (result.errorCount === 0) {
    logger.success(`Compiled ${result.compiled.length} page(s) into ${context.outputDir}`)
  } else {
    logger.error(`Build finished with ${result.errorCount} error(s)`)
    logger.error(`Failed items: ${result.failures.map(failure => path.basename(failure.pagePath)).join(', ')}`)
  }
}

/**
 * Compile a whole source directory into the output directory
 */
export function compileDirectory(options: BuildOptions): BuildResult {
  const sourceDir = path.resolve(options.sourceDir)
  if (!fs.existsSync(sourceDir) || !fs.statSync(sourceDir).isDirectory()) {
    throw new Error(`Source directory not found: ${options.sourceDir}`)
  }

  const context = createBuildContext(options)
  context.logger.log(
    `Compiling '${path.basename(sourceDir)}' -> '${path.basename(context.outputDir)}' ` +
    `(${context.mode.production ? 'Production' : 'Development'} mode)`
  )

  const result = buildAll(context)
  summarize(context, result)
  return result
}
