/**
 * Page Compiler
 *
 * parse -> copy script -> copy stylesheets -> expand components -> compose -> write
 */

import fs from 'fs'
import path from 'path'
import { createExpansionContext, expandComponents } from '../components/expand'
import { composeDocument, type LayoutFragments, type PageScript } from '../compose/compose'
import { withHelperPrelude } from '../compose/snippets'
import { ResourceError } from '../errors/compilerError'
import { parseDocument } from '../parse/parseDocument'
import { ensureDir, hrefFrom } from '../util/files'
import type { BuildContext } from './context'
import { resolvePageScript, stylesheetSources, validateReference } from './resolve'

export interface PageResult {
  pagePath: string
  outputPath: string
  /** Source script copied for this page, if any */
  script: string | null
  /** Linked stylesheets, layout and components included */
  stylesheets: string[]
  componentFiles: string[]
}

/** Output location of a source file, mirroring the source tree */
export function outputPathFor(context: BuildContext, sourcePath: string, extension?: string): string {
  const relative = path.relative(context.sourceDir, sourcePath)
  const target = path.join(context.outputDir, relative)
  if (extension === undefined) return target
  const parsed = path.parse(target)
  return path.join(parsed.dir, parsed.name + extension)
}

function writeOutput(filePath: string, content: string, referrer: string): void {
  try {
    ensureDir(path.dirname(filePath))
    fs.writeFileSync(filePath, content, 'utf-8')
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ResourceError(`Could not write ${filePath}: ${message}`, referrer)
  }
}

/**
 * Copy a page script to the output tree with the helper prelude prepended
 */
export function copyScript(context: BuildContext, scriptPath: string, referrer: string): string {
  const target = outputPathFor(context, scriptPath)
  if (!context.copiedScripts.has(scriptPath)) {
    const code = fs.readFileSync(scriptPath, 'utf-8')
    writeOutput(target, withHelperPrelude(code), referrer)
    context.copiedScripts.add(scriptPath)
    context.logger.debug(`Copied script ${path.relative(context.sourceDir, scriptPath)}`)
  }
  return target
}

export function copyStylesheet(context: BuildContext, stylesheetPath: string, referrer: string): string {
  const target = outputPathFor(context, stylesheetPath)
  if (!context.copiedStylesheets.has(stylesheetPath)) {
    try {
      ensureDir(path.dirname(target))
      fs.copyFileSync(stylesheetPath, target)
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ResourceError(`Could not copy ${stylesheetPath}: ${message}`, referrer)
    }
    context.copiedStylesheets.add(stylesheetPath)
    context.logger.debug(`Copied stylesheet ${path.relative(context.sourceDir, stylesheetPath)}`)
  }
  return target
}

/**
 * Compile one page. Throws a CompilerError subclass when the page cannot be built.
 */
export function compilePage(context: BuildContext, pagePath: string): PageResult {
  if (context.layoutError !== null) {
    throw context.layoutError
  }

  const page = parseDocument(pagePath, { logger: context.logger })
  const htmlPath = outputPathFor(context, pagePath, '.html')

  const script = resolvePageScript(pagePath, page, context)
  let pageScript: PageScript | null = null
  let copiedScript: string | null = null
  if (script.kind === 'external') {
    const target = copyScript(context, script.path, pagePath)
    pageScript = { kind: 'external', src: hrefFrom(htmlPath, target) }
    copiedScript = script.path
  } else if (script.kind === 'inline') {
    pageScript = { kind: 'inline', code: script.code }
  }

  const stylesheets: string[] = []
  const hrefs: string[] = []
  for (const source of stylesheetSources(pagePath, page, context.layout)) {
    const resolved = path.resolve(source.baseDir, source.href)
    if (stylesheets.includes(resolved)) continue
    validateReference(source.href, source.baseDir, source.referrer, context, 'Stylesheet')
    stylesheets.push(resolved)
    hrefs.push(hrefFrom(htmlPath, copyStylesheet(context, resolved, source.referrer)))
  }

  const expansion = createExpansionContext(context.registry, context.logger)
  let layout: LayoutFragments | null = null
  if (context.layout) {
    layout = {
      head: context.layout.headFragment,
      body: expandComponents(context.layout.bodyMarkup, context.layout.components, expansion),
      styleText: context.layout.styleText,
      inlineScript: context.layout.inlineScript
    }
  }
  const body = expandComponents(page.bodyMarkup, page.components, expansion)

  const html = composeDocument({
    page: {
      fileName: path.basename(pagePath),
      head: page.headFragment,
      body,
      styleText: page.styleText
    },
    layout,
    shell: context.shell,
    stylesheetHrefs: hrefs,
    scopedStyles: expansion.scopedStyles,
    pageScript,
    production: context.mode.production,
    watch: context.mode.watch,
    outputStem: path.parse(htmlPath).name
  })

  writeOutput(htmlPath, html, pagePath)
  context.logger.debug(`Compiled ${path.relative(context.sourceDir, pagePath)} -> ${path.relative(context.outputDir, htmlPath)}`)

  return {
    pagePath,
    outputPath: htmlPath,
    script: copiedScript,
    stylesheets: [...stylesheets, ...expansion.stylesheets],
    componentFiles: [...expansion.componentFiles]
  }
}
