/**
 * Build Context
 *
 * Everything a page compile reads: roots, mode, the component registry, the
 * cached layout and shell. Passed explicitly; there is no module-level state.
 */

import fs from 'fs'
import path from 'path'
import { LAYOUT_FILENAME, SHELL_BODY_PLACEHOLDER, SHELL_FILENAME, SHELL_HEAD_PLACEHOLDER } from '../constants'
import { ComponentRegistry } from '../components/registry'
import { inspectShell } from '../compose/compose'
import type { SourceDocument } from '../ir/types'
import { parseDocument } from '../parse/parseDocument'
import type { SourceRoots } from './resolve'
import type { Logger } from '../../core/logger'
import { silentLogger } from '../../core/logger'
import { DEFAULT_CONFIG } from '../../core/config/types'

export interface BuildMode {
  production: boolean
  /** Development build feeding a watcher; enables the live-reload script */
  watch: boolean
}

export interface BuildOptions {
  sourceDir: string
  outputDir: string
  /** Static directory name relative to the source root; null disables static handling */
  staticDirName?: string | null
  /** Components directory relative to the source root */
  componentsDir?: string
  production?: boolean
  watch?: boolean
  logger?: Logger
}

export interface BuildContext extends SourceRoots {
  outputDir: string
  componentsDir: string
  layoutPath: string
  shellPath: string
  registry: ComponentRegistry
  layout: SourceDocument | null
  /** Set when the layout exists but failed to parse */
  layoutError: unknown
  shell: string | null
  mode: BuildMode
  logger: Logger
  /** Scripts and stylesheets already copied during the current pass */
  copiedScripts: Set<string>
  copiedStylesheets: Set<string>
}

/**
 * Read the shell template, warning about missing placeholders once
 */
export function loadShell(shellPath: string, logger: Logger): string | null {
  if (!fs.existsSync(shellPath)) return null

  try {
    const shell = fs.readFileSync(shellPath, 'utf-8')
    const markers = inspectShell(shell)
    if (!markers.head) logger.warn(`${SHELL_FILENAME} is missing ${SHELL_HEAD_PLACEHOLDER}; head content goes before </head>`)
    if (!markers.body) logger.warn(`${SHELL_FILENAME} is missing ${SHELL_BODY_PLACEHOLDER}; body content goes before </body>`)
    logger.debug(`Using shell template ${shellPath}`)
    return shell
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err)
    logger.warn(`Could not read ${SHELL_FILENAME}: ${message}. Proceeding without it.`)
    return null
  }
}

/**
 * Re-read the layout into the context. A parse failure leaves `layout` null and
 * records the error so the directory build can report it.
 */
export function reloadLayout(context: BuildContext): void {
  context.layout = null
  context.layoutError = null
  if (!fs.existsSync(context.layoutPath)) {
    context.logger.debug(`No ${LAYOUT_FILENAME} found in ${context.sourceDir}`)
    return
  }

  try {
    context.layout = parseDocument(context.layoutPath, { isLayout: true, logger: context.logger })
    context.logger.debug(`Using layout ${context.layoutPath}`)
  } catch (err: unknown) {
    context.layoutError = err
  }
}

export function reloadShell(context: BuildContext): void {
  context.shell = loadShell(context.shellPath, context.logger)
}

export function createBuildContext(options: BuildOptions): BuildContext {
  const logger = options.logger ?? silentLogger
  const sourceDir = path.resolve(options.sourceDir)
  const staticDirName = options.staticDirName === undefined ? DEFAULT_CONFIG.staticDirName : options.staticDirName
  const componentsDir = path.resolve(sourceDir, options.componentsDir ?? DEFAULT_CONFIG.componentsDir)

  const context: BuildContext = {
    sourceDir,
    outputDir: path.resolve(options.outputDir),
    staticDir: staticDirName ? path.resolve(sourceDir, staticDirName) : null,
    componentsDir,
    layoutPath: path.join(sourceDir, LAYOUT_FILENAME),
    shellPath: path.join(sourceDir, SHELL_FILENAME),
    registry: new ComponentRegistry(componentsDir, logger),
    layout: null,
    layoutError: null,
    shell: null,
    mode: {
      production: options.production === true,
      watch: options.watch === true && options.production !== true
    },
    logger,
    copiedScripts: new Set(),
    copiedStylesheets: new Set()
  }

  context.registry.scan()
  reloadShell(context)
  reloadLayout(context)
  return context
}

/** Forget which assets were copied, so the next pass copies them afresh */
export function beginPass(context: BuildContext): void {
  context.copiedScripts.clear()
  context.copiedStylesheets.clear()
}
