/**
 * Single-File Build
 *
 * Compiles one page without a layout. The shell is looked up beside the file,
 * then in a sibling src/ directory.
 */

import fs from 'fs'
import path from 'path'
import { SHELL_FILENAME, SOURCE_EXTENSION } from '../constants'
import { ParseError } from '../errors/compilerError'
import { createBuildContext, loadShell, type BuildContext, type BuildOptions } from './context'
import { compilePage, type PageResult } from './compilePage'

export interface SingleFileOptions extends Omit<BuildOptions, 'sourceDir'> {
  filePath: string
}

export function shellCandidates(filePath: string): string[] {
  const dir = path.dirname(path.resolve(filePath))
  return [path.join(dir, SHELL_FILENAME), path.join(dir, 'src', SHELL_FILENAME)]
}

export function createFileContext(options: SingleFileOptions): BuildContext {
  const filePath = path.resolve(options.filePath)
  if (path.extname(filePath) !== SOURCE_EXTENSION) {
    throw new ParseError(`Input file must be a ${SOURCE_EXTENSION} file`, filePath, 'extension')
  }
  if (!fs.existsSync(filePath)) {
    throw new ParseError('File not found', filePath, 'not-found')
  }

  const context = createBuildContext({ ...options, sourceDir: path.dirname(filePath), staticDirName: null })
  context.layout = null
  context.layoutError = null

  if (context.shell === null) {
    const fallback = shellCandidates(filePath).find(candidate => candidate !== context.shellPath && fs.existsSync(candidate))
    if (fallback !== undefined) {
      context.shellPath = fallback
      context.shell = loadShell(fallback, context.logger)
    }
  }
  if (context.shell === null) {
    context.logger.debug(`No ${SHELL_FILENAME} found for ${path.basename(filePath)}`)
  }
  return context
}

/**
 * Compile a single page into `<outputDir>/<stem>.html`
 */
export function compileFile(options: SingleFileOptions): PageResult {
  const context = createFileContext(options)
  fs.mkdirSync(context.outputDir, { recursive: true })
  return compilePage(context, path.resolve(options.filePath))
}
