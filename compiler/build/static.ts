/**
 * Static Assets
 *
 * The static directory is mirrored into the output tree as-is
 */

import fs from 'fs'
import path from 'path'
import { ensureDir, pruneEmptyDirs, walkFiles } from '../util/files'
import type { BuildContext } from './context'

export function staticOutputDir(context: BuildContext): string | null {
  if (context.staticDir === null) return null
  return path.join(context.outputDir, path.relative(context.sourceDir, context.staticDir))
}

/**
 * Copy the whole static directory. Returns the number of files copied.
 */
export function copyStaticAssets(context: BuildContext): number {
  const target = staticOutputDir(context)
  if (context.staticDir === null || target === null) {
    context.logger.debug('Static asset handling disabled')
    return 0
  }
  if (!fs.existsSync(context.staticDir)) {
    context.logger.debug(`No static directory at ${context.staticDir}`)
    return 0
  }

  const staticDir = context.staticDir
  const files = walkFiles(staticDir)
  for (const file of files) {
    const destination = path.join(target, path.relative(staticDir, file))
    ensureDir(path.dirname(destination))
    fs.copyFileSync(file, destination)
  }
  context.logger.debug(`Copied ${files.length} static asset(s) to ${target}`)
  return files.length
}

/**
 * Mirror a single static file: copy it when present, remove the copy when not.
 * Returns the output path touched, or null when nothing changed.
 */
export function mirrorStaticFile(context: BuildContext, file: string): string | null {
  const target = staticOutputDir(context)
  if (context.staticDir === null || target === null) return null

  const destination = path.join(target, path.relative(context.staticDir, file))
  if (fs.existsSync(file) && fs.statSync(file).isFile()) {
    ensureDir(path.dirname(destination))
    fs.copyFileSync(file, destination)
    return destination
  }
  if (fs.existsSync(destination)) {
    fs.rmSync(destination, { force: true })
    pruneEmptyDirs(path.dirname(destination), context.outputDir)
    return destination
  }
  return null
}
