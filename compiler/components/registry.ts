/**
 * Component Registry
 *
 * Maps dotted component names to their .stitch files under the components root
 */

import path from 'path'
import { SOURCE_EXTENSION } from '../constants'
import { walkFiles } from '../util/files'
import type { Logger } from '../../core/logger'
import { silentLogger } from '../../core/logger'

function capitalize(segment: string): string {
  return segment.charAt(0).toUpperCase() + segment.slice(1).toLowerCase()
}

/**
 * Derive a component name from its path relative to the components root.
 * `ui/button.stitch` becomes `Ui.Button`.
 */
export function componentNameFor(relativePath: string): string {
  const withoutExtension = relativePath.slice(0, relativePath.length - path.extname(relativePath).length)
  return withoutExtension
    .split(/[\\/]/)
    .filter(segment => segment !== '')
    .map(capitalize)
    .join('.')
}

/**
 * Registry of components discovered in one scan
 */
export class ComponentRegistry {
  private components = new Map<string, string>()
  readonly componentsDir: string
  private logger: Logger

  constructor(componentsDir: string, logger: Logger = silentLogger) {
    this.componentsDir = path.resolve(componentsDir)
    this.logger = logger
  }

  /**
   * Rescan the components root, replacing the previous mapping wholesale
   */
  scan(): this {
    const next = new Map<string, string>()
    const files = walkFiles(this.componentsDir, file => path.extname(file) === SOURCE_EXTENSION)

    for (const file of files) {
      if (path.basename(file).startsWith('_')) {
        this.logger.debug(`Skipping private component file ${path.basename(file)}`)
        continue
      }

      const name = componentNameFor(path.relative(this.componentsDir, file))
      const existing = next.get(name)
      if (existing !== undefined) {
        this.logger.warn(`Component "${name}" is defined by both ${existing} and ${file}. Using the latter.`)
      }
      next.set(name, file)
    }

    this.components = next
    this.logger.debug(`Registered ${next.size} component(s) from ${this.componentsDir}`)
    return this
  }

  /**
   * Get the source path of a component by name
   */
  getPath(name: string): string | null {
    return this.components.get(name) ?? null
  }

  has(name: string): boolean {
    return this.components.has(name)
  }

  names(): string[] {
    return Array.from(this.components.keys())
  }

  get size(): number {
    return this.components.size
  }
}
