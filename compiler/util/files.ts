/**
 * File System Helpers
 */

import fs from 'fs'
import path from 'path'

/**
 * Recursively collect files under a directory, sorted for stable build order
 */
export function walkFiles(dir: string, accept: (fullPath: string) => boolean = () => true): string[] {
  const files: string[] = []

  function walk(current: string): void {
    if (!fs.existsSync(current)) return

    const entries = fs.readdirSync(current, { withFileTypes: true })
    entries.sort((a, b) => a.name.localeCompare(b.name))

    for (const entry of entries) {
      const fullPath = path.join(current, entry.name)

      if (entry.isDirectory()) {
        walk(fullPath)
      } else if (entry.isFile() && accept(fullPath)) {
        files.push(fullPath)
      }
    }
  }

  walk(dir)
  return files
}

/** True when `child` is `parent` itself or lies beneath it */
export function isInside(child: string, parent: string): boolean {
  const relative = path.relative(path.resolve(parent), path.resolve(child))
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative))
}

export function toPosix(filePath: string): string {
  return filePath.split(path.sep).join('/')
}

/** Relative href from an output HTML file to another output file */
export function hrefFrom(htmlPath: string, targetPath: string): string {
  return toPosix(path.relative(path.dirname(htmlPath), targetPath))
}

export function ensureDir(dir: string): void {
  fs.mkdirSync(dir, { recursive: true })
}

/**
 * Remove empty directories from `start` upwards, stopping at `stopAt`
 */
export function pruneEmptyDirs(start: string, stopAt: string): void {
  let current = path.resolve(start)
  const root = path.resolve(stopAt)

  while (current !== root && isInside(current, root)) {
    if (!fs.existsSync(current) || fs.readdirSync(current).length > 0) return
    fs.rmdirSync(current)
    current = path.dirname(current)
  }
}
