/**
 * Temporary project trees for tests
 */

import fs from 'fs'
import os from 'os'
import path from 'path'

export function makeTempDir(prefix = 'stitch-'): string {
    return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)))
}

/**
 * Write files relative to root. Keys use forward slashes.
 */
export function writeTree(root: string, files: Record<string, string>): void {
    for (const [relative, content] of Object.entries(files)) {
        const target = path.join(root, ...relative.split('/'))
        fs.mkdirSync(path.dirname(target), { recursive: true })
        fs.writeFileSync(target, content, 'utf-8')
    }
}

export function removeTempDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true })
}

export function read(file: string): string {
    return fs.readFileSync(file, 'utf-8')
}

export function countMatches(text: string, pattern: RegExp): number {
    return (text.match(pattern) ?? []).length
}

/** Deterministic id source for placeholder tokens */
export function sequentialIds(prefix = 'id'): () => string {
    let next = 0
    return () => `${prefix}${next++}`
}
