import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import fs from 'fs'
import path from 'path'
import { makeTempDir, removeTempDir, writeTree } from '../test/helpers'
import { createDevApp } from './serve'

let outputDir: string

beforeEach(() => {
    outputDir = makeTempDir()
})

afterEach(() => {
    removeTempDir(outputDir)
})

// ============================================================================
// Reload trigger
// ============================================================================

describe('reload trigger route', () => {
    test('returns 404 before the first build', async () => {
        const app = createDevApp({ outputDir })

        const res = await app.request('/.stitch-reload')

        expect(res.status).toBe(404)
        expect(res.headers.get('Cache-Control')).toBe('no-store, must-revalidate')
    })

    test('reports the trigger modification time', async () => {
        writeTree(outputDir, { '.stitch-reload': '1' })
        const stamp = new Date('2024-01-02T03:04:05Z')
        fs.utimesSync(path.join(outputDir, '.stitch-reload'), stamp, stamp)
        const app = createDevApp({ outputDir })

        const res = await app.request('/.stitch-reload', { method: 'HEAD' })

        expect(res.status).toBe(200)
        expect(res.headers.get('Last-Modified')).toBe('Tue, 02 Jan 2024 03:04:05 GMT')
        expect(res.headers.get('Expires')).toBe('0')
    })
})

// ============================================================================
// Static files
// ============================================================================

describe('static files', () => {
    test('serves built pages with caching disabled', async () => {
        writeTree(outputDir, { 'index.html': '<p>home</p>' })
        const app = createDevApp({ outputDir })

        const res = await app.request('/index.html')

        expect(res.status).toBe(200)
        expect(await res.text()).toBe('<p>home</p>')
        expect(res.headers.get('Cache-Control')).toBe('no-store, must-revalidate')
    })

    test('maps extensionless paths to html files', async () => {
        writeTree(outputDir, { 'about.html': '<p>about</p>' })
        const app = createDevApp({ outputDir })

        const res = await app.request('/about')

        expect(res.status).toBe(200)
        expect(await res.text()).toBe('<p>about</p>')
    })

    test('answers 404 for unknown paths', async () => {
        const app = createDevApp({ outputDir })

        const res = await app.request('/missing.css')

        expect(res.status).toBe(404)
        expect(await res.text()).toBe('Not found: /missing.css')
    })
})
