/**
 * Stitch Development Server
 *
 * Serves the output directory with caching disabled and exposes the
 * reload-trigger file whose Last-Modified header drives live reload.
 */

import fs from 'fs'
import path from 'path'
import { Hono } from 'hono'
import { serve, type ServerType } from '@hono/node-server'
import { serveStatic } from '@hono/node-server/serve-static'
import { RELOAD_TRIGGER_FILENAME } from '../compiler/constants'
import type { Logger } from '../core/logger'
import { silentLogger } from '../core/logger'

export interface DevServerOptions {
    outputDir: string
    port?: number
    host?: string
    logger?: Logger
}

export const DEFAULT_PORT = 8000

/**
 * Static roots are resolved against the working directory
 */
function staticRoot(outputDir: string): string {
    return path.relative(process.cwd(), path.resolve(outputDir)) || '.'
}

/**
 * Build the Hono app serving one output directory
 */
export function createDevApp(options: DevServerOptions): Hono {
    const outputDir = path.resolve(options.outputDir)
    const logger = options.logger ?? silentLogger
    const root = staticRoot(outputDir)
    const app = new Hono()

    app.use('*', async (c, next) => {
        await next()
        c.res.headers.set('Cache-Control', 'no-store, must-revalidate')
        c.res.headers.set('Expires', '0')
        logger.debug(`${c.req.method} ${c.req.path} ${c.res.status}`)
    })

    app.get(`/${RELOAD_TRIGGER_FILENAME}`, (c) => {
        const trigger = path.join(outputDir, RELOAD_TRIGGER_FILENAME)
        if (!fs.existsSync(trigger)) {
            return c.text('Not found', 404)
        }
        const stats = fs.statSync(trigger)
        c.header('Last-Modified', stats.mtime.toUTCString())
        return c.text(String(stats.mtimeMs))
    })

    app.use('/*', serveStatic({ root }))

    // /about -> about.html
    app.use('/*', serveStatic({
        root,
        rewriteRequestPath: (requestPath) =>
            requestPath.endsWith('/') || path.extname(requestPath) !== '' ? requestPath : `${requestPath}.html`
    }))

    app.notFound((c) => c.text(`Not found: ${c.req.path}`, 404))

    app.onError((err, c) => {
        logger.error(`Server error: ${err.message}`)
        return c.text('Internal Server Error', 500)
    })

    return app
}

/**
 * Start serving the output directory
 */
export function startDevServer(options: DevServerOptions): ServerType {
    const logger = options.logger ?? silentLogger
    const port = options.port ?? DEFAULT_PORT
    const hostname = options.host ?? 'localhost'
    const app = createDevApp(options)

    const server = serve({ fetch: app.fetch, port, hostname })
    logger.success(`Serving ${options.outputDir} at http://${hostname}:${port}`)
    return server
}
