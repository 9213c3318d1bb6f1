/**
 * File Watcher
 *
 * Feeds debounced chokidar events into the incremental builder
 */

import chokidar from 'chokidar'
import { WATCH_DEBOUNCE_MS } from '../compiler/constants'
import type { IncrementalBuilder, WatchEvent, WatchEventType } from '../compiler/build/incremental'
import { describeError } from '../compiler/errors/compilerError'
import { isInside } from '../compiler/util/files'

export interface SourceWatcher {
    close(): Promise<void>
}

export interface WatchOptions {
    debounceMs?: number
}

/**
 * Watch the builder's source root. Each quiet period flushes one batch.
 */
export function watchSources(builder: IncrementalBuilder, options: WatchOptions = {}): SourceWatcher {
    const { context } = builder
    const debounceMs = options.debounceMs ?? WATCH_DEBOUNCE_MS
    let pending: WatchEvent[] = []
    let timer: NodeJS.Timeout | null = null

    const flush = (): void => {
        timer = null
        const batch = pending
        pending = []
        try {
            const outcome = builder.handleBatch(batch)
            if (outcome.failedPages.length > 0) {
                context.logger.warn(`${outcome.failedPages.length} page(s) failed to rebuild`)
            }
        } catch (err: unknown) {
            context.logger.error(`Rebuild failed: ${describeError(err)}`)
        }
    }

    const enqueue = (type: WatchEventType) => (filePath: string): void => {
        pending.push({ type, path: filePath })
        if (timer) clearTimeout(timer)
        timer = setTimeout(flush, debounceMs)
    }

    const watcher = chokidar.watch(context.sourceDir, {
        ignoreInitial: true,
        ignored: (candidate: string) => isInside(candidate, context.outputDir)
    })

    watcher
        .on('add', enqueue('add'))
        .on('change', enqueue('change'))
        .on('unlink', enqueue('unlink'))
        .on('error', (err: unknown) => context.logger.error(`Watcher error: ${describeError(err)}`))

    context.logger.info(`Watching ${context.sourceDir} for changes...`)

    return {
        async close() {
            if (timer) clearTimeout(timer)
            timer = null
            pending = []
            await watcher.close()
        }
    }
}
