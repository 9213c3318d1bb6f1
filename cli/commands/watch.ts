/**
 * Watch Command
 *
 * Initial build, incremental rebuilds on change, and the dev server with live reload
 */

import fs from 'fs'
import path from 'path'
import chokidar from 'chokidar'
import { IncrementalBuilder } from '../../compiler/build/incremental'
import { compileFile } from '../../compiler/build/compileFile'
import { RELOAD_TRIGGER_FILENAME, WATCH_DEBOUNCE_MS } from '../../compiler/constants'
import { describeError } from '../../compiler/errors/compilerError'
import { DEFAULT_PORT, startDevServer } from '../../runtime/serve'
import { watchSources } from '../../runtime/watch'
import { parsePort, resolveProject, type StitchProject } from '../utils/project'
import type { CommandOptions } from './index'

function touch(outputDir: string): void {
    fs.mkdirSync(outputDir, { recursive: true })
    fs.writeFileSync(path.join(outputDir, RELOAD_TRIGGER_FILENAME), String(Date.now()), 'utf-8')
}

/**
 * Single files have no dependency graph: any change recompiles the file
 */
function watchSingleFile(project: StitchProject, options: CommandOptions): void {
    const { logger } = options
    const rebuild = (): void => {
        try {
            compileFile({ filePath: project.input, outputDir: project.outputDir, watch: true, logger })
            touch(project.outputDir)
            logger.rebuild('Page', path.basename(project.input))
        } catch (err: unknown) {
            logger.error(`Rebuild failed: ${describeError(err)}`)
        }
    }

    rebuild()
    let timer: NodeJS.Timeout | null = null
    chokidar.watch(project.input, { ignoreInitial: true }).on('all', () => {
        if (timer) clearTimeout(timer)
        timer = setTimeout(rebuild, WATCH_DEBOUNCE_MS)
    })
    logger.info(`Watching ${project.input} for changes...`)
}

export async function watch(positionals: string[], options: CommandOptions): Promise<number> {
    const { logger } = options
    const port = parsePort(options.values.port) ?? DEFAULT_PORT
    const project = await resolveProject({
        input: positionals[0],
        output: options.values.output,
        production: false,
        logger
    })

    logger.header('Stitch Watch')
    logger.log(`Source: ${project.input}`)
    logger.log(`Output: ${project.outputDir}`)

    if (project.isSingleFile) {
        watchSingleFile(project, options)
    } else {
        const builder = new IncrementalBuilder({
            sourceDir: project.input,
            outputDir: project.outputDir,
            staticDirName: project.config.staticDirName,
            componentsDir: project.config.componentsDir,
            watch: true,
            logger
        })
        const result = builder.start()
        if (result.errorCount > 0) {
            logger.warn(`Initial build finished with ${result.errorCount} error(s); watching anyway`)
        } else {
            logger.success(`Initial build compiled ${result.compiled.length} page(s)`)
        }
        watchSources(builder)
    }

    startDevServer({ outputDir: project.outputDir, port, host: options.values.host, logger })
    logger.info('Press Ctrl+C to stop')
    return 0
}
