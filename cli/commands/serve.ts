/**
 * Serve Command
 *
 * Optionally builds, then serves the output directory
 */

import { compileDirectory } from '../../compiler/build/compileDirectory'
import { compileFile } from '../../compiler/build/compileFile'
import { DEFAULT_PORT, startDevServer } from '../../runtime/serve'
import { parsePort, resolveProject } from '../utils/project'
import type { CommandOptions } from './index'

export async function serveCommand(positionals: string[], options: CommandOptions): Promise<number> {
    const { logger } = options
    const port = parsePort(options.values.port) ?? DEFAULT_PORT
    const project = await resolveProject({
        input: positionals[0],
        output: options.values.output,
        production: false,
        logger
    })

    if (!options.flags.has('no-build')) {
        logger.header('Stitch Build (development)')
        if (project.isSingleFile) {
            compileFile({ filePath: project.input, outputDir: project.outputDir, logger })
        } else {
            const result = compileDirectory({
                sourceDir: project.input,
                outputDir: project.outputDir,
                staticDirName: project.config.staticDirName,
                componentsDir: project.config.componentsDir,
                logger
            })
            if (result.errorCount > 0) {
                logger.warn('Serving despite build errors')
            }
        }
    }

    startDevServer({ outputDir: project.outputDir, port, host: options.values.host, logger })
    logger.info('Press Ctrl+C to stop')
    return 0
}
