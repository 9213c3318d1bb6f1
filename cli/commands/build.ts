/**
 * Build Command
 *
 * Compiles a source directory or a single .stitch file
 */

import { compileDirectory } from '../../compiler/build/compileDirectory'
import { compileFile } from '../../compiler/build/compileFile'
import { resolveProject } from '../utils/project'
import type { CommandOptions } from './index'

export async function build(positionals: string[], options: CommandOptions): Promise<number> {
    const { logger } = options
    const production = options.flags.has('production')
    const project = await resolveProject({
        input: positionals[0],
        output: options.values.output,
        production,
        logger
    })

    logger.header(`Stitch Build (${production ? 'production' : 'development'})`)
    logger.log(`Source: ${project.input}`)
    logger.log(`Output: ${project.outputDir}`)

    if (project.isSingleFile) {
        const result = compileFile({
            filePath: project.input,
            outputDir: project.outputDir,
            production,
            logger
        })
        logger.success(`Compiled ${result.outputPath}`)
        return 0
    }

    const result = compileDirectory({
        sourceDir: project.input,
        outputDir: project.outputDir,
        staticDirName: project.config.staticDirName,
        componentsDir: project.config.componentsDir,
        production,
        logger
    })
    return result.errorCount > 0 ? 1 : 0
}
