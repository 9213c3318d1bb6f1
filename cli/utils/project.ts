/**
 * Project Utility
 *
 * Resolves the source and output paths a command works on, from CLI
 * arguments and the project's stitch config
 */

import fs from 'fs'
import path from 'path'
import { findProjectRoot, loadStitchConfig, resolveConfig, type ResolvedStitchConfig } from '../../core/config'
import { SOURCE_EXTENSION } from '../../compiler/constants'
import { isInside } from '../../compiler/util/files'
import type { Logger } from '../../core/logger'

export interface StitchProject {
    root: string
    config: ResolvedStitchConfig
    /** Source directory, or the single .stitch file being built */
    input: string
    isSingleFile: boolean
    outputDir: string
}

export interface ProjectRequest {
    input?: string
    output?: string
    production: boolean
    logger: Logger
    cwd?: string
}

/**
 * Work out input and output for a command. Throws with a user-facing message
 * when the input is missing or the output would land inside the source tree.
 */
export async function resolveProject(request: ProjectRequest): Promise<StitchProject> {
    const cwd = request.cwd ?? process.cwd()
    const explicitInput = request.input ? path.resolve(cwd, request.input) : null
    const searchFrom = explicitInput
        ? (fs.existsSync(explicitInput) && fs.statSync(explicitInput).isFile() ? path.dirname(explicitInput) : explicitInput)
        : cwd

    const root = findProjectRoot(searchFrom)
    const config = resolveConfig(await loadStitchConfig(root, request.logger))
    const input = explicitInput ?? path.resolve(root, config.sourceDir)

    if (!fs.existsSync(input)) {
        throw new Error(`Input not found: ${input}`)
    }

    const isSingleFile = fs.statSync(input).isFile()
    if (isSingleFile && path.extname(input) !== SOURCE_EXTENSION) {
        throw new Error(`Input file must be a ${SOURCE_EXTENSION} file: ${input}`)
    }

    const defaultOutput = request.production ? config.outputDir : config.devOutputDir
    const outputDir = request.output
        ? path.resolve(cwd, request.output)
        : path.resolve(isSingleFile ? path.dirname(input) : root, defaultOutput)

    if (!isSingleFile && isInside(outputDir, input)) {
        throw new Error(`Output directory '${outputDir}' cannot be inside the source directory '${input}'`)
    }

    request.logger.debug(`Project root: ${root}`)
    return { root, config, input, isSingleFile, outputDir }
}

export function parsePort(value: string | undefined): number | null {
    if (value === undefined) return null
    const port = Number(value)
    if (!Number.isInteger(port) || port <= 0 || port > 65535) {
        throw new Error(`Invalid port: ${value}`)
    }
    return port
}
