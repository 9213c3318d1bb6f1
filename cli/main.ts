/**
 * Shared CLI Execution Logic
 */

import process from 'node:process'
import { BOOLEAN_FLAGS, SHORT_FLAGS, getCommand, showHelp, type CommandOptions } from './commands/index'
import { createLogger } from '../core/logger'
import { describeError } from '../compiler/errors/compilerError'

export const VERSION = '0.4.0'

export interface ParsedArgs {
    positionals: string[]
    values: Record<string, string>
    flags: Set<string>
}

/**
 * Split arguments into positionals, `--key value` options and boolean switches
 */
export function parseArgs(args: string[]): ParsedArgs {
    const positionals: string[] = []
    const values: Record<string, string> = {}
    const flags = new Set<string>()

    for (let i = 0; i < args.length; i++) {
        const arg = args[i]
        if (arg === undefined) continue

        const short = SHORT_FLAGS[arg]
        const key = arg.startsWith('--') ? arg.slice(2) : short
        if (key === undefined) {
            positionals.push(arg)
            continue
        }

        const inline = key.indexOf('=')
        if (inline !== -1) {
            values[key.slice(0, inline)] = key.slice(inline + 1)
            continue
        }
        if (BOOLEAN_FLAGS.has(key)) {
            flags.add(key)
            continue
        }

        const value = args[i + 1]
        if (value !== undefined && !value.startsWith('-')) {
            values[key] = value
            i++
        } else {
            flags.add(key)
        }
    }

    return { positionals, values, flags }
}

export interface CLIOptions {
    argv?: string[]
}

/**
 * Main CLI execution entry point
 */
export async function runCLI(options: CLIOptions = {}): Promise<void> {
    const args = options.argv ?? process.argv.slice(2)

    if (args.includes('--version')) {
        console.log(`stitch v${VERSION}`)
        return
    }

    const [commandName, ...rest] = args
    if (!commandName || commandName === '--help' || commandName === '-h' || commandName === 'help') {
        showHelp()
        return
    }

    const command = getCommand(commandName)
    const parsed = parseArgs(rest)
    const logger = createLogger({ verbose: parsed.flags.has('verbose') })

    if (!command) {
        logger.error(`Unknown command: ${commandName}`)
        showHelp()
        process.exitCode = 1
        return
    }

    if (parsed.flags.has('help')) {
        console.log(command.usage)
        return
    }

    const commandOptions: CommandOptions = { values: parsed.values, flags: parsed.flags, logger }

    try {
        const code = await command.run(parsed.positionals, commandOptions)
        if (code !== 0) process.exitCode = code
    } catch (err: unknown) {
        logger.error(describeError(err))
        if (logger.verbose && err instanceof Error && err.stack) {
            logger.debug(err.stack)
        }
        process.exitCode = 1
    }
}
