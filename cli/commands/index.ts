/**
 * Command Registry
 */

import pc from 'picocolors'
import type { Logger } from '../../core/logger'
import { build } from './build'
import { init } from './init'
import { serveCommand } from './serve'
import { watch } from './watch'

export interface CommandOptions {
    /** `--key value` options */
    values: Record<string, string>
    /** Boolean switches such as `--production` */
    flags: Set<string>
    logger: Logger
}

export interface Command {
    name: string
    description: string
    usage: string
    /** Resolves to the process exit code */
    run: (positionals: string[], options: CommandOptions) => Promise<number>
}

export const commands: Command[] = [
    {
        name: 'build',
        description: 'Compile a source directory or a single .stitch file',
        usage: 'stitch build [source] [--output DIR] [--production]',
        run: build
    },
    {
        name: 'serve',
        description: 'Build for development and serve the output',
        usage: 'stitch serve [source] [--output DIR] [--port N] [--no-build]',
        run: serveCommand
    },
    {
        name: 'watch',
        description: 'Build, rebuild on change and serve with live reload',
        usage: 'stitch watch [source] [--output DIR] [--port N]',
        run: watch
    },
    {
        name: 'init',
        description: 'Create a starter project',
        usage: 'stitch init <directory> [--blank | --single]',
        run: init
    }
]

/** Switches that never take a value */
export const BOOLEAN_FLAGS = new Set(['production', 'verbose', 'no-build', 'blank', 'single', 'help'])

export const SHORT_FLAGS: Record<string, string> = {
    '-o': 'output',
    '-p': 'port',
    '-v': 'verbose'
}

export function getCommand(name: string): Command | undefined {
    return commands.find(command => command.name === name)
}

export function showHelp(): void {
    console.log(`\n${pc.bold(pc.cyan('stitch'))} - compile .stitch pages into static HTML\n`)
    console.log(pc.bold('Usage:'))
    for (const command of commands) {
        console.log(`  ${pc.cyan(command.usage.padEnd(62))} ${pc.dim(command.description)}`)
    }
    console.log(`\n${pc.bold('Global options:')}`)
    console.log(`  ${'--verbose, -v'.padEnd(62)} ${pc.dim('Show debug output')}`)
    console.log(`  ${'--version'.padEnd(62)} ${pc.dim('Print the version')}`)
    console.log('')
}
