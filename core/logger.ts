/**
 * Logger
 *
 * Colored console output shared by the compiler, builder and CLI.
 * Verbosity travels with the logger instance rather than a global flag.
 */

import pc from 'picocolors'

export interface LoggerOptions {
    verbose?: boolean
    silent?: boolean
}

export interface Logger {
    readonly verbose: boolean
    log(message: string): void
    success(message: string): void
    warn(message: string): void
    error(message: string): void
    info(message: string): void
    header(title: string): void
    debug(message: string): void
    rebuild(kind: 'Page' | 'Layout' | 'Script' | 'Style' | 'Static' | 'Full', target: string): void
}

export function createLogger(options: LoggerOptions = {}): Logger {
    const verbose = options.verbose === true
    const silent = options.silent === true

    const out = (line: string): void => {
        if (!silent) console.log(line)
    }

    return {
        verbose,
        log(message) {
            out(`${pc.cyan('[stitch]')} ${message}`)
        },
        success(message) {
            out(`${pc.green('✓')} ${message}`)
        },
        warn(message) {
            out(`${pc.yellow('⚠')} ${message}`)
        },
        error(message) {
            if (!silent) console.error(`${pc.red('✗')} ${message}`)
        },
        info(message) {
            out(`${pc.blue('ℹ')} ${message}`)
        },
        header(title) {
            out(`\n${pc.bold(pc.cyan(title))}\n`)
        },
        debug(message) {
            if (verbose) out(`${pc.gray('[debug]')} ${message}`)
        },
        rebuild(kind, target) {
            out(`${pc.magenta('[watch]')} ${pc.bold(kind)} rebuilt: ${pc.dim(target)}`)
        }
    }
}

/** A logger that discards everything */
export const silentLogger: Logger = createLogger({ silent: true })
