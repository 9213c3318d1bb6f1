/**
 * Compiler Errors
 *
 * Every error raised while compiling a page carries the file it concerns.
 * The directory build catches these per page; anything else is a bug.
 */

export class CompilerError extends Error {
  readonly filePath: string
  readonly line?: number
  readonly column?: number

  constructor(message: string, filePath: string, line?: number, column?: number) {
    super(message)
    this.name = 'CompilerError'
    this.filePath = filePath
    this.line = line
    this.column = column
  }

  override toString(): string {
    const location = this.line !== undefined ? `:${this.line}:${this.column ?? 0}` : ''
    return `${this.filePath}${location}: ${this.message}`
  }
}

export type ParseFailure = 'not-found' | 'extension' | 'unreadable' | 'missing-section'

/** The document could not be read, or lacks a required section */
export class ParseError extends CompilerError {
  readonly reason: ParseFailure

  constructor(message: string, filePath: string, reason: ParseFailure) {
    super(message, filePath)
    this.name = 'ParseError'
    this.reason = reason
  }
}

/** Placeholder missing or repeated, or malformed markup structure */
export class StructuralError extends CompilerError {
  constructor(message: string, filePath: string) {
    super(message, filePath)
    this.name = 'StructuralError'
  }
}

/** A script or stylesheet reference that cannot be used */
export class DependencyError extends CompilerError {
  readonly reference: string

  constructor(message: string, filePath: string, reference: string) {
    super(message, filePath)
    this.name = 'DependencyError'
    this.reference = reference
  }
}

/** Output could not be written */
export class ResourceError extends CompilerError {
  constructor(message: string, filePath: string) {
    super(message, filePath)
    this.name = 'ResourceError'
  }
}

export function describeError(err: unknown): string {
  if (err instanceof CompilerError) return err.toString()
  return err instanceof Error ? err.message : String(err)
}
