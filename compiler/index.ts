/**
 * Stitch Compiler
 *
 * Public entry points for parsing, expanding, composing and building .stitch sources
 */

export * from './constants'
export {
  CompilerError,
  ParseError,
  StructuralError,
  DependencyError,
  ResourceError,
  describeError
} from './errors/compilerError'
export type { ParseFailure } from './errors/compilerError'
export type { SourceDocument, ComponentInvocation, ComponentTable, PropValue } from './ir/types'
export { parseDocument, parseDocumentText } from './parse/parseDocument'
export { ComponentRegistry, componentNameFor } from './components/registry'
export { expandComponents, createExpansionContext, scopeIdFor, substituteProps } from './components/expand'
export type { ExpansionContext } from './components/expand'
export { scopeStyles, scopeSelector } from './css/scope'
export { composeDocument } from './compose/compose'
export type { CompositionInput, PageScript } from './compose/compose'
export { compileDirectory, discoverPages } from './build/compileDirectory'
export type { BuildResult, PageFailure } from './build/compileDirectory'
export { compileFile } from './build/compileFile'
export { compilePage } from './build/compilePage'
export type { PageResult } from './build/compilePage'
export { createBuildContext } from './build/context'
export type { BuildContext, BuildOptions, BuildMode } from './build/context'
export { IncrementalBuilder } from './build/incremental'
export type { WatchEvent, WatchEventType, BatchOutcome, BuilderState } from './build/incremental'
export { DependencyGraph, analyzePage } from './graph/dependencyGraph'
