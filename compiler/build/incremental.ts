/**
 * Incremental Builder
 *
 * Keeps the dependency graph for a watch session and turns batches of file
 * events into the smallest set of page rebuilds. Layout changes always fall
 * back to a full rebuild.
 */

import fs from 'fs'
import path from 'path'
import { RELOAD_TRIGGER_FILENAME, SOURCE_EXTENSION } from '../constants'
import { describeError } from '../errors/compilerError'
import { DependencyGraph, analyzePage } from '../graph/dependencyGraph'
import { isInside, pruneEmptyDirs } from '../util/files'
import { buildAll, compilePages, discoverPages, isPagePath, type BuildResult } from './compileDirectory'
import { outputPathFor } from './compilePage'
import {
  beginPass,
  createBuildContext,
  reloadLayout,
  reloadShell,
  type BuildContext,
  type BuildOptions
} from './context'
import { mirrorStaticFile } from './static'
import { conventionalScriptPath } from './resolve'

// ============================================
// Types
// ============================================

export type WatchEventType = 'add' | 'change' | 'unlink'

export interface WatchEvent {
  type: WatchEventType
  path: string
}

export type BuilderState = 'scanning' | 'idle' | 'rebuilding'

export interface BatchOutcome {
  fullRebuild: boolean
  rebuiltPages: string[]
  failedPages: string[]
  removedOutputs: string[]
  mirroredAssets: string[]
}

function emptyOutcome(): BatchOutcome {
  return { fullRebuild: false, rebuiltPages: [], failedPages: [], removedOutputs: [], mirroredAssets: [] }
}

/**
 * Collapse a batch to one event per path, keeping the latest
 */
export function coalesceEvents(events: WatchEvent[]): WatchEvent[] {
  const latest = new Map<string, WatchEvent>()
  for (const event of events) {
    const resolved = path.resolve(event.path)
    latest.delete(resolved)
    latest.set(resolved, { type: event.type, path: resolved })
  }
  return Array.from(latest.values())
}

// ============================================
// Builder
// ============================================

export class IncrementalBuilder {
  readonly context: BuildContext
  readonly graph = new DependencyGraph()
  state: BuilderState = 'scanning'
  /** Pages whose last compile failed; retried when files appear */
  private failing = new Set<string>()

  constructor(options: BuildOptions) {
    this.context = createBuildContext({ ...options, watch: options.production !== true })
  }

  get reloadTriggerPath(): string {
    return path.join(this.context.outputDir, RELOAD_TRIGGER_FILENAME)
  }

  /**
   * Initial full build and graph scan
   */
  start(): BuildResult {
    this.state = 'scanning'
    const result = this.fullRebuild()
    this.touchReloadTrigger()
    this.state = 'idle'
    return result
  }

  /**
   * Rebuild the whole graph from the pages on disk
   */
  scan(): void {
    this.graph.clear()
    this.graph.layout = this.context.layout
    for (const page of discoverPages(this.context)) {
      this.graph.setPage(page, analyzePage(page, this.context, this.context.layout, this.context.logger))
    }
    this.context.logger.debug(`Tracking ${this.graph.pages.size} page(s)`)
  }

  fullRebuild(): BuildResult {
    this.scan()
    const result = buildAll(this.context)
    this.failing = new Set(result.failures.map(failure => failure.pagePath))
    return result
  }

  touchReloadTrigger(): void {
    fs.mkdirSync(this.context.outputDir, { recursive: true })
    fs.writeFileSync(this.reloadTriggerPath, String(Date.now()), 'utf-8')
  }

  /**
   * Process one debounced batch of file events
   */
  handleBatch(events: WatchEvent[]): BatchOutcome {
    const { context } = this
    const batch = coalesceEvents(events).filter(event =>
      isInside(event.path, context.sourceDir) && !isInside(event.path, context.outputDir)
    )
    const outcome = emptyOutcome()
    if (batch.length === 0) return outcome

    this.state = 'rebuilding'
    beginPass(context)

    try {
      if (batch.some(event => event.path === context.layoutPath)) {
        reloadLayout(context)
        if (context.layoutError !== null) {
          context.logger.warn(`Layout failed to parse: ${describeError(context.layoutError)}`)
        }
        context.logger.rebuild('Layout', path.relative(context.sourceDir, context.layoutPath))
        return this.runFullRebuild(outcome)
      }

      const structural = batch.find(event =>
        event.path === context.shellPath || isInside(event.path, context.componentsDir)
      )
      if (structural) {
        reloadShell(context)
        context.registry.scan()
        context.logger.rebuild('Full', path.relative(context.sourceDir, structural.path))
        return this.runFullRebuild(outcome)
      }

      const toRebuild = new Set<string>()
      for (const event of batch) {
        this.applyEvent(event, toRebuild, outcome)
      }

      if (batch.some(event => event.type === 'add')) {
        for (const page of this.failing) {
          if (!this.graph.pages.has(page)) continue
          this.refreshPage(page, outcome)
          toRebuild.add(page)
        }
      }

      this.rebuildPages([...toRebuild].filter(page => this.graph.pages.has(page)), outcome)

      if (outcome.rebuiltPages.length > 0 || outcome.removedOutputs.length > 0 || outcome.mirroredAssets.length > 0) {
        this.touchReloadTrigger()
      }
      return outcome
    } finally {
      this.state = 'idle'
    }
  }

  // ============================================
  // Event handling
  // ============================================

  private applyEvent(event: WatchEvent, toRebuild: Set<string>, outcome: BatchOutcome): void {
    const { context, graph } = this
    const file = event.path

    if (context.staticDir !== null && isInside(file, context.staticDir)) {
      const mirrored = mirrorStaticFile(context, file)
      if (mirrored !== null) {
        outcome.mirroredAssets.push(mirrored)
        context.logger.rebuild('Static', path.relative(context.sourceDir, file))
      }
      for (const page of graph.dependentsOf(file)) toRebuild.add(page)
      return
    }

    if (path.extname(file) === SOURCE_EXTENSION) {
      if (!isPagePath(context, file)) return
      if (event.type === 'unlink') {
        toRebuild.delete(file)
        this.removePage(file, outcome)
      } else {
        this.refreshPage(file, outcome)
        toRebuild.add(file)
      }
      return
    }

    if (graph.isTracked(file)) {
      if (event.type === 'unlink') {
        const dependents = graph.removeDependency(file)
        this.removeOutput(outputPathFor(context, file), outcome)
        for (const page of dependents) {
          this.refreshPage(page, outcome)
          toRebuild.add(page)
        }
      } else {
        const dependents = graph.dependentsOf(file)
        context.logger.debug(`${path.basename(file)} affects ${dependents.size} page(s)`)
        for (const page of dependents) toRebuild.add(page)
      }
      return
    }

    const owner = this.conventionalOwner(file)
    if (owner !== null) {
      this.refreshPage(owner, outcome)
      toRebuild.add(owner)
    }
  }

  /** The page whose same-stem script this file would be, if it is tracked */
  private conventionalOwner(file: string): string | null {
    const parsed = path.parse(file)
    const page = path.join(parsed.dir, parsed.name + SOURCE_EXTENSION)
    if (!this.graph.pages.has(page)) return null
    return conventionalScriptPath(page) === file ? page : null
  }

  /** Re-analyze a page; a script it no longer uses loses its output copy once no page uses it */
  private refreshPage(page: string, outcome: BatchOutcome): void {
    const { context, graph } = this
    const previous = graph.pageToScript.get(page) ?? null
    graph.setPage(page, analyzePage(page, context, context.layout, context.logger))

    if (previous !== null && graph.pageToScript.get(page) !== previous && graph.pagesUsingScript(previous).size === 0) {
      this.removeOutput(outputPathFor(context, previous), outcome)
    }
  }

  private removePage(page: string, outcome: BatchOutcome): void {
    const { context, graph } = this
    const script = graph.pageToScript.get(page) ?? null
    graph.removePage(page)
    this.failing.delete(page)

    this.removeOutput(outputPathFor(context, page, '.html'), outcome)
    if (script !== null && graph.pagesUsingScript(script).size === 0) {
      this.removeOutput(outputPathFor(context, script), outcome)
    }
    context.logger.rebuild('Page', `${path.relative(context.sourceDir, page)} (removed)`)
  }

  private removeOutput(target: string, outcome: BatchOutcome): void {
    if (!fs.existsSync(target)) return
    fs.rmSync(target, { force: true })
    pruneEmptyDirs(path.dirname(target), this.context.outputDir)
    outcome.removedOutputs.push(target)
  }

  private rebuildPages(pages: string[], outcome: BatchOutcome): void {
    const result = compilePages(this.context, pages)
    for (const page of result.compiled) {
      this.failing.delete(page.pagePath)
      outcome.rebuiltPages.push(page.pagePath)
      this.context.logger.rebuild('Page', path.relative(this.context.sourceDir, page.pagePath))
    }
    for (const failure of result.failures) {
      this.failing.add(failure.pagePath)
      outcome.failedPages.push(failure.pagePath)
    }
  }

  private runFullRebuild(outcome: BatchOutcome): BatchOutcome {
    const result = this.fullRebuild()
    outcome.fullRebuild = true
    outcome.rebuiltPages.push(...result.compiled.map(page => page.pagePath))
    outcome.failedPages.push(...result.failures.map(failure => failure.pagePath))
    this.touchReloadTrigger()
    return outcome
  }
}
