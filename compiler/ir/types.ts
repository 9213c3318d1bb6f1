/**
 * Document Types
 *
 * Records produced by the parser and consumed by the expander and compositor
 */

export type PropValue = string | boolean

export interface ComponentInvocation {
  /** Fresh id embedded in the placeholder comment */
  id: string
  /** Dotted capitalized name, e.g. "Ui.Button" */
  name: string
  props: Record<string, PropValue>
  /** Raw inner markup of a paired tag; empty for self-closing tags */
  children: string
}

export type ComponentTable = Map<string, ComponentInvocation>

export interface SourceDocument {
  filePath: string
  isLayout: boolean
  bodyMarkup: string
  headFragment: string | null
  /** Inline style blocks, trimmed and joined by a blank line */
  styleText: string
  /** Relative hrefs of linked stylesheets, in source order */
  externalStyleRefs: string[]
  inlineScript: string | null
  /** Set only when inlineScript is null */
  externalScriptRef: string | null
  components: ComponentTable
}

export interface ParseOptions {
  isLayout?: boolean
  /** Source for placeholder ids; defaults to crypto.randomUUID */
  createId?: () => string
}
