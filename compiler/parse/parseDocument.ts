/**
 * Document Parser
 *
 * Reads a .stitch file and splits it into the fragments the compositor needs.
 * Apart from diagnostics, parsing has no side effects.
 */

import fs from 'fs'
import path from 'path'
import { randomUUID } from 'crypto'
import { LAYOUT_FILENAME, PAGE_CONTENT_PLACEHOLDER, SOURCE_EXTENSION } from '../constants'
import { ParseError, StructuralError } from '../errors/compilerError'
import type { ParseOptions, SourceDocument } from '../ir/types'
import type { Logger } from '../../core/logger'
import { silentLogger } from '../../core/logger'
import {
  countOccurrences,
  extractComponentTags,
  extractPrimaryMarkup,
  extractScript,
  extractSection,
  extractStyleBlocks,
  extractStylesheetLinks
} from './extract'

export const HEAD_SECTION_TAG = 'stitch-head'
export const BODY_SECTION_TAG = 'stitch-body'

export interface ParseDocumentOptions extends ParseOptions {
  logger?: Logger
}

function readSource(filePath: string): string {
  if (path.extname(filePath) !== SOURCE_EXTENSION) {
    throw new ParseError(`Expected a ${SOURCE_EXTENSION} file`, filePath, 'extension')
  }
  if (!fs.existsSync(filePath)) {
    throw new ParseError('File not found', filePath, 'not-found')
  }
  try {
    return fs.readFileSync(filePath, 'utf-8')
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ParseError(`Could not read file: ${message}`, filePath, 'unreadable')
  }
}

function joinHead(...parts: Array<string | null>): string | null {
  const present = parts.map(part => (part ?? '').trim()).filter(part => part !== '')
  return present.length > 0 ? present.join('\n') : null
}

/**
 * Parse a source document from disk
 */
export function parseDocument(filePath: string, options: ParseDocumentOptions = {}): SourceDocument {
  const raw = readSource(filePath)
  return parseDocumentText(raw, filePath, options)
}

/**
 * Parse source text already in memory; `filePath` is used for diagnostics only
 */
export function parseDocumentText(raw: string, filePath: string, options: ParseDocumentOptions = {}): SourceDocument {
  const isLayout = options.isLayout === true
  const logger = options.logger ?? silentLogger
  const name = path.basename(filePath)

  const components = extractComponentTags(raw, options.createId ?? randomUUID)
  for (const diagnostic of components.diagnostics) logger.warn(`${name}: ${diagnostic}`)

  const styles = extractStyleBlocks(components.text)
  const links = extractStylesheetLinks(styles.text)

  const script = extractScript(links.text, isLayout)
  for (const diagnostic of script.diagnostics) logger.warn(`${name}: ${diagnostic}`)
  for (const note of script.notes) logger.debug(`${name}: ${note}`)

  const headSection = extractSection(script.text, HEAD_SECTION_TAG)

  const document: SourceDocument = {
    filePath,
    isLayout,
    bodyMarkup: '',
    headFragment: null,
    styleText: styles.styleText,
    externalStyleRefs: links.hrefs,
    inlineScript: script.inlineScript,
    externalScriptRef: script.externalScriptRef,
    components: components.components
  }

  if (isLayout) {
    const bodySection = extractSection(headSection.text, BODY_SECTION_TAG)
    let body = bodySection.content
    let legacyHead: string | null = null

    if (body === null) {
      const primary = extractPrimaryMarkup(bodySection.text)
      if (primary) {
        body = primary.body
        legacyHead = primary.head
      }
    }

    if (body === null) {
      throw new ParseError(
        `Layout has no <${BODY_SECTION_TAG}> section or <html> element`,
        filePath,
        'missing-section'
      )
    }

    const placeholders = countOccurrences(body, PAGE_CONTENT_PLACEHOLDER)
    if (placeholders !== 1) {
      const problem = placeholders === 0 ? 'is missing' : `appears ${placeholders} times`
      throw new StructuralError(`Page content placeholder ${PAGE_CONTENT_PLACEHOLDER} ${problem} in ${LAYOUT_FILENAME}`, filePath)
    }

    document.bodyMarkup = body.trim()
    document.headFragment = joinHead(headSection.content, legacyHead)
    return document
  }

  const primary = extractPrimaryMarkup(headSection.text)
  if (primary) {
    document.bodyMarkup = primary.body.trim()
    document.headFragment = joinHead(headSection.content, primary.head)
    return document
  }

  const leftover = headSection.text.trim()
  if (leftover) {
    logger.warn(`${name}: no <html> element found; using the remaining markup as the page body`)
  }
  document.bodyMarkup = leftover
  document.headFragment = joinHead(headSection.content)
  return document
}
