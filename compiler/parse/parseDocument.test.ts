import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import path from 'path'
import { makeTempDir, removeTempDir, sequentialIds, writeTree } from '../../test/helpers'
import { ParseError, StructuralError } from '../errors/compilerError'
import { componentPlaceholder } from './extract'
import { parseDocument, parseDocumentText } from './parseDocument'

let root: string

beforeEach(() => {
  root = makeTempDir()
})

afterEach(() => {
  removeTempDir(root)
})

// ============================================================================
// Pages
// ============================================================================

describe('parseDocument pages', () => {
  test('splits a page into its fragments', () => {
    writeTree(root, {
      'index.stitch': [
        '<stitch-head><title>Home</title></stitch-head>',
        '<html><h1>Hi</h1><Card title="x" /></html>',
        '<style>h1 { color: red; }</style>',
        '<link rel="stylesheet" href="main.css">',
        '<python>print("hi")</python>'
      ].join('\n')
    })
    const filePath = path.join(root, 'index.stitch')

    const doc = parseDocument(filePath, { createId: sequentialIds() })

    expect(doc.filePath).toBe(filePath)
    expect(doc.isLayout).toBe(false)
    expect(doc.headFragment).toBe('<title>Home</title>')
    expect(doc.bodyMarkup).toBe(`<h1>Hi</h1>${componentPlaceholder('id0')}`)
    expect(doc.styleText).toBe('h1 { color: red; }')
    expect(doc.externalStyleRefs).toEqual(['main.css'])
    expect(doc.inlineScript).toBe('print("hi")')
    expect(doc.externalScriptRef).toBeNull()
    expect(doc.components.get('id0')?.name).toBe('Card')
  })

  test('an external script excludes inline blocks', () => {
    const doc = parseDocumentText(
      '<html></html><python src="app.py"></python><python>print(1)</python>',
      'page.stitch'
    )

    expect(doc.externalScriptRef).toBe('app.py')
    expect(doc.inlineScript).toBeNull()
  })

  test('uses the remaining markup as body when there is no html element', () => {
    const doc = parseDocumentText('<p>loose</p>\n<style>p{}</style>', 'page.stitch')

    expect(doc.bodyMarkup).toBe('<p>loose</p>')
    expect(doc.headFragment).toBeNull()
  })

  test('joins a section head with a full-document head', () => {
    const doc = parseDocumentText(
      '<stitch-head><meta name="a"></stitch-head><html><head><meta name="b"></head><body><p>x</p></body></html>',
      'page.stitch'
    )

    expect(doc.headFragment).toBe('<meta name="a">\n<meta name="b">')
    expect(doc.bodyMarkup).toBe('<p>x</p>')
  })
})

// ============================================================================
// Read failures
// ============================================================================

describe('parseDocument read failures', () => {
  test('rejects the wrong extension', () => {
    writeTree(root, { 'page.html': '<p>x</p>' })
    expect(() => parseDocument(path.join(root, 'page.html'))).toThrow(ParseError)

    try {
      parseDocument(path.join(root, 'page.html'))
    } catch (err: unknown) {
      expect(err instanceof ParseError ? err.reason : null).toBe('extension')
    }
  })

  test('reports a missing file', () => {
    try {
      parseDocument(path.join(root, 'missing.stitch'))
      expect.unreachable()
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(ParseError)
      expect(err instanceof ParseError ? err.reason : null).toBe('not-found')
    }
  })
})

// ============================================================================
// Layouts
// ============================================================================

describe('parseDocument layouts', () => {
  test('reads the body section and keeps the placeholder', () => {
    const doc = parseDocumentText(
      '<stitch-head><title>L</title></stitch-head>\n<stitch-body>\n  <main><!-- STITCH_PAGE_CONTENT --></main>\n</stitch-body>',
      '_layout.stitch',
      { isLayout: true }
    )

    expect(doc.isLayout).toBe(true)
    expect(doc.headFragment).toBe('<title>L</title>')
    expect(doc.bodyMarkup).toBe('<main><!-- STITCH_PAGE_CONTENT --></main>')
  })

  test('accepts a full-document layout', () => {
    const doc = parseDocumentText(
      '<html><head><title>L</title></head><body><main><!-- STITCH_PAGE_CONTENT --></main></body></html>',
      '_layout.stitch',
      { isLayout: true }
    )

    expect(doc.headFragment).toBe('<title>L</title>')
    expect(doc.bodyMarkup).toBe('<main><!-- STITCH_PAGE_CONTENT --></main>')
  })

  test('rejects a layout without the placeholder', () => {
    expect(() =>
      parseDocumentText('<stitch-body><main></main></stitch-body>', '_layout.stitch', { isLayout: true })
    ).toThrow(StructuralError)
  })

  test('rejects a layout with the placeholder twice', () => {
    expect(() =>
      parseDocumentText(
        '<stitch-body><!-- STITCH_PAGE_CONTENT --><!-- STITCH_PAGE_CONTENT --></stitch-body>',
        '_layout.stitch',
        { isLayout: true }
      )
    ).toThrow(StructuralError)
  })

  test('rejects a layout with no body at all', () => {
    expect(() => parseDocumentText('<div>hi</div>', '_layout.stitch', { isLayout: true })).toThrow(ParseError)
  })

  test('ignores src on layout scripts', () => {
    const doc = parseDocumentText(
      '<stitch-body><!-- STITCH_PAGE_CONTENT --></stitch-body><python src="x.py">print(2)</python>',
      '_layout.stitch',
      { isLayout: true }
    )

    expect(doc.externalScriptRef).toBeNull()
    expect(doc.inlineScript).toBe('print(2)')
  })
})
