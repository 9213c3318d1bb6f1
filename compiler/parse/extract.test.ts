import { describe, expect, test } from 'vitest'
import { sequentialIds } from '../../test/helpers'
import {
  componentPlaceholder,
  countOccurrences,
  extractComponentTags,
  extractPrimaryMarkup,
  extractScript,
  extractSection,
  extractStyleBlocks,
  extractStylesheetLinks,
  extractTitle,
  isExternalHref,
  parseAttributes
} from './extract'

// ============================================================================
// Attributes and helpers
// ============================================================================

describe('parseAttributes', () => {
  test('reads quoted and bare attributes', () => {
    expect(parseAttributes(` a="1" b c='x y'`)).toEqual({ a: '1', b: true, c: 'x y' })
  })

  test('returns an empty record for no attributes', () => {
    expect(parseAttributes('')).toEqual({})
  })
})

test('countOccurrences counts non-overlapping matches', () => {
  expect(countOccurrences('a--a--a', 'a')).toBe(3)
  expect(countOccurrences('abc', '')).toBe(0)
})

test('isExternalHref separates URLs and root paths from relative paths', () => {
  expect(isExternalHref('https://cdn.example.com/x.css')).toBe(true)
  expect(isExternalHref('//cdn.example.com/x.css')).toBe(true)
  expect(isExternalHref('/abs.css')).toBe(true)
  expect(isExternalHref('css/a.css')).toBe(false)
  expect(isExternalHref('../a.css')).toBe(false)
})

// ============================================================================
// Component tags
// ============================================================================

describe('extractComponentTags', () => {
  test('replaces a self-closing tag with a placeholder', () => {
    const result = extractComponentTags('<div><Card title="Hi" featured /></div>', sequentialIds())

    expect(result.text).toBe(`<div>${componentPlaceholder('id0')}</div>`)
    expect(result.components.get('id0')).toEqual({
      id: 'id0',
      name: 'Card',
      props: { title: 'Hi', featured: true },
      children: ''
    })
    expect(result.diagnostics).toEqual([])
  })

  test('keeps angle brackets inside quoted prop values', () => {
    const result = extractComponentTags('<Card title="a > b" />', sequentialIds())
    expect(result.components.get('id0')?.props).toEqual({ title: 'a > b' })
  })

  test('leaves lowercase tags alone', () => {
    const result = extractComponentTags('<div class="x"><span>y</span></div>', sequentialIds())
    expect(result.text).toBe('<div class="x"><span>y</span></div>')
    expect(result.components.size).toBe(0)
  })

  test('extracts nested tags into the children of a paired tag', () => {
    const result = extractComponentTags(
      '<Ui.Panel heading="x"><p>Body</p><Badge label="new" /></Ui.Panel>',
      sequentialIds()
    )

    expect(result.text).toBe(componentPlaceholder('id1'))
    expect(result.components.get('id0')?.name).toBe('Badge')
    const panel = result.components.get('id1')
    expect(panel?.name).toBe('Ui.Panel')
    expect(panel?.props).toEqual({ heading: 'x' })
    expect(panel?.children).toBe(`<p>Body</p>${componentPlaceholder('id0')}`)
  })

  test('matches the outer closing tag when a component nests itself', () => {
    const result = extractComponentTags('<Box><Box>inner</Box></Box>', sequentialIds())

    expect(result.text).toBe(componentPlaceholder('id1'))
    expect(result.components.get('id0')?.children).toBe('inner')
    expect(result.components.get('id1')?.children).toBe(componentPlaceholder('id0'))
  })

  test('leaves script and style blocks untouched', () => {
    const source = [
      '<html><Card /></html>',
      '<python>',
      'if count<MAX_ITEMS and total>0:',
      '    print("ok")',
      '</python>',
      '<style>p::after { content: "<Badge>"; }</style>'
    ].join('\n')

    const result = extractComponentTags(source, sequentialIds())

    expect(result.text).toBe(source.replace('<Card />', componentPlaceholder('id0')))
    expect(result.components.size).toBe(1)
  })

  test('keeps script blocks inside children intact', () => {
    const result = extractComponentTags('<Card><python>x = a<B and c>1</python></Card>', sequentialIds())

    expect(result.components.size).toBe(1)
    expect(result.components.get('id0')?.children).toBe('<python>x = a<B and c>1</python>')
  })

  test('treats an unclosed tag as self-closing and reports it', () => {
    const result = extractComponentTags('<Card title="x">rest', sequentialIds())

    expect(result.text).toBe(`${componentPlaceholder('id0')}rest`)
    expect(result.diagnostics).toHaveLength(1)
  })
})

// ============================================================================
// Styles and links
// ============================================================================

describe('extractStyleBlocks', () => {
  test('joins non-empty blocks in order and removes them', () => {
    const result = extractStyleBlocks('a<style>.x{}</style>b<style>  </style><style>\n.y{}\n</style>')

    expect(result.text).toBe('ab')
    expect(result.styleText).toBe('.x{}\n\n.y{}')
  })
})

describe('extractStylesheetLinks', () => {
  test('takes relative stylesheet links and leaves the rest', () => {
    const result = extractStylesheetLinks(
      '<link rel="stylesheet" href="main.css"><link rel="stylesheet" href="https://cdn.example.com/x.css"><link rel="icon" href="fav.ico">'
    )

    expect(result.hrefs).toEqual(['main.css'])
    expect(result.text).toBe('<link rel="stylesheet" href="https://cdn.example.com/x.css"><link rel="icon" href="fav.ico">')
  })

  test('keeps duplicate hrefs', () => {
    const result = extractStylesheetLinks('<link rel="stylesheet" href="a.css" /><link href="a.css" rel="stylesheet">')
    expect(result.hrefs).toEqual(['a.css', 'a.css'])
    expect(result.text).toBe('')
  })
})

// ============================================================================
// Scripts
// ============================================================================

describe('extractScript', () => {
  test('joins inline blocks when no src is given', () => {
    const result = extractScript('<python>\nx = 1\n</python>\n<python>y = 2</python>', false)

    expect(result.inlineScript).toBe('x = 1\n\ny = 2')
    expect(result.externalScriptRef).toBeNull()
    expect(result.text).toBe('\n')
  })

  test('a src wins over inline blocks', () => {
    const result = extractScript('<python src="a.py"></python><python>print(1)</python>', false)

    expect(result.externalScriptRef).toBe('a.py')
    expect(result.inlineScript).toBeNull()
    expect(result.diagnostics).toEqual(['Inline script blocks are ignored because src="a.py" is set'])
  })

  test('the first src wins when several are given', () => {
    const result = extractScript('<python src="a.py"></python><python src="b.py"></python>', false)

    expect(result.externalScriptRef).toBe('a.py')
    expect(result.notes).toHaveLength(1)
    expect(result.diagnostics).toEqual([])
  })

  test('drops inline content inside a block that has a src', () => {
    const result = extractScript('<python src="a.py">print(1)</python>', false)

    expect(result.externalScriptRef).toBe('a.py')
    expect(result.inlineScript).toBeNull()
    expect(result.diagnostics).toHaveLength(1)
  })

  test('layouts ignore src and keep inline content', () => {
    const result = extractScript('<python src="a.py">print(2)</python>', true)

    expect(result.externalScriptRef).toBeNull()
    expect(result.inlineScript).toBe('print(2)')
    expect(result.diagnostics).toHaveLength(1)
  })

  test('an empty src is ignored', () => {
    const result = extractScript('<python src="">print(3)</python>', false)

    expect(result.externalScriptRef).toBeNull()
    expect(result.inlineScript).toBe('print(3)')
  })
})

// ============================================================================
// Sections
// ============================================================================

describe('sections', () => {
  test('extractSection returns the inner markup', () => {
    const result = extractSection('<stitch-head><title>T</title></stitch-head><p>x</p>', 'stitch-head')

    expect(result.content).toBe('<title>T</title>')
    expect(result.text).toBe('<p>x</p>')
  })

  test('extractSection returns null when absent', () => {
    expect(extractSection('<p>x</p>', 'stitch-head')).toEqual({ text: '<p>x</p>', content: null })
  })

  test('extractPrimaryMarkup splits a full document', () => {
    const result = extractPrimaryMarkup('<html lang="en"><head><title>A</title></head><body><p>B</p></body></html>')
    expect(result).toEqual({ head: '<title>A</title>', body: '<p>B</p>' })
  })

  test('extractPrimaryMarkup uses the whole element as body without head or body', () => {
    expect(extractPrimaryMarkup('<html>\n<p>x</p>\n</html>')).toEqual({ head: null, body: '\n<p>x</p>\n' })
  })

  test('extractPrimaryMarkup returns null without an html element', () => {
    expect(extractPrimaryMarkup('<p>x</p>')).toBeNull()
  })

  test('extractTitle keeps the first title and removes all of them', () => {
    const result = extractTitle('<meta charset="utf-8"><title> Page T </title><title>Other</title>')
    expect(result).toEqual({ text: '<meta charset="utf-8">', title: 'Page T' })
  })
})
