import { describe, expect, test } from 'vitest'
import { scopeAttributeSelector, scopeSelector, scopeStyles } from './scope'

describe('scopeSelector', () => {
  test('appends the attribute to the last compound', () => {
    expect(scopeSelector('.title', 'x')).toBe('.title[data-stitch-scope="x"]')
    expect(scopeSelector('.b > p', 'x')).toBe('.b > p[data-stitch-scope="x"]')
  })

  test('inserts the attribute before a pseudo-element', () => {
    expect(scopeSelector('ul li::marker', 'x')).toBe('ul li[data-stitch-scope="x"]::marker')
    expect(scopeSelector('a:hover::before', 'x')).toBe('a:hover[data-stitch-scope="x"]::before')
    expect(scopeSelector('p:after', 'x')).toBe('p[data-stitch-scope="x"]:after')
  })
})

describe('scopeStyles', () => {
  test('scopes a simple rule', () => {
    expect(scopeStyles('.title { color: red; }', 'abc')).toBe('.title[data-stitch-scope="abc"] { color: red; }')
  })

  test('scopes every selector in a list', () => {
    expect(scopeStyles('.a, .b > p { margin: 0 }', 'x')).toBe(
      '.a[data-stitch-scope="x"], .b > p[data-stitch-scope="x"] { margin: 0 }'
    )
  })

  test('scopes rules inside media queries', () => {
    expect(scopeStyles('@media (max-width: 600px) { .a { color: blue; } }', 'x')).toBe(
      '@media (max-width: 600px) { .a[data-stitch-scope="x"] { color: blue; } }'
    )
  })

  test('leaves keyframe steps alone', () => {
    const css = '@keyframes spin { from { opacity: 0; } to { opacity: 1; } }'
    expect(scopeStyles(css, 'x')).toBe(css)
  })

  test('returns an empty string for blank input', () => {
    expect(scopeStyles('  \n', 'x')).toBe('')
  })

  test('scopeAttributeSelector builds the attribute selector', () => {
    expect(scopeAttributeSelector('c1')).toBe('[data-stitch-scope="c1"]')
  })
})
