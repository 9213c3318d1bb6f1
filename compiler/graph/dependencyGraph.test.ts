import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import path from 'path'
import { makeTempDir, removeTempDir, writeTree } from '../../test/helpers'
import { parseDocumentText } from '../parse/parseDocument'
import { DependencyGraph, analyzePage } from './dependencyGraph'

// ============================================================================
// Graph edges
// ============================================================================

describe('DependencyGraph', () => {
  function populated(): DependencyGraph {
    const graph = new DependencyGraph()
    graph.setPage('/p1', { script: '/s.py', stylesheets: new Set(['/a.css']) })
    graph.setPage('/p2', { script: '/s.py', stylesheets: new Set(['/a.css', '/b.css']) })
    return graph
  }

  test('records forward and reverse edges', () => {
    const graph = populated()

    expect(graph.pagesUsingScript('/s.py')).toEqual(new Set(['/p1', '/p2']))
    expect(graph.pagesUsingStyle('/b.css')).toEqual(new Set(['/p2']))
    expect(graph.dependentsOf('/a.css')).toEqual(new Set(['/p1', '/p2']))
    expect(graph.isTracked('/b.css')).toBe(true)
    expect(graph.isTracked('/c.css')).toBe(false)
    expect(graph.verify()).toEqual([])
  })

  test('replacing a page drops its old edges', () => {
    const graph = populated()
    graph.setPage('/p1', { script: null, stylesheets: new Set() })

    expect(graph.scriptToPages.get('/s.py')).toEqual(new Set(['/p2']))
    expect(graph.pagesUsingStyle('/a.css')).toEqual(new Set(['/p2']))
    expect(graph.pageToScript.get('/p1')).toBeNull()
    expect(graph.verify()).toEqual([])
  })

  test('removing a page drops empty reverse sets', () => {
    const graph = populated()
    graph.removePage('/p2')

    expect(graph.pages.has('/p2')).toBe(false)
    expect(graph.styleToPages.has('/b.css')).toBe(false)
    expect(graph.scriptToPages.get('/s.py')).toEqual(new Set(['/p1']))
    expect(graph.verify()).toEqual([])
  })

  test('removing a dependency returns its dependents', () => {
    const graph = populated()

    expect(graph.removeDependency('/a.css')).toEqual(new Set(['/p1', '/p2']))
    expect(graph.pageToStyles.get('/p1')).toEqual(new Set())
    expect(graph.isTracked('/a.css')).toBe(false)

    expect(graph.removeDependency('/s.py')).toEqual(new Set(['/p1', '/p2']))
    expect(graph.pageToScript.get('/p2')).toBeNull()
    expect(graph.verify()).toEqual([])
  })

  test('verify reports a broken reverse edge', () => {
    const graph = populated()
    graph.scriptToPages.delete('/s.py')

    expect(graph.verify()).toEqual([
      'script /s.py missing reverse edge to /p1',
      'script /s.py missing reverse edge to /p2'
    ])
  })
})

// ============================================================================
// Page analysis
// ============================================================================

describe('analyzePage', () => {
  let root: string

  beforeEach(() => {
    root = makeTempDir()
  })

  afterEach(() => {
    removeTempDir(root)
  })

  test('falls back to the same-stem script when the explicit one is missing', () => {
    writeTree(root, {
      'a.stitch': '<html></html><python src="gone.py"></python>',
      'a.py': 'print(1)'
    })

    const deps = analyzePage(path.join(root, 'a.stitch'), { sourceDir: root, staticDir: null }, null)
    expect(deps.script).toBe(path.join(root, 'a.py'))
  })

  test('uses a valid explicit script', () => {
    writeTree(root, {
      'b.stitch': '<html></html><python src="lib/b_logic.py"></python>',
      'lib/b_logic.py': 'print(1)'
    })

    const deps = analyzePage(path.join(root, 'b.stitch'), { sourceDir: root, staticDir: null }, null)
    expect(deps.script).toBe(path.join(root, 'lib', 'b_logic.py'))
  })

  test('inline scripts are not tracked', () => {
    writeTree(root, { 'c.stitch': '<html></html><python>x = 1</python>' })

    const deps = analyzePage(path.join(root, 'c.stitch'), { sourceDir: root, staticDir: null }, null)
    expect(deps.script).toBeNull()
  })

  test('tracks layout and page stylesheets even when missing', () => {
    writeTree(root, { 'd.stitch': '<html></html><link rel="stylesheet" href="missing.css">' })
    const layout = parseDocumentText(
      '<stitch-body><!-- STITCH_PAGE_CONTENT --></stitch-body><link rel="stylesheet" href="main.css">',
      path.join(root, '_layout.stitch'),
      { isLayout: true }
    )

    const deps = analyzePage(path.join(root, 'd.stitch'), { sourceDir: root, staticDir: null }, layout)
    expect(deps.stylesheets).toEqual(new Set([path.join(root, 'main.css'), path.join(root, 'missing.css')]))
  })

  test('an unreadable page has no dependencies', () => {
    const deps = analyzePage(path.join(root, 'missing.stitch'), { sourceDir: root, staticDir: null }, null)
    expect(deps).toEqual({ script: null, stylesheets: new Set() })
  })
})
