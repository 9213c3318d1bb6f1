import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import fs from 'fs'
import path from 'path'
import { makeTempDir, removeTempDir, writeTree } from '../../test/helpers'
import { ComponentRegistry, componentNameFor } from './registry'

let root: string

beforeEach(() => {
  root = makeTempDir()
})

afterEach(() => {
  removeTempDir(root)
})

describe('componentNameFor', () => {
  test('capitalizes each path segment and joins with dots', () => {
    expect(componentNameFor('Card.stitch')).toBe('Card')
    expect(componentNameFor('ui/BUTTON.stitch')).toBe('Ui.Button')
    expect(componentNameFor('forms/inputs/text.stitch')).toBe('Forms.Inputs.Text')
  })
})

describe('ComponentRegistry', () => {
  test('registers components and skips private and non-source files', () => {
    writeTree(root, {
      'components/Card.stitch': '<html></html>',
      'components/ui/button.stitch': '<html></html>',
      'components/_private.stitch': '<html></html>',
      'components/notes.txt': 'not a component'
    })

    const registry = new ComponentRegistry(path.join(root, 'components')).scan()

    expect(registry.names().sort()).toEqual(['Card', 'Ui.Button'])
    expect(registry.size).toBe(2)
    expect(registry.getPath('Ui.Button')).toBe(path.join(root, 'components', 'ui', 'button.stitch'))
    expect(registry.has('Card')).toBe(true)
    expect(registry.getPath('Missing')).toBeNull()
  })

  test('an absent components directory yields an empty registry', () => {
    const registry = new ComponentRegistry(path.join(root, 'nope')).scan()
    expect(registry.size).toBe(0)
  })

  test('rescanning replaces the previous mapping', () => {
    writeTree(root, {
      'components/Card.stitch': '<html></html>',
      'components/Badge.stitch': '<html></html>'
    })
    const registry = new ComponentRegistry(path.join(root, 'components')).scan()
    fs.rmSync(path.join(root, 'components', 'Badge.stitch'))

    registry.scan()

    expect(registry.names()).toEqual(['Card'])
  })
})
