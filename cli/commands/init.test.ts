import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import fs from 'fs'
import path from 'path'
import { makeTempDir, removeTempDir } from '../../test/helpers'
import { silentLogger } from '../../core/logger'
import { compileDirectory } from '../../compiler/build/compileDirectory'
import { compileFile } from '../../compiler/build/compileFile'
import { resolveProject } from '../utils/project'
import { scaffoldProject } from './init'

let root: string

beforeEach(() => {
    root = makeTempDir()
})

afterEach(() => {
    removeTempDir(root)
})

describe('scaffoldProject', () => {
    test('the full template builds without errors', () => {
        const site = path.join(root, 'site')
        const created = scaffoldProject(site, 'full')

        expect(created).toContain('stitch.config.json')
        expect(created).toContain(path.join('src', '_layout.stitch'))
        expect(created).toContain(path.join('src', 'components', 'Card.stitch'))

        const result = compileDirectory({
            sourceDir: path.join(site, 'src'),
            outputDir: path.join(site, 'dist'),
            logger: silentLogger
        })

        expect(result.errorCount).toBe(0)
        expect(result.compiled).toHaveLength(2)
        expect(fs.readFileSync(path.join(site, 'dist', 'index.html'), 'utf-8')).toContain('data-featured="true"')
        expect(fs.existsSync(path.join(site, 'dist', 'static', 'logo.svg'))).toBe(true)
    })

    test('the blank template has one page', () => {
        const site = path.join(root, 'blank')
        scaffoldProject(site, 'blank')

        const result = compileDirectory({
            sourceDir: path.join(site, 'src'),
            outputDir: path.join(site, 'dist'),
            logger: silentLogger
        })

        expect(result.errorCount).toBe(0)
        expect(result.compiled).toHaveLength(1)
    })

    test('the single template compiles as one file', () => {
        const site = path.join(root, 'single')
        expect(scaffoldProject(site, 'single')).toEqual(['stitch.config.json', 'app.stitch'])

        const result = compileFile({ filePath: path.join(site, 'app.stitch'), outputDir: path.join(site, 'out') })

        expect(fs.readFileSync(result.outputPath, 'utf-8')).toContain('<title>My Stitch Page</title>')
    })

    test('the single template resolves to a single-file build', async () => {
        const site = path.join(root, 'single')
        scaffoldProject(site, 'single')

        const config: unknown = JSON.parse(fs.readFileSync(path.join(site, 'stitch.config.json'), 'utf-8'))
        expect(config).toEqual({ outputDir: 'dist', devOutputDir: '.stitch-dev' })

        const project = await resolveProject({ input: 'app.stitch', production: false, logger: silentLogger, cwd: site })

        expect(project.isSingleFile).toBe(true)
        expect(project.input).toBe(path.join(site, 'app.stitch'))
        expect(project.outputDir).toBe(path.join(site, '.stitch-dev'))
    })

    test('refuses a directory that is not empty', () => {
        fs.writeFileSync(path.join(root, 'keep.txt'), 'x')
        expect(() => scaffoldProject(root, 'full')).toThrow('already exists and is not empty')
    })
})
