/**
 * Init Command
 *
 * Scaffolds a starter project: a layout project with shell, layout, pages and a
 * component (default), a blank layout project (--blank) or a single page (--single)
 */

import fs from 'fs'
import path from 'path'
import {
    BRYTHON_VERSION,
    LAYOUT_FILENAME,
    PAGE_CONTENT_PLACEHOLDER,
    SHELL_BODY_PLACEHOLDER,
    SHELL_FILENAME,
    SHELL_HEAD_PLACEHOLDER
} from '../../compiler/constants'
import { DEFAULT_CONFIG, type StitchConfig } from '../../core/config'
import type { CommandOptions } from './index'

export type InitTemplate = 'full' | 'blank' | 'single'

/**
 * Write the starter files for a template. Returns the created paths relative to the target.
 */
export function scaffoldProject(targetDir: string, template: InitTemplate): string[] {
    if (fs.existsSync(targetDir) && fs.readdirSync(targetDir).length > 0) {
        throw new Error(`Directory '${targetDir}' already exists and is not empty`)
    }

    const created: string[] = []
    const write = (relative: string, content: string): void => {
        const target = path.join(targetDir, relative)
        fs.mkdirSync(path.dirname(target), { recursive: true })
        fs.writeFileSync(target, content, 'utf-8')
        created.push(relative)
    }

    if (template === 'single') {
        write('stitch.config.json', generateSingleFileConfig())
        write('app.stitch', generateSingleFilePage())
        return created
    }

    const src = DEFAULT_CONFIG.sourceDir
    write('stitch.config.json', generateConfig())
    write('.gitignore', generateGitignore())
    write(path.join(src, SHELL_FILENAME), generateShell())
    fs.mkdirSync(path.join(targetDir, src, DEFAULT_CONFIG.staticDirName), { recursive: true })

    if (template === 'blank') {
        write(path.join(src, LAYOUT_FILENAME), generateBlankLayout())
        write(path.join(src, 'index.stitch'), generateBlankPage())
        return created
    }

    write(path.join(src, LAYOUT_FILENAME), generateLayout())
    write(path.join(src, 'main.css'), generateMainCss())
    write(path.join(src, 'index.stitch'), generateIndexPage())
    write(path.join(src, 'index.py'), generateIndexScript())
    write(path.join(src, 'about.stitch'), generateAboutPage())
    write(path.join(src, 'scripts', 'about_logic.py'), generateAboutScript())
    write(path.join(src, DEFAULT_CONFIG.componentsDir, 'Card.stitch'), generateCardComponent())
    write(path.join(src, DEFAULT_CONFIG.staticDirName, 'logo.svg'), generateLogo())
    return created
}

export async function init(positionals: string[], options: CommandOptions): Promise<number> {
    const { logger } = options
    const directory = positionals[0]
    if (!directory) {
        throw new Error('Usage: stitch init <directory> [--blank | --single]')
    }

    const template: InitTemplate = options.flags.has('single') ? 'single' : options.flags.has('blank') ? 'blank' : 'full'
    const targetDir = path.resolve(directory)
    const created = scaffoldProject(targetDir, template)

    logger.success(`Initialized ${template} project in ${targetDir}`)
    for (const file of created) {
        logger.log(`  ${file}`)
    }
    logger.info('To get started:')
    console.log(`  cd ${path.relative(process.cwd(), targetDir) || '.'}`)
    if (template === 'single') {
        console.log('  stitch build app.stitch')
        console.log('  stitch watch app.stitch')
    } else {
        console.log('  stitch watch')
    }
    return 0
}

// ============================================
// Templates
// ============================================

function generateConfig(): string {
    const config: StitchConfig = {
        sourceDir: DEFAULT_CONFIG.sourceDir,
        outputDir: DEFAULT_CONFIG.outputDir,
        devOutputDir: DEFAULT_CONFIG.devOutputDir,
        staticDirName: DEFAULT_CONFIG.staticDirName,
        componentsDir: DEFAULT_CONFIG.componentsDir
    }
    return JSON.stringify(config, null, 4) + '\n'
}

/** Single-file projects are built by naming the page, so no source root is set */
function generateSingleFileConfig(): string {
    const config: StitchConfig = {
        outputDir: DEFAULT_CONFIG.outputDir,
        devOutputDir: DEFAULT_CONFIG.devOutputDir
    }
    return JSON.stringify(config, null, 4) + '\n'
}

function generateGitignore(): string {
    return `${DEFAULT_CONFIG.outputDir}/
${DEFAULT_CONFIG.devOutputDir}/
node_modules/
`
}

function generateShell(): string {
    return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>My Stitch App</title>
    <script src="https://cdn.jsdelivr.net/npm/brython@${BRYTHON_VERSION}/brython.min.js"></script>
    <script src="https://cdn.jsdelivr.net/npm/brython@${BRYTHON_VERSION}/brython_stdlib.js"></script>
    ${SHELL_HEAD_PLACEHOLDER}
</head>
<body onload="brython({'debug': 1})">
    ${SHELL_BODY_PLACEHOLDER}
</body>
</html>
`
}

function generateLayout(): string {
    return `<stitch-head>
    <link rel="stylesheet" href="main.css">
</stitch-head>

<stitch-body>
    <header class="site-header">
        <img src="static/logo.svg" alt="logo" width="32" height="32">
        <nav>
            <a href="index.html">Home</a>
            <a href="about.html">About</a>
        </nav>
    </header>
    <main>
        ${PAGE_CONTENT_PLACEHOLDER}
    </main>
    <footer>Built with stitch</footer>
</stitch-body>

<python>
print("layout loaded")
</python>
`
}

function generateBlankLayout(): string {
    return `<stitch-body>
    ${PAGE_CONTENT_PLACEHOLDER}
</stitch-body>
`
}

function generateBlankPage(): string {
    return `<stitch-head>
    <title>Home</title>
</stitch-head>

<html>
    <h1>Hello</h1>
</html>
`
}

function generateMainCss(): string {
    return `body {
    font-family: system-ui, sans-serif;
    margin: 0;
    color: #1f2933;
}

.site-header {
    display: flex;
    align-items: center;
    gap: 1rem;
    padding: 1rem 2rem;
    border-bottom: 1px solid #e4e7eb;
}

main {
    padding: 2rem;
}
`
}

function generateIndexPage(): string {
    return `<stitch-head>
    <title>Home</title>
</stitch-head>

<html>
    <h1>Welcome</h1>
    <Card title="Counter" featured>
        <p>Clicked <span id="count">0</span> times.</p>
        <button id="increment">Click me</button>
    </Card>
</html>

<style>
h1 {
    margin-top: 0;
}
</style>
`
}

function generateIndexScript(): string {
    return `count = 0

def increment(event):
    global count
    count += 1
    byid("count").text = str(count)

byid("increment").bind("click", increment)
`
}

function generateAboutPage(): string {
    return `<stitch-head>
    <title>About</title>
</stitch-head>

<html>
    <h1>About</h1>
    <p id="message">Loading...</p>
</html>

<python src="scripts/about_logic.py"></python>
`
}

function generateAboutScript(): string {
    return `byid("message").text = "This text was set from a script."
`
}

function generateCardComponent(): string {
    return `<html>
    <section class="card" data-featured="{props.featured}">
        <h2 class="card-title">{props.title}</h2>
        <div class="card-body">{props.children}</div>
    </section>
</html>

<style>
.card {
    border: 1px solid #cbd2d9;
    border-radius: 8px;
    padding: 1rem;
}

.card-title {
    margin: 0 0 0.5rem;
}
</style>
`
}

function generateLogo(): string {
    return `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 32 32">
    <rect width="32" height="32" rx="6" fill="#3e4c59"/>
    <path d="M8 16h16M16 8v16" stroke="#f5f7fa" stroke-width="3" stroke-linecap="round"/>
</svg>
`
}

function generateSingleFilePage(): string {
    return `<stitch-head>
    <title>My Stitch Page</title>
</stitch-head>

<html>
    <h1 id="greeting">Hello</h1>
    <button id="greet">Greet</button>
</html>

<style>
body {
    font-family: system-ui, sans-serif;
    padding: 2rem;
}
</style>

<python>
def greet(event):
    byid("greeting").text = "Hello from the browser"

byid("greet").bind("click", greet)
</python>
`
}
