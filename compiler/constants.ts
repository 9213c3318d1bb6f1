/**
 * Compiler Constants
 *
 * File names, markers and runtime pins shared by the parser, compositor and builder
 */

export const SOURCE_EXTENSION = '.stitch'
export const SCRIPT_EXTENSION = '.py'
export const LAYOUT_FILENAME = '_layout.stitch'
export const SHELL_FILENAME = '_shell.html'
export const RELOAD_TRIGGER_FILENAME = '.stitch-reload'

export const PAGE_CONTENT_PLACEHOLDER = '<!-- STITCH_PAGE_CONTENT -->'
export const SHELL_HEAD_PLACEHOLDER = '<!-- STITCH_HEAD -->'
export const SHELL_BODY_PLACEHOLDER = '<!-- STITCH_BODY -->'

export const SCOPE_ATTRIBUTE = 'data-stitch-scope'
export const COMPONENT_PLACEHOLDER_PREFIX = 'stitch-component:'

export const MAX_COMPONENT_DEPTH = 10
export const WATCH_DEBOUNCE_MS = 500
export const RELOAD_POLL_INTERVAL_MS = 1500

export const BRYTHON_VERSION = '3.11.3'
export const BRYTHON_CDN = `https://cdn.jsdelivr.net/npm/brython@${BRYTHON_VERSION}`

export const DEFAULT_TITLE = 'Stitch App'
export const DEFAULT_SHELL_TITLE = 'Stitch Application'
