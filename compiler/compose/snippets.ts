/**
 * Runtime Snippets
 *
 * Fixed text injected into generated pages: the Brython bootstrap tags, the
 * helper prelude prepended to page scripts, and the live-reload poller.
 */

import { BRYTHON_CDN, RELOAD_POLL_INTERVAL_MS, RELOAD_TRIGGER_FILENAME } from '../constants'

export const HELPER_PRELUDE = `# --- stitch helpers (injected) ---
from browser import document
def byid(element_id):
    try: return document[element_id]
    except KeyError: return None
def qs(selector): return document.select_one(selector)
def qsa(selector): return document.select(selector)
# --- end stitch helpers ---
`

export function hasHelperPrelude(code: string): boolean {
  return code.includes(HELPER_PRELUDE.trim())
}

/** Prepend the helper prelude unless the code already carries it */
export function withHelperPrelude(code: string): string {
  if (hasHelperPrelude(code)) return code
  return `${HELPER_PRELUDE}\n${code}`
}

export function bootstrapScriptTags(): string[] {
  return [
    `<script src="${BRYTHON_CDN}/brython.min.js"></script>`,
    `<script src="${BRYTHON_CDN}/brython_stdlib.js"></script>`
  ]
}

export function bootstrapCall(debugLevel: number): string {
  return `brython({'debug': ${debugLevel}})`
}

/** Matches a bootstrap call that passes a debug option; group 2 is the level */
export const DEBUG_CALL_PATTERN = /(brython\s*\(\s*\{[^}]*['"]debug['"]\s*:\s*)(\d+)/gi

export const LIVE_RELOAD_SCRIPT = `<script>
// stitch live reload
(function () {
  var TRIGGER = '/${RELOAD_TRIGGER_FILENAME}';
  var INTERVAL = ${RELOAD_POLL_INTERVAL_MS};
  var lastModified = null;

  function check() {
    return fetch(TRIGGER, { method: 'HEAD', cache: 'no-store' }).then(function (response) {
      if (!response.ok) return;
      var stamp = response.headers.get('Last-Modified');
      if (stamp && lastModified && stamp !== lastModified) {
        window.location.reload();
        return;
      }
      if (stamp) lastModified = stamp;
    });
  }

  function poll() {
    var pending = document.hidden ? Promise.resolve() : check();
    pending.catch(function () {}).then(function () {
      setTimeout(poll, INTERVAL);
    });
  }

  check().catch(function () {}).then(function () {
    setTimeout(poll, INTERVAL);
  });
})();
</script>`
