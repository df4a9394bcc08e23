const NUXT_MARKER = "window.__NUXT__=";

const SCRIPT_RE = /<script\b[^>]*>([\s\S]*?)<\/script>/gi;

/**
 * Pulls the JSON assigned to window.__NUXT__ out of the page's inline scripts.
 * Throws when no script carries the marker or the payload is not JSON.
 */
export function extractNuxtState(html: string): unknown {
  for (const match of html.matchAll(SCRIPT_RE)) {
    const body = match[1];
    const at = body.indexOf(NUXT_MARKER);
    if (at < 0) continue;

    const json = body.slice(at + NUXT_MARKER.length).trim().replace(/;\s*$/, "");
    try {
      return JSON.parse(json) as unknown;
    } catch (err) {
      throw new Error(`Embedded campaign state is not valid JSON: ${String(err)}`);
    }
  }
  throw new Error(`No script containing ${NUXT_MARKER} found on the campaign page.`);
}
