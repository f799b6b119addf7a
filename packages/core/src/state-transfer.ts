import type { HydrationPayload } from 'hearthjs-shared';

/** id of the script element carrying the server state to the client. */
export const STATE_SCRIPT_ID = '__hearth_state';

/**
 * Escape a JSON string for safe embedding inside a <script> tag.
 * Prevents XSS via </script> injection and HTML comment sequences, and
 * escapes the U+2028/U+2029 line separators.
 */
export function escapeJsonForScript(json: string): string {
  return json
    .replace(/</g, '\\u003c')
    .replace(/>/g, '\\u003e')
    .replace(/&/g, '\\u0026')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
}

/**
 * Serialize the state snapshot and loader data for the client.
 *
 * Throws when the state cannot be represented as JSON (cycles, BigInt).
 */
export function serializeHydrationPayload<S>(payload: HydrationPayload<S>): string {
  let json: string;
  try {
    json = JSON.stringify(payload);
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new Error(`Store state is not JSON-serializable: ${msg}`);
  }
  return escapeJsonForScript(json);
}

export function renderStateScript<S>(payload: HydrationPayload<S>): string {
  return `<script id="${STATE_SCRIPT_ID}" type="application/json">${serializeHydrationPayload(payload)}</script>`;
}

/**
 * Parse the text of the state script on the client.
 * Returns null for missing or empty text; throws on a malformed payload.
 */
export function parseHydrationPayload(text: string | null | undefined): HydrationPayload | null {
  if (!text || !text.trim()) return null;

  const parsed: unknown = JSON.parse(text);
  if (!isRecord(parsed) || !('state' in parsed)) {
    throw new Error(`Malformed hydration payload in #${STATE_SCRIPT_ID}: expected an object with "state".`);
  }

  const data = isRecord(parsed.data) ? parsed.data : {};
  const url = typeof parsed.url === 'string' ? parsed.url : '/';

  return { state: parsed.state, data, url };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
