import type { HeadAttributes, HeadCollector, HeadTag } from 'hearthjs-shared';

/** Attribute put on every server-rendered head tag so the client can find them. */
export const HEAD_ATTRIBUTE = 'data-hearth-head';

const VOID_TAGS = new Set(['meta', 'link', 'base']);

/** Meta attributes that identify a tag; a second tag with the same one replaces the first. */
const META_KEYS = ['charset', 'name', 'property', 'http-equiv', 'itemprop'] as const;

export interface ServerHeadCollector extends HeadCollector {
  getTitle(): string | null;
  getTags(): HeadTag[];
  getHtmlAttributes(): HeadAttributes;
  getBodyAttributes(): HeadAttributes;
  /** Serialize title and tags for the document head. */
  renderHead(): string;
}

/**
 * Collect head tags declared by components during a server render.
 *
 * Later declarations win: nested routes render after their layouts, so a
 * page's title or description replaces the layout's default.
 */
export function createHeadCollector(): ServerHeadCollector {
  let title: string | null = null;
  const tags = new Map<string, HeadTag>();
  let unkeyed = 0;
  const htmlAttributes: HeadAttributes = {};
  const bodyAttributes: HeadAttributes = {};

  return {
    setTitle(value) {
      title = value;
    },

    addTag(tag) {
      const key = dedupeKey(tag) ?? `#${unkeyed++}`;
      // Re-inserting moves a replaced tag to the position of its latest declaration
      tags.delete(key);
      tags.set(key, tag);
    },

    setHtmlAttributes(attributes) {
      Object.assign(htmlAttributes, attributes);
    },

    setBodyAttributes(attributes) {
      Object.assign(bodyAttributes, attributes);
    },

    getTitle: () => title,
    getTags: () => [...tags.values()],
    getHtmlAttributes: () => ({ ...htmlAttributes }),
    getBodyAttributes: () => ({ ...bodyAttributes }),

    renderHead() {
      const parts: string[] = [];
      if (title !== null) {
        parts.push(`<title ${HEAD_ATTRIBUTE}="">${escapeHtml(title)}</title>`);
      }
      for (const tag of tags.values()) {
        parts.push(renderTag(tag));
      }
      return parts.join('\n  ');
    },
  };
}

/**
 * Key used to deduplicate a tag, or null when the tag always appends.
 */
export function dedupeKey(tag: HeadTag): string | null {
  if (tag.key) return `key:${tag.key}`;

  const attrs = tag.attributes ?? {};
  if (tag.tag === 'meta') {
    for (const name of META_KEYS) {
      const value = attrs[name];
      if (value === undefined || value === false) continue;
      // charset is unique no matter its value
      return name === 'charset' ? 'meta:charset' : `meta:${name}:${String(value)}`;
    }
  }
  if (tag.tag === 'link' && attrs.rel === 'canonical') return 'link:canonical';
  if (tag.tag === 'base') return 'base';

  return null;
}

/**
 * Serialize one head tag. Attribute values and title text are escaped;
 * script, style and noscript content is emitted as given.
 */
export function renderTag(tag: HeadTag): string {
  const attrs = renderAttributes({ ...tag.attributes, [HEAD_ATTRIBUTE]: '' });
  const open = `<${tag.tag}${attrs ? ' ' + attrs : ''}>`;
  if (VOID_TAGS.has(tag.tag)) return open;
  return `${open}${tag.content ?? ''}</${tag.tag}>`;
}

/**
 * Serialize attributes: `true` renders the bare name, `false` and
 * `undefined` are omitted.
 */
export function renderAttributes(attributes: HeadAttributes): string {
  const parts: string[] = [];
  for (const [name, value] of Object.entries(attributes)) {
    if (value === undefined || value === false) continue;
    if (!/^[A-Za-z_:][-A-Za-z0-9_:.]*$/.test(name)) continue;
    parts.push(value === true ? name : `${name}="${escapeHtml(String(value))}"`);
  }
  return parts.join(' ');
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}
