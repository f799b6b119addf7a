import { createHeadCollector, HEAD_ATTRIBUTE } from "hearthjs-core/runtime";
import type { HeadAttributes, HeadCollector, HeadTag } from "hearthjs-shared";

/** What one mounted <Head> declares. */
export interface HeadDeclaration {
  title?: string;
  tags: HeadTag[];
  htmlAttributes?: HeadAttributes;
  bodyAttributes?: HeadAttributes;
}

interface Entry {
  depth: number;
  order: number;
  declaration: HeadDeclaration;
}

interface Registry {
  entries: Map<symbol, Entry>;
  nextOrder: number;
  /** Attribute names set on <html>/<body> by the last sync. */
  applied: { html: string[]; body: string[] };
}

const registries = new WeakMap<Document, Registry>();

function getRegistry(doc: Document): Registry {
  let registry = registries.get(doc);
  if (!registry) {
    registry = { entries: new Map(), nextOrder: 0, applied: { html: [], body: [] } };
    registries.set(doc, registry);
  }
  return registry;
}

/** Feed a declaration into a collector, server or client side. */
export function declareHead(collector: HeadCollector, declaration: HeadDeclaration): void {
  if (declaration.title !== undefined) collector.setTitle(declaration.title);
  for (const tag of declaration.tags) collector.addTag(tag);
  if (declaration.htmlAttributes) collector.setHtmlAttributes(declaration.htmlAttributes);
  if (declaration.bodyAttributes) collector.setBodyAttributes(declaration.bodyAttributes);
}

/**
 * Register a mounted <Head> and bring the document in line with every
 * registered declaration. Deeper routes win over their layouts regardless
 * of the order effects run in. Returns the unregister function.
 */
export function mountHead(doc: Document, depth: number, declaration: HeadDeclaration): () => void {
  const registry = getRegistry(doc);
  const id = Symbol("head");
  registry.entries.set(id, { depth, order: registry.nextOrder++, declaration });
  syncHead(doc, registry);

  return () => {
    registry.entries.delete(id);
    syncHead(doc, registry);
  };
}

function syncHead(doc: Document, registry: Registry): void {
  const ordered = [...registry.entries.values()].sort(
    (a, b) => a.depth - b.depth || a.order - b.order,
  );

  const collector = createHeadCollector();
  for (const entry of ordered) declareHead(collector, entry.declaration);

  const title = collector.getTitle();
  if (title !== null) doc.title = title;

  for (const element of doc.head.querySelectorAll(`[${HEAD_ATTRIBUTE}]`)) {
    if (element.tagName.toLowerCase() !== "title") element.remove();
  }
  for (const tag of collector.getTags()) {
    doc.head.appendChild(createTagElement(doc, tag));
  }

  registry.applied.html = setAttributes(
    doc.documentElement,
    collector.getHtmlAttributes(),
    registry.applied.html,
  );
  registry.applied.body = setAttributes(doc.body, collector.getBodyAttributes(), registry.applied.body);
}

function createTagElement(doc: Document, tag: HeadTag): HTMLElement {
  const element = doc.createElement(tag.tag);
  for (const [name, value] of Object.entries(tag.attributes ?? {})) {
    if (value === undefined || value === false) continue;
    element.setAttribute(name, value === true ? "" : String(value));
  }
  element.setAttribute(HEAD_ATTRIBUTE, "");
  if (tag.content !== undefined) element.textContent = tag.content;
  return element;
}

function setAttributes(element: HTMLElement, attributes: HeadAttributes, previous: string[]): string[] {
  const applied: string[] = [];
  for (const [name, value] of Object.entries(attributes)) {
    if (value === undefined || value === false) continue;
    element.setAttribute(name, value === true ? "" : String(value));
    applied.push(name);
  }
  for (const name of previous) {
    if (!applied.includes(name)) element.removeAttribute(name);
  }
  return applied;
}
