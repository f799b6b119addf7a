import type { ClientManifest, HeadAttributes } from "hearthjs-shared";
import { escapeHtml, renderAttributes } from "./head.js";

/** Default HTML document shell used when neither the app nor the adapter provides one. */
export const DEFAULT_SHELL = `<!DOCTYPE html>
<html>
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <!--hearth-head-->
</head>
<body>
  <div id="__CONTAINER_ID__"><!--hearth-outlet--></div>
  <!--hearth-scripts-->
</body>
</html>`;

export interface AssembleDocumentOptions {
  shell: string;
  containerId: string;
  /** Rendered app markup. */
  body: string;
  /** Head tags, already serialized. */
  head: string;
  /** Script and preload tags for the end of <body>. */
  scripts: string;
  htmlAttributes?: HeadAttributes;
  bodyAttributes?: HeadAttributes;
}

/**
 * Fill a document shell.
 *
 * Markers: `<!--hearth-head-->`, `<!--hearth-outlet-->`,
 * `<!--hearth-scripts-->` and `__CONTAINER_ID__`. A shell without the
 * scripts marker gets its scripts right before `</body>`.
 */
export function assembleDocument(options: AssembleDocumentOptions): string {
  let html = options.shell;
  html = html.replace("__CONTAINER_ID__", options.containerId);
  // Function replacers: rendered markup may contain "$&" sequences
  html = html.replace("<!--hearth-outlet-->", () => options.body);
  html = html.replace("<!--hearth-head-->", () => options.head);

  if (html.includes("<!--hearth-scripts-->")) {
    html = html.replace("<!--hearth-scripts-->", () => options.scripts);
  } else {
    html = html.replace("</body>", () => `  ${options.scripts}\n</body>`);
  }

  html = mergeTagAttributes(html, "html", options.htmlAttributes);
  html = mergeTagAttributes(html, "body", options.bodyAttributes);
  return html;
}

/**
 * Add attributes to the first opening `<html>` or `<body>` tag.
 * A collected attribute replaces a same-named one written in the shell.
 */
function mergeTagAttributes(
  html: string,
  tagName: "html" | "body",
  attributes: HeadAttributes | undefined,
): string {
  if (!attributes) return html;
  const rendered = renderAttributes(attributes);
  if (!rendered) return html;

  const pattern = new RegExp(`<${tagName}(\\s[^>]*)?>`, "i");
  return html.replace(pattern, (_tag, existing: string | undefined) => {
    const existingAttrs = existing ? existing.trim() : "";
    const withoutDuplicates = dropOverridden(existingAttrs, Object.keys(attributes));
    const all = [withoutDuplicates, rendered].filter(Boolean).join(" ");
    return `<${tagName} ${all}>`;
  });
}

function dropOverridden(existing: string, names: string[]): string {
  let result = existing;
  for (const name of names) {
    const attrPattern = new RegExp(`(^|\\s)${escapeRegExp(name)}(=("[^"]*"|'[^']*'|[^\\s>]*))?(?=\\s|$)`, "g");
    result = result.replace(attrPattern, "");
  }
  return result.trim();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Generate <link> and <script> tags for the client build output.
 */
export function buildAssetTags(
  manifest: ClientManifest | null,
  base = "/",
): { head: string; body: string } {
  if (!manifest) return { head: "", body: "" };

  const prefix = base.endsWith("/") ? base : base + "/";
  const headParts: string[] = [];

  for (const css of manifest.css) {
    headParts.push(`<link rel="stylesheet" href="${prefix}${css}">`);
  }
  headParts.push(`<link rel="modulepreload" href="${prefix}${manifest.entry}">`);

  return {
    head: headParts.join("\n  "),
    body: `<script type="module" src="${prefix}${manifest.entry}"></script>`,
  };
}

/** 500 page. `details` is shown (escaped) in development only. */
export function getErrorHTML(details?: { message: string; stack?: string }): string {
  const detailBlock = details
    ? `\n    <pre>${escapeHtml(details.stack || details.message)}</pre>`
    : "";
  return `<!DOCTYPE html>
<html><head><title>500 Internal Server Error</title>
<style>
  body { font-family: system-ui, sans-serif; background: #1c1917; color: #e7e5e4;
         display: flex; align-items: center; justify-content: center; min-height: 100vh; margin: 0; }
  .container { text-align: center; max-width: 90vw; }
  h1 { font-size: 4rem; color: #f97316; margin: 0; }
  p { color: #a8a29e; margin-top: 1rem; }
  pre { text-align: left; background: #292524; padding: 1rem; overflow: auto; }
</style></head>
<body>
  <div class="container">
    <h1>500</h1>
    <p>Internal Server Error</p>${detailBlock}
  </div>
</body></html>`;
}

/** Generic 404 page shown when no route matches. */
export function get404HTML(pathname: string): string {
  return `<!DOCTYPE html>
<html><head><title>404 Not Found</title>
<style>
  body { font-family: system-ui, sans-serif; background: #1c1917; color: #e7e5e4;
         display: flex; align-items: center; justify-content: center; min-height: 100vh; margin: 0; }
  .container { text-align: center; }
  h1 { font-size: 4rem; color: #f97316; margin: 0; }
  p { color: #a8a29e; margin-top: 1rem; }
  code { color: #fdba74; }
</style></head>
<body>
  <div class="container">
    <h1>404</h1>
    <p>Page <code>${escapeHtml(pathname)}</code> not found</p>
  </div>
</body></html>`;
}
