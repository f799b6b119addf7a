import fs from "node:fs";
import path from "node:path";

// ─── Cache-Control ────────────────────────────────────────────────────────────

/**
 * Determine Cache-Control header for a static asset.
 * Hashed files in /assets/ get immutable caching.
 */
export function getCacheControl(urlPath: string): string {
  if (
    urlPath.includes("/assets/") &&
    isHashedFilename(path.posix.basename(urlPath))
  ) {
    return "public, max-age=31536000, immutable";
  }
  return "no-cache";
}

/**
 * Check if a filename matches esbuild's [name]-[hash].ext pattern.
 */
function isHashedFilename(filename: string): boolean {
  const ext = path.posix.extname(filename);
  const base = path.posix.basename(filename, ext);
  return /-[A-Za-z0-9]{6,}$/.test(base);
}

// ─── MIME types ───────────────────────────────────────────────────────────────

const CONTENT_TYPES: Record<string, string> = {
  ".js": "application/javascript",
  ".mjs": "application/javascript",
  ".css": "text/css",
  ".html": "text/html",
  ".json": "application/json",
  ".txt": "text/plain",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".svg": "image/svg+xml",
  ".ico": "image/x-icon",
  ".webp": "image/webp",
  ".woff": "font/woff",
  ".woff2": "font/woff2",
  ".ttf": "font/ttf",
  ".map": "application/json",
};

/**
 * Get MIME type from file extension.
 */
export function getContentType(ext: string): string {
  return CONTENT_TYPES[ext.toLowerCase()] ?? "application/octet-stream";
}

// ─── Lookup ───────────────────────────────────────────────────────────────────

/**
 * Resolve a URL pathname to a file inside one of `dirs`, first hit wins.
 * Returns null for directories, missing files, and any path that would
 * leave its directory.
 */
export function resolveStaticFile(dirs: string[], pathname: string): string | null {
  let decoded: string;
  try {
    decoded = decodeURIComponent(pathname);
  } catch {
    return null;
  }
  if (decoded.includes("\0")) return null;

  for (const dir of dirs) {
    const root = path.resolve(dir);
    const candidate = path.resolve(root, "." + decoded);
    if (!candidate.startsWith(root + path.sep)) continue;

    try {
      if (fs.statSync(candidate).isFile()) return candidate;
    } catch {
      // Missing in this directory; try the next one
      continue;
    }
  }
  return null;
}

/**
 * Answer a GET/HEAD request from the first directory holding the file.
 * Returns null when no file matches, so the caller can render a page.
 */
export async function serveStatic(
  dirs: string[],
  request: Request,
): Promise<Response | null> {
  const { pathname } = new URL(request.url);
  const filePath = resolveStaticFile(dirs, pathname);
  if (!filePath) return null;

  const content = await fs.promises.readFile(filePath);
  const headers = {
    "Content-Type": getContentType(path.extname(filePath)),
    "Content-Length": String(content.length),
    "Cache-Control": getCacheControl(pathname),
  };

  return new Response(request.method === "HEAD" ? null : new Uint8Array(content), {
    status: 200,
    headers,
  });
}
