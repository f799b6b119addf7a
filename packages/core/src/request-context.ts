import type http from "node:http";
import { pickPrefixedEnv } from "hearthjs-shared";
import type {
  HearthMode,
  RequestContext,
  CookieJar,
  CookieOptions,
} from "hearthjs-shared";

/**
 * Internal CookieJar implementation.
 * Parses the Cookie header on construction and tracks Set-Cookie mutations.
 */
class CookieJarImpl implements CookieJar {
  private parsed: Map<string, string>;
  private pending: string[] = [];

  constructor(cookieHeader: string | null) {
    this.parsed = parseCookieHeader(cookieHeader || "");
  }

  get(name: string): string | undefined {
    return this.parsed.get(name);
  }

  getAll(): Record<string, string> {
    return Object.fromEntries(this.parsed);
  }

  set(name: string, value: string, options?: CookieOptions): void {
    this.parsed.set(name, value);
    this.pending.push(serializeSetCookie(name, value, options));
  }

  delete(name: string): void {
    this.pending.push(serializeSetCookie(name, "", { maxAge: 0, path: "/" }));
    this.parsed.delete(name);
  }

  /** Pending Set-Cookie header values, in the order they were queued. */
  getSetCookieHeaders(): string[] {
    return this.pending;
  }
}

/**
 * Parse a Cookie header string into a Map of name → value.
 * Format: "name1=value1; name2=value2"
 */
function parseCookieHeader(header: string): Map<string, string> {
  const map = new Map<string, string>();
  if (!header) return map;

  for (const pair of header.split(";")) {
    const eqIndex = pair.indexOf("=");
    if (eqIndex === -1) continue;
    const name = pair.slice(0, eqIndex).trim();
    const value = pair.slice(eqIndex + 1).trim();
    if (name) {
      map.set(name, safeDecode(value));
    }
  }
  return map;
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    // Not percent-encoded by us; keep the raw value
    return value;
  }
}

/**
 * Serialize a Set-Cookie header value from name, value, and options.
 */
function serializeSetCookie(
  name: string,
  value: string,
  options?: CookieOptions,
): string {
  let cookie = `${name}=${encodeURIComponent(value)}`;

  if (options) {
    if (options.maxAge !== undefined) cookie += `; Max-Age=${options.maxAge}`;
    if (options.expires) cookie += `; Expires=${options.expires.toUTCString()}`;
    if (options.path) cookie += `; Path=${options.path}`;
    if (options.domain) cookie += `; Domain=${options.domain}`;
    if (options.secure) cookie += "; Secure";
    if (options.httpOnly) cookie += "; HttpOnly";
    if (options.sameSite) {
      cookie += `; SameSite=${options.sameSite.charAt(0).toUpperCase() + options.sameSite.slice(1)}`;
    }
  }

  return cookie;
}

export interface CreateRequestContextOptions {
  request: Request;
  params: Record<string, string>;
  routeId: string;
  mode: HearthMode;
  envPrefix?: string;
}

/**
 * Build a RequestContext around a Web standard Request, enriched with the
 * matched route's params, a cookie jar, prefixed env and response helpers.
 */
export function createRequestContext(
  opts: CreateRequestContextOptions,
): RequestContext {
  const { request, params, routeId, mode, envPrefix = "HEARTH_" } = opts;

  const ctx: RequestContext = {
    request,
    url: new URL(request.url),
    params,
    headers: request.headers,
    cookies: new CookieJarImpl(request.headers.get("cookie")),
    env: pickPrefixedEnv(envPrefix),
    mode,
    routeId,

    json(data: unknown, init?: ResponseInit): Response {
      return withContentType(JSON.stringify(data), "application/json", init);
    },

    html(body: string, init?: ResponseInit): Response {
      return withContentType(body, "text/html; charset=utf-8", init);
    },

    text(body: string, init?: ResponseInit): Response {
      return withContentType(body, "text/plain; charset=utf-8", init);
    },

    redirect(redirectUrl: string, status = 302): Response {
      return new Response(null, {
        status,
        headers: { Location: redirectUrl },
      });
    },
  };

  return ctx;
}

function withContentType(body: string, contentType: string, init?: ResponseInit): Response {
  const headers = new Headers(init?.headers);
  if (!headers.has("Content-Type")) headers.set("Content-Type", contentType);
  return new Response(body, { ...init, headers });
}

/**
 * Extract pending Set-Cookie headers from a RequestContext.
 * Returns empty array if the cookies aren't our CookieJarImpl.
 */
export function getSetCookieHeaders(ctx: RequestContext): string[] {
  if (ctx.cookies instanceof CookieJarImpl) {
    return ctx.cookies.getSetCookieHeaders();
  }
  return [];
}

/**
 * Convert Node's IncomingMessage into a Web standard Request.
 * Only the method, URL and headers are carried over: page requests are
 * GET or HEAD, so the body is never read.
 */
export function toWebRequest(req: http.IncomingMessage): Request {
  const host = req.headers.host || "localhost";
  const url = new URL(req.url || "/", `http://${host}`);

  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const v of value) headers.append(key, v);
    } else {
      headers.set(key, value);
    }
  }

  return new Request(url.href, {
    method: (req.method || "GET").toUpperCase(),
    headers,
  });
}
