import type { Action, AnyAction, MatchedRoute, PathMatch, RouteConfig } from 'hearthjs-shared';

// ─── Pattern compilation ──────────────────────────────────────────────────────

/**
 * One segment of a compiled path pattern.
 *
 *   - static:   exact segment match ("stories", "about")
 *   - param:    any single segment, captured under `name` (":id")
 *   - catchAll: every remaining segment, joined by "/" ("*rest", or bare "*")
 */
export type PatternSegment =
  | { kind: 'static'; value: string }
  | { kind: 'param'; name: string }
  | { kind: 'catchAll'; name: string };

export interface CompiledPath {
  pattern: string;
  segments: PatternSegment[];
}

const compiledCache = new Map<string, CompiledPath>();

/**
 * Compile a route pattern into segments. Results are memoized per pattern.
 *
 * '/stories/:id' → [static "stories", param "id"]
 * '/docs/*rest'  → [static "docs", catchAll "rest"]
 * '/'            → []
 */
export function compilePath(pattern: string): CompiledPath {
  const cached = compiledCache.get(pattern);
  if (cached) return cached;

  const parts = splitPath(pattern);
  const segments: PatternSegment[] = [];

  for (let i = 0; i < parts.length; i++) {
    const part = parts[i];

    if (part.startsWith('*')) {
      if (i !== parts.length - 1) {
        throw new Error(`Invalid route pattern "${pattern}": a catch-all segment must be the last segment.`);
      }
      segments.push({ kind: 'catchAll', name: part.slice(1) || '*' });
    } else if (part.startsWith(':')) {
      const name = part.slice(1);
      if (!name) {
        throw new Error(`Invalid route pattern "${pattern}": parameter segment without a name.`);
      }
      segments.push({ kind: 'param', name });
    } else {
      segments.push({ kind: 'static', value: part });
    }
  }

  const compiled = { pattern, segments };
  compiledCache.set(pattern, compiled);
  return compiled;
}

// ─── Matching ─────────────────────────────────────────────────────────────────

export interface MatchPathOptions {
  path: string;
  exact?: boolean;
}

/**
 * Match a pathname against a single pattern.
 *
 * Without `exact` the pattern only needs to match a prefix of the pathname
 * (so '/' matches everything); with `exact` every pathname segment must be
 * consumed. Returns null when the pattern does not match.
 */
export function matchPath(pathname: string, options: MatchPathOptions): PathMatch | null {
  const { segments } = compilePath(options.path);
  const parts = splitPath(pathname);
  const params: Record<string, string> = {};
  let consumed = 0;

  for (const segment of segments) {
    if (segment.kind === 'catchAll') {
      params[segment.name] = parts.slice(consumed).map(safeDecode).join('/');
      consumed = parts.length;
      break;
    }

    const part = parts[consumed];
    if (part === undefined) return null;

    if (segment.kind === 'static') {
      if (part !== segment.value) return null;
    } else {
      params[segment.name] = safeDecode(part);
    }
    consumed++;
  }

  const isExact = consumed === parts.length;
  if (options.exact && !isExact) return null;

  return {
    path: options.path,
    url: '/' + parts.slice(0, consumed).join('/'),
    isExact,
    params,
  };
}

/**
 * Resolve the branch of nested routes that render for a pathname.
 *
 * At each level the first route in declaration order that matches wins,
 * then matching descends into its child routes. A route without `path`
 * always matches and inherits its parent's match. Returns [] when the top
 * level has no match.
 *
 * @example
 * ```ts
 * const branch = matchRoutes(routes, '/stories/42');
 * // branch[0].route === rootLayout, branch[1].match.params === { id: '42' }
 * ```
 */
export function matchRoutes<C, S, A extends Action = AnyAction>(
  routes: RouteConfig<C, S, A>[],
  pathname: string,
  branch: MatchedRoute<C, S, A>[] = [],
): MatchedRoute<C, S, A>[] {
  const parent = branch[branch.length - 1];

  for (const route of routes) {
    const match = route.path === undefined
      ? inheritMatch(parent?.match)
      : matchPath(pathname, { path: route.path, exact: route.exact });

    if (!match) continue;

    // Keys stay unique within a branch: loader data is stored under them
    const key = routeKey(route, branch.length);
    const taken = branch.some((entry) => entry.key === key);
    branch.push({ route, match, key: taken ? `${key}#${branch.length}` : key });

    if (route.routes && route.routes.length > 0) {
      matchRoutes(route.routes, pathname, branch);
    }
    break;
  }

  return branch;
}

/**
 * Stable key for a route within a branch: explicit key, then path, then depth.
 */
export function routeKey(route: { key?: string; path?: string }, depth: number): string {
  return route.key ?? route.path ?? `#${depth}`;
}

/**
 * Build a concrete URL from a pattern and its params.
 *
 * createPath('/stories/:id', { id: '42' }) → '/stories/42'
 */
export function createPath(pattern: string, params: Record<string, string | number> = {}): string {
  const { segments } = compilePath(pattern);
  const parts: string[] = [];

  for (const segment of segments) {
    if (segment.kind === 'static') {
      parts.push(segment.value);
      continue;
    }

    const value = params[segment.name];
    if (value === undefined) {
      if (segment.kind === 'catchAll') continue;
      throw new Error(`Missing param "${segment.name}" for route pattern "${pattern}".`);
    }

    if (segment.kind === 'catchAll') {
      parts.push(...String(value).split('/').filter(Boolean).map(encodeURIComponent));
    } else {
      parts.push(encodeURIComponent(String(value)));
    }
  }

  return '/' + parts.join('/');
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function inheritMatch(parent: PathMatch | undefined): PathMatch {
  if (parent) return { ...parent, params: { ...parent.params } };
  return { path: '/', url: '/', isExact: false, params: {} };
}

/**
 * Split a pattern or pathname into segments, ignoring empty ones.
 * '/stories/42/' → ['stories', '42']
 * '/' → []
 */
function splitPath(value: string): string[] {
  return value.split('/').filter(Boolean);
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    // Malformed escape sequences are passed through as written
    return segment;
  }
}
