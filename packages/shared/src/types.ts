/**
 * Hearth run mode
 */
export type HearthMode = 'development' | 'production';

// ─── Configuration ────────────────────────────────────────────────────────────

/**
 * HTTP server configuration
 */
export type ServerConfig = {
  /** Port to listen on (default: 3000) */
  port?: number;
  /** Host to bind to (default: 'localhost') */
  host?: string;
  /** Add Server-Timing headers and log one line per request (default: true in development) */
  trace?: boolean;
  /** How long stop() waits for in-flight requests, in ms (default: 10000) */
  shutdownTimeoutMs?: number;
};

/**
 * Build configuration
 */
export type BuildConfig = {
  /** Output directory (default: 'dist') */
  outDir?: string;
  /** Generate sourcemaps (default: false) */
  sourcemap?: boolean;
  /** Minify the client bundle (default: true) */
  minify?: boolean;
  /** esbuild target for the client bundle (default: 'es2020') */
  target?: string | string[];
  /** Public path the client assets are served from (default: '/') */
  base?: string;
};

/**
 * Environment variables configuration
 */
export type EnvConfig = {
  /** Directory containing .env files (default: root) */
  dir?: string;
  /** Prefix of variables exposed on the request context (default: 'HEARTH_') */
  prefix?: string;
  /** Additional env files to load */
  files?: string[];
};

/**
 * Main Hearth configuration
 */
export type HearthConfig = {
  /** Root directory (default: process.cwd()) */
  root?: string;

  /** Module whose default export is the app definition (default: 'src/app.tsx') */
  app?: string;

  /** Browser entry that hydrates the app (default: 'src/client.tsx') */
  client?: string;

  /** Directory of files served as-is (default: 'public') */
  publicDir?: string;

  /** Output directory (default: 'dist') - shorthand for build.outDir */
  outDir?: string;

  /** Server port (default: 3000) - shorthand for server.port */
  port?: number;

  /** Run mode (default: 'development') */
  mode?: HearthMode;

  /** id of the element the app renders into (default: 'root') */
  containerId?: string;

  server?: ServerConfig;

  build?: BuildConfig;

  env?: EnvConfig;
};

/**
 * Helper to define config with type safety
 */
export function defineConfig(config: HearthConfig): HearthConfig {
  return config;
}

/**
 * Helper to define config as a function with mode support
 */
export function defineConfigFn(
  fn: (mode: HearthMode) => HearthConfig
): (mode: HearthMode) => HearthConfig {
  return fn;
}

// ─── Request context ──────────────────────────────────────────────────────────

export interface CookieOptions {
  maxAge?: number;
  expires?: Date;
  path?: string;
  domain?: string;
  secure?: boolean;
  httpOnly?: boolean;
  sameSite?: 'strict' | 'lax' | 'none';
}

export interface CookieJar {
  get(name: string): string | undefined;
  getAll(): Record<string, string>;
  set(name: string, value: string, options?: CookieOptions): void;
  delete(name: string): void;
}

/**
 * Per-request context handed to middleware and server-side loaders.
 */
export interface RequestContext {
  request: Request;
  url: URL;
  /** Params of the deepest matched route. */
  params: Record<string, string>;
  headers: Headers;
  cookies: CookieJar;
  /** Variables carrying the env prefix, with the prefix stripped. */
  env: Record<string, string>;
  mode: HearthMode;
  /** Pattern of the deepest matched route, e.g. '/stories/:id'. */
  routeId: string;

  json(data: unknown, init?: ResponseInit): Response;
  html(body: string, init?: ResponseInit): Response;
  text(body: string, init?: ResponseInit): Response;
  redirect(url: string, status?: number): Response;
}

export type Middleware = (
  ctx: RequestContext,
  next: () => Promise<Response>,
) => Response | Promise<Response>;

// ─── Store ────────────────────────────────────────────────────────────────────

export interface Action<T extends string = string> {
  type: T;
}

export interface AnyAction extends Action {
  [extraProps: string]: unknown;
}

/** Dispatched once when a store is created or its reducer replaced. */
export interface InitAction {
  type: '@@hearth/INIT';
}

/**
 * Reducers see the app's own actions plus the init action, which they should
 * answer by returning their (default) state.
 */
export type Reducer<S = unknown, A extends Action = AnyAction> = (
  state: S | undefined,
  action: A | InitAction,
) => S;

/** A function dispatched in place of an action; its return value is returned by dispatch. */
export type Thunk<S, A extends Action, R> = (
  dispatch: Dispatch<S, A>,
  getState: () => S,
) => R;

export interface Dispatch<S, A extends Action> {
  <T extends A>(action: T): T;
  <R>(thunk: Thunk<S, A, R>): R;
}

export type Unsubscribe = () => void;

export interface Store<S = unknown, A extends Action = AnyAction> {
  getState(): S;
  dispatch: Dispatch<S, A>;
  subscribe(listener: () => void): Unsubscribe;
  replaceReducer(nextReducer: Reducer<S, A>): void;
}

// ─── Routes ───────────────────────────────────────────────────────────────────

export interface PathMatch {
  /** The pattern that matched, e.g. '/stories/:id'. */
  path: string;
  /** The matched portion of the pathname, e.g. '/stories/42'. */
  url: string;
  isExact: boolean;
  params: Record<string, string>;
}

export interface LoadDataArgs<S = unknown, A extends Action = AnyAction> {
  store: Store<S, A>;
  match: PathMatch;
  params: Record<string, string>;
  url: URL;
  /** Present on the server only. */
  ctx?: RequestContext;
}

/**
 * Data loader declared on a route. Runs before the route renders, on the
 * server for the first request and on the client for later navigations.
 *
 * Resolve to a value to expose it as route data, or to a `Response`
 * (e.g. `ctx.redirect()`) to answer the request without rendering.
 */
export type LoadData<S = unknown, A extends Action = AnyAction> = (
  args: LoadDataArgs<S, A>,
) => unknown;

export interface RouteConfig<C = unknown, S = unknown, A extends Action = AnyAction> {
  /** Pattern such as '/', '/stories/:id' or '/docs/*rest'. Omit to always match. */
  path?: string;
  exact?: boolean;
  /** Key under which loader data is stored (default: path). */
  key?: string;
  component: C;
  loadData?: LoadData<S, A>;
  routes?: RouteConfig<C, S, A>[];
}

export interface MatchedRoute<C = unknown, S = unknown, A extends Action = AnyAction> {
  route: RouteConfig<C, S, A>;
  match: PathMatch;
  key: string;
}

/**
 * A universal application: the same definition is rendered on the server
 * and hydrated in the browser.
 */
export interface HearthApp<C = unknown, S = unknown, A extends Action = AnyAction> {
  routes: RouteConfig<C, S, A>[];
  reducer: Reducer<S, A>;
  preloadedState?: S;
  /** Server-only middleware wrapped around every page request. */
  middleware?: Middleware[];
  /** Document template; falls back to the adapter's, then the default shell. */
  shell?: string;
}

// ─── Head tags ────────────────────────────────────────────────────────────────

export type HeadTagName = 'meta' | 'link' | 'script' | 'style' | 'base' | 'noscript';

export type HeadAttributes = Record<string, string | number | boolean | undefined>;

export interface HeadTag {
  tag: HeadTagName;
  attributes?: HeadAttributes;
  /** Raw inner content (script, style, noscript). */
  content?: string;
  /** Explicit dedupe key; a later tag with the same key replaces the earlier one. */
  key?: string;
}

export interface HeadCollector {
  setTitle(title: string): void;
  addTag(tag: HeadTag): void;
  setHtmlAttributes(attributes: HeadAttributes): void;
  setBodyAttributes(attributes: HeadAttributes): void;
}

// ─── Rendering ────────────────────────────────────────────────────────────────

/**
 * Mutable record filled in by components while rendering on the server.
 */
export interface StaticContext {
  status?: number;
  redirect?: { url: string; status: number };
}

export interface RenderContext<C = unknown, S = unknown, A extends Action = AnyAction> {
  url: URL;
  branch: MatchedRoute<C, S, A>[];
  store: Store<S, A>;
  /** Loader results keyed by route key. */
  data: Record<string, unknown>;
  head: HeadCollector;
  staticContext: StaticContext;
  mode: HearthMode;
}

/**
 * UI framework adapter. Core never sees the framework: it passes route
 * components through as opaque `C` values.
 */
export interface HearthAdapter<C = unknown> {
  name: string;
  renderToHTML<S, A extends Action>(
    app: HearthApp<C, S, A>,
    context: RenderContext<C, S, A>,
  ): string | Promise<string>;
  getDocumentShell?(): string;
}

/** Shape of the JSON transferred from server to client. */
export interface HydrationPayload<S = unknown> {
  state: S;
  data: Record<string, unknown>;
  url: string;
}

/** Written by the client build, read by the server. */
export interface ClientManifest {
  version: 1;
  base: string;
  entry: string;
  css: string[];
}

// ─── Tracing ──────────────────────────────────────────────────────────────────

export interface TraceStage {
  name: string;
  durationMs: number;
  detail?: string;
  error?: string;
}

export interface ServerStartResult {
  port: number;
  host: string;
  startupMs: number;
}
