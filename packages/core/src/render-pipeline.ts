import type {
  Action,
  AnyAction,
  ClientManifest,
  HearthAdapter,
  HearthApp,
  HearthMode,
  MatchedRoute,
  RequestContext,
  StaticContext,
} from "hearthjs-shared";
import { matchRoutes } from "./route-matcher.js";
import { createStore } from "./store.js";
import { prefetchData } from "./prefetch.js";
import type { PrefetchResult } from "./prefetch.js";
import { createHeadCollector } from "./head.js";
import { renderStateScript } from "./state-transfer.js";
import {
  DEFAULT_SHELL,
  assembleDocument,
  buildAssetTags,
  get404HTML,
} from "./document.js";
import { createRequestContext, getSetCookieHeaders } from "./request-context.js";
import { runMiddleware } from "./middleware.js";
import type { RequestTracer } from "./tracer.js";

export interface RenderPageOptions<C, S, A extends Action> {
  app: HearthApp<C, S, A>;
  adapter: HearthAdapter<C>;
  request: Request;
  mode: HearthMode;
  /** id of the mount element (default: 'root'). */
  containerId?: string;
  /** Client build manifest; without one the page ships no scripts. */
  manifest?: ClientManifest | null;
  envPrefix?: string;
  tracer?: RequestTracer | null;
}

const HTML_HEADERS = {
  "Content-Type": "text/html; charset=utf-8",
  "Cache-Control": "no-cache",
};

/**
 * Render one page request.
 *
 * Pipeline:
 * 1. Match the route branch for the pathname (no branch → 404 page).
 * 2. Build the request context and a fresh store for this request.
 * 3. Run the app middleware around steps 4–7.
 * 4. Prefetch: run every loader in the branch and wait for all of them.
 *    A loader Response (e.g. a redirect) short-circuits.
 * 5. Render the tree through the adapter.
 * 6. Answer a redirect recorded by the tree while rendering.
 * 7. Serialize the store state and loader data, assemble the document.
 *
 * Errors propagate; the server turns them into the error page.
 */
export async function renderPage<C, S, A extends Action = AnyAction>(
  options: RenderPageOptions<C, S, A>,
): Promise<Response> {
  const { app, request, tracer } = options;
  const url = new URL(request.url);

  tracer?.start("route-match");
  const branch = matchRoutes(app.routes, url.pathname);
  tracer?.end();

  if (branch.length === 0) {
    return new Response(get404HTML(url.pathname), {
      status: 404,
      headers: HTML_HEADERS,
    });
  }

  const deepest = branch[branch.length - 1];
  tracer?.setRoute(deepest.match.path);

  const ctx = createRequestContext({
    request,
    params: deepest.match.params,
    routeId: deepest.match.path,
    mode: options.mode,
    envPrefix: options.envPrefix,
  });

  tracer?.start("middleware");
  const response = await runMiddleware(app.middleware ?? [], ctx, () => {
    tracer?.end();
    return renderBranch(options, branch, ctx, url);
  });
  tracer?.end();

  return appendCookies(response, getSetCookieHeaders(ctx));
}

async function renderBranch<C, S, A extends Action>(
  options: RenderPageOptions<C, S, A>,
  branch: MatchedRoute<C, S, A>[],
  ctx: RequestContext,
  url: URL,
): Promise<Response> {
  const { app, adapter, tracer } = options;

  // One store per request: nothing is shared between concurrent renders
  const store = createStore(app.reducer, app.preloadedState);

  const loaderCount = branch.filter((entry) => entry.route.loadData).length;
  tracer?.start("prefetch", `${loaderCount} loader${loaderCount === 1 ? "" : "s"}`);
  let prefetched: PrefetchResult;
  try {
    prefetched = await prefetchData(branch, { store, url, ctx });
  } catch (error) {
    tracer?.endWithError(error instanceof Error ? error.message : String(error));
    throw error;
  }
  tracer?.end();

  if (prefetched.response) {
    return prefetched.response;
  }

  const head = createHeadCollector();
  const staticContext: StaticContext = {};

  tracer?.start("render", adapter.name);
  const body = await adapter.renderToHTML(app, {
    url,
    branch,
    store,
    data: prefetched.data,
    head,
    staticContext,
    mode: options.mode,
  });
  tracer?.end();

  if (staticContext.redirect) {
    return ctx.redirect(staticContext.redirect.url, staticContext.redirect.status);
  }

  tracer?.start("assemble");
  const assets = buildAssetTags(options.manifest ?? null, options.manifest?.base);
  const stateScript = renderStateScript({
    state: store.getState(),
    data: prefetched.data,
    url: url.pathname + url.search,
  });

  const html = assembleDocument({
    shell: app.shell ?? adapter.getDocumentShell?.() ?? DEFAULT_SHELL,
    containerId: options.containerId ?? "root",
    body,
    head: [head.renderHead(), assets.head].filter(Boolean).join("\n  "),
    scripts: [stateScript, assets.body].filter(Boolean).join("\n  "),
    htmlAttributes: head.getHtmlAttributes(),
    bodyAttributes: head.getBodyAttributes(),
  });
  tracer?.end();

  return new Response(html, {
    status: staticContext.status ?? 200,
    headers: HTML_HEADERS,
  });
}

function appendCookies(response: Response, cookies: string[]): Response {
  if (cookies.length === 0) return response;

  const headers = new Headers(response.headers);
  for (const cookie of cookies) {
    headers.append("Set-Cookie", cookie);
  }
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
