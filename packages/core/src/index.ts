export { compilePath, matchPath, matchRoutes, routeKey, createPath } from './route-matcher.js';
export type { CompiledPath, PatternSegment, MatchPathOptions } from './route-matcher.js';
export { createStore, INIT_ACTION } from './store.js';
export { collectLoaders, prefetchData } from './prefetch.js';
export type { PendingLoader, PrefetchOptions, PrefetchResult } from './prefetch.js';
export { createHeadCollector, dedupeKey, renderTag, escapeHtml, renderAttributes, HEAD_ATTRIBUTE } from './head.js';
export type { ServerHeadCollector } from './head.js';
export {
  STATE_SCRIPT_ID,
  escapeJsonForScript,
  serializeHydrationPayload,
  renderStateScript,
  parseHydrationPayload,
} from './state-transfer.js';
export { DEFAULT_SHELL, assembleDocument, buildAssetTags, getErrorHTML, get404HTML } from './document.js';
export type { AssembleDocumentOptions } from './document.js';
export { createRequestContext, getSetCookieHeaders, toWebRequest } from './request-context.js';
export type { CreateRequestContextOptions } from './request-context.js';
export { runMiddleware } from './middleware.js';
export { renderPage } from './render-pipeline.js';
export type { RenderPageOptions } from './render-pipeline.js';
export { getCacheControl, getContentType, resolveStaticFile, serveStatic } from './static.js';
export { createRequestHandler, readClientManifest, HearthServer, sendWebResponse } from './server.js';
export type { RequestHandler, RequestHandlerOptions, HearthServerOptions } from './server.js';
export { RequestTracer, shouldTrace, TRACE_HEADER } from './tracer.js';
export { build, buildClient, buildServer, formatSize } from './bundler.js';
export type { BuildClientOptions, BuildClientResult, BuildServerOptions } from './bundler.js';
