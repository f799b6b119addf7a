// Browser-safe subset of hearthjs-core: no node: modules, no esbuild.
export { compilePath, matchPath, matchRoutes, routeKey, createPath } from './route-matcher.js';
export { createStore, INIT_ACTION } from './store.js';
export { collectLoaders, prefetchData } from './prefetch.js';
export type { PrefetchOptions, PrefetchResult } from './prefetch.js';
export { createHeadCollector, dedupeKey, renderTag, escapeHtml, renderAttributes, HEAD_ATTRIBUTE } from './head.js';
export type { ServerHeadCollector } from './head.js';
export { STATE_SCRIPT_ID, parseHydrationPayload } from './state-transfer.js';
