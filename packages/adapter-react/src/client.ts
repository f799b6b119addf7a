import { createElement, useSyncExternalStore } from "react";
import type { ReactElement } from "react";
import { hydrateRoot } from "react-dom/client";
import {
  createStore,
  matchRoutes,
  parseHydrationPayload,
  prefetchData,
  STATE_SCRIPT_ID,
} from "hearthjs-core/runtime";
import type { PrefetchResult } from "hearthjs-core/runtime";
import type { Action, AnyAction, HearthApp, Store, Unsubscribe } from "hearthjs-shared";
import { toRenderedRoutes } from "./context.js";
import type {
  HearthComponent,
  HearthLocation,
  NavigateFunction,
  NavigationState,
  RenderedRoute,
} from "./context.js";
import { HearthRoot } from "./root.js";

/** Redirects followed by one navigation before falling back to a full load. */
const MAX_REDIRECTS = 10;

// ─── History ──────────────────────────────────────────────────────────────────

export interface RouterHistory {
  location(): HearthLocation;
  push(path: string): void;
  replace(path: string): void;
  /** Called on back/forward; returns the unlisten function. */
  listen(listener: () => void): Unsubscribe;
}

export function createBrowserHistory(win: Window = window): RouterHistory {
  return {
    location() {
      const { pathname, search, hash } = win.location;
      return { pathname, search, hash };
    },
    push(path) {
      win.history.pushState(null, "", path);
    },
    replace(path) {
      win.history.replaceState(null, "", path);
    },
    listen(listener) {
      win.addEventListener("popstate", listener);
      return () => win.removeEventListener("popstate", listener);
    },
  };
}

// ─── Router ───────────────────────────────────────────────────────────────────

export interface RouterSnapshot {
  location: HearthLocation;
  routes: RenderedRoute[];
  data: Record<string, unknown>;
  navigation: NavigationState;
}

export interface ClientRouterOptions<S, A extends Action> {
  app: HearthApp<HearthComponent, S, A>;
  store: Store<S, A>;
  history: RouterHistory;
  /** Loader data the server rendered the current page with. */
  data?: Record<string, unknown>;
  /** Origin of the page (default: window.location.origin). */
  origin?: string;
  /** Leave the app for a real page load (default: window.location.assign). */
  onFullLoad?: (url: string) => void;
}

export interface ClientRouter {
  getSnapshot(): RouterSnapshot;
  subscribe(listener: () => void): Unsubscribe;
  navigate: NavigateFunction;
  /** Start following back/forward navigation; returns the stop function. */
  start(): Unsubscribe;
}

/**
 * Client-side router: matches the target branch, runs its loaders against
 * the live store and commits the new location once they have resolved.
 *
 * A navigation started while another is loading supersedes it. Anything the
 * router cannot render itself (another origin, no matching route, a failing
 * loader, a non-redirect Response) falls back to a full page load so the
 * server answers instead.
 */
export function createClientRouter<S, A extends Action = AnyAction>(
  options: ClientRouterOptions<S, A>,
): ClientRouter {
  const { app, store, history } = options;
  const origin = options.origin ?? window.location.origin;
  const fullLoad = options.onFullLoad ?? ((url: string) => window.location.assign(url));

  const location = history.location();
  let snapshot: RouterSnapshot = {
    location,
    routes: toRenderedRoutes(matchRoutes(app.routes, location.pathname)),
    data: options.data ?? {},
    navigation: "idle",
  };
  let listeners: Array<() => void> = [];
  let navigationId = 0;

  function commit(next: RouterSnapshot): void {
    snapshot = next;
    for (const listener of [...listeners]) listener();
  }

  async function go(to: string, replace: boolean, pop: boolean, redirects: number): Promise<void> {
    const current = snapshot.location;
    const url = new URL(to, origin + current.pathname + current.search);
    if (url.origin !== origin) {
      fullLoad(url.href);
      return;
    }

    const branch = matchRoutes(app.routes, url.pathname);
    if (branch.length === 0) {
      fullLoad(url.href);
      return;
    }

    const id = ++navigationId;
    commit({ ...snapshot, navigation: "loading" });

    let result: PrefetchResult;
    try {
      result = await prefetchData(branch, { store, url });
    } catch {
      if (id === navigationId) fullLoad(url.href);
      return;
    }
    if (id !== navigationId) return;

    if (result.response) {
      const target = result.response.headers.get("location");
      if (target && redirects < MAX_REDIRECTS) {
        // A pop already moved history; the redirect target replaces that entry
        return go(target, replace || pop, false, redirects + 1);
      }
      fullLoad(url.href);
      return;
    }

    const path = url.pathname + url.search + url.hash;
    if (!pop) {
      if (replace) history.replace(path);
      else history.push(path);
    }

    commit({
      location: { pathname: url.pathname, search: url.search, hash: url.hash },
      routes: toRenderedRoutes(branch),
      data: result.data,
      navigation: "idle",
    });
  }

  const navigate: NavigateFunction = (to, navigateOptions = {}) =>
    go(to, navigateOptions.replace ?? false, false, 0);

  return {
    getSnapshot: () => snapshot,

    subscribe(listener) {
      listeners.push(listener);
      return () => {
        listeners = listeners.filter((l) => l !== listener);
      };
    },

    navigate,

    start() {
      return history.listen(() => {
        const { pathname, search, hash } = history.location();
        void go(pathname + search + hash, false, true, 0);
      });
    },
  };
}

// ─── Hydration ────────────────────────────────────────────────────────────────

interface ClientRootProps {
  router: ClientRouter;
  store: unknown;
}

function ClientRoot({ router, store }: ClientRootProps): ReactElement {
  const snapshot = useSyncExternalStore(router.subscribe, router.getSnapshot, router.getSnapshot);
  return createElement(HearthRoot, {
    store,
    routes: snapshot.routes,
    data: snapshot.data,
    location: snapshot.location,
    navigate: router.navigate,
    navigation: snapshot.navigation,
  });
}

export interface HydrateOptions {
  /** id of the element the server rendered into (default: 'root'). */
  containerId?: string;
}

/**
 * Hydrate the server-rendered page: restore the store from the transferred
 * state and take over navigation.
 *
 * ```ts
 * import { hydrate } from "hearthjs-adapter-react/client";
 * import app from "./app";
 *
 * hydrate(app);
 * ```
 */
export function hydrate<S, A extends Action = AnyAction>(
  app: HearthApp<HearthComponent, S, A>,
  options: HydrateOptions = {},
): ClientRouter {
  const containerId = options.containerId ?? "root";
  const container = document.getElementById(containerId);
  if (!container) {
    throw new Error(`Cannot hydrate: no element with id "${containerId}".`);
  }

  const payload = parseHydrationPayload(document.getElementById(STATE_SCRIPT_ID)?.textContent);
  // The server serialized this state from a store built with the same reducer
  const state = payload ? (payload.state as S) : app.preloadedState;
  const store = createStore(app.reducer, state);

  const router = createClientRouter({
    app,
    store,
    history: createBrowserHistory(),
    data: payload?.data,
  });

  hydrateRoot(container, createElement(ClientRoot, { router, store }));
  router.start();
  return router;
}
