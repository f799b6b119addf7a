import { useContext, useSyncExternalStore } from "react";
import type { Action, AnyAction, Dispatch, Store } from "hearthjs-shared";
import {
  DataContext,
  RouteContext,
  RouterContext,
  StoreContext,
} from "./context.js";
import type {
  HearthLocation,
  NavigateFunction,
  NavigationState,
  RouterContextValue,
} from "./context.js";

function useRouter(hook: string): RouterContextValue {
  const router = useContext(RouterContext);
  if (!router) {
    throw new Error(`${hook}() must be used inside <HearthRoot>.`);
  }
  return router;
}

/**
 * The app's store. The type parameters are the caller's claim about the
 * store HearthRoot was given; they are not checked.
 */
export function useStore<S, A extends Action = AnyAction>(): Store<S, A> {
  const store = useContext(StoreContext);
  if (!isStore<S, A>(store)) {
    throw new Error("useStore() must be used inside <HearthRoot>.");
  }
  return store;
}

/**
 * Read a slice of state and re-render when it changes.
 * The selector should return a stable value for unchanged state.
 */
export function useSelector<S, T>(selector: (state: S) => T): T {
  const store = useStore<S>();
  const read = () => selector(store.getState());
  return useSyncExternalStore(store.subscribe, read, read);
}

export function useDispatch<S, A extends Action = AnyAction>(): Dispatch<S, A> {
  return useStore<S, A>().dispatch;
}

export function useLocation(): HearthLocation {
  return useRouter("useLocation").location;
}

export function useNavigate(): NavigateFunction {
  return useRouter("useNavigate").navigate;
}

export function useNavigationState(): NavigationState {
  return useRouter("useNavigationState").navigation;
}

/** Params of the nearest enclosing route. */
export function useParams(): Record<string, string> {
  const route = useContext(RouteContext);
  return route ? route.match.params : {};
}

/** Loader data of the nearest enclosing route, or of the route with the given key. */
export function useRouteData(key?: string): unknown {
  const data = useContext(DataContext);
  const route = useContext(RouteContext);
  const target = key ?? route?.key;
  return target === undefined ? undefined : data[target];
}

function isStore<S, A extends Action>(value: unknown): value is Store<S, A> {
  return (
    typeof value === "object" &&
    value !== null &&
    "getState" in value &&
    "subscribe" in value &&
    "dispatch" in value
  );
}
