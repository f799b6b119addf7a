import { createContext } from "react";
import type { ComponentType, ReactNode } from "react";
import type {
  Action,
  HeadCollector,
  MatchedRoute,
  PathMatch,
  StaticContext,
} from "hearthjs-shared";

/** Props every route component receives. */
export interface RouteComponentProps {
  match: PathMatch;
  params: Record<string, string>;
  /** What this route's loader resolved to, if anything. */
  data: unknown;
  routeKey: string;
  /** The element of the next route in the branch. */
  children?: ReactNode;
}

export type HearthComponent = ComponentType<RouteComponentProps>;

export interface HearthLocation {
  pathname: string;
  search: string;
  hash: string;
}

export interface NavigateOptions {
  replace?: boolean;
}

export type NavigateFunction = (to: string, options?: NavigateOptions) => Promise<void>;

export type NavigationState = "idle" | "loading";

/** One level of a matched branch, stripped of the route's store typing. */
export interface RenderedRoute {
  key: string;
  /** Position in the branch, 0 being the outermost route. */
  depth: number;
  match: PathMatch;
  component: HearthComponent;
}

export function toRenderedRoutes<S, A extends Action>(
  branch: MatchedRoute<HearthComponent, S, A>[],
): RenderedRoute[] {
  return branch.map((entry, depth) => ({
    key: entry.key,
    depth,
    match: entry.match,
    component: entry.route.component,
  }));
}

export interface RouterContextValue {
  location: HearthLocation;
  navigate: NavigateFunction;
  navigation: NavigationState;
  /** Present during server rendering only. */
  staticContext: StaticContext | null;
}

export const RouterContext = createContext<RouterContextValue | null>(null);

/** Holds a Store<S, A>; useStore restores the app's types. */
export const StoreContext = createContext<unknown>(null);

export const DataContext = createContext<Record<string, unknown>>({});

/** Present during server rendering only. */
export const HeadContext = createContext<HeadCollector | null>(null);

export const RouteContext = createContext<RenderedRoute | null>(null);
