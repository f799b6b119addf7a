import { createElement } from "react";
import type { ReactElement, ReactNode } from "react";
import type { HeadCollector, StaticContext } from "hearthjs-shared";
import {
  DataContext,
  HeadContext,
  RouteContext,
  RouterContext,
  StoreContext,
} from "./context.js";
import type {
  HearthLocation,
  NavigateFunction,
  NavigationState,
  RenderedRoute,
} from "./context.js";

export interface HearthRootProps {
  /** A Store<S, A> created from the app's reducer. */
  store: unknown;
  routes: RenderedRoute[];
  data: Record<string, unknown>;
  location: HearthLocation;
  navigate: NavigateFunction;
  navigation?: NavigationState;
  staticContext?: StaticContext | null;
  head?: HeadCollector | null;
}

/**
 * Provide router, store, loader data and head collection to the tree, and
 * render the matched branch. The same element is rendered on the server and
 * hydrated in the browser.
 */
export function HearthRoot(props: HearthRootProps): ReactElement {
  const router = {
    location: props.location,
    navigate: props.navigate,
    navigation: props.navigation ?? "idle",
    staticContext: props.staticContext ?? null,
  };

  return createElement(
    RouterContext.Provider,
    { value: router },
    createElement(
      StoreContext.Provider,
      { value: props.store },
      createElement(
        DataContext.Provider,
        { value: props.data },
        createElement(
          HeadContext.Provider,
          { value: props.head ?? null },
          RouteOutlet({ routes: props.routes, data: props.data }),
        ),
      ),
    ),
  );
}

/**
 * Nest the branch: each route's element is the `children` of the route
 * above it, so outer routes act as layouts.
 */
export function RouteOutlet(props: {
  routes: RenderedRoute[];
  data: Record<string, unknown>;
}): ReactNode {
  let element: ReactNode = null;

  for (let i = props.routes.length - 1; i >= 0; i--) {
    const route = props.routes[i];
    element = createElement(
      RouteContext.Provider,
      { value: route, key: route.key },
      createElement(
        route.component,
        {
          match: route.match,
          params: route.match.params,
          data: props.data[route.key],
          routeKey: route.key,
        },
        element,
      ),
    );
  }

  return element;
}
