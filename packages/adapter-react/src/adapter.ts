import { renderToString } from "react-dom/server";
import { createElement } from "react";
import type { HearthAdapter } from "hearthjs-shared";
import { toRenderedRoutes } from "./context.js";
import type { HearthComponent, NavigateFunction } from "./context.js";
import { HearthRoot } from "./root.js";

const DEFAULT_SHELL = `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <!--hearth-head-->
</head>
<body>
  <div id="__CONTAINER_ID__"><!--hearth-outlet--></div>
  <!--hearth-scripts-->
</body>
</html>`;

/**
 * Create the React adapter for Hearth.
 *
 * This adapter:
 * - Renders the matched branch inside HearthRoot via renderToString()
 * - Lets Link, Redirect, Status and Head reach the request's static
 *   context and head collector through React context
 * - Returns a document shell with placeholder markers
 *
 * Core never sees React; it calls these methods through the HearthAdapter
 * interface with route components as opaque values.
 */
export function createReactAdapter(): HearthAdapter<HearthComponent> {
  return {
    name: "react",

    renderToHTML(_app, context) {
      const { url, staticContext } = context;

      // Navigation during a server render can only end in a redirect
      const navigate: NavigateFunction = async (to) => {
        staticContext.redirect ??= { url: to, status: 302 };
      };

      return renderToString(
        createElement(HearthRoot, {
          store: context.store,
          routes: toRenderedRoutes(context.branch),
          data: context.data,
          location: { pathname: url.pathname, search: url.search, hash: "" },
          navigate,
          staticContext,
          head: context.head,
        }),
      );
    },

    getDocumentShell(): string {
      return DEFAULT_SHELL;
    },
  };
}
