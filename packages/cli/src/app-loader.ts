import fs from 'node:fs';
import { pathToFileURL } from 'node:url';
import type { HearthApp, RouteConfig } from 'hearthjs-shared';
import type { HearthComponent } from 'hearthjs-adapter-react';

/**
 * Import the server bundle written by `hearth build` and return its default
 * export, the app definition.
 */
export async function loadServerApp(file: string): Promise<HearthApp<HearthComponent>> {
  if (!fs.existsSync(file)) {
    throw new Error(`No server build at ${file}. Run 'hearth build' first.`);
  }

  const mod: unknown = await import(pathToFileURL(file).href);
  const app = typeof mod === 'object' && mod !== null && 'default' in mod ? mod.default : undefined;

  if (!isHearthApp(app)) {
    throw new Error(`${file} must default-export an app with "routes" and "reducer".`);
  }
  return app;
}

/** Route components are taken on trust; the build bundled them with React. */
function isHearthApp(value: unknown): value is HearthApp<HearthComponent> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'routes' in value &&
    Array.isArray(value.routes) &&
    'reducer' in value &&
    typeof value.reducer === 'function'
  );
}

/** Number of routes in the tree, nested ones included. */
export function countRoutes(routes: RouteConfig<HearthComponent>[]): number {
  let count = 0;
  for (const route of routes) {
    count += 1 + countRoutes(route.routes ?? []);
  }
  return count;
}
