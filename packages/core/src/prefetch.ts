import type {
  Action,
  AnyAction,
  LoadData,
  MatchedRoute,
  RequestContext,
  Store,
} from 'hearthjs-shared';

export interface PrefetchOptions<S, A extends Action> {
  store: Store<S, A>;
  url: URL;
  /** Server only; loaders running in the browser get no request context. */
  ctx?: RequestContext;
}

export interface PrefetchResult {
  /** Loader results keyed by route key. `undefined` and Response values are left out. */
  data: Record<string, unknown>;
  /** The first Response returned by a loader, in branch order. */
  response: Response | null;
}

export interface PendingLoader<C, S, A extends Action> {
  entry: MatchedRoute<C, S, A>;
  loadData: LoadData<S, A>;
}

/**
 * Keep the branch entries whose route declares a loader.
 */
export function collectLoaders<C, S, A extends Action = AnyAction>(
  branch: MatchedRoute<C, S, A>[],
): PendingLoader<C, S, A>[] {
  const loaders: PendingLoader<C, S, A>[] = [];
  for (const entry of branch) {
    if (typeof entry.route.loadData === 'function') {
      loaders.push({ entry, loadData: entry.route.loadData });
    }
  }
  return loaders;
}

/**
 * Run every loader of a matched branch and wait for all of them.
 *
 * Loaders start together and are awaited as one: the render never sees
 * partial results, and the first rejection rejects the whole prefetch.
 * There is no timeout and no cancellation.
 */
export async function prefetchData<C, S, A extends Action = AnyAction>(
  branch: MatchedRoute<C, S, A>[],
  options: PrefetchOptions<S, A>,
): Promise<PrefetchResult> {
  const loaders = collectLoaders(branch);
  if (loaders.length === 0) {
    return { data: {}, response: null };
  }

  const results = await Promise.all(
    loaders.map(async ({ entry, loadData }) =>
      loadData({
        store: options.store,
        match: entry.match,
        params: entry.match.params,
        url: options.url,
        ctx: options.ctx,
      }),
    ),
  );

  const data: Record<string, unknown> = {};
  let response: Response | null = null;

  for (let i = 0; i < results.length; i++) {
    const value = results[i];
    if (value instanceof Response) {
      response ??= value;
    } else if (value !== undefined) {
      data[loaders[i].entry.key] = value;
    }
  }

  return { data, response };
}
