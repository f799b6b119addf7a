import type { Middleware, RequestContext } from "hearthjs-shared";

/**
 * Run a middleware chain around a final handler (onion model).
 *
 * Each middleware receives the context and a `next` that runs the rest of
 * the chain. Returning without calling `next()` short-circuits; the handler
 * never runs. Errors thrown anywhere propagate to the caller.
 */
export async function runMiddleware(
  chain: Middleware[],
  ctx: RequestContext,
  final: () => Promise<Response>,
): Promise<Response> {
  let lastIndex = -1;

  async function dispatch(index: number): Promise<Response> {
    if (index <= lastIndex) {
      throw new Error("next() called multiple times in the same middleware");
    }
    lastIndex = index;

    const mw = chain[index];
    if (!mw) return final();

    return mw(ctx, () => dispatch(index + 1));
  }

  return dispatch(0);
}
