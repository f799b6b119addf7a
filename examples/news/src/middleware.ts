import type { Middleware } from "hearthjs-shared";

export const responseTime: Middleware = async (ctx, next) => {
  const start = Date.now();
  const response = await next();
  response.headers.set("X-Response-Time", `${Date.now() - start}ms`);
  return response;
};

/** Remember the first visit so returning readers can be told apart. */
export const firstVisit: Middleware = async (ctx, next) => {
  if (!ctx.cookies.get("news_seen")) {
    ctx.cookies.set("news_seen", "1", { path: "/", maxAge: 60 * 60 * 24 * 365, sameSite: "lax" });
  }
  return next();
};
