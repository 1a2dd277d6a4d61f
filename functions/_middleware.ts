import type { MiddlewareHandler } from "hono";
import type { SessionContext, SessionStore } from "./_session";
import type { Env } from "./_utils";

export const SESSION_HEADER = "X-Session-Id";
export const API_KEY_HEADER = "X-Api-Key";

export type AppEnv = { Variables: { session: SessionContext } };

export interface FunctionContext {
  request: Request;
  env: Env;
  session: SessionContext;
  store: SessionStore;
}

export const cors: MiddlewareHandler<AppEnv> = async (c, next) => {
  const origin = c.req.header("Origin") || "*";
  if (c.req.method === "OPTIONS") {
    const h = new Headers();
    h.set("Access-Control-Allow-Origin", origin);
    h.set("Access-Control-Allow-Methods", "GET,POST,DELETE,OPTIONS");
    h.set("Access-Control-Allow-Headers", `Content-Type,${API_KEY_HEADER},${SESSION_HEADER}`);
    h.set("Access-Control-Expose-Headers", SESSION_HEADER);
    return new Response(null, { status: 204, headers: h });
  }
  await next();
  c.res.headers.set("Access-Control-Allow-Origin", origin);
  c.res.headers.set("Access-Control-Expose-Headers", SESSION_HEADER);
  c.res.headers.set("Vary", "Origin");
};

export const withSession =
  (store: SessionStore): MiddlewareHandler<AppEnv> =>
  async (c, next) => {
    const session = store.resolve(c.req.header(SESSION_HEADER));
    c.set("session", session);
    await next();
    c.res.headers.set(SESSION_HEADER, session.id);
  };
