// functions/api/index.ts
import { Hono, type Context } from "hono";
import { cors, withSession, type AppEnv, type FunctionContext } from "../_middleware";
import { SessionStore } from "../_session";
import { sessionTtlMs, type Env } from "../_utils";
import * as analyze from "./analyze";
import * as generate from "./generate";
import * as health from "./health";
import * as sessionRoutes from "./session";
import * as synthesize from "./synthesize";
import * as synthesizeAndGenerate from "./synthesize-and-generate";

export const createApp = (env: Env, store: SessionStore = new SessionStore(sessionTtlMs(env))) => {
  const app = new Hono<AppEnv>();

  const context = (c: Context<AppEnv>): FunctionContext => ({
    request: c.req.raw,
    env,
    session: c.get("session"),
    store,
  });

  app.use("*", cors);

  app.get("/api/health", () => health.onRequestGet({ env }));

  app.use("/api/*", withSession(store));

  app.get("/api/session", (c) => sessionRoutes.onRequestGet(context(c)));
  app.delete("/api/session", (c) => sessionRoutes.onRequestDelete(context(c)));

  // Multipart: one or more files under the "images" field.
  app.post("/api/analyze", (c) => analyze.onRequestPost(context(c)));
  app.post("/api/synthesize", (c) => synthesize.onRequestPost(context(c)));
  app.post("/api/generate", (c) => generate.onRequestPost(context(c)));
  app.post("/api/synthesize-and-generate", (c) => synthesizeAndGenerate.onRequestPost(context(c)));

  app.notFound((c) => c.json({ error: "Not found" }, 404));

  return app;
};
