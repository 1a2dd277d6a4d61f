import { serve } from "@hono/node-server";
import { createApp } from "./api/index";
import { loadEnv } from "./_utils";

const env = loadEnv(process.env);
const port = Number.parseInt(env.PORT || "5000", 10);

if (!env.OPENAI_API_KEY) {
  console.warn("OPENAI_API_KEY is not set; callers must send an X-Api-Key header.");
}

const app = createApp(env);

serve({ fetch: app.fetch, port }, (info) => {
  console.log(`Thumbnail lab API listening on http://localhost:${info.port}`);
});
