import { API_KEY_HEADER, type FunctionContext } from "../_middleware";
import { generateForSession, synthesizeSession } from "../_session";
import {
  ensureImageConfig,
  ensureSynthesisConfig,
  ensureUpstreamConfig,
  errorResponse,
  ok,
  resolveCredential,
} from "../_utils";
import { describeImage } from "./generate";

export const onRequestPost = async ({ request, env, session }: FunctionContext) => {
  try {
    const apiKey = resolveCredential(env, request.headers.get(API_KEY_HEADER));
    const upstream = ensureUpstreamConfig(env, apiKey);
    const synthesisOptions = ensureSynthesisConfig(env);
    const imageOptions = ensureImageConfig(env);

    const outcome = await synthesizeSession(upstream, synthesisOptions, session);
    const image = await generateForSession(upstream, imageOptions, session);

    return ok({
      status: "Synthesis and generation completed",
      sessionId: session.id,
      summary: outcome.result.summary,
      generationPrompt: outcome.result.generationPrompt,
      warning: outcome.warning,
      image: describeImage(image),
    });
  } catch (err) {
    console.error("Synthesize & generate failed", err instanceof Error ? err.message : err);
    return errorResponse(err, "Unable to synthesize and generate");
  }
};
