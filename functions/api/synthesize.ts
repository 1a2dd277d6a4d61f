import { API_KEY_HEADER, type FunctionContext } from "../_middleware";
import { synthesizeSession } from "../_session";
import {
  ensureSynthesisConfig,
  ensureUpstreamConfig,
  errorResponse,
  invalidInput,
  ok,
  readJsonObject,
  resolveCredential,
} from "../_utils";

export const onRequestPost = async ({ request, env, session }: FunctionContext) => {
  try {
    const apiKey = resolveCredential(env, request.headers.get(API_KEY_HEADER));
    const payload = await readJsonObject(request);

    const options = ensureSynthesisConfig(env);
    if (payload.maxAnalyses !== undefined) {
      const { maxAnalyses } = payload;
      if (typeof maxAnalyses !== "number" || !Number.isInteger(maxAnalyses) || maxAnalyses <= 0) {
        throw invalidInput("maxAnalyses must be a positive integer");
      }
      options.maxAnalyses = maxAnalyses;
    }

    const outcome = await synthesizeSession(ensureUpstreamConfig(env, apiKey), options, session);

    return ok({
      status: "Synthesis completed",
      sessionId: session.id,
      analysesUsed: Math.min(options.maxAnalyses, session.records.length),
      summary: outcome.result.summary,
      generationPrompt: outcome.result.generationPrompt,
      warning: outcome.warning,
    });
  } catch (err) {
    console.error("Synthesis failed", err instanceof Error ? err.message : err);
    return errorResponse(err, "Unable to synthesize analyses");
  }
};
