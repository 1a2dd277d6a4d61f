import type { GeneratedImage } from "../_pipeline";
import { API_KEY_HEADER, type FunctionContext } from "../_middleware";
import { generateForSession } from "../_session";
import {
  encodeImage,
  ensureImageConfig,
  ensureUpstreamConfig,
  errorResponse,
  ok,
  readJsonObject,
  resolveCredential,
  toDataUri,
} from "../_utils";

export const describeImage = (image: GeneratedImage) => ({
  prompt: image.prompt,
  mimeType: image.mimeType,
  source: image.source,
  byteLength: image.bytes.byteLength,
  dataUri: toDataUri(encodeImage(image.bytes), image.mimeType),
});

export const onRequestPost = async ({ request, env, session }: FunctionContext) => {
  try {
    const apiKey = resolveCredential(env, request.headers.get(API_KEY_HEADER));
    const payload = await readJsonObject(request);
    const prompt = typeof payload.prompt === "string" ? payload.prompt : undefined;

    const options = ensureImageConfig(env);
    const image = await generateForSession(ensureUpstreamConfig(env, apiKey), options, session, prompt);

    return ok({
      status: "Thumbnail generated",
      sessionId: session.id,
      size: options.size,
      model: options.model,
      ...describeImage(image),
    });
  } catch (err) {
    console.error("Generation failed", err instanceof Error ? err.message : err);
    return errorResponse(err, "Generation request failed");
  }
};
