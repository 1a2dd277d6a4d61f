import { listVariants } from "../_variants";
import { ensureImageConfig, ensureVisionConfig, errorResponse, ok, type Env } from "../_utils";

export const onRequestGet = async ({ env }: { env: Env }) => {
  try {
    const vision = ensureVisionConfig(env);
    const image = ensureImageConfig(env);
    return ok({
      status: "ok",
      visionModel: vision.model,
      imageModel: image.model,
      imageSize: image.size,
      variant: vision.variant.id,
      variants: listVariants(),
      imageReference: vision.imageReference,
      credentialConfigured: Boolean(env.OPENAI_API_KEY?.trim()),
    });
  } catch (err) {
    console.error("Health check failed", err);
    return errorResponse(err, "Configuration is invalid");
  }
};
