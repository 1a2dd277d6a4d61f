import { API_KEY_HEADER, type FunctionContext } from "../_middleware";
import { analyzeUploads, type PendingUpload } from "../_session";
import {
  MAX_UPLOAD_SOURCE_BYTES,
  ensureUpstreamConfig,
  ensureVisionConfig,
  error,
  errorResponse,
  ok,
  resolveCredential,
  resolveImageMimeType,
} from "../_utils";

export const onRequestPost = async ({ request, env, session }: FunctionContext) => {
  try {
    const apiKey = resolveCredential(env, request.headers.get(API_KEY_HEADER));
    const formData = await request.formData().catch(() => null);
    if (!formData) {
      return error("Expected multipart/form-data with one or more images", 400, "INVALID_INPUT");
    }

    const files = formData.getAll("images").filter((entry): entry is File => typeof entry !== "string");
    if (!files.length) {
      return error("At least one image is required", 400, "INVALID_INPUT");
    }

    const uploads: PendingUpload[] = [];
    for (const [index, file] of files.entries()) {
      if (file.size > MAX_UPLOAD_SOURCE_BYTES) {
        return error(`${file.name || "Image"} exceeds the 20MB upload limit`, 413, "INVALID_INPUT");
      }
      const bytes = new Uint8Array(await file.arrayBuffer());
      uploads.push({
        name: file.name || `upload-${index + 1}`,
        mimeType: resolveImageMimeType(file.type, bytes),
        bytes,
      });
    }

    const upstream = ensureUpstreamConfig(env, apiKey);
    const vision = ensureVisionConfig(env);
    const batch = await analyzeUploads(upstream, vision, session, uploads);

    return ok({
      status: batch.failures.length ? "Analysis finished with failures" : "Analysis completed",
      sessionId: session.id,
      variant: vision.variant.id,
      added: batch.added,
      skipped: batch.skipped,
      warnings: batch.warnings,
      failures: batch.failures,
      total: session.records.length,
    });
  } catch (err) {
    console.error("Analyze request failed", err instanceof Error ? err.message : err);
    return errorResponse(err, "Unable to analyze images");
  }
};
