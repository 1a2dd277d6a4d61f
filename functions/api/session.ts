import type { FunctionContext } from "../_middleware";
import { ok } from "../_utils";

export const onRequestGet = async ({ session }: FunctionContext) =>
  ok({
    sessionId: session.id,
    records: session.records.map(({ name, byteLength, mimeType, analysis, analyzedAt }) => ({
      name,
      byteLength,
      mimeType,
      analysis,
      analyzedAt,
    })),
    synthesis: session.synthesis,
    hasGeneratedImage: session.generated !== null,
  });

export const onRequestDelete = async ({ session, store }: FunctionContext) => {
  const fresh = store.reset(session.id);
  return ok({ status: "Session cleared", sessionId: fresh.id, records: [] });
};
