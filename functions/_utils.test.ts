import { describe, expect, it } from "vitest";
import {
  ApiError,
  decodeBase64,
  encodeImage,
  ensureImageConfig,
  ensureSynthesisConfig,
  ensureUpstreamConfig,
  ensureVisionConfig,
  loadEnv,
  resolveCredential,
  resolveImageMimeType,
  sniffImageMimeType,
  toDataUri,
} from "./_utils";

describe("image encoding", () => {
  it("encodes bytes as standard base64", () => {
    expect(encodeImage(Uint8Array.from([104, 105]))).toBe("aGk=");
    expect(encodeImage(new Uint8Array(0))).toBe("");
  });

  it("round-trips buffers larger than one chunk", () => {
    const bytes = new Uint8Array(0x8000 * 2 + 5).map((_, i) => (i * 31) % 256);
    expect(decodeBase64(encodeImage(bytes))).toEqual(bytes);
  });

  it("accepts ArrayBuffer input", () => {
    expect(encodeImage(Uint8Array.from([0, 255, 128]).buffer)).toBe("AP+A");
  });

  it("wraps and unwraps data URIs", () => {
    const uri = toDataUri("aGk=", "image/png");
    expect(uri).toBe("data:image/png;base64,aGk=");
    expect(Array.from(decodeBase64(uri))).toEqual([104, 105]);
  });
});

describe("mime detection", () => {
  it("recognizes png and webp signatures", () => {
    expect(sniffImageMimeType(Uint8Array.from([0x89, 0x50, 0x4e, 0x47, 0x0d]))).toBe("image/png");
    const webp = Uint8Array.from([0x52, 0x49, 0x46, 0x46, 0, 0, 0, 0, 0x57, 0x45, 0x42, 0x50]);
    expect(sniffImageMimeType(webp)).toBe("image/webp");
    expect(sniffImageMimeType(Uint8Array.from([1, 2, 3]))).toBeNull();
  });

  it("prefers the declared image type and defaults to jpeg", () => {
    expect(resolveImageMimeType("image/gif", Uint8Array.from([1]))).toBe("image/gif");
    expect(resolveImageMimeType("", Uint8Array.from([0xff, 0xd8, 0xff, 0xe0]))).toBe("image/jpeg");
    expect(resolveImageMimeType("application/octet-stream", Uint8Array.from([1, 2]))).toBe("image/jpeg");
  });
});

describe("configuration", () => {
  it("lets the header credential win over the environment", () => {
    expect(resolveCredential({ OPENAI_API_KEY: "env-key" }, "header-key")).toBe("header-key");
    expect(resolveCredential({ OPENAI_API_KEY: " env-key " }, "  ")).toBe("env-key");
  });

  it("reports a missing credential", () => {
    expect(() => resolveCredential({}, null)).toThrow(ApiError);
    let caught: unknown;
    try {
      resolveCredential({ OPENAI_API_KEY: "  " });
    } catch (err) {
      caught = err;
    }
    expect(caught).toMatchObject({ status: 401, code: "MISSING_CREDENTIAL" });
  });

  it("applies synthesis defaults and overrides", () => {
    expect(ensureSynthesisConfig({})).toEqual({
      model: "gpt-4o",
      maxAnalyses: 5,
      itemCharLimit: 2000,
      totalCharLimit: 40000,
    });
    expect(ensureSynthesisConfig({ SYNTHESIS_MAX_ANALYSES: "10", SYNTHESIS_ITEM_CHAR_LIMIT: "700" })).toMatchObject({
      maxAnalyses: 10,
      itemCharLimit: 700,
    });
    expect(() => ensureSynthesisConfig({ SYNTHESIS_MAX_ANALYSES: "0" })).toThrow(
      "SYNTHESIS_MAX_ANALYSES must be a positive integer.",
    );
  });

  it("validates the image size and response format", () => {
    expect(ensureImageConfig({})).toEqual({ model: "gpt-image-1", size: "1024x576", responseFormat: null });
    expect(ensureImageConfig({ IMAGE_SIZE: "512x512", IMAGE_RESPONSE_FORMAT: "url" })).toMatchObject({
      size: "512x512",
      responseFormat: "url",
    });
    expect(() => ensureImageConfig({ IMAGE_SIZE: "huge" })).toThrow("IMAGE_SIZE must look like 1024x576, got huge");
    expect(() => ensureImageConfig({ IMAGE_RESPONSE_FORMAT: "png" })).toThrow("Unsupported IMAGE_RESPONSE_FORMAT: png");
  });

  it("resolves the analysis variant and image reference mode", () => {
    const vision = ensureVisionConfig({ ANALYSIS_VARIANT: "hooks", IMAGE_REFERENCE_MODE: "Structured" });
    expect(vision.variant.id).toBe("hooks");
    expect(vision.imageReference).toBe("structured");
    expect(() => ensureVisionConfig({ ANALYSIS_VARIANT: "nope" })).toThrow("Unknown ANALYSIS_VARIANT: nope");
    expect(() => ensureVisionConfig({ IMAGE_REFERENCE_MODE: "multipart" })).toThrow(
      "Unsupported IMAGE_REFERENCE_MODE: multipart",
    );
  });

  it("strips the trailing slash from the base url", () => {
    expect(ensureUpstreamConfig({ OPENAI_BASE_URL: "https://api.test/v1/" }, "test-key")).toEqual({
      apiKey: "test-key",
      baseUrl: "https://api.test/v1",
      timeoutMs: 60000,
    });
  });

  it("copies only known keys from the process environment", () => {
    expect(loadEnv({ OPENAI_API_KEY: "test-key", PATH: "/usr/bin", PORT: "8080" })).toEqual({
      OPENAI_API_KEY: "test-key",
      PORT: "8080",
    });
  });
});
