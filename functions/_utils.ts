import { getVariant, type AnalysisVariant } from "./_variants";

export const MAX_UPLOAD_SOURCE_BYTES = 20 * 1024 * 1024;

export interface Env {
  OPENAI_API_KEY?: string;
  OPENAI_BASE_URL?: string;
  VISION_MODEL?: string;
  IMAGE_MODEL?: string;
  IMAGE_SIZE?: string;
  IMAGE_RESPONSE_FORMAT?: string;
  ANALYSIS_VARIANT?: string;
  IMAGE_REFERENCE_MODE?: string;
  SYNTHESIS_MAX_ANALYSES?: string;
  SYNTHESIS_ITEM_CHAR_LIMIT?: string;
  SYNTHESIS_TOTAL_CHAR_LIMIT?: string;
  UPSTREAM_TIMEOUT_MS?: string;
  SESSION_TTL_MINUTES?: string;
  PORT?: string;
}

const ENV_KEYS = [
  "OPENAI_API_KEY",
  "OPENAI_BASE_URL",
  "VISION_MODEL",
  "IMAGE_MODEL",
  "IMAGE_SIZE",
  "IMAGE_RESPONSE_FORMAT",
  "ANALYSIS_VARIANT",
  "IMAGE_REFERENCE_MODE",
  "SYNTHESIS_MAX_ANALYSES",
  "SYNTHESIS_ITEM_CHAR_LIMIT",
  "SYNTHESIS_TOTAL_CHAR_LIMIT",
  "UPSTREAM_TIMEOUT_MS",
  "SESSION_TTL_MINUTES",
  "PORT",
] as const satisfies ReadonlyArray<keyof Env>;

export const loadEnv = (source: Record<string, string | undefined>): Env => {
  const env: Env = {};
  for (const key of ENV_KEYS) {
    const value = source[key];
    if (value !== undefined) env[key] = value;
  }
  return env;
};

const DEFAULT_BASE_URL = "https://api.openai.com/v1";
const DEFAULT_VISION_MODEL = "gpt-4o";
const DEFAULT_IMAGE_MODEL = "gpt-image-1";
const DEFAULT_IMAGE_SIZE = "1024x576";
const DEFAULT_TIMEOUT_MS = 60000;
const DEFAULT_MAX_ANALYSES = 5;
const DEFAULT_ITEM_CHAR_LIMIT = 2000;
const DEFAULT_TOTAL_CHAR_LIMIT = 40000;
const DEFAULT_SESSION_TTL_MINUTES = 60;

export type ErrorCode = "MISSING_CREDENTIAL" | "INVALID_INPUT" | "TRANSPORT_ERROR" | "CONFIG_ERROR";

export class ApiError extends Error {
  constructor(
    public status: number,
    message: string,
    public code: ErrorCode,
  ) {
    super(message);
    this.name = "ApiError";
  }
}

export const invalidInput = (message: string) => new ApiError(400, message, "INVALID_INPUT");

export const transportError = (message: string) => new ApiError(502, message, "TRANSPORT_ERROR");

export const ok = (data: unknown, init: ResponseInit = {}) =>
  Response.json(data, {
    ...init,
    headers: {
      "Content-Type": "application/json",
      "Cache-Control": "no-store",
      ...(init.headers || {}),
    },
  });

export const error = (message: string, status = 400, code?: ErrorCode) =>
  ok(code ? { error: message, code } : { error: message }, { status });

export const errorResponse = (err: unknown, fallbackMessage: string) => {
  if (err instanceof ApiError) {
    return error(err.message, err.status, err.code);
  }
  const message = err instanceof Error ? err.message : fallbackMessage;
  return error(message, 500);
};

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const readJsonObject = async (request: Request): Promise<Record<string, unknown>> => {
  const payload: unknown = await request.json().catch(() => null);
  return isRecord(payload) ? payload : {};
};

const arrayBufferToBase64 = (buffer: ArrayBuffer | Uint8Array): string => {
  const bytes = buffer instanceof Uint8Array ? buffer : new Uint8Array(buffer);
  const chunkSize = 0x8000;
  let binary = "";
  for (let i = 0; i < bytes.length; i += chunkSize) {
    const chunk = bytes.subarray(i, i + chunkSize);
    binary += String.fromCharCode(...chunk);
  }
  return btoa(binary);
};

export const encodeImage = (bytes: ArrayBuffer | Uint8Array): string => arrayBufferToBase64(bytes);

export const toDataUri = (base64: string, mimeType: string) => `data:${mimeType};base64,${base64}`;

/** Accepts a bare base64 payload or a full data URI. */
export const decodeBase64 = (text: string): Uint8Array => {
  const match = text.match(/^data:[^;,]*;base64,(.*)$/s);
  const payload = (match ? match[1] : text).replace(/\s+/g, "");
  const binary = atob(payload);
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i);
  }
  return bytes;
};

const IMAGE_SIGNATURES: Array<{ mimeType: string; offset: number; bytes: number[] }> = [
  { mimeType: "image/png", offset: 0, bytes: [0x89, 0x50, 0x4e, 0x47] },
  { mimeType: "image/jpeg", offset: 0, bytes: [0xff, 0xd8, 0xff] },
  { mimeType: "image/gif", offset: 0, bytes: [0x47, 0x49, 0x46, 0x38] },
  { mimeType: "image/webp", offset: 8, bytes: [0x57, 0x45, 0x42, 0x50] },
];

export const sniffImageMimeType = (bytes: Uint8Array): string | null => {
  const found = IMAGE_SIGNATURES.find(({ offset, bytes: signature }) =>
    signature.every((value, index) => bytes[offset + index] === value),
  );
  return found ? found.mimeType : null;
};

export const resolveImageMimeType = (declared: string, bytes: Uint8Array) => {
  if (declared.startsWith("image/")) return declared;
  return sniffImageMimeType(bytes) || "image/jpeg";
};

const parsePositiveInt = (env: Env, key: keyof Env, fallback: number): number => {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    throw new ApiError(500, `${key} must be a positive integer.`, "CONFIG_ERROR");
  }
  return parsed;
};

/**
 * The header credential wins over the configured one so a caller can bring
 * their own key.
 */
export const resolveCredential = (env: Env, headerValue?: string | null): string => {
  const credential = headerValue?.trim() || env.OPENAI_API_KEY?.trim();
  if (!credential) {
    throw new ApiError(401, "OPENAI_API_KEY is not configured and no X-Api-Key header was sent.", "MISSING_CREDENTIAL");
  }
  return credential;
};

export interface UpstreamConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

export const ensureUpstreamConfig = (env: Env, apiKey: string): UpstreamConfig => ({
  apiKey,
  baseUrl: (env.OPENAI_BASE_URL?.trim() || DEFAULT_BASE_URL).replace(/\/$/, ""),
  timeoutMs: parsePositiveInt(env, "UPSTREAM_TIMEOUT_MS", DEFAULT_TIMEOUT_MS),
});

export type ImageReferenceMode = "inline" | "structured";

export interface VisionOptions {
  model: string;
  variant: AnalysisVariant;
  imageReference: ImageReferenceMode;
}

const IMAGE_REFERENCE_MODES: ImageReferenceMode[] = ["inline", "structured"];

export const ensureVisionConfig = (env: Env): VisionOptions => {
  const mode = env.IMAGE_REFERENCE_MODE?.trim().toLowerCase() || "inline";
  const imageReference = IMAGE_REFERENCE_MODES.find((candidate) => candidate === mode);
  if (!imageReference) {
    throw new ApiError(500, `Unsupported IMAGE_REFERENCE_MODE: ${mode}`, "CONFIG_ERROR");
  }
  const variantId = env.ANALYSIS_VARIANT?.trim() || "thumbnail";
  const variant = getVariant(variantId);
  if (!variant) {
    throw new ApiError(500, `Unknown ANALYSIS_VARIANT: ${variantId}`, "CONFIG_ERROR");
  }
  return {
    model: env.VISION_MODEL?.trim() || DEFAULT_VISION_MODEL,
    variant,
    imageReference,
  };
};

export interface SynthesisOptions {
  model: string;
  maxAnalyses: number;
  itemCharLimit: number;
  totalCharLimit: number;
}

export const ensureSynthesisConfig = (env: Env): SynthesisOptions => ({
  model: env.VISION_MODEL?.trim() || DEFAULT_VISION_MODEL,
  maxAnalyses: parsePositiveInt(env, "SYNTHESIS_MAX_ANALYSES", DEFAULT_MAX_ANALYSES),
  itemCharLimit: parsePositiveInt(env, "SYNTHESIS_ITEM_CHAR_LIMIT", DEFAULT_ITEM_CHAR_LIMIT),
  totalCharLimit: parsePositiveInt(env, "SYNTHESIS_TOTAL_CHAR_LIMIT", DEFAULT_TOTAL_CHAR_LIMIT),
});

export type ImageResponseFormat = "b64_json" | "url";

const IMAGE_RESPONSE_FORMATS: ImageResponseFormat[] = ["b64_json", "url"];

export interface ImageOptions {
  model: string;
  size: string;
  responseFormat: ImageResponseFormat | null;
}

export const ensureImageConfig = (env: Env): ImageOptions => {
  const size = env.IMAGE_SIZE?.trim() || DEFAULT_IMAGE_SIZE;
  if (!/^\d+x\d+$/.test(size)) {
    throw new ApiError(500, `IMAGE_SIZE must look like 1024x576, got ${size}`, "CONFIG_ERROR");
  }
  const format = env.IMAGE_RESPONSE_FORMAT?.trim() || "";
  const responseFormat = IMAGE_RESPONSE_FORMATS.find((candidate) => candidate === format) ?? null;
  if (format && !responseFormat) {
    throw new ApiError(500, `Unsupported IMAGE_RESPONSE_FORMAT: ${format}`, "CONFIG_ERROR");
  }
  return {
    model: env.IMAGE_MODEL?.trim() || DEFAULT_IMAGE_MODEL,
    size,
    responseFormat,
  };
};

export const sessionTtlMs = (env: Env) =>
  parsePositiveInt(env, "SESSION_TTL_MINUTES", DEFAULT_SESSION_TTL_MINUTES) * 60 * 1000;

