import { parseJsonObject } from "./_json";
import { buildImageMessage, createChatCompletion, createImage, fetchImageBytes } from "./_upstream";
import {
  decodeBase64,
  invalidInput,
  sniffImageMimeType,
  toDataUri,
  transportError,
  type ImageOptions,
  type SynthesisOptions,
  type UpstreamConfig,
  type VisionOptions,
} from "./_utils";
import { defaultAnalysis, normalizeAnalysis, type AnalysisResult } from "./_variants";

export interface EncodedImage {
  base64: string;
  mimeType: string;
}

export interface AnalysisOutcome {
  analysis: AnalysisResult;
  warning: string | null;
}

export const analyzeImage = async (
  upstream: UpstreamConfig,
  options: VisionOptions,
  image: EncodedImage,
  displayName: string,
): Promise<AnalysisOutcome> => {
  const { variant } = options;
  const dataUri = toDataUri(image.base64, image.mimeType);
  const content = await createChatCompletion(upstream, {
    model: options.model,
    maxTokens: variant.maxTokens,
    temperature: 0.2,
    messages: [
      { role: "system", content: variant.system },
      buildImageMessage(`Analyze '${displayName}'. ${variant.instruction}`, dataUri, options.imageReference),
    ],
  });

  const parsed = parseJsonObject(content);
  if (!parsed.ok) {
    const warning = `Analysis of ${displayName} was not valid JSON; using empty defaults.`;
    console.warn(warning, { attempted: parsed.attempted, length: content.length });
    return { analysis: defaultAnalysis(variant), warning };
  }
  return { analysis: normalizeAnalysis(variant, parsed.value), warning: null };
};

export interface SynthesisResult {
  summary: string[];
  generationPrompt: string;
}

export interface SynthesisOutcome {
  result: SynthesisResult;
  /** The user message actually sent upstream. */
  payload: string;
  warning: string | null;
}

export const ITEM_TRUNCATION_MARKER = "…";
export const PAYLOAD_TRUNCATION_MARKER = "\n[truncated]";

const SYNTHESIS_SYSTEM =
  "You are an expert in design & marketing psychology. " +
  "Input is a JSON array of thumbnail analyses (objects or free-text notes). " +
  "1) Summarize common visual patterns & psychological strategies across all of them in 3-5 bullets. " +
  "2) Write exactly one concise image-generation prompt to recreate that style as a 16:9 thumbnail. " +
  "Output ONLY valid JSON with keys analysis_summary (array of strings) and generation_prompt (string).";

const isHighSurrogate = (code: number) => code >= 0xd800 && code <= 0xdbff;

/** Cuts at `limit` UTF-16 units, stepping back so a surrogate pair is never split. */
const truncate = (text: string, limit: number, marker: string) => {
  if (text.length <= limit) return text;
  const end = limit > 0 && isHighSurrogate(text.charCodeAt(limit - 1)) ? limit - 1 : limit;
  return `${text.slice(0, end)}${marker}`;
};

export const serializeAnalyses = (
  analyses: Array<AnalysisResult | string>,
  options: Pick<SynthesisOptions, "maxAnalyses" | "itemCharLimit" | "totalCharLimit">,
): string => {
  const recent = analyses.slice(-options.maxAnalyses);
  const items = recent.map((analysis) =>
    truncate(typeof analysis === "string" ? analysis : JSON.stringify(analysis), options.itemCharLimit, ITEM_TRUNCATION_MARKER),
  );
  return truncate(`[\n${items.join(",\n")}\n]`, options.totalCharLimit, PAYLOAD_TRUNCATION_MARKER);
};

const toSummary = (value: unknown): string[] => {
  if (typeof value === "string") return value.trim() ? [value.trim()] : [];
  if (!Array.isArray(value)) return [];
  return value.flatMap((entry) => (typeof entry === "string" && entry.trim() ? [entry.trim()] : []));
};

export const synthesizeAnalyses = async (
  upstream: UpstreamConfig,
  options: SynthesisOptions,
  analyses: Array<AnalysisResult | string>,
): Promise<SynthesisOutcome> => {
  if (analyses.length === 0) {
    throw invalidInput("At least one analysis is required to synthesize");
  }

  const payload = serializeAnalyses(analyses, options);
  const content = await createChatCompletion(upstream, {
    model: options.model,
    maxTokens: 400,
    temperature: 0.4,
    messages: [
      { role: "system", content: SYNTHESIS_SYSTEM },
      { role: "user", content: payload },
    ],
  });

  const parsed = parseJsonObject(content);
  const generationPrompt =
    parsed.ok && typeof parsed.value.generation_prompt === "string" ? parsed.value.generation_prompt.trim() : "";

  if (!parsed.ok || !generationPrompt) {
    const warning = "Synthesis response was not the expected JSON; using the raw text.";
    console.warn(warning, { length: content.length });
    return {
      result: { summary: content ? [content] : [], generationPrompt: content },
      payload,
      warning,
    };
  }

  return {
    result: { summary: toSummary(parsed.value.analysis_summary), generationPrompt },
    payload,
    warning: null,
  };
};

export interface GeneratedImage {
  bytes: Uint8Array;
  mimeType: string;
  prompt: string;
  source: "inline" | "url";
}

export const generateThumbnail = async (
  upstream: UpstreamConfig,
  options: ImageOptions,
  prompt: string,
): Promise<GeneratedImage> => {
  const trimmed = prompt.trim();
  if (!trimmed) {
    throw invalidInput("Prompt is required");
  }

  const output = await createImage(upstream, {
    model: options.model,
    prompt: trimmed,
    size: options.size,
    responseFormat: options.responseFormat,
  });

  if (output.kind === "url") {
    const { bytes, contentType } = await fetchImageBytes(upstream, output.url);
    if (!bytes.length) {
      throw transportError("Generated image download was empty");
    }
    const mimeType = contentType.startsWith("image/") ? contentType : sniffImageMimeType(bytes) || "image/png";
    return { bytes, mimeType, prompt: trimmed, source: "url" };
  }

  let bytes: Uint8Array;
  try {
    bytes = decodeBase64(output.base64);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw transportError(`Unable to decode generated image: ${message}`);
  }
  if (!bytes.length) {
    throw transportError("Image API returned an empty image");
  }
  return { bytes, mimeType: output.mimeType || sniffImageMimeType(bytes) || "image/png", prompt: trimmed, source: "inline" };
};
