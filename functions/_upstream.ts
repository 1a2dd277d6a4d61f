import { isRecord, transportError, type ImageReferenceMode, type ImageResponseFormat, type UpstreamConfig } from "./_utils";

export type ContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } };

export interface ChatMessage {
  role: "system" | "user";
  content: string | ContentPart[];
}

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  maxTokens: number;
  temperature?: number;
}

/**
 * Builds the user message carrying an image. `inline` embeds the data URI in
 * the text between IMAGE_DATA tags; `structured` sends an image_url part.
 */
export const buildImageMessage = (text: string, dataUri: string, mode: ImageReferenceMode): ChatMessage =>
  mode === "inline"
    ? { role: "user", content: `${text}<IMAGE_DATA>${dataUri}</IMAGE_DATA>` }
    : {
        role: "user",
        content: [
          { type: "text", text },
          { type: "image_url", image_url: { url: dataUri } },
        ],
      };

const withTimeout = async <T>(timeoutMs: number, run: (signal: AbortSignal) => Promise<T>): Promise<T> => {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await run(controller.signal);
  } catch (err) {
    if (err instanceof Error && err.name === "AbortError") {
      throw transportError(`Upstream request timed out after ${timeoutMs}ms`);
    }
    throw err;
  } finally {
    clearTimeout(timeout);
  }
};

const postJson = (config: UpstreamConfig, path: string, body: unknown, label: string) =>
  withTimeout(config.timeoutMs, async (signal) => {
    let response: Response;
    try {
      response = await fetch(`${config.baseUrl}${path}`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${config.apiKey}`,
        },
        body: JSON.stringify(body),
        signal,
      });
    } catch (err) {
      if (err instanceof Error && err.name === "AbortError") throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw transportError(`${label} request failed: ${message}`);
    }

    if (!response.ok) {
      const text = await response.text().catch(() => response.statusText);
      throw transportError(`${label} error (${response.status}): ${text}`);
    }

    const payload: unknown = await response.json().catch(() => null);
    if (payload === null) {
      throw transportError(`${label} returned a non-JSON body`);
    }
    return payload;
  });

const extractMessageContent = (payload: unknown): string => {
  if (!isRecord(payload) || !Array.isArray(payload.choices)) return "";
  const [first] = payload.choices;
  if (!isRecord(first) || !isRecord(first.message)) return "";
  const content = first.message.content;
  if (typeof content === "string") return content.trim();
  if (Array.isArray(content)) {
    return content
      .map((part) => (isRecord(part) && typeof part.text === "string" ? part.text : ""))
      .join("")
      .trim();
  }
  return "";
};

/** Returns the assistant text of the first choice; an empty string when there is none. */
export const createChatCompletion = async (config: UpstreamConfig, request: ChatRequest): Promise<string> => {
  const payload = await postJson(
    config,
    "/chat/completions",
    {
      model: request.model,
      messages: request.messages,
      max_tokens: request.maxTokens,
      temperature: request.temperature ?? 0.4,
    },
    "Completion API",
  );
  return extractMessageContent(payload);
};

export type ImageOutput = { kind: "inline"; base64: string; mimeType: string | null } | { kind: "url"; url: string };

const normalizeImageOutputs = (output: unknown): ImageOutput[] => {
  if (!output) return [];
  if (Array.isArray(output)) {
    return output.flatMap(normalizeImageOutputs);
  }
  if (typeof output === "string") {
    const match = output.match(/^data:([^;,]+);base64,/);
    if (match) return [{ kind: "inline", base64: output, mimeType: match[1] }];
    return /^https?:\/\//.test(output) ? [{ kind: "url", url: output }] : [];
  }
  if (isRecord(output)) {
    if (typeof output.b64_json === "string" && output.b64_json) {
      const mimeType = typeof output.mime_type === "string" ? output.mime_type : null;
      return [{ kind: "inline", base64: output.b64_json, mimeType }];
    }
    if (typeof output.url === "string" && output.url) return [{ kind: "url", url: output.url }];
    if (typeof output.image_url === "string" && output.image_url) return [{ kind: "url", url: output.image_url }];
    if (Array.isArray(output.data)) return output.data.flatMap(normalizeImageOutputs);
    if (Array.isArray(output.images)) return output.images.flatMap(normalizeImageOutputs);
    if (Array.isArray(output.output)) return output.output.flatMap(normalizeImageOutputs);
  }
  return [];
};

export interface ImageRequest {
  model: string;
  prompt: string;
  size: string;
  responseFormat: ImageResponseFormat | null;
}

export const createImage = async (config: UpstreamConfig, request: ImageRequest): Promise<ImageOutput> => {
  const body: Record<string, unknown> = {
    model: request.model,
    prompt: request.prompt,
    size: request.size,
    n: 1,
  };
  if (request.responseFormat) {
    body.response_format = request.responseFormat;
  }

  const payload = await postJson(config, "/images/generations", body, "Image API");
  const [first] = normalizeImageOutputs(payload);
  if (!first) {
    throw transportError("Image API returned no image");
  }
  return first;
};

export const fetchImageBytes = (config: UpstreamConfig, url: string) =>
  withTimeout(config.timeoutMs, async (signal) => {
    let response: Response;
    try {
      response = await fetch(url, { redirect: "follow", signal });
    } catch (err) {
      if (err instanceof Error && err.name === "AbortError") throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw transportError(`Unable to fetch generated image: ${message}`);
    }
    if (!response.ok) {
      throw transportError(`Unable to fetch generated image (status ${response.status})`);
    }
    const contentType = response.headers.get("content-type") || "";
    try {
      return { bytes: new Uint8Array(await response.arrayBuffer()), contentType };
    } catch (err) {
      if (err instanceof Error && err.name === "AbortError") throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw transportError(`Unable to read generated image: ${message}`);
    }
  });
